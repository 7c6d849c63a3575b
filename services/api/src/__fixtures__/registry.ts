import type { ActivityRegistry } from "@activities/sdk";

export function createTestRegistry(): ActivityRegistry {
  return {
    Basketball: {
      description: "Team sport focusing on basketball skills and competition",
      schedule: "Mondays and Wednesdays, 4:00 PM - 5:30 PM",
      max_participants: 15,
      participants: ["alex@mergington.edu"]
    },
    "Tennis Club": {
      description: "Learn tennis techniques and participate in friendly matches",
      schedule: "Saturdays, 10:00 AM - 12:00 PM",
      max_participants: 10,
      participants: ["lucas@mergington.edu"]
    },
    "Drama Club": {
      description: "Perform in theatrical productions and develop acting skills",
      schedule: "Thursdays, 3:30 PM - 5:00 PM",
      max_participants: 25,
      participants: ["isabella@mergington.edu", "noah@mergington.edu"]
    }
  };
}
