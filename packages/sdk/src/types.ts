export type Activity = {
  description: string;
  schedule: string;
  max_participants: number;
  participants: string[];
};

export type ActivityRegistry = Record<string, Activity>;

export type MessageResponse = {
  message: string;
};

export type ErrorResponse = {
  detail: unknown;
};
