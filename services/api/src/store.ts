import type { Activity, ActivityRegistry } from "@activities/sdk";
import { ActivityFullError, ActivityNotFoundError, AlreadySignedUpError, NotRegisteredError } from "./errors";
import { KeyedLock } from "./lock";

export class ActivityStore {
  private readonly activities: Map<string, Activity>;
  private readonly lock = new KeyedLock();

  constructor(seed: ActivityRegistry) {
    this.activities = new Map(Object.entries(structuredClone(seed)));
  }

  list(): ActivityRegistry {
    return structuredClone(Object.fromEntries(this.activities));
  }

  get(name: string): Activity | null {
    const activity = this.activities.get(name);
    return activity ? structuredClone(activity) : null;
  }

  size(): number {
    return this.activities.size;
  }

  signup(name: string, email: string): Promise<string> {
    return this.lock.runExclusive(name, () => {
      const activity = this.require(name);
      if (activity.participants.includes(email)) {
        throw new AlreadySignedUpError();
      }
      if (activity.participants.length >= activity.max_participants) {
        throw new ActivityFullError();
      }
      activity.participants.push(email);
      return `Signed up ${email} for ${name}`;
    });
  }

  unregister(name: string, email: string): Promise<string> {
    return this.lock.runExclusive(name, () => {
      const activity = this.require(name);
      const index = activity.participants.indexOf(email);
      if (index === -1) {
        throw new NotRegisteredError();
      }
      activity.participants.splice(index, 1);
      return `Unregistered ${email} from ${name}`;
    });
  }

  private require(name: string): Activity {
    const activity = this.activities.get(name);
    if (!activity) throw new ActivityNotFoundError();
    return activity;
  }
}
