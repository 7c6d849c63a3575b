export class RegistryError extends Error {
  readonly status: number;

  constructor(message: string, status: number) {
    super(message);
    this.name = new.target.name;
    this.status = status;
  }
}

export class ActivityNotFoundError extends RegistryError {
  constructor() {
    super("Activity not found", 404);
  }
}

export class AlreadySignedUpError extends RegistryError {
  constructor() {
    super("Student is already signed up for this activity", 400);
  }
}

export class NotRegisteredError extends RegistryError {
  constructor() {
    super("Student is not registered for this activity", 400);
  }
}

export class ActivityFullError extends RegistryError {
  constructor() {
    super("Activity is full", 400);
  }
}
