import { Data } from "effect";

export class ActuatorCommunicationError extends Data.TaggedError("ActuatorCommunicationError")<{
  operation: string;
  message: string;
}> {}

export class SessionInvalidError extends Data.TaggedError("SessionInvalid")<{
  sessionId: number;
  message: string;
}> {}

// Logged only; the loop carries on.
export class ActuatorConvergenceWarning extends Data.TaggedError("ActuatorConvergenceWarning")<{
  requested: number;
  reported: number;
}> {
  public override readonly message = `Amperage mismatch! Set ${this.requested}A but charger reports ${this.reported}A.`;
}

// Internal retryable error (not exposed externally)
export class AmperageNotReflectedError extends Data.TaggedError("AmperageNotReflected")<{
  requested: number;
  reported: number;
}> {}
