import { Context, Effect, Option } from "effect";
import type { ActuatorCommunicationError, SessionInvalidError } from "./errors.js";
import type { ChargerStatus, ChargingSession } from "./schema.js";

export type { ChargerStatus, ChargingSession, ChargingStatus } from "./schema.js";

export type SessionHandle = {
  readonly sessionId: number;
  readonly chargerId: number;
  readonly startedAt: Date;
  readonly refresh: () => Effect.Effect<ChargingSession, SessionInvalidError>;
  readonly stop: () => Effect.Effect<void, ActuatorCommunicationError>;
};

export type UserChargingStatus = {
  readonly sessionId: number;
};

export class ChargerActuator extends Context.Tag("ChargerActuator")<
  ChargerActuator,
  {
    readonly listChargers: () => Effect.Effect<ReadonlyArray<number>, ActuatorCommunicationError>;
    readonly getStatus: (chargerId: number) => Effect.Effect<ChargerStatus, ActuatorCommunicationError>;
    /** Resolves once the charger reports the requested limit. */
    readonly setAmperage: (chargerId: number, amperage: number) => Effect.Effect<void, ActuatorCommunicationError>;
    readonly startSession: (chargerId: number) => Effect.Effect<SessionHandle, ActuatorCommunicationError>;
    readonly getUserChargingStatus: () => Effect.Effect<Option.Option<UserChargingStatus>, ActuatorCommunicationError>;
    readonly attachSession: (sessionId: number) => Effect.Effect<SessionHandle, ActuatorCommunicationError>;
  }>
(){}

export type IChargerActuator = Context.Tag.Service<typeof ChargerActuator>;
