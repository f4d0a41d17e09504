import { Clock, Effect } from "effect";
import type { IChargerActuator, SessionHandle } from "./types.js";

const DRY_RUN_SESSION_ID = -1;

const dryRunStop = (sessionId: number) => Effect.log(`[dry-run] Stopping charging session ${sessionId}`);

/**
 * Reads go to the real charger, commands are only logged.
 */
export const makeDryRunChargerActuator = (actuator: IChargerActuator): IChargerActuator => ({
  listChargers: () => actuator.listChargers(),
  getStatus: (chargerId) => actuator.getStatus(chargerId),
  getUserChargingStatus: () => actuator.getUserChargingStatus(),

  setAmperage: (chargerId, amperage) => Effect.log(`[dry-run] Setting amperage of charger ${chargerId} to ${amperage}A`),

  startSession: (chargerId) => Effect.gen(function* () {
    yield* Effect.log(`[dry-run] Starting charging session on charger ${chargerId}`);
    const startedAt = new Date(yield* Clock.currentTimeMillis);

    const handle: SessionHandle = {
      sessionId: DRY_RUN_SESSION_ID,
      chargerId,
      startedAt,
      refresh: () => Effect.succeed({ sessionId: DRY_RUN_SESSION_ID, chargerId, startedAt, powerKw: 0 }),
      stop: () => dryRunStop(DRY_RUN_SESSION_ID),
    };

    return handle;
  }),

  attachSession: (sessionId) => actuator.attachSession(sessionId).pipe(
    Effect.map((handle): SessionHandle => ({
      ...handle,
      stop: () => dryRunStop(handle.sessionId),
    })),
  ),
});
