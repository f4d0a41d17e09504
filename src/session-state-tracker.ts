import { Context, Data, Effect, Layer, Option } from 'effect';
import { ChargerActuator, type ChargingSession, type IChargerActuator, type SessionHandle } from './charger-actuator/types.js';
import type { ActuatorCommunicationError } from './charger-actuator/errors.js';

export type SessionState = Data.TaggedEnum<{
  None: {};
  Active: { readonly handle: SessionHandle; readonly session: ChargingSession };
}>;

export const SessionState = Data.taggedEnum<SessionState>();

export type SessionStateTracker = {
  /** Adopts a session that was already running before startup. */
  readonly initialize: () => Effect.Effect<void>;
  readonly start: (chargerId: number) => Effect.Effect<ChargingSession, ActuatorCommunicationError>;
  readonly stop: () => Effect.Effect<void, ActuatorCommunicationError>;
  /** A failed refresh drops the session rather than failing. */
  readonly refresh: () => Effect.Effect<Option.Option<ChargingSession>>;
  readonly currentPowerW: () => Effect.Effect<number>;
  readonly isActive: () => boolean;
  readonly get: () => SessionState;
};

export const SessionStateTracker = Context.GenericTag<SessionStateTracker>('@solar-charge-controller/SessionStateTracker');

export const makeSessionStateTracker = (actuator: IChargerActuator): SessionStateTracker => {
  let state: SessionState = SessionState.None();

  const activate = (handle: SessionHandle): ChargingSession => {
    const session: ChargingSession = {
      sessionId: handle.sessionId,
      chargerId: handle.chargerId,
      startedAt: handle.startedAt,
      powerKw: 0,
    };
    state = SessionState.Active({ handle, session });
    return session;
  };

  const initialize = () =>
    Effect.gen(function* () {
      const chargingStatus = yield* actuator.getUserChargingStatus();

      if (Option.isNone(chargingStatus)) {
        yield* Effect.log('No active charging session found.');
        return;
      }

      const handle = yield* actuator.attachSession(chargingStatus.value.sessionId);
      activate(handle);
      yield* Effect.log(`Found and adopted existing charging session: ${handle.sessionId}`);
    }).pipe(
      Effect.catchAll((err) => Effect.logWarning(`Failed to check for existing charging session: ${err.message}`)),
    );

  const start = (chargerId: number) =>
    Effect.gen(function* () {
      const current = state;

      if (current._tag === 'Active') {
        yield* Effect.logWarning(`Charging session ${current.session.sessionId} is already active; not starting another.`);
        return current.session;
      }

      const handle = yield* actuator.startSession(chargerId);
      const session = activate(handle);
      yield* Effect.log(`Started charging session: ${handle.sessionId}`);

      return session;
    });

  const stop = () =>
    Effect.gen(function* () {
      const current = state;

      if (current._tag === 'None') {
        return;
      }

      yield* current.handle.stop();
      state = SessionState.None();
      yield* Effect.log(`Stopped charging session ${current.session.sessionId} and cleared state.`);
    });

  const refresh = () =>
    Effect.gen(function* () {
      const current = state;

      if (current._tag === 'None') {
        return Option.none<ChargingSession>();
      }

      return yield* current.handle.refresh().pipe(
        Effect.map((session) => {
          state = SessionState.Active({ handle: current.handle, session });
          return Option.some(session);
        }),
        Effect.catchTag('SessionInvalid', (err) =>
          Effect.logWarning(`Failed to refresh charging session ${err.sessionId}: ${err.message}. Clearing it.`).pipe(
            Effect.map(() => {
              state = SessionState.None();
              return Option.none<ChargingSession>();
            }),
          )
        ),
      );
    });

  const currentPowerW = () =>
    refresh().pipe(
      Effect.map(Option.match({
        onNone: () => 0,
        onSome: (session) => session.powerKw * 1000,
      })),
      Effect.tap((watts) => Effect.logDebug(`Current charging power: ${watts}W`)),
    );

  return {
    initialize,
    start,
    stop,
    refresh,
    currentPowerW,
    isActive: () => state._tag === 'Active',
    get: () => state,
  };
};

export const SessionStateTrackerLayer = Layer.effect(
  SessionStateTracker,
  Effect.map(ChargerActuator, makeSessionStateTracker),
);
