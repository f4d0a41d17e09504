import { describe, it, vitest, beforeEach, expect } from "@effect/vitest";
import type { MockedObject } from "@effect/vitest";
import { Effect, Option } from "effect";
import type { ChargingSession, IChargerActuator, SessionHandle } from "../../charger-actuator/types.js";
import { ActuatorCommunicationError, SessionInvalidError } from "../../charger-actuator/errors.js";
import { makeSessionStateTracker, type SessionStateTracker } from "../../session-state-tracker.js";

const startedAt = new Date('2024-06-01T10:00:00.000Z');

const session = (sessionId: number, powerKw: number): ChargingSession => ({
    sessionId,
    chargerId: 1,
    startedAt,
    powerKw,
});

const makeHandle = (sessionId: number, powerKw = 0) => {
    const refresh = vitest.fn<SessionHandle['refresh']>(() => Effect.succeed(session(sessionId, powerKw)));
    const stop = vitest.fn<SessionHandle['stop']>(() => Effect.void);
    const handle: SessionHandle = { sessionId, chargerId: 1, startedAt, refresh, stop };

    return { handle, refresh, stop };
};

describe('SessionStateTracker', () => {
    const actuatorMock: MockedObject<IChargerActuator> = {
        listChargers: vitest.fn(),
        getStatus: vitest.fn(),
        setAmperage: vitest.fn(),
        startSession: vitest.fn(),
        getUserChargingStatus: vitest.fn(),
        attachSession: vitest.fn(),
    };

    let tracker: SessionStateTracker;

    beforeEach(() => {
        vitest.clearAllMocks();
        actuatorMock.getUserChargingStatus.mockReturnValue(Effect.succeed(Option.none()));
        tracker = makeSessionStateTracker(actuatorMock);
    });

    it.effect('should report no power without a session', () => Effect.gen(function* () {
        expect(tracker.isActive()).toBe(false);
        expect(yield* tracker.currentPowerW()).toBe(0);
        expect(tracker.get()._tag).toBe('None');
    }));

    it.effect('should track a started session and its power draw', () => Effect.gen(function* () {
        const { handle } = makeHandle(7, 1.5);
        actuatorMock.startSession.mockReturnValue(Effect.succeed(handle));

        const started = yield* tracker.start(1);

        expect(started).toEqual(session(7, 0));
        expect(actuatorMock.startSession).toHaveBeenCalledWith(1);
        expect(tracker.isActive()).toBe(true);
        expect(yield* tracker.currentPowerW()).toBe(1500);
    }));

    it.effect('should return the active session instead of starting another', () => Effect.gen(function* () {
        const { handle } = makeHandle(7);
        actuatorMock.startSession.mockReturnValue(Effect.succeed(handle));

        yield* tracker.start(1);
        const second = yield* tracker.start(1);

        expect(second.sessionId).toBe(7);
        expect(actuatorMock.startSession).toHaveBeenCalledTimes(1);
    }));

    it.effect('should stop the session and clear state', () => Effect.gen(function* () {
        const { handle, stop } = makeHandle(7, 2);
        actuatorMock.startSession.mockReturnValue(Effect.succeed(handle));

        yield* tracker.start(1);
        yield* tracker.stop();

        expect(stop).toHaveBeenCalledTimes(1);
        expect(tracker.isActive()).toBe(false);
        expect(yield* tracker.currentPowerW()).toBe(0);
    }));

    it.effect('should do nothing when stopping without a session', () => Effect.gen(function* () {
        yield* tracker.stop();

        expect(tracker.isActive()).toBe(false);
    }));

    it.effect('should keep the session when stopping fails', () => Effect.gen(function* () {
        const { handle, stop } = makeHandle(7);
        stop.mockReturnValue(Effect.fail(new ActuatorCommunicationError({ operation: 'stopSession', message: 'timeout' })));
        actuatorMock.startSession.mockReturnValue(Effect.succeed(handle));

        yield* tracker.start(1);
        const error = yield* Effect.flip(tracker.stop());

        expect(error.operation).toBe('stopSession');
        expect(tracker.isActive()).toBe(true);
    }));

    it.effect('should drop the session when a refresh fails', () => Effect.gen(function* () {
        const { handle, refresh } = makeHandle(7);
        refresh.mockReturnValue(Effect.fail(new SessionInvalidError({ sessionId: 7, message: 'not found' })));
        actuatorMock.startSession.mockReturnValue(Effect.succeed(handle));

        yield* tracker.start(1);
        const refreshed = yield* tracker.refresh();

        expect(Option.isNone(refreshed)).toBe(true);
        expect(tracker.isActive()).toBe(false);
        expect(yield* tracker.currentPowerW()).toBe(0);
    }));

    it.effect('should adopt an existing session on initialize', () => Effect.gen(function* () {
        const { handle } = makeHandle(42, 0.5);
        actuatorMock.getUserChargingStatus.mockReturnValue(Effect.succeed(Option.some({ sessionId: 42 })));
        actuatorMock.attachSession.mockReturnValue(Effect.succeed(handle));

        yield* tracker.initialize();

        expect(actuatorMock.attachSession).toHaveBeenCalledWith(42);
        expect(tracker.isActive()).toBe(true);
        expect(yield* tracker.currentPowerW()).toBe(500);
    }));

    it.effect('should stay idle when no session exists on initialize', () => Effect.gen(function* () {
        yield* tracker.initialize();

        expect(actuatorMock.attachSession).not.toHaveBeenCalled();
        expect(tracker.isActive()).toBe(false);
    }));

    it.effect('should only log when initialize cannot reach the charger', () => Effect.gen(function* () {
        actuatorMock.getUserChargingStatus.mockReturnValue(
            Effect.fail(new ActuatorCommunicationError({ operation: 'getUserChargingStatus', message: 'connection refused' }))
        );

        yield* tracker.initialize();

        expect(tracker.isActive()).toBe(false);
    }));
});
