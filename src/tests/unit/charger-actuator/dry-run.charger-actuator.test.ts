import { describe, it, vitest, beforeEach, expect } from "@effect/vitest";
import type { MockedObject } from "@effect/vitest";
import { Effect } from "effect";
import type { ChargerStatus, IChargerActuator, SessionHandle } from "../../../charger-actuator/types.js";
import { makeDryRunChargerActuator } from "../../../charger-actuator/dry-run.charger-actuator.js";

describe('makeDryRunChargerActuator', () => {
    const actuatorMock: MockedObject<IChargerActuator> = {
        listChargers: vitest.fn(),
        getStatus: vitest.fn(),
        setAmperage: vitest.fn(),
        startSession: vitest.fn(),
        getUserChargingStatus: vitest.fn(),
        attachSession: vitest.fn(),
    };

    const status: ChargerStatus = {
        chargerId: 1,
        amperageLimit: 16,
        possibleAmperageLimits: [8, 16],
        pluggedIn: true,
        chargingStatus: 'CHARGING',
    };

    let dryRun: IChargerActuator;

    beforeEach(() => {
        vitest.clearAllMocks();
        actuatorMock.getStatus.mockReturnValue(Effect.succeed(status));
        dryRun = makeDryRunChargerActuator(actuatorMock);
    });

    it.effect('should read from the real charger', () => Effect.gen(function* () {
        expect(yield* dryRun.getStatus(1)).toEqual(status);
        expect(actuatorMock.getStatus).toHaveBeenCalledWith(1);
    }));

    it.effect('should not send commands', () => Effect.gen(function* () {
        yield* dryRun.setAmperage(1, 8);
        const handle = yield* dryRun.startSession(1);
        yield* handle.stop();

        expect(handle.sessionId).toBe(-1);
        expect((yield* handle.refresh()).powerKw).toBe(0);
        expect(actuatorMock.setAmperage).not.toHaveBeenCalled();
        expect(actuatorMock.startSession).not.toHaveBeenCalled();
    }));

    it.effect('should not stop an adopted session', () => Effect.gen(function* () {
        const stop = vitest.fn<SessionHandle['stop']>(() => Effect.void);
        actuatorMock.attachSession.mockReturnValue(Effect.succeed({
            sessionId: 42,
            chargerId: 1,
            startedAt: new Date(0),
            refresh: () => Effect.succeed({ sessionId: 42, chargerId: 1, startedAt: new Date(0), powerKw: 1.5 }),
            stop,
        }));

        const handle = yield* dryRun.attachSession(42);
        yield* handle.stop();

        expect(handle.sessionId).toBe(42);
        expect((yield* handle.refresh()).powerKw).toBe(1.5);
        expect(stop).not.toHaveBeenCalled();
    }));
});
