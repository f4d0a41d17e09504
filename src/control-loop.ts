import { Clock, Data, Duration, Effect, Either } from 'effect';
import type { ChargerStatus, IChargerActuator } from './charger-actuator/types.js';
import { ActuatorConvergenceWarning, type ActuatorCommunicationError } from './charger-actuator/errors.js';
import { highestStep, lowestStep, requireAmperageLadder } from './charging-speed-controller/amperage-decider.js';
import { determineTargetAmperage, type TargetAmperage } from './charging-speed-controller/target-amperage.js';
import type { IEventLogger } from './event-logger/types.js';
import { EventLogger } from './event-logger/index.js';
import type { IMetricsSink } from './metrics/types.js';
import { float, integer } from './metrics/types.js';
import type { SessionStateTracker } from './session-state-tracker.js';
import type { ITelemetrySource } from './telemetry/types.js';
import { fixedDelayRetry } from './retry.js';

export type ControlLoopSettings = {
  readonly chargerId: number;
  readonly tickInterval: Duration.Duration;
  /** Averaging window, extrapolation horizon and minimum gap between actuations. */
  readonly controlInterval: Duration.Duration;
  readonly slopeWindow: Duration.Duration;
  readonly voltage: number;
  readonly lowProductionThresholdW: number;
  readonly metricsMeasurement: string;
};

type ActuationState = {
  lastActuationAtMs: number | null;
  lastSetAmperage: number | null;
};

export type ControlDecision = {
  readonly targetAmps: number;
  readonly confirmedAmps: number;
  readonly timestamp: Date;
};

export type ActuationOutcome = Data.TaggedEnum<{
  NotDue: {};
  ManualOverride: { readonly amperage: number };
  Applied: { readonly decision: ControlDecision };
  Failed: { readonly error: ActuatorCommunicationError };
}>;

export const ActuationOutcome = Data.taggedEnum<ActuationOutcome>();

export type TickOutcome = Data.TaggedEnum<{
  TelemetryUnavailable: {};
  Completed: {
    readonly target: TargetAmperage;
    readonly predictedExcessW: number;
    readonly actuation: ActuationOutcome;
    readonly confirmedAmps: number;
  };
}>;

export const TickOutcome = Data.taggedEnum<TickOutcome>();

/**
 * Best-effort detection of an operator change: the charger is running at the
 * top step and the controller did not ask for it. A ladder whose top step is
 * the everyday rate will trip this too.
 */
export const isManualOverride = (status: ChargerStatus, maxAmperage: number, lastSetAmperage: number | null) =>
  status.chargingStatus === 'CHARGING'
  && status.amperageLimit === maxAmperage
  && lastSetAmperage !== maxAmperage;

export class ControlLoop {
  private actuationState: ActuationState = {
    lastActuationAtMs: null,
    lastSetAmperage: null,
  };

  public constructor(
    private readonly actuator: IChargerActuator,
    private readonly telemetrySource: ITelemetrySource,
    private readonly sessionTracker: SessionStateTracker,
    private readonly metricsSink: IMetricsSink,
    private readonly settings: ControlLoopSettings,
    private readonly eventLogger: IEventLogger = new EventLogger(),
  ) { }

  /**
   * Ticks forever. A failed tick is logged and retried after a full control
   * interval.
   */
  public run(): Effect.Effect<never, ActuatorCommunicationError> {
    const { tickInterval, controlInterval } = this.settings;

    return this.tick().pipe(
      Effect.tapError((err) => Effect.logError(`Error in control loop: ${err.message}`)),
      Effect.retry(fixedDelayRetry({ delay: controlInterval })),
      Effect.flatMap((outcome) => Effect.sleep(
        outcome._tag === 'TelemetryUnavailable' ? controlInterval : tickInterval
      )),
      Effect.forever,
    );
  }

  public tick(): Effect.Effect<TickOutcome, ActuatorCommunicationError> {
    const deps = this;
    const { chargerId, controlInterval, slopeWindow, voltage, lowProductionThresholdW } = this.settings;

    return Effect.gen(function* () {
      const now = yield* Clock.currentTimeMillis;

      const estimate = yield* Effect.either(
        deps.telemetrySource.estimate(new Date(now), controlInterval, slopeWindow)
      );

      if (Either.isLeft(estimate)) {
        yield* deps.eventLogger.onTelemetryUnavailable(estimate.left);
        return TickOutcome.TelemetryUnavailable();
      }

      const sample = estimate.right;
      const status = yield* deps.actuator.getStatus(chargerId);
      const ladder = yield* requireAmperageLadder(status);

      const currentChargingW = yield* deps.sessionTracker.currentPowerW();
      const averageExcessW = -(sample.consumptionW - currentChargingW);
      const predictedExcessW = averageExcessW + sample.slopeWPerS * Duration.toSeconds(controlInterval);

      yield* deps.eventLogger.onSolarEstimate({
        sample,
        controlIntervalMinutes: Duration.toMinutes(controlInterval),
        currentChargingW,
        averageExcessW,
        predictedExcessW,
      });

      const target = determineTargetAmperage({
        productionW: sample.productionW,
        predictedExcessW,
        ladder,
        voltage,
        lowProductionThresholdW,
      });

      yield* deps.eventLogger.onTargetDetermined(target);

      const actuation = yield* deps.actuateIfDue(status, highestStep(ladder), lowestStep(ladder), target.amperage, now);

      const { amperageLimit: confirmedAmps } = yield* deps.actuator.getStatus(chargerId);

      yield* deps.metricsSink.write(deps.settings.metricsMeasurement, {
        solar_slope_w_per_s: float(sample.slopeWPerS),
        excess_solar_watts: float(predictedExcessW),
        charging_power_watts: float(currentChargingW),
        target_amperage: integer(target.amperage),
        current_amperage: integer(confirmedAmps),
      });

      yield* Effect.annotateCurrentSpan({
        targetAmps: target.amperage,
        confirmedAmps,
        actuation: actuation._tag,
      });

      return TickOutcome.Completed({ target, predictedExcessW, actuation, confirmedAmps });
    }).pipe(
      Effect.withSpan('controlLoop.tick'),
    );
  }

  private actuateIfDue(
    status: ChargerStatus,
    maxAmperage: number,
    minAmperage: number,
    targetAmps: number,
    nowMs: number,
  ): Effect.Effect<ActuationOutcome> {
    const deps = this;

    return Effect.gen(function* () {
      const { lastActuationAtMs, lastSetAmperage } = deps.actuationState;

      if (lastActuationAtMs !== null && nowMs - lastActuationAtMs < Duration.toMillis(deps.settings.controlInterval)) {
        return ActuationOutcome.NotDue();
      }

      if (isManualOverride(status, maxAmperage, lastSetAmperage)) {
        yield* deps.eventLogger.onManualOverride(status.amperageLimit);
        return ActuationOutcome.ManualOverride({ amperage: status.amperageLimit });
      }

      return yield* deps.applyChargingDecision(status, targetAmps, minAmperage).pipe(
        Effect.map((confirmedAmps) => {
          deps.actuationState = { lastActuationAtMs: nowMs, lastSetAmperage: targetAmps };
          return ActuationOutcome.Applied({
            decision: { targetAmps, confirmedAmps, timestamp: new Date(nowMs) },
          });
        }),
        // the attempt still uses up this interval
        Effect.catchTag('ActuatorCommunicationError', (error) => {
          deps.actuationState = { ...deps.actuationState, lastActuationAtMs: nowMs };
          return deps.eventLogger.onActuationFailed(error).pipe(
            Effect.as(ActuationOutcome.Failed({ error })),
          );
        }),
      );
    });
  }

  /**
   * Drives the charger towards `targetAmps` and returns the amperage it
   * confirmed (0 when charging is stopped).
   */
  public applyChargingDecision(
    status: ChargerStatus,
    targetAmps: number,
    minAmperage: number,
  ): Effect.Effect<number, ActuatorCommunicationError> {
    const deps = this;
    const { chargerId } = this.settings;
    const currentAmperage = status.amperageLimit;

    return Effect.gen(function* () {
      if (targetAmps === 0) {
        if (deps.sessionTracker.isActive()) {
          yield* deps.sessionTracker.stop();
        } else if (currentAmperage !== minAmperage) {
          yield* deps.actuator.setAmperage(chargerId, minAmperage);
          yield* Effect.log(`Amperage set to minimum of ${minAmperage}A.`);
        } else {
          yield* Effect.log('Already not charging.');
        }

        return 0;
      }

      let confirmedAmps = currentAmperage;

      if (currentAmperage !== targetAmps) {
        yield* deps.eventLogger.onSetAmperage(currentAmperage, targetAmps);

        // amperage changes must not straddle a live session
        yield* deps.sessionTracker.stop();
        yield* deps.actuator.setAmperage(chargerId, targetAmps);
        // kept even if a later step of this actuation fails
        deps.actuationState = { ...deps.actuationState, lastSetAmperage: targetAmps };

        confirmedAmps = (yield* deps.actuator.getStatus(chargerId)).amperageLimit;

        if (confirmedAmps === targetAmps) {
          yield* deps.eventLogger.onAmperageConfirmed(confirmedAmps);
        } else {
          yield* deps.eventLogger.onAmperageMismatch(
            new ActuatorConvergenceWarning({ requested: targetAmps, reported: confirmedAmps })
          );
        }
      } else {
        yield* deps.eventLogger.onNoAmperageChange(currentAmperage);
      }

      if (!deps.sessionTracker.isActive() && status.pluggedIn) {
        yield* deps.sessionTracker.start(chargerId);
      }

      return confirmedAmps;
    }).pipe(
      Effect.withSpan('controlLoop.applyChargingDecision', { attributes: { targetAmps, currentAmperage } }),
    );
  }
}
