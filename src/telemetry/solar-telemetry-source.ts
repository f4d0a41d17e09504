import { Duration, Effect, Layer } from "effect";
import { AppConfig } from "../config.js";
import {
  TelemetrySource,
  TelemetryStore,
  TelemetryUnavailableError,
  type ITelemetrySource,
  type ITelemetryStore,
  type SolarSample,
  type TelemetryMetric,
  type TimeWindow,
} from "./types.js";

export type SolarTelemetryConfig = {
  readonly productionMetric: TelemetryMetric;
  /** Net grid power, positive while importing. */
  readonly gridMetric: TelemetryMetric;
  /** Multiplier from stored units to watts (1000 for kW). */
  readonly unitScale: number;
  readonly derivativeBucket: Duration.Duration;
};

const windowEndingAt = (now: Date, length: Duration.Duration): TimeWindow => ({
  start: new Date(now.getTime() - Duration.toMillis(length)),
  end: now,
});

/**
 * Averages production and grid draw over the control window and estimates the
 * production trend over the slope window. Any missing piece makes the whole
 * estimate unavailable.
 */
export class SolarTelemetrySource implements ITelemetrySource {
  public constructor(
    private readonly store: ITelemetryStore,
    private readonly config: SolarTelemetryConfig,
  ) { }

  public estimate(
    now: Date,
    controlWindowLength: Duration.Duration,
    slopeWindowLength: Duration.Duration,
  ): Effect.Effect<SolarSample, TelemetryUnavailableError> {
    const deps = this;
    const controlWindow = windowEndingAt(now, controlWindowLength);
    const slopeWindow = windowEndingAt(now, slopeWindowLength);

    return Effect.gen(function* () {
      const { productionMetric, gridMetric, unitScale, derivativeBucket } = deps.config;

      const production = yield* deps.store.meanOver(productionMetric, controlWindow);
      const grid = yield* deps.store.meanOver(gridMetric, controlWindow);
      const derivatives = yield* deps.store.derivativeSeries(productionMetric, slopeWindow, derivativeBucket);

      const slopes = derivatives.flatMap((point) => point.value === null ? [] : [point.value]);

      if (slopes.length === 0) {
        return yield* new TelemetryUnavailableError({ reason: 'no production slope samples in window' });
      }

      const averageSlope = slopes.reduce((sum, slope) => sum + slope, 0) / slopes.length;

      return {
        productionW: production * unitScale,
        consumptionW: grid * unitScale,
        // per-second rate in stored units, so scaling alone gives W/s
        slopeWPerS: averageSlope * unitScale,
        controlWindow,
        slopeWindow,
      };
    }).pipe(
      Effect.catchTags({
        DataNotAvailable: (err) => Effect.fail(new TelemetryUnavailableError({ reason: err.message })),
        SourceNotAvailable: (err) => Effect.fail(new TelemetryUnavailableError({ reason: err.message })),
      }),
      Effect.withSpan('telemetry.estimate'),
    );
  }
}

export const SolarTelemetrySourceLayer = Layer.effect(
  TelemetrySource,
  Effect.gen(function* () {
    const config = AppConfig.telemetry;
    const measurement = yield* config.measurement;

    return new SolarTelemetrySource(
      yield* TelemetryStore,
      {
        productionMetric: { measurement, field: yield* config.productionField },
        gridMetric: { measurement, field: yield* config.gridField },
        unitScale: yield* config.unitScale,
        derivativeBucket: Duration.minutes(1),
      },
    );
  })
);
