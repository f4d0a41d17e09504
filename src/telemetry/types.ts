import { Context, Data, Duration, Effect } from "effect";

export type TelemetryMetric = {
  readonly measurement: string;
  readonly field: string;
};

export type TimeWindow = {
  readonly start: Date;
  readonly end: Date;
};

export type DerivativePoint = {
  readonly time: Date;
  readonly value: number | null;
};

export class DataNotAvailableError extends Data.TaggedError("DataNotAvailable") {
  public override readonly message = 'No data found to determine the result.';
}
export class SourceNotAvailableError extends Data.TaggedError("SourceNotAvailable") {
  public override readonly message = 'Could not connect to the Data Source. Check if the source is running.';
}

export class TelemetryStore extends Context.Tag("TelemetryStore")<
  TelemetryStore,
  {
    readonly meanOver: (metric: TelemetryMetric, window: TimeWindow) => Effect.Effect<number, DataNotAvailableError | SourceNotAvailableError>;
    readonly derivativeSeries: (
      metric: TelemetryMetric,
      window: TimeWindow,
      bucket: Duration.Duration,
    ) => Effect.Effect<ReadonlyArray<DerivativePoint>, SourceNotAvailableError>;
  }>
(){}

export type ITelemetryStore = Context.Tag.Service<typeof TelemetryStore>;

/** Power figures in watts, averaged over the control window. */
export type SolarSample = {
  readonly productionW: number;
  /** Net grid draw; negative while exporting. */
  readonly consumptionW: number;
  readonly slopeWPerS: number;
  readonly controlWindow: TimeWindow;
  readonly slopeWindow: TimeWindow;
};

export class TelemetryUnavailableError extends Data.TaggedError("TelemetryUnavailable")<{
  reason: string;
}> {
  public override readonly message = `Telemetry unavailable: ${this.reason}`;
}

export class TelemetrySource extends Context.Tag("TelemetrySource")<
  TelemetrySource,
  {
    readonly estimate: (
      now: Date,
      controlWindow: Duration.Duration,
      slopeWindow: Duration.Duration,
    ) => Effect.Effect<SolarSample, TelemetryUnavailableError>;
  }>
(){}

export type ITelemetrySource = Context.Tag.Service<typeof TelemetrySource>;
