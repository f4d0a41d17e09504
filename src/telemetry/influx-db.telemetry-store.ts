import { Duration, Effect, Layer, Schema } from "effect";
import { HttpClient, HttpClientRequest, HttpClientResponse } from "@effect/platform";
import { loadInfluxConnection, makeInfluxHttpClient, type InfluxConnection } from "../influx-db/connection.js";
import {
  DataNotAvailableError,
  SourceNotAvailableError,
  TelemetryStore,
  type DerivativePoint,
  type ITelemetryStore,
  type TelemetryMetric,
  type TimeWindow,
} from "./types.js";

const CellSchema = Schema.NullOr(Schema.Union(Schema.Number, Schema.String));

const SeriesSchema = Schema.Struct({
  name: Schema.String,
  columns: Schema.Array(Schema.String),
  values: Schema.Array(Schema.Array(CellSchema)),
});

const StatementResultSchema = Schema.Struct({
  statement_id: Schema.Number,
  series: Schema.optional(Schema.Array(SeriesSchema)),
  error: Schema.optional(Schema.String),
});

const QueryResponseSchema = Schema.Struct({
  results: Schema.optional(Schema.Array(StatementResultSchema)),
  error: Schema.optional(Schema.String),
});

type Series = typeof SeriesSchema.Type;
type Cell = typeof CellSchema.Type;

const toEpochSeconds = (date: Date) => Math.floor(date.getTime() / 1000);

const timeClause = (window: TimeWindow) =>
  `time >= ${toEpochSeconds(window.start)}s and time <= ${toEpochSeconds(window.end)}s`;

const meanQuery = (metric: TelemetryMetric, window: TimeWindow) =>
  `SELECT MEAN("${metric.field}") FROM "${metric.measurement}" WHERE ${timeClause(window)}`;

// DERIVATIVE(..., 1s) yields the change per second between consecutive bucket means.
const derivativeQuery = (metric: TelemetryMetric, window: TimeWindow, bucket: Duration.Duration) =>
  `SELECT DERIVATIVE(MEAN("${metric.field}"), 1s) FROM "${metric.measurement}" `
  + `WHERE ${timeClause(window)} GROUP BY time(${Math.round(Duration.toSeconds(bucket))}s) fill(null)`;

const columnValues = (series: Series, column: string): ReadonlyArray<readonly [Cell, Cell]> => {
  const timeIndex = series.columns.indexOf('time');
  const valueIndex = series.columns.indexOf(column);

  if (timeIndex < 0 || valueIndex < 0) {
    return [];
  }

  return series.values.map((row) => [row[timeIndex] ?? null, row[valueIndex] ?? null] as const);
};

export class InfluxDbTelemetryStore implements ITelemetryStore {
  private readonly TIMEOUT_MS = 10000; // 10 seconds timeout
  private readonly client: HttpClient.HttpClient;

  constructor(
    private readonly connection: InfluxConnection,
    httpClient: HttpClient.HttpClient,
  ) {
    this.client = makeInfluxHttpClient(connection, httpClient);
  }

  /** Runs one InfluxQL statement and returns its series, empty when nothing matched. */
  private query(statement: string): Effect.Effect<ReadonlyArray<Series>, SourceNotAvailableError> {
    const request = HttpClientRequest.get('/query').pipe(
      HttpClientRequest.setUrlParams({
        db: this.connection.database,
        q: statement,
        epoch: 'ms',
      }),
    );

    return this.client.execute(request).pipe(
      Effect.flatMap(HttpClientResponse.schemaBodyJson(QueryResponseSchema)),
      Effect.scoped,
      Effect.timeout(Duration.millis(this.TIMEOUT_MS)),
      Effect.retry({ times: 2, while: (err) => err._tag === 'TimeoutException' }),
      Effect.flatMap((response): Effect.Effect<ReadonlyArray<Series>, SourceNotAvailableError> => {
        const result = response.results?.[0];
        const error = response.error ?? result?.error;

        if (error !== undefined) {
          return Effect.logWarning(`InfluxDB rejected query: ${error}`).pipe(
            Effect.zipRight(Effect.fail(new SourceNotAvailableError())),
          );
        }

        return Effect.succeed(result?.series ?? []);
      }),
      Effect.catchTags({
        TimeoutException: () => Effect.fail(new SourceNotAvailableError()),
        RequestError: () => Effect.fail(new SourceNotAvailableError()),
        ResponseError: () => Effect.fail(new SourceNotAvailableError()),
        ParseError: (err) => Effect.logWarning(`Unrecognized response from InfluxDB: ${err.message}`).pipe(
          Effect.zipRight(Effect.fail(new SourceNotAvailableError())),
        ),
      }),
    );
  }

  public meanOver(metric: TelemetryMetric, window: TimeWindow): Effect.Effect<number, DataNotAvailableError | SourceNotAvailableError> {
    return this.query(meanQuery(metric, window)).pipe(
      Effect.flatMap((series): Effect.Effect<number, DataNotAvailableError> => {
        const [first] = series.flatMap((s) => columnValues(s, 'mean'));
        const mean = first?.[1];

        if (typeof mean !== 'number') {
          return Effect.logWarning(`No data found for ${metric.measurement}.${metric.field}`).pipe(
            Effect.zipRight(Effect.fail(new DataNotAvailableError())),
          );
        }

        return Effect.succeed(mean);
      }),
    );
  }

  public derivativeSeries(
    metric: TelemetryMetric,
    window: TimeWindow,
    bucket: Duration.Duration,
  ): Effect.Effect<ReadonlyArray<DerivativePoint>, SourceNotAvailableError> {
    return this.query(derivativeQuery(metric, window, bucket)).pipe(
      Effect.map((series) => series
        .flatMap((s) => columnValues(s, 'derivative'))
        .flatMap(([time, value]): DerivativePoint[] => typeof time === 'number'
          ? [{ time: new Date(time), value: typeof value === 'number' ? value : null }]
          : []
        )
      ),
    );
  }
}

export const InfluxDbTelemetryStoreLayer = Layer.effect(
  TelemetryStore,
  Effect.gen(function* () {
    return new InfluxDbTelemetryStore(
      yield* loadInfluxConnection,
      yield* HttpClient.HttpClient,
    );
  })
);
