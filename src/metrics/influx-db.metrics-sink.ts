import { Clock, Duration, Effect, Layer, Option } from "effect";
import { HttpClient, HttpClientRequest } from "@effect/platform";
import { loadInfluxConnection, makeInfluxHttpClient, type InfluxConnection } from "../influx-db/connection.js";
import { MetricsSink, type IMetricsSink, type MetricField, type MetricFields } from "./types.js";

const escapeMeasurement = (name: string) => name.replace(/[, ]/g, (char) => `\\${char}`);
const escapeFieldKey = (key: string) => key.replace(/[,= ]/g, (char) => `\\${char}`);

const formatFieldValue = (field: MetricField) =>
  field.type === 'integer' ? `${Math.trunc(field.value)}i` : `${field.value}`;

/**
 * Encodes one point in InfluxDB line protocol. Non-finite values are dropped;
 * none when no field is left.
 */
export const toLineProtocol = (measurement: string, fields: MetricFields, timestampMs: number): Option.Option<string> => {
  const encodedFields = Object.entries(fields)
    .filter(([, field]) => Number.isFinite(field.value))
    .map(([key, field]) => `${escapeFieldKey(key)}=${formatFieldValue(field)}`);

  if (encodedFields.length === 0) {
    return Option.none();
  }

  return Option.some(`${escapeMeasurement(measurement)} ${encodedFields.join(',')} ${Math.trunc(timestampMs)}`);
};

export class InfluxDbMetricsSink implements IMetricsSink {
  private readonly TIMEOUT_MS = 5_000;
  private readonly client: HttpClient.HttpClient;

  constructor(
    private readonly connection: InfluxConnection,
    httpClient: HttpClient.HttpClient,
  ) {
    this.client = makeInfluxHttpClient(connection, httpClient);
  }

  public write(measurement: string, fields: MetricFields): Effect.Effect<void> {
    const deps = this;

    return Effect.gen(function* () {
      const line = toLineProtocol(measurement, fields, yield* Clock.currentTimeMillis);

      if (Option.isNone(line)) {
        return;
      }

      const request = HttpClientRequest.post('/write').pipe(
        HttpClientRequest.setUrlParams({ db: deps.connection.database, precision: 'ms' }),
        HttpClientRequest.bodyText(line.value, 'text/plain'),
      );

      yield* deps.client.execute(request).pipe(
        Effect.scoped,
        Effect.timeout(Duration.millis(deps.TIMEOUT_MS)),
      );
    }).pipe(
      Effect.catchAll((err) => Effect.logWarning(`Failed to write control metrics to InfluxDB: ${err.message}`)),
    );
  }
}

export const InfluxDbMetricsSinkLayer = Layer.effect(
  MetricsSink,
  Effect.gen(function* () {
    return new InfluxDbMetricsSink(
      yield* loadInfluxConnection,
      yield* HttpClient.HttpClient,
    );
  })
);
