import { Duration, Effect, Option, Redacted } from "effect";
import { HttpClient, HttpClientRequest, HttpClientResponse, UrlParams } from "@effect/platform";
import { RequestError } from "@effect/platform/HttpClientError";
import { describe, it, expect } from "@effect/vitest";
import { InfluxDbTelemetryStore } from "./influx-db.telemetry-store.js";
import { DataNotAvailableError, SourceNotAvailableError } from "./types.js";
import type { InfluxConnection } from "../influx-db/connection.js";

const connection: InfluxConnection = {
  baseUrl: "http://localhost:8086",
  username: "test-user",
  password: Redacted.make("test-secret"),
  database: "pvs6",
};

const makeMockHttpClient = (response: () => Response) => {
  const requests: HttpClientRequest.HttpClientRequest[] = [];
  const client = HttpClient.make((req) => {
    requests.push(req);
    return Effect.succeed(HttpClientResponse.fromWeb(req, response()));
  });

  return { client, requests };
};

const seriesResponse = (column: string, values: ReadonlyArray<ReadonlyArray<number | null>>) => () => new Response(JSON.stringify({
  results: [{
    statement_id: 0,
    series: [{ name: "sunpower_power", columns: ["time", column], values }],
  }],
}));

const production = { measurement: "sunpower_power", field: "pv_p" };
const controlWindow = { start: new Date(1_700_000_000_000), end: new Date(1_700_000_300_000) };

describe("InfluxDbTelemetryStore", () => {
  it.effect("should query the mean over the window", () => Effect.gen(function* () {
    const { client, requests } = makeMockHttpClient(seriesResponse("mean", [[1_700_000_000_000, 2.5]]));
    const store = new InfluxDbTelemetryStore(connection, client);

    const mean = yield* store.meanOver(production, controlWindow);

    expect(mean).toBe(2.5);
    expect(requests).toHaveLength(1);
    const [request] = requests;
    expect(request?.url).toBe("http://localhost:8086/query");
    expect(request?.method).toBe("GET");
    expect(Option.getOrNull(UrlParams.getFirst(request?.urlParams ?? [], "q"))).toBe(
      'SELECT MEAN("pv_p") FROM "sunpower_power" WHERE time >= 1700000000s and time <= 1700000300s'
    );
    expect(Option.getOrNull(UrlParams.getFirst(request?.urlParams ?? [], "db"))).toBe("pvs6");
    expect(Option.getOrNull(UrlParams.getFirst(request?.urlParams ?? [], "epoch"))).toBe("ms");
    expect(request?.headers["authorization"]).toBe(`Basic ${Buffer.from("test-user:test-secret").toString("base64")}`);
  }));

  it.effect("should fail with DataNotAvailableError when nothing matched", () => Effect.gen(function* () {
    const { client } = makeMockHttpClient(() => new Response(JSON.stringify({ results: [{ statement_id: 0 }] })));
    const store = new InfluxDbTelemetryStore(connection, client);

    const error = yield* Effect.flip(store.meanOver(production, controlWindow));

    expect(error).toBeInstanceOf(DataNotAvailableError);
  }));

  it.effect("should fail with DataNotAvailableError for a null mean", () => Effect.gen(function* () {
    const { client } = makeMockHttpClient(seriesResponse("mean", [[1_700_000_000_000, null]]));
    const store = new InfluxDbTelemetryStore(connection, client);

    const error = yield* Effect.flip(store.meanOver(production, controlWindow));

    expect(error).toBeInstanceOf(DataNotAvailableError);
  }));

  it.effect("should fail with SourceNotAvailableError when the statement is rejected", () => Effect.gen(function* () {
    const { client } = makeMockHttpClient(() => new Response(JSON.stringify({
      results: [{ statement_id: 0, error: "database not found: pvs6" }],
    })));
    const store = new InfluxDbTelemetryStore(connection, client);

    const error = yield* Effect.flip(store.meanOver(production, controlWindow));

    expect(error).toBeInstanceOf(SourceNotAvailableError);
  }));

  it.effect("should fail with SourceNotAvailableError on a non-2xx status", () => Effect.gen(function* () {
    const { client } = makeMockHttpClient(() => new Response("unauthorized", { status: 401 }));
    const store = new InfluxDbTelemetryStore(connection, client);

    const error = yield* Effect.flip(store.meanOver(production, controlWindow));

    expect(error).toBeInstanceOf(SourceNotAvailableError);
  }));

  it.effect("should fail with SourceNotAvailableError if http client returns RequestError", () => Effect.gen(function* () {
    const failingHttpClient: HttpClient.HttpClient = HttpClient.make((req) =>
      Effect.fail(new RequestError({ reason: "Transport", request: req }))
    );
    const store = new InfluxDbTelemetryStore(connection, failingHttpClient);

    const error = yield* Effect.flip(store.meanOver(production, controlWindow));

    expect(error).toBeInstanceOf(SourceNotAvailableError);
  }));

  it.effect("should return the derivative series with gaps as null", () => Effect.gen(function* () {
    const { client, requests } = makeMockHttpClient(seriesResponse("derivative", [
      [1_700_000_060_000, null],
      [1_700_000_120_000, 0.25],
    ]));
    const store = new InfluxDbTelemetryStore(connection, client);
    const slopeWindow = { start: new Date(1_700_000_000_000), end: new Date(1_700_001_800_000) };

    const series = yield* store.derivativeSeries(production, slopeWindow, Duration.minutes(1));

    expect(series).toEqual([
      { time: new Date(1_700_000_060_000), value: null },
      { time: new Date(1_700_000_120_000), value: 0.25 },
    ]);
    expect(Option.getOrNull(UrlParams.getFirst(requests[0]?.urlParams ?? [], "q"))).toBe(
      'SELECT DERIVATIVE(MEAN("pv_p"), 1s) FROM "sunpower_power" '
      + 'WHERE time >= 1700000000s and time <= 1700001800s GROUP BY time(60s) fill(null)'
    );
  }));

  it.effect("should return an empty series when nothing matched", () => Effect.gen(function* () {
    const { client } = makeMockHttpClient(() => new Response(JSON.stringify({ results: [{ statement_id: 0 }] })));
    const store = new InfluxDbTelemetryStore(connection, client);

    const series = yield* store.derivativeSeries(production, controlWindow, Duration.minutes(1));

    expect(series).toEqual([]);
  }));
});
