import { HttpClient, HttpClientRequest } from "@effect/platform";
import { Effect, Redacted, flow } from "effect";
import { AppConfig } from "../config.js";

export type InfluxConnection = {
  readonly baseUrl: string;
  readonly username: string;
  readonly password: Redacted.Redacted;
  readonly database: string;
};

export const loadInfluxConnection = Effect.gen(function* () {
  const config = AppConfig.influx;

  const connection: InfluxConnection = {
    baseUrl: `${yield* config.protocol}://${yield* config.host}:${yield* config.port}`,
    username: yield* config.username,
    password: yield* config.password,
    database: yield* config.database,
  };

  return connection;
});

/**
 * InfluxDB 1.x HTTP API client: basic auth, non-2xx responses fail.
 */
export const makeInfluxHttpClient = (connection: InfluxConnection, httpClient: HttpClient.HttpClient): HttpClient.HttpClient =>
  httpClient.pipe(
    HttpClient.filterStatusOk,
    HttpClient.mapRequest(flow(
      HttpClientRequest.prependUrl(connection.baseUrl),
      HttpClientRequest.basicAuth(connection.username, Redacted.value(connection.password)),
    )),
  );
