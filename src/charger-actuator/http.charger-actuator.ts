import { Duration, Effect, Layer, Option, Redacted, Schema, flow } from "effect";
import { HttpClient, HttpClientRequest, HttpClientResponse } from "@effect/platform";
import { AppConfig } from "../config.js";
import { fixedDelayRetry, type FixedDelayRetryOptions } from "../retry.js";
import { ActuatorCommunicationError, AmperageNotReflectedError, SessionInvalidError } from "./errors.js";
import {
  AmperageLimitResponseSchema,
  ChargerListResponseSchema,
  ChargerStatusSchema,
  ChargingSessionSchema,
  SessionStartedResponseSchema,
  UserChargingStatusResponseSchema,
} from "./schema.js";
import { ChargerActuator, type ChargerStatus, type IChargerActuator, type SessionHandle, type UserChargingStatus } from "./types.js";

export type ChargerApiConfig = {
  readonly baseUrl: string;
  readonly token: Redacted.Redacted;
  readonly amperageRetry: FixedDelayRetryOptions;
};

/**
 * Talks to a charger API bridge over JSON. Reads are retried on timeouts and
 * transport errors; writes are sent once.
 */
export class HttpChargerActuator implements IChargerActuator {
  private readonly TIMEOUT_MS = 10_000;
  private readonly client: HttpClient.HttpClient;

  constructor(
    private readonly config: ChargerApiConfig,
    httpClient: HttpClient.HttpClient,
  ) {
    this.client = httpClient.pipe(
      HttpClient.filterStatusOk,
      HttpClient.mapRequest(flow(
        HttpClientRequest.prependUrl(config.baseUrl),
        HttpClientRequest.bearerToken(Redacted.value(config.token)),
        HttpClientRequest.acceptJson,
      )),
    );
  }

  private send<A, I>(request: HttpClientRequest.HttpClientRequest, schema: Schema.Schema<A, I>) {
    return this.client.execute(request).pipe(
      Effect.flatMap(HttpClientResponse.schemaBodyJson(schema)),
      Effect.scoped,
      Effect.timeout(Duration.millis(this.TIMEOUT_MS)),
    );
  }

  private read<A, I>(
    operation: string,
    request: HttpClientRequest.HttpClientRequest,
    schema: Schema.Schema<A, I>,
  ): Effect.Effect<A, ActuatorCommunicationError> {
    return this.send(request, schema).pipe(
      Effect.retry({
        times: 2,
        while: (err) => err._tag === 'TimeoutException' || (err._tag === 'RequestError' && err.reason === 'Transport'),
      }),
      Effect.mapError((err) => new ActuatorCommunicationError({ operation, message: err.message })),
    );
  }

  private write<A, I>(
    operation: string,
    request: HttpClientRequest.HttpClientRequest,
    schema: Schema.Schema<A, I>,
  ): Effect.Effect<A, ActuatorCommunicationError> {
    return this.send(request, schema).pipe(
      Effect.mapError((err) => new ActuatorCommunicationError({ operation, message: err.message })),
    );
  }

  public listChargers(): Effect.Effect<ReadonlyArray<number>, ActuatorCommunicationError> {
    return this.read('listChargers', HttpClientRequest.get('/chargers'), ChargerListResponseSchema).pipe(
      Effect.map(({ chargers }) => chargers),
    );
  }

  public getStatus(chargerId: number): Effect.Effect<ChargerStatus, ActuatorCommunicationError> {
    return this.read('getStatus', HttpClientRequest.get(`/chargers/${chargerId}/status`), ChargerStatusSchema);
  }

  public setAmperage(chargerId: number, amperage: number): Effect.Effect<void, ActuatorCommunicationError> {
    const deps = this;

    return Effect.gen(function* () {
      const result = yield* deps.write(
        'setAmperage',
        HttpClientRequest.put(`/chargers/${chargerId}/amperage-limit`).pipe(
          HttpClientRequest.bodyUnsafeJson({ amperage_limit: amperage }),
        ),
        AmperageLimitResponseSchema,
      );

      // The API can return 200 but still have a failure status.
      if (result.status !== 'success') {
        return yield* new ActuatorCommunicationError({
          operation: 'setAmperage',
          message: `Failed to set amperage limit: ${result.status} (${result.message ?? 'empty message'})`,
        });
      }

      yield* deps.awaitAmperage(chargerId, amperage);
    }).pipe(
      Effect.withSpan('charger.setAmperage', { attributes: { chargerId, amperage } }),
    );
  }

  private awaitAmperage(chargerId: number, amperage: number): Effect.Effect<void, ActuatorCommunicationError> {
    return this.getStatus(chargerId).pipe(
      Effect.flatMap((status) => status.amperageLimit === amperage
        ? Effect.void
        : Effect.fail(new AmperageNotReflectedError({ requested: amperage, reported: status.amperageLimit }))
      ),
      Effect.retry({
        schedule: fixedDelayRetry(this.config.amperageRetry),
        while: (err) => err._tag === 'AmperageNotReflected',
      }),
      Effect.catchTag('AmperageNotReflected', (err) => Effect.fail(new ActuatorCommunicationError({
        operation: 'setAmperage',
        message: `Charger still reports ${err.reported}A after requesting ${err.requested}A`,
      }))),
    );
  }

  public startSession(chargerId: number): Effect.Effect<SessionHandle, ActuatorCommunicationError> {
    return this.write('startSession', HttpClientRequest.post(`/chargers/${chargerId}/sessions`), SessionStartedResponseSchema).pipe(
      Effect.map((started) => this.sessionHandle(started.sessionId, started.chargerId, started.startedAt)),
    );
  }

  public getUserChargingStatus(): Effect.Effect<Option.Option<UserChargingStatus>, ActuatorCommunicationError> {
    return this.read('getUserChargingStatus', HttpClientRequest.get('/user/charging-status'), UserChargingStatusResponseSchema).pipe(
      Effect.map(({ sessionId }) => Option.map(sessionId, (id) => ({ sessionId: id }))),
    );
  }

  public attachSession(sessionId: number): Effect.Effect<SessionHandle, ActuatorCommunicationError> {
    return this.fetchSession(sessionId).pipe(
      Effect.map((session) => this.sessionHandle(session.sessionId, session.chargerId, session.startedAt)),
    );
  }

  private fetchSession(sessionId: number) {
    return this.read('getSession', HttpClientRequest.get(`/sessions/${sessionId}`), ChargingSessionSchema);
  }

  private sessionHandle(sessionId: number, chargerId: number, startedAt: Date): SessionHandle {
    return {
      sessionId,
      chargerId,
      startedAt,
      refresh: () => this.fetchSession(sessionId).pipe(
        Effect.mapError((err) => new SessionInvalidError({ sessionId, message: err.message })),
      ),
      stop: () => this.client.execute(HttpClientRequest.del(`/sessions/${sessionId}`)).pipe(
        Effect.scoped,
        Effect.timeout(Duration.millis(this.TIMEOUT_MS)),
        Effect.asVoid,
        Effect.mapError((err) => new ActuatorCommunicationError({ operation: 'stopSession', message: err.message })),
      ),
    };
  }
}

export const HttpChargerActuatorLayer = Layer.effect(
  ChargerActuator,
  Effect.gen(function* () {
    const config = AppConfig.charger;

    return new HttpChargerActuator(
      {
        baseUrl: yield* config.apiUrl,
        token: yield* config.apiToken,
        amperageRetry: {
          maxRetries: yield* config.amperageRetries,
          delay: yield* config.amperagePollDelay,
        },
      },
      yield* HttpClient.HttpClient,
    );
  })
);
