#!/usr/bin/env node
import { NodeContext, NodeHttpClient, NodeRuntime } from "@effect/platform-node"
import { Array, Duration, Effect, Layer, Logger, LogLevel, Option } from "effect"
import { NodeSdk } from "@effect/opentelemetry"
import { SentrySpanProcessor } from "@sentry/opentelemetry";
import * as Sentry from "@sentry/node";
import { AppConfig } from "./config.js";
import { makeServiceLayers } from "./layers.js";
import { makeLoggerLayer } from "./logger.js";
import { ControlLoop } from "./control-loop.js";
import { ChargerActuator } from "./charger-actuator/types.js";
import { TelemetrySource } from "./telemetry/types.js";
import { MetricsSink } from "./metrics/types.js";
import { SessionStateTracker } from "./session-state-tracker.js";
import { lowestStep, minimumExcessWatts, requireAmperageLadder } from "./charging-speed-controller/amperage-decider.js";
import { NoChargerFoundError } from "./errors/no-charger-found.error.js";

const isProd = process.env.NODE_ENV == 'production';
const isDryRun = process.argv.includes('--dry-run');
const isQuiet = process.argv.includes('--quiet');

Sentry.init({
  dsn: process.env.SENTRY_DSN,
  tracesSampleRate: 1.0,
});

const NodeSdkLive = NodeSdk.layer(() => ({
  resource: { serviceName: "solar-charge-controller" },
  spanProcessor: new SentrySpanProcessor()
}))

const selectCharger = Effect.gen(function* () {
  const configured = yield* AppConfig.charger.chargerId;

  if (Option.isSome(configured)) {
    return configured.value;
  }

  const actuator = yield* ChargerActuator;
  const chargers = yield* actuator.listChargers();

  return yield* Option.match(Array.head(chargers), {
    onNone: () => Effect.die(new NoChargerFoundError()),
    onSome: Effect.succeed,
  });
});

const program = Effect.gen(function*() {
  if (isDryRun) {
    yield* Effect.logWarning('Dry run: charger commands will be logged, not sent.');
  }

  const actuator = yield* ChargerActuator;
  const sessionTracker = yield* SessionStateTracker;
  const control = AppConfig.control;

  const chargerId = yield* selectCharger;
  yield* Effect.log(`Using charger ${chargerId}`);

  yield* sessionTracker.initialize();

  const status = yield* actuator.getStatus(chargerId);
  const ladder = yield* requireAmperageLadder(status);
  const voltage = yield* control.voltage;

  yield* Effect.log(`Minimum amperage: ${lowestStep(ladder)}A`);
  yield* Effect.log(`Minimum excess to start charging: ${minimumExcessWatts(ladder, voltage).toFixed(1)}W`);

  const controlLoop = new ControlLoop(
    actuator,
    yield* TelemetrySource,
    sessionTracker,
    yield* MetricsSink,
    {
      chargerId,
      tickInterval: Duration.seconds(yield* control.tickIntervalSeconds),
      controlInterval: Duration.minutes(yield* control.controlIntervalMinutes),
      slopeWindow: Duration.minutes(yield* control.slopeWindowMinutes),
      voltage,
      lowProductionThresholdW: yield* control.lowProductionThresholdWatts,
      metricsMeasurement: yield* AppConfig.metrics.measurement,
    },
  );

  return yield* controlLoop.run();
}).pipe(
  Effect.provide(makeServiceLayers({ dryRun: isDryRun })),
  Effect.provide(NodeSdkLive),
  Effect.provide(makeLoggerLayer({ quiet: isQuiet }).pipe(Layer.provide(NodeContext.layer))),
  Effect.provide(NodeHttpClient.layer),
  Effect.scoped,
  Logger.withMinimumLogLevel(isProd ? LogLevel.Info : LogLevel.Debug),
);

NodeRuntime.runMain(program);
