import { Effect, Layer } from "effect";
import { ChargerActuator } from "./charger-actuator/types.js";
import { HttpChargerActuatorLayer } from "./charger-actuator/http.charger-actuator.js";
import { makeDryRunChargerActuator } from "./charger-actuator/dry-run.charger-actuator.js";
import { InfluxDbTelemetryStoreLayer } from "./telemetry/influx-db.telemetry-store.js";
import { SolarTelemetrySourceLayer } from "./telemetry/solar-telemetry-source.js";
import { InfluxDbMetricsSinkLayer } from "./metrics/influx-db.metrics-sink.js";
import { SessionStateTrackerLayer } from "./session-state-tracker.js";

const DryRunChargerActuatorLayer = Layer.effect(
  ChargerActuator,
  Effect.map(ChargerActuator, makeDryRunChargerActuator),
).pipe(Layer.provide(HttpChargerActuatorLayer));

export const makeServiceLayers = (options: { readonly dryRun: boolean }) => {
  const actuatorLayer = options.dryRun ? DryRunChargerActuatorLayer : HttpChargerActuatorLayer;

  return Layer.mergeAll(
    SolarTelemetrySourceLayer.pipe(Layer.provide(InfluxDbTelemetryStoreLayer)),
    InfluxDbMetricsSinkLayer,
    SessionStateTrackerLayer.pipe(Layer.provideMerge(actuatorLayer)),
  );
};
