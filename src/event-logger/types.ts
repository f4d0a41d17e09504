import type { Effect } from "effect";
import type { ActuatorCommunicationError, ActuatorConvergenceWarning } from "../charger-actuator/errors.js";
import type { TargetAmperage } from "../charging-speed-controller/target-amperage.js";
import type { SolarSample, TelemetryUnavailableError } from "../telemetry/types.js";

export type SolarEstimate = {
  readonly sample: SolarSample;
  readonly controlIntervalMinutes: number;
  readonly currentChargingW: number;
  readonly averageExcessW: number;
  readonly predictedExcessW: number;
};

export type IEventLogger = {
  onSolarEstimate: (estimate: SolarEstimate) => Effect.Effect<void>;
  onTelemetryUnavailable: (error: TelemetryUnavailableError) => Effect.Effect<void>;
  onTargetDetermined: (target: TargetAmperage) => Effect.Effect<void>;
  onManualOverride: (amperage: number) => Effect.Effect<void>;
  onSetAmperage: (currentAmperage: number, targetAmperage: number) => Effect.Effect<void>;
  onAmperageConfirmed: (amperage: number) => Effect.Effect<void>;
  onAmperageMismatch: (warning: ActuatorConvergenceWarning) => Effect.Effect<void>;
  onNoAmperageChange: (currentAmperage: number) => Effect.Effect<void>;
  onActuationFailed: (error: ActuatorCommunicationError) => Effect.Effect<void>;
};
