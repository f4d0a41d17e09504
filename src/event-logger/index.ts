import type { IEventLogger, SolarEstimate } from "./types.js";
import type { ActuatorCommunicationError, ActuatorConvergenceWarning } from "../charger-actuator/errors.js";
import { TargetAmperage } from "../charging-speed-controller/target-amperage.js";
import type { TelemetryUnavailableError } from "../telemetry/types.js";
import { Effect } from "effect";

const watts = (value: number) => `${value.toFixed(1)}W`;

export class EventLogger implements IEventLogger {

  public onSolarEstimate({ sample, controlIntervalMinutes, currentChargingW, averageExcessW, predictedExcessW }: SolarEstimate) {
    return Effect.log(
      `${controlIntervalMinutes}-min averages - Production: ${watts(sample.productionW)}, `
      + `Grid Consumption: ${watts(sample.consumptionW)}, Current Charging Load: ${watts(currentChargingW)}, `
      + `Average Excess: ${watts(averageExcessW)}, Solar Slope: ${sample.slopeWPerS.toFixed(3)}W/s, `
      + `Predicted Excess: ${watts(predictedExcessW)}`
    );
  }

  public onTelemetryUnavailable(error: TelemetryUnavailableError) {
    return Effect.logWarning(`No solar data (${error.reason}). Skipping...`);
  }

  public onTargetDetermined(target: TargetAmperage) {
    return Effect.log(TargetAmperage.$match(target, {
      LowProduction: ({ amperage, productionW }) =>
        `Low production (${watts(productionW)}). Setting to max amperage ${amperage}A for fast charging.`,
      ExcessSolar: ({ amperage, predictedExcessW }) =>
        `Predicted excess solar (${watts(predictedExcessW)}). Setting amperage to ${amperage}A.`,
      InsufficientExcess: ({ predictedExcessW, minimumW }) =>
        `Insufficient predicted excess solar (${watts(predictedExcessW)}) < minimum (${watts(minimumW)}). Stopping charging.`,
    }));
  }

  public onManualOverride(amperage: number) {
    return Effect.log(`Charger is charging at ${amperage}A, which this controller did not set; likely a manual change. Skipping adjustment.`);
  }

  public onSetAmperage(currentAmperage: number, targetAmperage: number) {
    return Effect.log(`Changing amperage from ${currentAmperage}A to ${targetAmperage}A...`);
  }

  public onAmperageConfirmed(amperage: number) {
    return Effect.log(`Confirmed amperage: ${amperage}A.`);
  }

  public onAmperageMismatch(warning: ActuatorConvergenceWarning) {
    return Effect.logWarning(warning.message);
  }

  public onNoAmperageChange(currentAmperage: number) {
    return Effect.log(`Amperage already set correctly (${currentAmperage}A). No change needed.`);
  }

  public onActuationFailed(error: ActuatorCommunicationError) {
    return Effect.logError(`Failed to apply charging decision (${error.operation}): ${error.message}`);
  }
}
