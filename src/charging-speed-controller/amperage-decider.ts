import { Array, Effect } from "effect";
import type { ChargerStatus } from "../charger-actuator/types.js";
import { EmptyAmperageLadderError } from "../errors/empty-amperage-ladder.error.js";

/** The discrete current limits a charger accepts. */
export type AmperageLadder = Array.NonEmptyReadonlyArray<number>;

const DEFAULT_VOLTAGE = 240;

// Absorbs rounding noise just under the lowest step.
const LOWEST_STEP_SLACK_AMPS = 0.5;

export const lowestStep = (ladder: AmperageLadder) => Math.min(...ladder);
export const highestStep = (ladder: AmperageLadder) => Math.max(...ladder);

/** Excess power needed before the lowest step is worth switching on. */
export const minimumExcessWatts = (ladder: AmperageLadder, voltage = DEFAULT_VOLTAGE) =>
  (lowestStep(ladder) - LOWEST_STEP_SLACK_AMPS) * voltage;

/**
 * Rounds the predicted excess up to the next ladder step, capped at the top step.
 */
export const decide = (predictedExcessW: number, allowedAmps: AmperageLadder, voltage = DEFAULT_VOLTAGE): number => {
  if (predictedExcessW <= 0) {
    return 0;
  }

  const idealAmps = Math.max(predictedExcessW / voltage, lowestStep(allowedAmps) - LOWEST_STEP_SLACK_AMPS);
  const candidates = allowedAmps.filter((amps) => amps >= idealAmps);

  return candidates.length === 0 ? highestStep(allowedAmps) : Math.min(...candidates);
};

/**
 * A charger without amperage steps cannot be controlled; that needs an
 * operator, so it dies instead of failing.
 */
export const requireAmperageLadder = (status: ChargerStatus): Effect.Effect<AmperageLadder> =>
  Array.isNonEmptyReadonlyArray(status.possibleAmperageLimits)
    ? Effect.succeed(status.possibleAmperageLimits)
    : Effect.die(new EmptyAmperageLadderError({ chargerId: status.chargerId }));
