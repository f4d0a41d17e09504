import { Duration, Schedule } from "effect";

export type FixedDelayRetryOptions = {
  readonly delay: Duration.DurationInput;
  /** Omit to retry forever. */
  readonly maxRetries?: number;
};

/**
 * Waits `delay` before every retry, at most `maxRetries` times.
 */
export const fixedDelayRetry = ({ delay, maxRetries }: FixedDelayRetryOptions): Schedule.Schedule<number> => {
  const spaced = Schedule.spaced(delay);

  if (maxRetries === undefined) {
    return spaced;
  }

  return spaced.pipe(
    Schedule.intersect(Schedule.recurs(maxRetries)),
    Schedule.map(([attempt]) => attempt),
  );
};
