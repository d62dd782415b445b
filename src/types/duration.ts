/** Duration category for command timeouts. */
export type DurationCategory = "instant" | "quick" | "normal" | "slow" | "long_running";

/** Timeout in ms per duration category. */
export const DURATION_TIMEOUTS: Record<DurationCategory, number> = {
  instant: 5_000,
  quick: 15_000,
  normal: 30_000,
  slow: 60_000,
  long_running: 300_000,
};
