import { finiteValues, mean, sampleStd } from "../lib/descriptive";

export const MIN_CONSISTENCY_SAMPLES = 3;

/**
 * Consistency index between 0 and 100: a clipped inverse coefficient of
 * variation. 100 means no relative spread.
 *
 * Returns null with fewer than 3 usable values or a zero mean.
 */
export function calcConsistency(values: readonly (number | null | undefined)[]): number | null {
  const sample = finiteValues(values);
  if (sample.length < MIN_CONSISTENCY_SAMPLES) return null;

  const avg = mean(sample);
  const std = sampleStd(sample);
  if (avg === null || std === null || avg === 0) return null;

  // |mean| keeps negative-valued metrics (angle of attack) inside the 0-100 band
  return Math.max(0, 100 * (1 - std / Math.abs(avg)));
}
