/**
 * Descriptive statistics over nullable samples
 */

export function finiteValues(values: readonly (number | null | undefined)[]): number[] {
  const out: number[] = [];
  for (const value of values) {
    if (typeof value === "number" && Number.isFinite(value)) out.push(value);
  }
  return out;
}

export function mean(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Sample standard deviation (N - 1 divisor). Null below two values.
 */
export function sampleStd(values: readonly number[]): number | null {
  if (values.length < 2) return null;
  const avg = values.reduce((sum, v) => sum + v, 0) / values.length;
  const squared = values.reduce((sum, v) => sum + (v - avg) ** 2, 0);
  return Math.sqrt(squared / (values.length - 1));
}

export function sum(values: readonly (number | null | undefined)[]): number {
  return finiteValues(values).reduce((total, v) => total + v, 0);
}

export function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}

/** Code-point string comparison */
export function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
