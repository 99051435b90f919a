/**
 * Rolling Indicators
 *
 * Series are aligned 1:1 with the input, right-aligned: index i covers
 * values[i - period + 1 .. i]. Positions without a full window are null.
 */

export type Series = (number | null)[];

export function rollingMean(values: number[], period: number): Series {
  const out: Series = new Array(values.length).fill(null);
  if (!Number.isInteger(period) || period < 1) return out;

  // Deviations from the window's first value keep a flat window exactly flat.
  for (let i = period - 1; i < values.length; i++) {
    const base = values[i - period + 1];
    let deviation = 0;
    for (let j = i - period + 2; j <= i; j++) {
      deviation += values[j] - base;
    }
    out[i] = base + deviation / period;
  }
  return out;
}

export function latest<T>(arr: T[] | undefined): T | null {
  if (!arr || arr.length === 0) return null;
  return arr[arr.length - 1];
}

/**
 * Last value of a series; null when the series is empty or not yet available.
 */
export function latestValue(series: Series): number | null {
  return latest(series) ?? null;
}

export function safeDiv(n: number, d: number, fallback = 0): number {
  return d === 0 ? fallback : n / d;
}

export function minOf(values: number[]): number | null {
  if (values.length === 0) return null;
  let min = Infinity;
  for (const v of values) {
    if (v < min) min = v;
  }
  return min;
}

export function maxOf(values: number[]): number | null {
  if (values.length === 0) return null;
  let max = -Infinity;
  for (const v of values) {
    if (v > max) max = v;
  }
  return max;
}
