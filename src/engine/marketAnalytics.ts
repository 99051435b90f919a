/**
 * Market Analytics
 * Read-only levels for display and journaling. Nothing here feeds the
 * trade decision.
 */

import type { CandleWindow } from '../types/market.js';
import { maxOf, minOf } from './indicators.js';

export interface SupportResistance {
  support: number;
  resistance: number;
}

export interface FibonacciLevels {
  fib_23: number;
  fib_38: number;
  fib_50: number;
  fib_61: number;
  fib_78: number;
}

export interface TrendlinePoint {
  index: number;
  timestamp: number;
  price: number;
}

export interface Trendlines {
  /** Rising line anchor: lowest low */
  lta: TrendlinePoint;
  /** Falling line anchor: highest high */
  ltb: TrendlinePoint;
}

export const FIBONACCI_RATIOS = [0.236, 0.382, 0.5, 0.618, 0.786] as const;

/**
 * Support/resistance over the last `lookback` candles. Null until the window
 * holds a full lookback.
 */
export function supportResistance(window: CandleWindow, lookback: number = 50): SupportResistance | null {
  const { candles } = window;
  if (!Number.isInteger(lookback) || lookback < 1 || candles.length < lookback) return null;

  const recent = candles.slice(-lookback);
  const support = minOf(recent.map(c => c.low));
  const resistance = maxOf(recent.map(c => c.high));
  if (support === null || resistance === null) return null;

  return { support, resistance };
}

export function fibonacciLevels(window: CandleWindow): FibonacciLevels | null {
  const swingLow = minOf(window.candles.map(c => c.low));
  const swingHigh = maxOf(window.candles.map(c => c.high));
  if (swingLow === null || swingHigh === null) return null;

  const diff = swingHigh - swingLow;
  const [l23, l38, l50, l61, l78] = FIBONACCI_RATIOS;

  return {
    fib_23: swingLow + diff * l23,
    fib_38: swingLow + diff * l38,
    fib_50: swingLow + diff * l50,
    fib_61: swingLow + diff * l61,
    fib_78: swingLow + diff * l78,
  };
}

export function trendlines(window: CandleWindow): Trendlines | null {
  const { candles } = window;
  if (candles.length === 0) return null;

  let lowIdx = 0;
  let highIdx = 0;
  for (let i = 1; i < candles.length; i++) {
    // strict comparisons keep the first occurrence
    if (candles[i].low < candles[lowIdx].low) lowIdx = i;
    if (candles[i].high > candles[highIdx].high) highIdx = i;
  }

  return {
    lta: { index: lowIdx, timestamp: candles[lowIdx].timestamp, price: candles[lowIdx].low },
    ltb: { index: highIdx, timestamp: candles[highIdx].timestamp, price: candles[highIdx].high },
  };
}
