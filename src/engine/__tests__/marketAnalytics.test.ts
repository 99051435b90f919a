import { describe, it, expect } from 'vitest';
import { fibonacciLevels, supportResistance, trendlines } from '../marketAnalytics.js';
import { candle, windowOf } from '../../__tests__/fixtures.js';

describe('supportResistance', () => {
  const candles = [
    candle(3, { timestamp: 60, low: 1, high: 5 }),
    candle(4, { timestamp: 120, low: 2, high: 6 }),
    candle(3.5, { timestamp: 180, low: 3, high: 4 }),
  ];

  it('uses only the last lookback candles', () => {
    expect(supportResistance(windowOf(candles), 2)).toEqual({ support: 2, resistance: 6 });
    expect(supportResistance(windowOf(candles), 3)).toEqual({ support: 1, resistance: 6 });
  });

  it('is null until a full lookback is available', () => {
    expect(supportResistance(windowOf(candles), 4)).toBeNull();
    expect(supportResistance(windowOf(candles))).toBeNull();
  });

  it('is null for an invalid lookback', () => {
    expect(supportResistance(windowOf(candles), 0)).toBeNull();
  });
});

describe('fibonacciLevels', () => {
  it('spreads the ratios between the swing low and high', () => {
    const levels = fibonacciLevels(windowOf([
      candle(15, { low: 10, high: 16 }),
      candle(18, { low: 14, high: 20 }),
    ]));

    expect(levels).not.toBeNull();
    expect(levels?.fib_23).toBeCloseTo(12.36, 10);
    expect(levels?.fib_38).toBeCloseTo(13.82, 10);
    expect(levels?.fib_50).toBe(15);
    expect(levels?.fib_61).toBeCloseTo(16.18, 10);
    expect(levels?.fib_78).toBeCloseTo(17.86, 10);
  });

  it('is null for an empty window', () => {
    expect(fibonacciLevels(windowOf([]))).toBeNull();
  });
});

describe('trendlines', () => {
  it('anchors on the first lowest low and first highest high', () => {
    const lines = trendlines(windowOf([
      candle(6, { timestamp: 60, low: 5, high: 8 }),
      candle(6, { timestamp: 120, low: 3, high: 9 }),
      candle(6, { timestamp: 180, low: 3, high: 9 }),
      candle(6, { timestamp: 240, low: 4, high: 7 }),
    ]));

    expect(lines).toEqual({
      lta: { index: 1, timestamp: 120, price: 3 },
      ltb: { index: 1, timestamp: 120, price: 9 },
    });
  });

  it('is null for an empty window', () => {
    expect(trendlines(windowOf([]))).toBeNull();
  });
});
