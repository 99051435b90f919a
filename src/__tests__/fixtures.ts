import type { Candle, CandleWindow } from '../types/market.js';

/**
 * Candle around `close`; overrides win.
 */
export function candle(close: number, overrides: Partial<Candle> = {}): Candle {
  return {
    timestamp: 0,
    open: close,
    high: close + 0.5,
    low: close - 0.5,
    close,
    volume: 10,
    ...overrides,
  };
}

/** Candles one minute apart starting at `start` (epoch seconds) */
export function series(closes: number[], shape: (close: number, i: number) => Partial<Candle> = () => ({}), start: number = 1_792_400_000): Candle[] {
  return closes.map((close, i) => candle(close, { timestamp: start + i * 60, ...shape(close, i) }));
}

export function windowOf(candles: Candle[], instrument: string = 'EURUSD'): CandleWindow {
  return { instrument, timeframeSeconds: 60, candles };
}

/**
 * 60 candles: closes 100..158 then a jump to 160, every high 0.5 below its
 * close. Last close clears the whole window's high.
 */
export function risingBreakoutCandles(): Candle[] {
  const closes = Array.from({ length: 59 }, (_, i) => 100 + i);
  closes.push(160);
  return series(closes, close => ({ open: close - 0.2, high: close - 0.5, low: close - 1 }));
}
