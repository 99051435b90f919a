/**
 * Market Types
 * Candle windows, feature vectors and trade decisions shared by the engine.
 */

export interface Candle {
  /** Bucket open time, epoch seconds */
  timestamp: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

/**
 * Most recent candle last. May be shorter than requested when the feed
 * has gaps; lookback-dependent values then come back null.
 */
export interface CandleWindow {
  instrument: string;
  timeframeSeconds: number;
  candles: Candle[];
}

export type TrendDirection = 'up' | 'down' | 'flat';
export type BreakoutKind = 'breakout_up' | 'breakout_down' | 'none';
export type TradeDirection = 'call' | 'put';
export type TradeOutcome = 'win' | 'loss';

export interface PatternHit {
  name: string;
  /** Signed, non-zero: +100 bullish, -100 bearish */
  strength: number;
}

export interface FeatureVector {
  readonly patternName: string | null;
  readonly breakout: BreakoutKind;
  readonly trend: TrendDirection;
  readonly volumeRatio: number;
  readonly payout: number;
}

export interface TradeDecision {
  instrument: string;
  direction: TradeDirection;
  stakeAmount: number;
  features: FeatureVector;
}
