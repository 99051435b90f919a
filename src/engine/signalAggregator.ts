/**
 * Signal Aggregator
 * Turns a candle window into trend, breakout, pattern and volume features,
 * then infers a direction.
 *
 * Rules:
 * - TREND:     last MA_fast vs MA_slow (either unavailable = flat)
 * - BREAKOUT:  last close beyond min(low) / max(high) of the WHOLE window,
 *              last candle included
 * - DIRECTION: call = breakout_up + up, put = breakout_down + down, else none
 */

import type {
  BreakoutKind,
  Candle,
  CandleWindow,
  FeatureVector,
  PatternHit,
  TradeDirection,
  TrendDirection,
} from '../types/market.js';
import type { PatternDetector } from './candlestickPatterns.js';
import { latestValue, maxOf, minOf, rollingMean, safeDiv } from './indicators.js';
import { createLogger } from '../services/logger.js';

const logger = createLogger('SignalAggregator');

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

export interface SignalAggregatorOptions {
  maFast: number;
  maSlow: number;
  volumePeriod: number;
  patternDetector: PatternDetector;
}

export interface SignalAnalysis {
  instrument: string;
  candleCount: number;
  maFast: number | null;
  maSlow: number | null;
  trend: TrendDirection;
  support: number | null;
  resistance: number | null;
  lastClose: number | null;
  breakout: BreakoutKind;
  patterns: PatternHit[];
  patternName: string | null;
  volumeRatio: number;
  highChanceBasic: boolean;
  direction: TradeDirection | null;
}

// ═══════════════════════════════════════════════════════════════
// PURE CLASSIFIERS
// ═══════════════════════════════════════════════════════════════

export function classifyTrend(maFast: number | null, maSlow: number | null): TrendDirection {
  if (maFast === null || maSlow === null) return 'flat';
  if (maFast > maSlow) return 'up';
  if (maFast < maSlow) return 'down';
  return 'flat';
}

export function classifyBreakout(candles: Candle[]): BreakoutKind {
  const support = minOf(candles.map(c => c.low));
  const resistance = maxOf(candles.map(c => c.high));
  if (support === null || resistance === null) return 'none';

  const lastClose = candles[candles.length - 1].close;
  if (lastClose > resistance) return 'breakout_up';
  if (lastClose < support) return 'breakout_down';
  return 'none';
}

export function computeVolumeRatio(candles: Candle[], period: number): number {
  if (candles.length === 0) return 0;

  const avgVolume = latestValue(rollingMean(candles.map(c => c.volume), period));
  if (avgVolume === null || !(avgVolume > 0)) return 0;

  const ratio = safeDiv(candles[candles.length - 1].volume, avgVolume, 0);
  return Number.isFinite(ratio) && ratio > 0 ? ratio : 0;
}

export function isHighChanceBasic(features: Pick<FeatureVector, 'breakout' | 'patternName' | 'volumeRatio' | 'trend'>): boolean {
  return (
    features.breakout !== 'none' &&
    features.patternName !== null &&
    features.volumeRatio > 1.0 &&
    features.trend !== 'flat'
  );
}

export function inferDirection(breakout: BreakoutKind, trend: TrendDirection): TradeDirection | null {
  if (breakout === 'breakout_up' && trend === 'up') return 'call';
  if (breakout === 'breakout_down' && trend === 'down') return 'put';
  return null;
}

export function buildFeatureVector(analysis: SignalAnalysis, payout: number): FeatureVector {
  return Object.freeze({
    patternName: analysis.patternName,
    breakout: analysis.breakout,
    trend: analysis.trend,
    volumeRatio: analysis.volumeRatio,
    payout,
  });
}

// ═══════════════════════════════════════════════════════════════
// AGGREGATOR
// ═══════════════════════════════════════════════════════════════

export class SignalAggregator {
  private readonly options: SignalAggregatorOptions;

  constructor(options: SignalAggregatorOptions) {
    this.options = options;
  }

  analyze(window: CandleWindow): SignalAnalysis {
    const { candles } = window;
    const { maFast: fastPeriod, maSlow: slowPeriod, volumePeriod, patternDetector } = this.options;

    const closes = candles.map(c => c.close);
    const maFast = latestValue(rollingMean(closes, fastPeriod));
    const maSlow = latestValue(rollingMean(closes, slowPeriod));
    const trend = classifyTrend(maFast, maSlow);

    const breakout = classifyBreakout(candles);
    const patterns = patternDetector.detect(candles);
    const patternName = patterns.length > 0 ? patterns[0].name : null;
    const volumeRatio = computeVolumeRatio(candles, volumePeriod);

    const analysis: SignalAnalysis = {
      instrument: window.instrument,
      candleCount: candles.length,
      maFast,
      maSlow,
      trend,
      support: minOf(candles.map(c => c.low)),
      resistance: maxOf(candles.map(c => c.high)),
      lastClose: candles.length > 0 ? candles[candles.length - 1].close : null,
      breakout,
      patterns,
      patternName,
      volumeRatio,
      highChanceBasic: isHighChanceBasic({ breakout, patternName, volumeRatio, trend }),
      direction: inferDirection(breakout, trend),
    };

    if (maFast === null || maSlow === null) {
      logger.debug(`${window.instrument}: moving averages unavailable (${candles.length} candles)`, {
        maFast: fastPeriod,
        maSlow: slowPeriod,
      });
    }

    return analysis;
  }
}
