import { describe, it, expect } from 'vitest';
import {
  SignalAggregator,
  buildFeatureVector,
  classifyBreakout,
  classifyTrend,
  computeVolumeRatio,
  inferDirection,
  isHighChanceBasic,
} from '../signalAggregator.js';
import type { PatternDetector } from '../candlestickPatterns.js';
import type { PatternHit } from '../../types/market.js';
import { candle, risingBreakoutCandles, series, windowOf } from '../../__tests__/fixtures.js';

function detectorReturning(hits: PatternHit[]): PatternDetector {
  return { detect: () => hits };
}

function aggregator(hits: PatternHit[] = [], maFast = 5, maSlow = 20, volumePeriod = 20): SignalAggregator {
  return new SignalAggregator({ maFast, maSlow, volumePeriod, patternDetector: detectorReturning(hits) });
}

describe('SignalAggregator.analyze', () => {
  it('rising closes with a final jump give up / breakout_up / call', () => {
    const analysis = aggregator([{ name: 'engulfing', strength: 100 }]).analyze(windowOf(risingBreakoutCandles()));

    expect(analysis.candleCount).toBe(60);
    expect(analysis.maFast).toBeCloseTo(157.2, 10);
    expect(analysis.maSlow).toBeCloseTo(149.55, 10);
    expect(analysis.trend).toBe('up');
    expect(analysis.resistance).toBe(159.5);
    expect(analysis.support).toBe(99);
    expect(analysis.lastClose).toBe(160);
    expect(analysis.breakout).toBe('breakout_up');
    expect(analysis.direction).toBe('call');
    expect(analysis.patternName).toBe('engulfing');
    expect(analysis.volumeRatio).toBe(1);
    expect(analysis.highChanceBasic).toBe(false);
  });

  it('constant closes are flat with no direction', () => {
    const candles = series(Array.from({ length: 60 }, () => 100));
    const analysis = aggregator().analyze(windowOf(candles));

    expect(analysis.maFast).toBe(100);
    expect(analysis.maSlow).toBe(100);
    expect(analysis.trend).toBe('flat');
    expect(analysis.breakout).toBe('none');
    expect(analysis.direction).toBeNull();
  });

  it('a window shorter than the slow MA leaves the trend flat', () => {
    const candles = series(Array.from({ length: 10 }, (_, i) => 100 + i));
    const analysis = aggregator().analyze(windowOf(candles));

    expect(analysis.maFast).not.toBeNull();
    expect(analysis.maSlow).toBeNull();
    expect(analysis.trend).toBe('flat');
    expect(analysis.direction).toBeNull();
  });

  it('handles an empty window', () => {
    const analysis = aggregator().analyze(windowOf([]));

    expect(analysis.candleCount).toBe(0);
    expect(analysis.lastClose).toBeNull();
    expect(analysis.support).toBeNull();
    expect(analysis.breakout).toBe('none');
    expect(analysis.volumeRatio).toBe(0);
    expect(analysis.direction).toBeNull();
  });

  it('keeps the detector order and takes the first hit as the pattern name', () => {
    const hits = [
      { name: 'zeta', strength: -100 },
      { name: 'alpha', strength: 100 },
    ];
    const analysis = aggregator(hits).analyze(windowOf(risingBreakoutCandles()));

    expect(analysis.patterns).toEqual(hits);
    expect(analysis.patternName).toBe('zeta');
  });
});

describe('classifiers', () => {
  it('classifyTrend compares the averages', () => {
    expect(classifyTrend(2, 1)).toBe('up');
    expect(classifyTrend(1, 2)).toBe('down');
    expect(classifyTrend(1, 1)).toBe('flat');
    expect(classifyTrend(null, 1)).toBe('flat');
    expect(classifyTrend(1, null)).toBe('flat');
  });

  it('classifyBreakout is none while the last close sits inside the range', () => {
    const candles = [candle(100), candle(101), candle(100.5)];
    expect(classifyBreakout(candles)).toBe('none');
  });

  it('classifyBreakout detects a close below every low', () => {
    const candles = [candle(100), candle(101), candle(98, { low: 98.5, high: 99 })];
    expect(classifyBreakout(candles)).toBe('breakout_down');
  });

  it('inferDirection needs breakout and trend to agree', () => {
    expect(inferDirection('breakout_up', 'up')).toBe('call');
    expect(inferDirection('breakout_down', 'down')).toBe('put');
    expect(inferDirection('breakout_up', 'down')).toBeNull();
    expect(inferDirection('breakout_down', 'up')).toBeNull();
    expect(inferDirection('none', 'up')).toBeNull();
    expect(inferDirection('breakout_up', 'flat')).toBeNull();
  });
});

describe('computeVolumeRatio', () => {
  it('divides the last volume by the rolling mean', () => {
    const candles = [10, 10, 10, 40].map(volume => candle(100, { volume }));
    expect(computeVolumeRatio(candles, 4)).toBeCloseTo(40 / 17.5, 12);
  });

  it('is 0 when the mean is zero', () => {
    const candles = [0, 0, 0].map(volume => candle(100, { volume }));
    expect(computeVolumeRatio(candles, 3)).toBe(0);
  });

  it('is 0 when the window is shorter than the period', () => {
    const candles = [10, 20].map(volume => candle(100, { volume }));
    expect(computeVolumeRatio(candles, 3)).toBe(0);
  });
});

describe('isHighChanceBasic', () => {
  const strong = { breakout: 'breakout_up', patternName: 'hammer', volumeRatio: 1.4, trend: 'up' } as const;

  it('requires breakout, pattern, volume above average and a trend', () => {
    expect(isHighChanceBasic(strong)).toBe(true);
    expect(isHighChanceBasic({ ...strong, breakout: 'none' })).toBe(false);
    expect(isHighChanceBasic({ ...strong, patternName: null })).toBe(false);
    expect(isHighChanceBasic({ ...strong, volumeRatio: 1 })).toBe(false);
    expect(isHighChanceBasic({ ...strong, trend: 'flat' })).toBe(false);
  });
});

describe('buildFeatureVector', () => {
  it('returns a frozen vector carrying the payout', () => {
    const analysis = aggregator([{ name: 'hammer', strength: 100 }]).analyze(windowOf(risingBreakoutCandles()));
    const features = buildFeatureVector(analysis, 0.82);

    expect(features).toEqual({
      patternName: 'hammer',
      breakout: 'breakout_up',
      trend: 'up',
      volumeRatio: 1,
      payout: 0.82,
    });
    expect(Object.isFrozen(features)).toBe(true);
  });
});
