/**
 * Candlestick Pattern Detection
 *
 * Backed by the technicalindicators candlestick finders. Each rule sees only
 * the bars it needs, ending at the last candle of the window, so older
 * candles never produce a hit. Hits are returned sorted by name so the first
 * hit is stable across runs.
 */

import {
  bearishengulfingpattern,
  bearishhammerstick,
  bearishharami,
  bearishinvertedhammerstick,
  bearishmarubozu,
  bullishengulfingpattern,
  bullishhammerstick,
  bullishharami,
  bullishinvertedhammerstick,
  bullishmarubozu,
  doji,
  dragonflydoji,
  gravestonedoji,
} from 'technicalindicators';
import type { Candle, PatternHit } from '../types/market.js';

export interface PatternDetector {
  detect(candles: Candle[]): PatternHit[];
}

interface OhlcSeries {
  open: number[];
  high: number[];
  low: number[];
  close: number[];
}

type Matcher = (data: OhlcSeries) => boolean;

interface PatternRule {
  name: string;
  /** Bars the finder looks at, ending with the last candle */
  bars: number;
  bullish?: Matcher;
  bearish?: Matcher;
}

const BULL = 100;
const BEAR = -100;

export const PATTERN_RULES: readonly PatternRule[] = [
  { name: 'doji', bars: 1, bullish: data => doji(data) === true },
  { name: 'dragonfly_doji', bars: 1, bullish: data => dragonflydoji(data) === true },
  { name: 'gravestone_doji', bars: 1, bearish: data => gravestonedoji(data) === true },
  {
    name: 'hammer',
    bars: 1,
    bullish: data => bullishhammerstick(data) === true || bearishhammerstick(data) === true,
  },
  {
    name: 'shooting_star',
    bars: 1,
    bearish: data => bullishinvertedhammerstick(data) === true || bearishinvertedhammerstick(data) === true,
  },
  {
    name: 'marubozu',
    bars: 1,
    bullish: data => bullishmarubozu(data) === true,
    bearish: data => bearishmarubozu(data) === true,
  },
  {
    name: 'engulfing',
    bars: 2,
    bullish: data => bullishengulfingpattern(data) === true,
    bearish: data => bearishengulfingpattern(data) === true,
  },
  {
    name: 'harami',
    bars: 2,
    bullish: data => bullishharami(data) === true,
    bearish: data => bearishharami(data) === true,
  },
];

function lastBars(candles: Candle[], count: number): OhlcSeries {
  const recent = candles.slice(-count);
  return {
    open: recent.map(c => c.open),
    high: recent.map(c => c.high),
    low: recent.map(c => c.low),
    close: recent.map(c => c.close),
  };
}

export class BasicPatternDetector implements PatternDetector {
  detect(candles: Candle[]): PatternHit[] {
    const hits: PatternHit[] = [];

    for (const rule of PATTERN_RULES) {
      // finders warn on short input
      if (candles.length < rule.bars) continue;

      const data = lastBars(candles, rule.bars);
      if (rule.bullish?.(data)) {
        hits.push({ name: rule.name, strength: BULL });
      } else if (rule.bearish?.(data)) {
        hits.push({ name: rule.name, strength: BEAR });
      }
    }

    return hits.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  }
}
