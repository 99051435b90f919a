/**
 * Outcome Predictor
 * Per-setup win-rate table, rebuilt once a day from the trade log.
 *
 * Setup key: pattern|breakout|trend|volumeBucket
 * - A setup with at least minSamples trades is high chance iff its win
 *   rate reaches winRateThreshold
 * - Thinner setups fall back to the basic composite rule
 */

import type { Predictor } from '../types/collaborators.js';
import type { FeatureVector } from '../types/market.js';
import type { PredictorConfig, TradeLogRecord } from '../validation/schemas.js';
import type { TradeLogStore } from '../storage/tradeLogStore.js';
import { isHighChanceBasic } from '../engine/signalAggregator.js';
import { errorMessage } from './errors.js';
import { createLogger } from './logger.js';
import { toDayKey } from '../utils/timeUtils.js';

const logger = createLogger('OutcomePredictor');

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

export interface SetupStats {
  trades: number;
  wins: number;
  winRate: number;
}

export interface OutcomePredictorOptions extends PredictorConfig {
  timezone: string;
  clock?: () => Date;
}

export function setupKey(features: Pick<FeatureVector, 'patternName' | 'breakout' | 'trend' | 'volumeRatio'>): string {
  const volumeBucket = features.volumeRatio > 1 ? 'high' : 'low';
  return [features.patternName ?? 'unknown', features.breakout, features.trend, volumeBucket].join('|');
}

export function buildWinRateTable(records: readonly TradeLogRecord[]): Map<string, SetupStats> {
  const table = new Map<string, SetupStats>();
  for (const record of records) {
    const key = setupKey(record.features);
    const stats = table.get(key) ?? { trades: 0, wins: 0, winRate: 0 };
    stats.trades++;
    if (record.win) stats.wins++;
    stats.winRate = stats.wins / stats.trades;
    table.set(key, stats);
  }
  return table;
}

// ═══════════════════════════════════════════════════════════════
// PREDICTOR
// ═══════════════════════════════════════════════════════════════

export class OutcomePredictor implements Predictor {
  private readonly store: TradeLogStore;
  private readonly options: OutcomePredictorOptions;
  private readonly clock: () => Date;
  private readonly pendingWrites: Set<Promise<void>> = new Set();

  private table: Map<string, SetupStats> = new Map();
  private trainedDay: string | null = null;
  private sampleCount: number = 0;

  constructor(store: TradeLogStore, options: OutcomePredictorOptions) {
    this.store = store;
    this.options = options;
    this.clock = options.clock ?? (() => new Date());
  }

  predictHighChance(features: FeatureVector): boolean {
    const stats = this.table.get(setupKey(features));
    if (stats && stats.trades >= this.options.minSamples) {
      return stats.winRate >= this.options.winRateThreshold;
    }
    return isHighChanceBasic(features);
  }

  logOutcome(features: FeatureVector, win: boolean): void {
    const record: TradeLogRecord = {
      features: { ...features },
      win,
      loggedAt: this.clock().toISOString(),
    };

    const write = this.store.append(record).catch((error: unknown) => {
      logger.error('Failed to log trade outcome', { error: errorMessage(error) });
    });
    this.pendingWrites.add(write);
    void write.finally(() => this.pendingWrites.delete(write));
  }

  async checkAndTrainDaily(now: Date): Promise<void> {
    const today = toDayKey(now, this.options.timezone);
    if (this.trainedDay === today) return;

    await this.flush();
    const records = await this.store.loadAll();
    this.table = buildWinRateTable(records);
    this.sampleCount = records.length;
    this.trainedDay = today;

    const qualified = [...this.table.values()].filter(s => s.trades >= this.options.minSamples).length;
    logger.info(`Retrained on ${records.length} trades - ${this.table.size} setups, ${qualified} with enough samples`, {
      store: this.store.kind,
      day: today,
    });
  }

  /** Resolves once every logged outcome has been written (or failed) */
  async flush(): Promise<void> {
    await Promise.all([...this.pendingWrites]);
  }

  getStats(): { trainedDay: string | null; samples: number; setups: Record<string, SetupStats> } {
    return {
      trainedDay: this.trainedDay,
      samples: this.sampleCount,
      setups: Object.fromEntries([...this.table].map(([key, stats]): [string, SetupStats] => [key, { ...stats }])),
    };
  }
}
