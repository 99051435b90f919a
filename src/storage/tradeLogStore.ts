/**
 * Trade Log Store
 * Hybrid storage: PostgreSQL when available, JSON-lines file fallback.
 * One record per resolved trade, read back by the predictor for retraining.
 */

import fsPromises from 'fs/promises';
import path from 'path';
import type { Kysely } from 'kysely';
import type { Database, TradeOutcomeRow } from '../db/types.js';
import { TradeLogRecordSchema, type TradeLogRecord } from '../validation/schemas.js';
import { errorMessage } from '../services/errors.js';
import { createLogger } from '../services/logger.js';

const logger = createLogger('TradeLogStore');

export interface TradeLogStore {
  readonly kind: 'file' | 'postgres';
  append(record: TradeLogRecord): Promise<void>;
  loadAll(): Promise<TradeLogRecord[]>;
}

// ═══════════════════════════════════════════════════════════════
// FILE STORE (JSONL)
// ═══════════════════════════════════════════════════════════════

export class FileTradeLogStore implements TradeLogStore {
  readonly kind = 'file' as const;
  private readonly filePath: string;
  /** Appends run one after another */
  private writeChain: Promise<void> = Promise.resolve();

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  append(record: TradeLogRecord): Promise<void> {
    const line = `${JSON.stringify(record)}\n`;
    const write = this.writeChain.then(async () => {
      await fsPromises.mkdir(path.dirname(this.filePath), { recursive: true });
      await fsPromises.appendFile(this.filePath, line, 'utf-8');
    });
    // keep the chain alive after a failed write; the caller still sees the rejection
    this.writeChain = write.catch(() => undefined);
    return write;
  }

  async loadAll(): Promise<TradeLogRecord[]> {
    let content: string;
    try {
      content = await fsPromises.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        logger.info(`No trade log at ${this.filePath} yet`);
        return [];
      }
      throw error;
    }

    const records: TradeLogRecord[] = [];
    let skipped = 0;
    for (const line of content.split('\n')) {
      if (!line.trim()) continue;
      const record = parseLine(line);
      if (record) {
        records.push(record);
      } else {
        skipped++;
      }
    }

    if (skipped > 0) {
      logger.warn(`Skipped ${skipped} malformed trade log lines`, { file: this.filePath });
    }
    return records;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function parseLine(line: string): TradeLogRecord | null {
  let json: unknown;
  try {
    json = JSON.parse(line);
  } catch {
    return null;
  }
  const parsed = TradeLogRecordSchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}

// ═══════════════════════════════════════════════════════════════
// POSTGRES STORE
// ═══════════════════════════════════════════════════════════════

export class PostgresTradeLogStore implements TradeLogStore {
  readonly kind = 'postgres' as const;
  private readonly db: Kysely<Database>;
  private readonly fallback: TradeLogStore | null;

  constructor(db: Kysely<Database>, fallback: TradeLogStore | null = null) {
    this.db = db;
    this.fallback = fallback;
  }

  async append(record: TradeLogRecord): Promise<void> {
    const { features } = record;
    try {
      await this.db
        .insertInto('trade_outcomes')
        .values({
          pattern_name: features.patternName,
          breakout: features.breakout,
          trend: features.trend,
          volume_ratio: features.volumeRatio,
          payout: features.payout,
          win: record.win,
          logged_at: record.loggedAt,
        })
        .execute();
    } catch (error) {
      if (!this.fallback) throw error;
      logger.error('Failed to save trade outcome to database, using file fallback', { error: errorMessage(error) });
      await this.fallback.append(record);
    }
  }

  async loadAll(): Promise<TradeLogRecord[]> {
    const rows = await this.db
      .selectFrom('trade_outcomes')
      .selectAll()
      .orderBy('logged_at', 'asc')
      .execute();

    const records: TradeLogRecord[] = [];
    for (const row of rows) {
      const record = rowToRecord(row);
      if (record) records.push(record);
    }

    if (this.fallback) {
      records.push(...(await this.fallback.loadAll()));
    }
    return records;
  }
}

function rowToRecord(row: TradeOutcomeRow): TradeLogRecord | null {
  const parsed = TradeLogRecordSchema.safeParse({
    features: {
      patternName: row.pattern_name,
      breakout: row.breakout,
      trend: row.trend,
      volumeRatio: Number(row.volume_ratio),
      payout: Number(row.payout),
    },
    win: row.win,
    loggedAt: new Date(row.logged_at).toISOString(),
  });
  if (!parsed.success) {
    logger.warn(`Skipping malformed trade_outcomes row ${row.id}`);
    return null;
  }
  return parsed.data;
}
