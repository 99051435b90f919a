/**
 * Database Type Definitions
 * Kysely schema types for the session engine
 */

import type { ColumnType, Generated, Insertable, Selectable } from 'kysely';

// ═══════════════════════════════════════════════════════════════
// TABLE DEFINITIONS
// ═══════════════════════════════════════════════════════════════

export interface TradeOutcomesTable {
  id: Generated<string>;
  pattern_name: string | null;
  breakout: string;
  trend: string;
  volume_ratio: number;
  payout: number;
  win: boolean;
  /** pg returns timestamptz as Date */
  logged_at: ColumnType<Date, string, string>;
  created_at: Generated<string>;
}

// ═══════════════════════════════════════════════════════════════
// DATABASE INTERFACE
// ═══════════════════════════════════════════════════════════════

export interface Database {
  trade_outcomes: TradeOutcomesTable;
}

export type TradeOutcomeRow = Selectable<TradeOutcomesTable>;
export type NewTradeOutcome = Insertable<TradeOutcomesTable>;
