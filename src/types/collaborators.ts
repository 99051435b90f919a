/**
 * Collaborator Contracts
 * Everything the session controller talks to besides the signal aggregator.
 */

import type { CandleWindow, FeatureVector, TradeDirection, TradeOutcome } from './market.js';

export interface BrokerSession {
  /** Throws ConnectionError */
  connect(): Promise<void>;
  /** Throws FetchError */
  fetchCandles(instrument: string, timeframeSeconds: number, count: number): Promise<CandleWindow>;
  /** Throws FetchError. Instruments without a quoted payout are absent. */
  fetchAllPayouts(): Promise<Map<string, number>>;
  /** Returns the order id. Throws ExecutionError */
  execute(amount: number, instrument: string, direction: TradeDirection, expiryMinutes: number): Promise<string>;
  /** Throws TimeoutError */
  awaitOutcome(orderId: string): Promise<TradeOutcome>;
}

export interface StakingManager {
  canTrade(instrument: string): boolean;
  nextStake(instrument: string, highChance: boolean, payout: number): number;
  registerOutcome(instrument: string, win: boolean): void;
}

export interface Predictor {
  predictHighChance(features: FeatureVector): boolean;
  /** Fire-and-forget */
  logOutcome(features: FeatureVector, win: boolean): void;
  checkAndTrainDaily(now: Date): Promise<void>;
}

export interface NewsGate {
  hasImminentHighImpactEvent(): Promise<boolean>;
}
