/**
 * Risk Manager
 * Trade eligibility and stake sizing for the session loop.
 *
 * Eligibility (all must hold):
 * 1. Asset is in the configured basket
 * 2. Day's net loss below stopLossAmount
 * 3. Consecutive losses below stopLossConsecutive
 * 4. Day's net profit below stopWinAmount
 * 5. Asset cooldown since its last trade has elapsed
 *
 * Staking:
 * - martingale: after a loss, last stake x martingaleFactor (up to maxMartingaleSteps)
 * - soros:      after a win, last stake + last profit (up to sorosLevel)
 * - otherwise baseStake
 *
 * Day counters reset when the calendar day changes.
 */

import type { StakingManager } from '../types/collaborators.js';
import type { RiskConfig } from '../validation/schemas.js';
import { createLogger } from './logger.js';
import { toDayKey } from '../utils/timeUtils.js';

const logger = createLogger('RiskManager');

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

export interface RiskManagerOptions extends RiskConfig {
  assets: readonly string[];
  timezone: string;
}

type StakeMode = 'base' | 'martingale' | 'soros';

interface PendingStake {
  stake: number;
  payout: number;
  mode: StakeMode;
}

interface AssetState {
  lastStake: number | null;
  lastProfit: number;
  /** null = next stake starts from base */
  lastWin: boolean | null;
  martingaleStep: number;
  sorosStep: number;
  pending: PendingStake | null;
  lastTradeAt: number | null;
}

export interface RiskSnapshot {
  dayKey: string;
  netProfit: number;
  wins: number;
  losses: number;
  consecutiveLosses: number;
  blockedReason: string | null;
}

// ═══════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════

function roundCents(value: number): number {
  return Math.round(value * 100) / 100;
}

function freshAsset(): AssetState {
  return {
    lastStake: null,
    lastProfit: 0,
    lastWin: null,
    martingaleStep: 0,
    sorosStep: 0,
    pending: null,
    lastTradeAt: null,
  };
}

// ═══════════════════════════════════════════════════════════════
// RISK MANAGER
// ═══════════════════════════════════════════════════════════════

export class RiskManager implements StakingManager {
  private readonly options: RiskManagerOptions;
  private readonly clock: () => Date;
  private readonly assets: Map<string, AssetState> = new Map();

  private dayKey: string;
  private netProfit: number = 0;
  private wins: number = 0;
  private losses: number = 0;
  private consecutiveLosses: number = 0;

  constructor(options: RiskManagerOptions, clock: () => Date = () => new Date()) {
    this.options = options;
    this.clock = clock;
    this.dayKey = toDayKey(clock(), options.timezone);
    for (const asset of options.assets) {
      this.assets.set(asset, freshAsset());
    }
  }

  canTrade(instrument: string): boolean {
    this.rollDay();

    const asset = this.assets.get(instrument);
    if (!asset) {
      logger.warn(`${instrument} is not in the configured basket`);
      return false;
    }

    const blocked = this.blockedReason();
    if (blocked) {
      logger.debug(`${instrument} blocked: ${blocked}`);
      return false;
    }

    if (asset.lastTradeAt !== null && this.options.cooldownSeconds > 0) {
      const elapsedMs = this.clock().getTime() - asset.lastTradeAt;
      if (elapsedMs < this.options.cooldownSeconds * 1000) {
        logger.debug(`${instrument} in cooldown`, { remainingSec: Math.ceil((this.options.cooldownSeconds * 1000 - elapsedMs) / 1000) });
        return false;
      }
    }

    return true;
  }

  nextStake(instrument: string, highChance: boolean, payout: number): number {
    const asset = this.assetState(instrument);
    const { baseStake, strategy } = this.options;

    const martingale = strategy === 'martingale' || (this.options.useMartingaleIfHighChance && highChance);
    const sorosPayoutOk = this.options.useSorosIfLowPayout || payout >= this.options.minPayoutForSoros;

    let stake = baseStake;
    let mode: StakeMode = 'base';

    if (martingale && asset.lastWin === false && asset.lastStake !== null && asset.martingaleStep < this.options.maxMartingaleSteps) {
      stake = asset.lastStake * this.options.martingaleFactor;
      mode = 'martingale';
    } else if (strategy === 'soros' && sorosPayoutOk && asset.lastWin === true && asset.lastStake !== null && asset.sorosStep < this.options.sorosLevel) {
      stake = asset.lastStake + asset.lastProfit;
      mode = 'soros';
    }

    stake = roundCents(stake);
    if (mode !== 'base') {
      logger.debug(`${instrument} ${mode} stake ${stake}`, { martingaleStep: asset.martingaleStep, sorosStep: asset.sorosStep });
    }

    asset.pending = { stake, payout, mode };
    return stake;
  }

  registerOutcome(instrument: string, win: boolean): void {
    this.rollDay();
    const asset = this.assetState(instrument);

    const pending: PendingStake = asset.pending ?? { stake: this.options.baseStake, payout: 0, mode: 'base' };
    const profit = roundCents(win ? pending.stake * pending.payout : -pending.stake);

    if (win) {
      this.wins++;
      this.consecutiveLosses = 0;
      asset.martingaleStep = 0;
      asset.sorosStep = pending.mode === 'soros' ? asset.sorosStep + 1 : 0;
      asset.lastWin = true;
      if (asset.sorosStep >= this.options.sorosLevel) {
        // cycle complete: bank the profit and restart from base
        asset.sorosStep = 0;
        asset.lastWin = null;
      }
    } else {
      this.losses++;
      this.consecutiveLosses++;
      asset.sorosStep = 0;
      asset.martingaleStep = pending.mode === 'martingale' ? asset.martingaleStep + 1 : 0;
      asset.lastWin = false;
      if (asset.martingaleStep >= this.options.maxMartingaleSteps) {
        // recovery ladder exhausted: take the loss and restart from base
        asset.martingaleStep = 0;
        asset.lastWin = null;
      }
    }

    asset.lastStake = pending.stake;
    asset.lastProfit = profit;
    asset.pending = null;
    asset.lastTradeAt = this.clock().getTime();
    this.netProfit = roundCents(this.netProfit + profit);

    logger.info(`${instrument} ${win ? 'win' : 'loss'} ${profit >= 0 ? '+' : ''}${profit}`, {
      netProfit: this.netProfit,
      consecutiveLosses: this.consecutiveLosses,
    });

    const blocked = this.blockedReason();
    if (blocked) {
      logger.warn(`Trading halted for the day: ${blocked}`);
    }
  }

  getSnapshot(): RiskSnapshot {
    this.rollDay();
    return {
      dayKey: this.dayKey,
      netProfit: this.netProfit,
      wins: this.wins,
      losses: this.losses,
      consecutiveLosses: this.consecutiveLosses,
      blockedReason: this.blockedReason(),
    };
  }

  // ═══════════════════════════════════════════════════════════════
  // INTERNALS
  // ═══════════════════════════════════════════════════════════════

  private assetState(instrument: string): AssetState {
    let asset = this.assets.get(instrument);
    if (!asset) {
      asset = freshAsset();
      this.assets.set(instrument, asset);
    }
    return asset;
  }

  private blockedReason(): string | null {
    const { stopLossAmount, stopLossConsecutive, stopWinAmount } = this.options;
    if (this.netProfit <= -stopLossAmount) return `stop loss ${this.netProfit} <= -${stopLossAmount}`;
    if (this.consecutiveLosses >= stopLossConsecutive) return `${this.consecutiveLosses} consecutive losses`;
    if (this.netProfit >= stopWinAmount) return `stop win ${this.netProfit} >= ${stopWinAmount}`;
    return null;
  }

  private rollDay(): void {
    const today = toDayKey(this.clock(), this.options.timezone);
    if (today <= this.dayKey) return;

    logger.info(`New day ${today} - risk counters reset`, { previousNet: this.netProfit });
    this.dayKey = today;
    this.netProfit = 0;
    this.wins = 0;
    this.losses = 0;
    this.consecutiveLosses = 0;
    for (const asset of this.assets.values()) {
      asset.martingaleStep = 0;
      asset.sorosStep = 0;
      asset.lastWin = null;
      asset.lastStake = null;
      asset.lastProfit = 0;
    }
  }
}
