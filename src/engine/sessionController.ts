/**
 * Session Controller
 * Drives the scan loop: one cycle per wake-up, one instrument at a time.
 *
 * Cycle precedence (checked in order, first match wins):
 * 1. NEWS_PAUSE        high-impact event imminent, state untouched
 * 2. (rollover)        new calendar day resets daily wins
 * 3. DAILY_STOP_PAUSE  daily win cap reached
 * 4. RUNNING           scan every instrument
 *
 * A failing instrument never stops the scan of the rest of the basket.
 * Only connect() failure escapes, from start().
 */

import type { BrokerSession, NewsGate, Predictor, StakingManager } from '../types/collaborators.js';
import type { CandleWindow, TradeDecision, TradeDirection } from '../types/market.js';
import { SignalAggregator, buildFeatureVector } from './signalAggregator.js';
import { SessionState, type SessionStateSnapshot } from './sessionState.js';
import { ConnectionError, errorMessage } from '../services/errors.js';
import { createLogger } from '../services/logger.js';
import { formatDuration, sleep as defaultSleep, toDayKey } from '../utils/timeUtils.js';

const logger = createLogger('SessionController');

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

export type SessionPhase = 'RUNNING' | 'NEWS_PAUSE' | 'DAILY_STOP_PAUSE';

export type InstrumentOutcome =
  | 'payout_unavailable'
  | 'payout_out_of_band'
  | 'fetch_failed'
  | 'no_direction'
  | 'not_tradeable'
  | 'low_chance'
  | 'execution_failed'
  | 'traded';

export interface InstrumentReport {
  instrument: string;
  outcome: InstrumentOutcome;
  payout?: number;
  direction?: TradeDirection;
  stake?: number;
  win?: boolean;
  error?: string;
}

export interface CycleReport {
  cycle: number;
  phase: SessionPhase;
  startedAt: string;
  dateKey: string | null;
  sleepMs: number;
  dailyWins: number;
  instruments: InstrumentReport[];
}

export interface SessionStatus extends SessionStateSnapshot {
  running: boolean;
  phase: SessionPhase | null;
  cycles: number;
  lastCycle: CycleReport | null;
}

export interface SessionSettings {
  instruments: readonly string[];
  timeframeMainSeconds: number;
  candleCount: number;
  expiryMinutes: number;
  minPayout: number;
  maxPayout: number;
  dailyWinCap: number;
  baseCycleSleepSeconds: number;
  newsPauseSeconds: number;
  dailyStopPauseSeconds: number;
  timezone: string;
}

export interface SessionControllerDeps {
  settings: SessionSettings;
  broker: BrokerSession;
  staking: StakingManager;
  predictor: Predictor;
  newsGate: NewsGate;
  aggregator: SignalAggregator;
  state?: SessionState;
  clock?: () => Date;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

// ═══════════════════════════════════════════════════════════════
// CONTROLLER
// ═══════════════════════════════════════════════════════════════

export class SessionController {
  private readonly settings: SessionSettings;
  private readonly broker: BrokerSession;
  private readonly staking: StakingManager;
  private readonly predictor: Predictor;
  private readonly newsGate: NewsGate;
  private readonly aggregator: SignalAggregator;
  private readonly state: SessionState;
  private readonly clock: () => Date;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  private running: boolean = false;
  private phase: SessionPhase | null = null;
  private cycles: number = 0;
  private lastCycle: CycleReport | null = null;

  constructor(deps: SessionControllerDeps) {
    this.settings = deps.settings;
    this.broker = deps.broker;
    this.staking = deps.staking;
    this.predictor = deps.predictor;
    this.newsGate = deps.newsGate;
    this.aggregator = deps.aggregator;
    this.state = deps.state ?? new SessionState();
    this.clock = deps.clock ?? (() => new Date());
    this.sleep = deps.sleep ?? defaultSleep;
  }

  /**
   * Opens the broker session. Fatal on failure.
   */
  async start(): Promise<void> {
    try {
      await this.broker.connect();
    } catch (error) {
      const fatal = error instanceof ConnectionError
        ? error
        : new ConnectionError(`Broker connection failed: ${errorMessage(error)}`, { cause: error });
      logger.error('Failed to connect to broker', { error: fatal.message });
      throw fatal;
    }
    logger.info(`Connected - watching ${this.settings.instruments.length} instruments`);
  }

  /**
   * Loops until `signal` aborts. Sleeps end early on abort.
   */
  async run(signal: AbortSignal): Promise<void> {
    this.running = true;
    logger.info('Session loop started');

    try {
      while (!signal.aborted) {
        let sleepMs = this.settings.baseCycleSleepSeconds * 1000;
        try {
          const report = await this.runCycle();
          sleepMs = report.sleepMs;
        } catch (error) {
          logger.error('Cycle aborted unexpectedly', { error: errorMessage(error) });
        }

        if (signal.aborted) break;
        logger.debug(`Waiting ${formatDuration(sleepMs)} for next cycle`);
        await this.sleep(sleepMs, signal);
      }
    } finally {
      this.running = false;
      logger.info('Session loop stopped', { cycles: this.cycles, dailyWins: this.state.dailyWins });
    }
  }

  async runCycle(): Promise<CycleReport> {
    const cycle = ++this.cycles;
    const now = this.clock();
    logger.debug(`Cycle ${cycle} started`);

    await this.retrainIfDue(now);

    if (await this.newsImminent()) {
      logger.info('Waiting - high-impact news nearby');
      return this.finish({
        cycle,
        phase: 'NEWS_PAUSE',
        startedAt: now.toISOString(),
        dateKey: null,
        sleepMs: this.settings.newsPauseSeconds * 1000,
        dailyWins: this.state.dailyWins,
        instruments: [],
      });
    }

    const today = toDayKey(now, this.settings.timezone);
    const previous = this.state.lastTradeDate;
    if (this.state.observeDate(today) && previous !== null) {
      logger.info(`New trading day ${today} - daily wins reset`, { previous });
    }

    if (this.state.dailyWins >= this.settings.dailyWinCap) {
      logger.info(`Daily stop-win reached (${this.state.dailyWins}/${this.settings.dailyWinCap}) - pausing`);
      return this.finish({
        cycle,
        phase: 'DAILY_STOP_PAUSE',
        startedAt: now.toISOString(),
        dateKey: today,
        sleepMs: this.settings.dailyStopPauseSeconds * 1000,
        dailyWins: this.state.dailyWins,
        instruments: [],
      });
    }

    this.phase = 'RUNNING';
    const instruments = await this.scan();

    const report = this.finish({
      cycle,
      phase: 'RUNNING',
      startedAt: now.toISOString(),
      dateKey: today,
      sleepMs: this.settings.baseCycleSleepSeconds * 1000,
      dailyWins: this.state.dailyWins,
      instruments,
    });

    const traded = instruments.filter(r => r.outcome === 'traded').length;
    logger.info(`Cycle ${cycle} complete - ${instruments.length} instruments, ${traded} trades, ${this.state.dailyWins} wins today`);
    return report;
  }

  getStatus(): SessionStatus {
    return {
      ...this.state.snapshot(),
      running: this.running,
      phase: this.phase,
      cycles: this.cycles,
      lastCycle: this.lastCycle,
    };
  }

  // ═══════════════════════════════════════════════════════════════
  // CYCLE STEPS
  // ═══════════════════════════════════════════════════════════════

  private finish(report: CycleReport): CycleReport {
    this.phase = report.phase;
    this.lastCycle = report;
    return report;
  }

  private async retrainIfDue(now: Date): Promise<void> {
    try {
      await this.predictor.checkAndTrainDaily(now);
    } catch (error) {
      logger.error('Predictor retrain failed', { error: errorMessage(error) });
    }
  }

  /**
   * A news source that cannot answer counts as an imminent event.
   */
  private async newsImminent(): Promise<boolean> {
    try {
      return await this.newsGate.hasImminentHighImpactEvent();
    } catch (error) {
      logger.error('News check failed - pausing as if news were imminent', { error: errorMessage(error) });
      return true;
    }
  }

  private async scan(): Promise<InstrumentReport[]> {
    let payouts: Map<string, number>;
    try {
      payouts = await this.broker.fetchAllPayouts();
    } catch (error) {
      logger.error('Failed to fetch payouts - skipping scan', { error: errorMessage(error) });
      payouts = new Map();
    }

    const reports: InstrumentReport[] = [];
    for (const instrument of this.settings.instruments) {
      try {
        reports.push(await this.evaluate(instrument, payouts.get(instrument)));
      } catch (error) {
        logger.error(`[${instrument}] Evaluation failed`, { error: errorMessage(error) });
        reports.push({ instrument, outcome: 'execution_failed', error: errorMessage(error) });
      }
    }
    return reports;
  }

  private async evaluate(instrument: string, payout: number | undefined): Promise<InstrumentReport> {
    if (payout === undefined) {
      return { instrument, outcome: 'payout_unavailable' };
    }
    if (payout < this.settings.minPayout || payout > this.settings.maxPayout) {
      logger.debug(`[${instrument}] Payout ${payout} outside band`, {
        min: this.settings.minPayout,
        max: this.settings.maxPayout,
      });
      return { instrument, outcome: 'payout_out_of_band', payout };
    }

    let candleWindow: CandleWindow;
    try {
      candleWindow = await this.broker.fetchCandles(instrument, this.settings.timeframeMainSeconds, this.settings.candleCount);
    } catch (error) {
      logger.error(`[${instrument}] Failed to fetch candles`, { error: errorMessage(error) });
      return { instrument, outcome: 'fetch_failed', payout, error: errorMessage(error) };
    }

    const analysis = this.aggregator.analyze(candleWindow);
    const direction = analysis.direction;
    if (direction === null) {
      return { instrument, outcome: 'no_direction', payout };
    }

    if (!this.staking.canTrade(instrument)) {
      logger.debug(`[${instrument}] ${direction} signal blocked by risk limits`);
      return { instrument, outcome: 'not_tradeable', payout, direction };
    }

    const features = buildFeatureVector(analysis, payout);
    if (!this.predictor.predictHighChance(features)) {
      logger.debug(`[${instrument}] ${direction} signal rated low chance`, { features });
      return { instrument, outcome: 'low_chance', payout, direction };
    }

    const decision: TradeDecision = {
      instrument,
      direction,
      stakeAmount: this.staking.nextStake(instrument, true, payout),
      features,
    };
    return this.execute(decision);
  }

  private async execute(decision: TradeDecision): Promise<InstrumentReport> {
    const { instrument, direction, stakeAmount, features } = decision;
    logger.info(`[${instrument}] Entering ${direction} with ${stakeAmount} - high chance`, {
      pattern: features.patternName,
      volumeRatio: Number(features.volumeRatio.toFixed(2)),
      payout: features.payout,
    });

    let win: boolean;
    try {
      const orderId = await this.broker.execute(stakeAmount, instrument, direction, this.settings.expiryMinutes);
      win = (await this.broker.awaitOutcome(orderId)) === 'win';
    } catch (error) {
      // failed or unresolved orders count as losses
      logger.error(`[${instrument}] Order failed - recording a loss`, { error: errorMessage(error) });
      this.staking.registerOutcome(instrument, false);
      this.predictor.logOutcome(features, false);
      return {
        instrument,
        outcome: 'execution_failed',
        payout: features.payout,
        direction,
        stake: stakeAmount,
        error: errorMessage(error),
      };
    }

    this.staking.registerOutcome(instrument, win);
    this.predictor.logOutcome(features, win);
    if (win) {
      this.state.recordWin();
    }

    logger.info(`[${instrument}] ${direction} ${win ? 'WIN' : 'LOSS'}`, { stake: stakeAmount, dailyWins: this.state.dailyWins });
    return { instrument, outcome: 'traded', payout: features.payout, direction, stake: stakeAmount, win };
  }
}
