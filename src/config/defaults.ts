/**
 * Default Settings
 * Values used when config/session.json leaves a field out.
 */

export const DEFAULTS = {
  // ═══════════════════════════════════════════════════════════════
  // ACCOUNT
  // ═══════════════════════════════════════════════════════════════
  accountType: 'PRACTICE' as const,

  // ═══════════════════════════════════════════════════════════════
  // MARKET DATA
  // ═══════════════════════════════════════════════════════════════
  market: {
    timeframeMainSeconds: 60,   // 1-minute candles
    candleCount: 100,           // lookback requested per cycle
    expiryMinutes: 1,           // turbo expiry
  },

  // ═══════════════════════════════════════════════════════════════
  // PAYOUT BAND
  // ═══════════════════════════════════════════════════════════════
  payout: {
    min: 0.7,
    max: 0.95,
  },

  // ═══════════════════════════════════════════════════════════════
  // SIGNAL
  // ═══════════════════════════════════════════════════════════════
  signal: {
    maFast: 20,
    maSlow: 50,
    volumePeriod: 20,
  },

  // ═══════════════════════════════════════════════════════════════
  // SESSION LOOP
  // ═══════════════════════════════════════════════════════════════
  session: {
    dailyWinCap: 3,
    baseCycleSleepSeconds: 60,
    newsPauseSeconds: 60,
    dailyStopPauseSeconds: 60 * 60,
    newsBufferMinutes: 30,
    timezone: 'UTC',
  },

  // ═══════════════════════════════════════════════════════════════
  // RISK / STAKING
  // ═══════════════════════════════════════════════════════════════
  risk: {
    baseStake: 2,
    stopLossAmount: 20,
    stopLossConsecutive: 3,
    stopWinAmount: 30,
    strategy: 'fixed' as const,
    martingaleFactor: 2.2,
    maxMartingaleSteps: 2,
    sorosLevel: 2,
    useMartingaleIfHighChance: false,
    useSorosIfLowPayout: false,
    minPayoutForSoros: 0.8,
    cooldownSeconds: 120,
  },

  // ═══════════════════════════════════════════════════════════════
  // PREDICTOR
  // ═══════════════════════════════════════════════════════════════
  predictor: {
    minSamples: 20,
    winRateThreshold: 0.6,
  },

  // ═══════════════════════════════════════════════════════════════
  // NEWS
  // ═══════════════════════════════════════════════════════════════
  news: {
    calendarFile: 'data/news-calendar.json',
    refreshMinutes: 15,
  },

  // ═══════════════════════════════════════════════════════════════
  // RUNTIME
  // ═══════════════════════════════════════════════════════════════
  runtime: {
    configPath: 'config/session.json',
    tradeLogFile: 'data/trade-log.jsonl',
    statusPort: 3000,
    outcomePollMs: 2000,
    outcomeTimeoutMs: 5 * 60 * 1000,
  },
} as const;
