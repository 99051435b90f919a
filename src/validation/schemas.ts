import { z } from 'zod';
import { DEFAULTS } from '../config/defaults.js';
import { isValidTimezone } from '../utils/timeUtils.js';

// ═══════════════════════════════════════════════════════════════
// SESSION CONFIG (config/session.json)
// ═══════════════════════════════════════════════════════════════

const positiveInt = z.number().int().positive();
const fraction = z.number().min(0).max(1);

export const RiskConfigSchema = z.object({
  baseStake: z.number().positive().default(DEFAULTS.risk.baseStake),
  stopLossAmount: z.number().positive().default(DEFAULTS.risk.stopLossAmount),
  stopLossConsecutive: positiveInt.default(DEFAULTS.risk.stopLossConsecutive),
  stopWinAmount: z.number().positive().default(DEFAULTS.risk.stopWinAmount),
  strategy: z.enum(['fixed', 'martingale', 'soros']).default(DEFAULTS.risk.strategy),
  martingaleFactor: z.number().min(1).max(10).default(DEFAULTS.risk.martingaleFactor),
  maxMartingaleSteps: z.number().int().min(0).max(10).default(DEFAULTS.risk.maxMartingaleSteps),
  sorosLevel: z.number().int().min(0).max(10).default(DEFAULTS.risk.sorosLevel),
  useMartingaleIfHighChance: z.boolean().default(DEFAULTS.risk.useMartingaleIfHighChance),
  useSorosIfLowPayout: z.boolean().default(DEFAULTS.risk.useSorosIfLowPayout),
  minPayoutForSoros: fraction.default(DEFAULTS.risk.minPayoutForSoros),
  cooldownSeconds: z.number().int().min(0).default(DEFAULTS.risk.cooldownSeconds),
});

export const PredictorConfigSchema = z.object({
  minSamples: positiveInt.default(DEFAULTS.predictor.minSamples),
  winRateThreshold: fraction.default(DEFAULTS.predictor.winRateThreshold),
});

export const NewsConfigSchema = z.object({
  calendarFile: z.string().min(1).optional(),
  calendarUrl: z.string().url().optional(),
  refreshMinutes: positiveInt.default(DEFAULTS.news.refreshMinutes),
  currencies: z.array(z.string().length(3).transform(s => s.toUpperCase())).optional(),
});

export const SessionFileSchema = z.object({
  accountType: z.enum(['PRACTICE', 'REAL']).default(DEFAULTS.accountType),
  instruments: z.array(z.string().trim().min(1).max(30).transform(s => s.toUpperCase()))
    .min(1, 'At least one instrument is required')
    .refine(list => new Set(list).size === list.length, 'Instruments must be unique'),
  timeframeMainSeconds: positiveInt.default(DEFAULTS.market.timeframeMainSeconds),
  candleCount: positiveInt.max(1000).default(DEFAULTS.market.candleCount),
  expiryMinutes: positiveInt.max(60).default(DEFAULTS.market.expiryMinutes),
  minPayout: fraction.default(DEFAULTS.payout.min),
  maxPayout: fraction.default(DEFAULTS.payout.max),
  maFast: positiveInt.default(DEFAULTS.signal.maFast),
  maSlow: positiveInt.default(DEFAULTS.signal.maSlow),
  volumePeriod: positiveInt.default(DEFAULTS.signal.volumePeriod),
  dailyWinCap: positiveInt.default(DEFAULTS.session.dailyWinCap),
  baseCycleSleepSeconds: positiveInt.default(DEFAULTS.session.baseCycleSleepSeconds),
  newsPauseSeconds: positiveInt.default(DEFAULTS.session.newsPauseSeconds),
  dailyStopPauseSeconds: positiveInt.default(DEFAULTS.session.dailyStopPauseSeconds),
  newsBufferMinutes: z.number().int().min(0).default(DEFAULTS.session.newsBufferMinutes),
  timezone: z.string().refine(isValidTimezone, 'Unknown IANA timezone').default(DEFAULTS.session.timezone),
  risk: RiskConfigSchema.default({}),
  predictor: PredictorConfigSchema.default({}),
  news: NewsConfigSchema.default({}),
}).superRefine((cfg, ctx) => {
  if (cfg.minPayout > cfg.maxPayout) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['minPayout'],
      message: `minPayout (${cfg.minPayout}) must not exceed maxPayout (${cfg.maxPayout})`,
    });
  }
  if (cfg.maFast >= cfg.maSlow) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['maFast'],
      message: `maFast (${cfg.maFast}) must be shorter than maSlow (${cfg.maSlow})`,
    });
  }
  const longestLookback = Math.max(cfg.maSlow, cfg.volumePeriod);
  if (cfg.candleCount < longestLookback) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['candleCount'],
      message: `candleCount (${cfg.candleCount}) must cover the longest lookback (${longestLookback})`,
    });
  }
});

export const EnvSchema = z.object({
  BROKER_EMAIL: z.string().email('BROKER_EMAIL must be an email address'),
  BROKER_PASSWORD: z.string().min(1, 'BROKER_PASSWORD is required'),
  BROKER_BASE_URL: z.string().url('BROKER_BASE_URL must be a URL'),
  DATABASE_URL: z.string().min(1).optional(),
  SESSION_CONFIG: z.string().min(1).optional().default(DEFAULTS.runtime.configPath),
  TRADE_LOG_FILE: z.string().min(1).optional().default(DEFAULTS.runtime.tradeLogFile),
  STATUS_PORT: z.coerce.number().int().min(0).max(65535).optional().default(DEFAULTS.runtime.statusPort),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional().default('info'),
  LOG_FORMAT: z.enum(['text', 'json']).optional().default('text'),
});

// ═══════════════════════════════════════════════════════════════
// BROKER BRIDGE PAYLOADS
// ═══════════════════════════════════════════════════════════════

export const BridgeSessionSchema = z.object({
  token: z.string().min(1),
});

/** Bridge candles use the venue's field names: min/max for low/high */
export const BridgeCandleSchema = z.object({
  from: z.number().finite(),
  open: z.number().finite(),
  close: z.number().finite(),
  min: z.number().finite(),
  max: z.number().finite(),
  volume: z.number().finite().min(0),
});

export const BridgeCandlesSchema = z.array(BridgeCandleSchema);

export const BridgePayoutsSchema = z.record(
  z.string(),
  z.object({
    turbo: fraction.optional(),
    binary: fraction.optional(),
  }),
);

export const BridgeOrderSchema = z.object({
  ok: z.boolean(),
  orderId: z.union([z.string(), z.number()]).transform(v => String(v)).optional(),
  message: z.string().optional(),
});

export const BridgeOrderStatusSchema = z.object({
  status: z.enum(['open', 'win', 'loss', 'equal']),
});

// ═══════════════════════════════════════════════════════════════
// NEWS CALENDAR
// ═══════════════════════════════════════════════════════════════

export const NewsEventSchema = z.object({
  time: z.string().datetime({ offset: true }),
  currency: z.string().length(3).transform(s => s.toUpperCase()),
  impact: z.enum(['low', 'medium', 'high']),
  title: z.string().default(''),
});

export const NewsCalendarSchema = z.array(NewsEventSchema);

// ═══════════════════════════════════════════════════════════════
// TRADE LOG
// ═══════════════════════════════════════════════════════════════

export const FeatureVectorSchema = z.object({
  patternName: z.string().nullable(),
  breakout: z.enum(['breakout_up', 'breakout_down', 'none']),
  trend: z.enum(['up', 'down', 'flat']),
  volumeRatio: z.number().min(0),
  payout: fraction,
});

export const TradeLogRecordSchema = z.object({
  features: FeatureVectorSchema,
  win: z.boolean(),
  loggedAt: z.string().datetime(),
});

// ═══════════════════════════════════════════════════════════════
// STATUS API
// ═══════════════════════════════════════════════════════════════

export const InstrumentParamSchema = z.object({
  instrument: z.string().min(1).max(30).transform(s => s.toUpperCase()),
});

export const LevelsQuerySchema = z.object({
  lookback: z.coerce.number().int().min(1).max(1000).optional().default(50),
});

export type SessionFileConfig = z.infer<typeof SessionFileSchema>;
export type SessionFileInput = z.input<typeof SessionFileSchema>;
export type RiskConfig = z.infer<typeof RiskConfigSchema>;
export type PredictorConfig = z.infer<typeof PredictorConfigSchema>;
export type NewsConfig = z.infer<typeof NewsConfigSchema>;
export type EnvConfig = z.infer<typeof EnvSchema>;
export type NewsEvent = z.infer<typeof NewsEventSchema>;
export type TradeLogRecord = z.infer<typeof TradeLogRecordSchema>;
