/**
 * Broker Bridge Client
 * JSON-over-HTTP session with the options venue bridge.
 *
 * POST /session        -> { token }
 * GET  /candles        -> [{ from, open, close, min, max, volume }]
 * GET  /payouts        -> { [instrument]: { turbo?, binary? } }
 * POST /orders         -> { ok, orderId }
 * GET  /orders/:id     -> { status }  (polled until resolved)
 */

import type { ZodType, ZodTypeDef } from 'zod';
import type { BrokerSession } from '../types/collaborators.js';
import type { Candle, CandleWindow, TradeDirection, TradeOutcome } from '../types/market.js';
import {
  BridgeCandlesSchema,
  BridgeOrderSchema,
  BridgeOrderStatusSchema,
  BridgePayoutsSchema,
  BridgeSessionSchema,
} from '../validation/schemas.js';
import { ConnectionError, EngineError, ExecutionError, FetchError, TimeoutError, errorMessage } from './errors.js';
import { createLogger } from './logger.js';
import { DEFAULTS } from '../config/defaults.js';
import { sleep as defaultSleep } from '../utils/timeUtils.js';

const logger = createLogger('BrokerClient');

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

export interface BrokerClientOptions {
  baseUrl: string;
  email: string;
  password: string;
  accountType: 'PRACTICE' | 'REAL';
  outcomePollMs?: number;
  outcomeTimeoutMs?: number;
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
  clock?: () => Date;
}

type ErrorFactory = (message: string, cause: unknown) => EngineError;

// ═══════════════════════════════════════════════════════════════
// CLIENT
// ═══════════════════════════════════════════════════════════════

export class HttpBrokerClient implements BrokerSession {
  private readonly baseUrl: string;
  private readonly options: BrokerClientOptions;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly clock: () => Date;
  private readonly pollMs: number;
  private readonly timeoutMs: number;
  private token: string | null = null;

  constructor(options: BrokerClientOptions) {
    this.options = options;
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.sleep = options.sleep ?? (ms => defaultSleep(ms));
    this.clock = options.clock ?? (() => new Date());
    this.pollMs = options.outcomePollMs ?? DEFAULTS.runtime.outcomePollMs;
    this.timeoutMs = options.outcomeTimeoutMs ?? DEFAULTS.runtime.outcomeTimeoutMs;
  }

  get connected(): boolean {
    return this.token !== null;
  }

  async connect(): Promise<void> {
    logger.info(`Connecting to ${this.baseUrl} (${this.options.accountType})`);
    const session = await this.request(
      '/session',
      { method: 'POST', body: { email: this.options.email, password: this.options.password, accountType: this.options.accountType } },
      BridgeSessionSchema,
      (message, cause) => new ConnectionError(`Broker login failed: ${message}`, { cause }),
    );
    this.token = session.token;
    logger.info('Broker session established');
  }

  async fetchCandles(instrument: string, timeframeSeconds: number, count: number): Promise<CandleWindow> {
    const query = new URLSearchParams({
      instrument,
      timeframe: String(timeframeSeconds),
      count: String(count),
      to: String(Math.floor(this.clock().getTime() / 1000)),
    });

    const raw = await this.request(
      `/candles?${query.toString()}`,
      { method: 'GET' },
      BridgeCandlesSchema,
      (message, cause) => new FetchError(`Candles for ${instrument}: ${message}`, instrument, { cause }),
    );

    const candles: Candle[] = raw
      .map(c => ({
        timestamp: c.from,
        open: c.open,
        high: c.max,
        low: c.min,
        close: c.close,
        volume: c.volume,
      }))
      .sort((a, b) => a.timestamp - b.timestamp);

    for (let i = 1; i < candles.length; i++) {
      if (candles[i].timestamp === candles[i - 1].timestamp) {
        throw new FetchError(`Candles for ${instrument}: duplicate timestamp ${candles[i].timestamp}`, instrument);
      }
    }

    if (candles.length < count) {
      logger.debug(`[${instrument}] ${candles.length}/${count} candles returned`);
    }

    return { instrument, timeframeSeconds, candles };
  }

  async fetchAllPayouts(): Promise<Map<string, number>> {
    const raw = await this.request(
      '/payouts',
      { method: 'GET' },
      BridgePayoutsSchema,
      (message, cause) => new FetchError(`Payouts: ${message}`, null, { cause }),
    );

    const payouts = new Map<string, number>();
    for (const [instrument, quote] of Object.entries(raw)) {
      if (quote.turbo !== undefined) {
        payouts.set(instrument.toUpperCase(), quote.turbo);
      }
    }
    return payouts;
  }

  async execute(amount: number, instrument: string, direction: TradeDirection, expiryMinutes: number): Promise<string> {
    const order = await this.request(
      '/orders',
      { method: 'POST', body: { amount, instrument, direction, expiryMinutes } },
      BridgeOrderSchema,
      (message, cause) => new ExecutionError(`Order for ${instrument}: ${message}`, instrument, { cause }),
    );

    if (!order.ok || order.orderId === undefined) {
      throw new ExecutionError(`Order for ${instrument} rejected: ${order.message ?? 'no reason given'}`, instrument);
    }

    logger.info(`[${instrument}] Order ${order.orderId} placed`, { amount, direction, expiryMinutes });
    return order.orderId;
  }

  async awaitOutcome(orderId: string): Promise<TradeOutcome> {
    const startedAt = this.clock().getTime();

    for (;;) {
      let status: 'open' | 'win' | 'loss' | 'equal';
      try {
        const result = await this.request(
          `/orders/${encodeURIComponent(orderId)}`,
          { method: 'GET' },
          BridgeOrderStatusSchema,
          (message, cause) => new FetchError(`Order ${orderId} status: ${message}`, null, { cause }),
        );
        status = result.status;
      } catch (error) {
        // transient status failures are retried until the deadline
        logger.warn(`Order ${orderId} status check failed`, { error: errorMessage(error) });
        status = 'open';
      }

      if (status !== 'open') {
        logger.debug(`Order ${orderId} resolved: ${status}`);
        return status === 'win' ? 'win' : 'loss';
      }

      const waited = this.clock().getTime() - startedAt;
      if (waited >= this.timeoutMs) {
        throw new TimeoutError(orderId, waited);
      }
      await this.sleep(this.pollMs);
    }
  }

  // ═══════════════════════════════════════════════════════════════
  // TRANSPORT
  // ═══════════════════════════════════════════════════════════════

  private async request<T>(
    pathAndQuery: string,
    init: { method: 'GET' | 'POST'; body?: Record<string, unknown> },
    schema: ZodType<T, ZodTypeDef, unknown>,
    toError: ErrorFactory,
  ): Promise<T> {
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (init.body) headers['Content-Type'] = 'application/json';
    if (this.token) headers.Authorization = `Bearer ${this.token}`;

    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}${pathAndQuery}`, {
        method: init.method,
        headers,
        body: init.body ? JSON.stringify(init.body) : undefined,
      });
    } catch (error) {
      throw toError(`transport error: ${errorMessage(error)}`, error);
    }

    if (!response.ok) {
      throw toError(`HTTP ${response.status} ${response.statusText}`, null);
    }

    let json: unknown;
    try {
      json = await response.json();
    } catch (error) {
      throw toError('response is not JSON', error);
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      const detail = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
      throw toError(`unexpected payload (${detail})`, parsed.error);
    }
    return parsed.data;
  }
}
