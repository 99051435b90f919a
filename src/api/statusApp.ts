/**
 * Status API
 *
 * Endpoints:
 * GET  /api/health                                 - Liveness
 * GET  /api/session                                - Loop status, last cycle, risk and predictor state
 * GET  /api/config                                 - Active config, credentials stripped
 * GET  /api/news                                   - Upcoming high-impact events
 * GET  /api/instruments/:instrument/levels         - Support/resistance, Fibonacci, trendlines
 */

import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import type { BrokerSession } from '../types/collaborators.js';
import type { SessionStatus } from '../engine/sessionController.js';
import type { RiskSnapshot } from '../services/riskManager.js';
import type { SetupStats } from '../services/outcomePredictor.js';
import type { NewsEvent } from '../validation/schemas.js';
import { InstrumentParamSchema, LevelsQuerySchema } from '../validation/schemas.js';
import { publicConfig, type AppConfig } from '../config/sessionConfig.js';
import { fibonacciLevels, supportResistance, trendlines } from '../engine/marketAnalytics.js';
import { requestIdMiddleware } from '../middleware/requestId.js';
import { parsedParams, parsedQuery, validateParams, validateQuery } from '../middleware/validate.js';
import { EngineError, errorMessage } from '../services/errors.js';
import { createLogger } from '../services/logger.js';

const logger = createLogger('StatusApi');

export interface StatusAppDeps {
  config: AppConfig;
  controller: { getStatus(): SessionStatus };
  broker: Pick<BrokerSession, 'fetchCandles'>;
  risk?: { getSnapshot(): RiskSnapshot };
  predictor?: { getStats(): { trainedDay: string | null; samples: number; setups: Record<string, SetupStats> } };
  news?: { upcoming(limit?: number): NewsEvent[] };
  version?: string;
  clock?: () => Date;
}

export function createStatusApp(deps: StatusAppDeps): Express {
  const app = express();
  const clock = deps.clock ?? (() => new Date());
  const startedAt = clock();

  // ═══════════════════════════════════════════════════════════════
  // MIDDLEWARE
  // ═══════════════════════════════════════════════════════════════

  app.use(cors());
  app.use(express.json());
  app.use(requestIdMiddleware);

  app.use((req, res, next) => {
    const start = Date.now();
    res.on('finish', () => {
      logger.debug(`${req.method} ${req.path} ${res.statusCode} ${Date.now() - start}ms`, { requestId: req.id });
    });
    next();
  });

  // ═══════════════════════════════════════════════════════════════
  // API ROUTES
  // ═══════════════════════════════════════════════════════════════

  app.get('/api/health', (_req, res) => {
    const status = deps.controller.getStatus();
    res.json({
      status: 'ok',
      version: deps.version ?? '1.0.0',
      timestamp: clock().toISOString(),
      uptimeSeconds: Math.floor((clock().getTime() - startedAt.getTime()) / 1000),
      running: status.running,
    });
  });

  app.get('/api/session', (_req, res) => {
    res.json({
      ...deps.controller.getStatus(),
      risk: deps.risk?.getSnapshot() ?? null,
      predictor: deps.predictor?.getStats() ?? null,
    });
  });

  app.get('/api/config', (_req, res) => {
    res.json(publicConfig(deps.config));
  });

  app.get('/api/news', (_req, res) => {
    res.json({ events: deps.news?.upcoming() ?? [] });
  });

  app.get(
    '/api/instruments/:instrument/levels',
    validateParams(InstrumentParamSchema),
    validateQuery(LevelsQuerySchema),
    async (_req, res, next) => {
      try {
        const { instrument } = parsedParams(res, InstrumentParamSchema);
        const { lookback } = parsedQuery(res, LevelsQuerySchema);

        if (!deps.config.instruments.includes(instrument)) {
          res.status(404).json({ error: `${instrument} is not in the configured basket` });
          return;
        }

        const candleWindow = await deps.broker.fetchCandles(
          instrument,
          deps.config.timeframeMainSeconds,
          Math.max(deps.config.candleCount, lookback),
        );

        res.json({
          instrument,
          candles: candleWindow.candles.length,
          supportResistance: supportResistance(candleWindow, lookback),
          fibonacci: fibonacciLevels(candleWindow),
          trendlines: trendlines(candleWindow),
        });
      } catch (error) {
        next(error);
      }
    },
  );

  app.use('/api', (_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  // ═══════════════════════════════════════════════════════════════
  // ERROR HANDLING
  // ═══════════════════════════════════════════════════════════════

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof EngineError && err.recoverable) {
      logger.warn(`Upstream error on ${req.path}`, { requestId: req.id, error: err.message });
      res.status(502).json({ error: err.message, code: err.code });
      return;
    }
    logger.error('Unhandled error', { requestId: req.id, error: errorMessage(err) });
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
