/**
 * Binary Session Engine - entrypoint
 *
 * Boot order:
 * 1. Config (.env + config/session.json)  - exit 1 on ConfigError
 * 2. Trade log (PostgreSQL if DATABASE_URL, else JSONL file)
 * 3. Broker session                        - exit 1 on ConnectionError
 * 4. Status API + session loop until SIGINT/SIGTERM
 */

import 'dotenv/config';
import type { Server } from 'http';

import { loadConfig, type AppConfig } from './config/sessionConfig.js';
import { DEFAULTS } from './config/defaults.js';
import { closeDb, initDb, runMigrations } from './db/client.js';
import { FileTradeLogStore, PostgresTradeLogStore, type TradeLogStore } from './storage/tradeLogStore.js';
import { HttpBrokerClient } from './services/brokerClient.js';
import { RiskManager } from './services/riskManager.js';
import { OutcomePredictor } from './services/outcomePredictor.js';
import { NewsCalendarGate } from './services/newsGate.js';
import { ConfigError, ConnectionError, errorMessage } from './services/errors.js';
import { createLogger } from './services/logger.js';
import { SignalAggregator } from './engine/signalAggregator.js';
import { BasicPatternDetector } from './engine/candlestickPatterns.js';
import { SessionController } from './engine/sessionController.js';
import { createStatusApp } from './api/statusApp.js';

const logger = createLogger('Server');

// ═══════════════════════════════════════════════════════════════
// WIRING
// ═══════════════════════════════════════════════════════════════

async function createTradeLogStore(config: AppConfig): Promise<TradeLogStore> {
  const fileStore = new FileTradeLogStore(config.tradeLogFile);
  if (!config.databaseUrl) {
    logger.info(`DATABASE_URL not set - trade log at ${config.tradeLogFile}`);
    return fileStore;
  }

  try {
    const db = await initDb(config.databaseUrl);
    await runMigrations();
    return new PostgresTradeLogStore(db, fileStore);
  } catch (error) {
    logger.error('Database unavailable - falling back to file trade log', { error: errorMessage(error) });
    return fileStore;
  }
}

function listen(app: ReturnType<typeof createStatusApp>, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, () => resolve(server));
    server.once('error', reject);
  });
}

async function main(): Promise<void> {
  const config = loadConfig();

  const store = await createTradeLogStore(config);
  const broker = new HttpBrokerClient({
    baseUrl: config.brokerBaseUrl,
    email: config.email,
    password: config.password,
    accountType: config.accountType,
    outcomePollMs: DEFAULTS.runtime.outcomePollMs,
    outcomeTimeoutMs: DEFAULTS.runtime.outcomeTimeoutMs,
  });
  const risk = new RiskManager({ ...config.risk, assets: config.instruments, timezone: config.timezone });
  const predictor = new OutcomePredictor(store, { ...config.predictor, timezone: config.timezone });
  const newsGate = new NewsCalendarGate({
    calendarFile: config.news.calendarFile,
    calendarUrl: config.news.calendarUrl,
    refreshMinutes: config.news.refreshMinutes,
    bufferMinutes: config.newsBufferMinutes,
    currencies: config.news.currencies,
  });
  const aggregator = new SignalAggregator({
    maFast: config.maFast,
    maSlow: config.maSlow,
    volumePeriod: config.volumePeriod,
    patternDetector: new BasicPatternDetector(),
  });

  const controller = new SessionController({
    settings: config,
    broker,
    staking: risk,
    predictor,
    newsGate,
    aggregator,
  });

  await controller.start();

  const app = createStatusApp({ config, controller, broker, risk, predictor, news: newsGate });
  const server = await listen(app, config.statusPort);
  logger.info(`📡 Status API on port ${config.statusPort}`);

  const abort = new AbortController();
  const shutdown = (signal: string): void => {
    if (abort.signal.aborted) return;
    logger.info(`${signal} received - shutting down...`);
    abort.abort();
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  logger.info(`🎯 Binary Session Engine - ${config.accountType} account, ${config.instruments.join(', ')}`);
  await controller.run(abort.signal);

  await predictor.flush();
  await new Promise<void>(resolve => server.close(() => resolve()));
  await closeDb();
  logger.info('Shutdown complete');
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    logger.error(error.message, { issues: error.issues });
  } else if (error instanceof ConnectionError) {
    logger.error(`Cannot start session: ${error.message}`);
  } else {
    logger.error('Fatal error', { error: errorMessage(error) });
  }
  process.exitCode = 1;
  closeDb().catch((closeError: unknown) => {
    logger.error('Failed to close database', { error: errorMessage(closeError) });
  });
});
