/**
 * Session Configuration
 * Reads config/session.json plus broker credentials from the environment,
 * validates both, and returns one frozen object. Loaded once at startup.
 */

import fs from 'fs';
import path from 'path';
import { ZodError } from 'zod';
import {
  EnvSchema,
  SessionFileSchema,
  type EnvConfig,
  type SessionFileConfig,
} from '../validation/schemas.js';
import { DEFAULTS } from './defaults.js';
import { ConfigError, type ConfigIssue } from '../services/errors.js';
import { createLogger } from '../services/logger.js';

const logger = createLogger('Config');

export interface RuntimeConfig {
  email: string;
  password: string;
  brokerBaseUrl: string;
  databaseUrl: string | null;
  tradeLogFile: string;
  statusPort: number;
  configPath: string;
}

export type AppConfig = Readonly<SessionFileConfig & RuntimeConfig>;

function toIssues(error: ZodError): ConfigIssue[] {
  return error.issues.map(issue => ({
    field: issue.path.join('.') || '(root)',
    message: issue.message,
  }));
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object') {
    for (const inner of Object.values(value)) {
      deepFreeze(inner);
    }
    Object.freeze(value);
  }
  return value;
}

export function parseEnv(env: NodeJS.ProcessEnv): EnvConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const issues = toIssues(result.error);
    throw new ConfigError(`Invalid environment: ${issues.map(i => `${i.field}: ${i.message}`).join('; ')}`, issues);
  }
  return result.data;
}

export function parseSessionFile(raw: unknown): SessionFileConfig {
  const result = SessionFileSchema.safeParse(raw);
  if (!result.success) {
    const issues = toIssues(result.error);
    throw new ConfigError(`Invalid session config: ${issues.map(i => `${i.field}: ${i.message}`).join('; ')}`, issues);
  }
  return result.data;
}

function readJson(filePath: string): unknown {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read session config at ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
  }

  try {
    return JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Session config at ${filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): AppConfig {
  const envConfig = parseEnv(env);
  const configPath = path.resolve(cwd, envConfig.SESSION_CONFIG);
  const session = parseSessionFile(readJson(configPath));

  const config: SessionFileConfig & RuntimeConfig = {
    ...session,
    email: envConfig.BROKER_EMAIL,
    password: envConfig.BROKER_PASSWORD,
    brokerBaseUrl: envConfig.BROKER_BASE_URL,
    databaseUrl: envConfig.DATABASE_URL ?? null,
    tradeLogFile: path.resolve(cwd, envConfig.TRADE_LOG_FILE),
    statusPort: envConfig.STATUS_PORT,
    configPath,
  };

  const calendarFile = config.news.calendarFile ?? (config.news.calendarUrl ? undefined : DEFAULTS.news.calendarFile);
  if (calendarFile) {
    config.news = { ...config.news, calendarFile: path.resolve(cwd, calendarFile) };
  }

  logger.info(`Loaded session config from ${configPath}`, {
    accountType: config.accountType,
    instruments: config.instruments.length,
    dailyWinCap: config.dailyWinCap,
    payoutBand: [config.minPayout, config.maxPayout],
  });

  return deepFreeze(config);
}

/**
 * Config as exposed by the status API: credentials stripped.
 */
export function publicConfig(config: AppConfig): Omit<AppConfig, 'password' | 'databaseUrl'> {
  const { password: _password, databaseUrl: _databaseUrl, ...rest } = config;
  return rest;
}
