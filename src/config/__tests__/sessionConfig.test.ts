import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { loadConfig, parseEnv, parseSessionFile, publicConfig } from '../sessionConfig.js';
import { ConfigError } from '../../services/errors.js';

const ENV = {
  BROKER_EMAIL: 'trader@example.com',
  BROKER_PASSWORD: 'test-secret',
  BROKER_BASE_URL: 'http://localhost:8080',
};

function issuesOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigError) return error.issues.map(i => i.field);
    throw error;
  }
  throw new Error('expected a ConfigError');
}

describe('parseSessionFile', () => {
  it('fills defaults around the instrument list', () => {
    const config = parseSessionFile({ instruments: ['eurusd', ' gbpusd '] });

    expect(config.instruments).toEqual(['EURUSD', 'GBPUSD']);
    expect(config.accountType).toBe('PRACTICE');
    expect(config.minPayout).toBe(0.7);
    expect(config.maxPayout).toBe(0.95);
    expect(config.maFast).toBe(20);
    expect(config.maSlow).toBe(50);
    expect(config.dailyWinCap).toBe(3);
    expect(config.risk.strategy).toBe('fixed');
    expect(config.predictor.minSamples).toBe(20);
    expect(config.news.refreshMinutes).toBe(15);
  });

  it('requires at least one unique instrument', () => {
    expect(issuesOf(() => parseSessionFile({ instruments: [] }))).toEqual(['instruments']);
    expect(issuesOf(() => parseSessionFile({ instruments: ['EURUSD', 'eurusd'] }))).toEqual(['instruments']);
  });

  it('rejects an inverted payout band', () => {
    expect(issuesOf(() => parseSessionFile({ instruments: ['EURUSD'], minPayout: 0.9, maxPayout: 0.8 }))).toEqual(['minPayout']);
  });

  it('rejects a fast average that is not shorter than the slow one', () => {
    expect(issuesOf(() => parseSessionFile({ instruments: ['EURUSD'], maFast: 50, maSlow: 50 }))).toEqual(['maFast']);
  });

  it('rejects a candle count below the longest lookback', () => {
    expect(issuesOf(() => parseSessionFile({ instruments: ['EURUSD'], candleCount: 40 }))).toEqual(['candleCount']);
  });

  it('rejects negative periods and unknown timezones', () => {
    expect(issuesOf(() => parseSessionFile({ instruments: ['EURUSD'], volumePeriod: -1 }))).toEqual(['volumePeriod']);
    expect(issuesOf(() => parseSessionFile({ instruments: ['EURUSD'], timezone: 'Mars/Olympus' }))).toEqual(['timezone']);
  });

  it('validates nested risk settings', () => {
    expect(issuesOf(() => parseSessionFile({ instruments: ['EURUSD'], risk: { strategy: 'kelly' } }))).toEqual(['risk.strategy']);
  });
});

describe('parseEnv', () => {
  it('applies runtime defaults', () => {
    const env = parseEnv(ENV);
    expect(env.SESSION_CONFIG).toBe('config/session.json');
    expect(env.STATUS_PORT).toBe(3000);
    expect(env.DATABASE_URL).toBeUndefined();
  });

  it('coerces the status port', () => {
    expect(parseEnv({ ...ENV, STATUS_PORT: '8081' }).STATUS_PORT).toBe(8081);
  });

  it('reports missing credentials', () => {
    expect(issuesOf(() => parseEnv({ BROKER_BASE_URL: 'http://localhost:8080' }))).toEqual(['BROKER_EMAIL', 'BROKER_PASSWORD']);
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'session-config-'));
    fs.mkdirSync(path.join(dir, 'config'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('merges the session file with the environment and freezes the result', () => {
    fs.writeFileSync(path.join(dir, 'config', 'session.json'), JSON.stringify({ instruments: ['EURUSD'], dailyWinCap: 5 }));

    const config = loadConfig(ENV, dir);

    expect(config.instruments).toEqual(['EURUSD']);
    expect(config.dailyWinCap).toBe(5);
    expect(config.email).toBe('trader@example.com');
    expect(config.databaseUrl).toBeNull();
    expect(config.configPath).toBe(path.join(dir, 'config', 'session.json'));
    expect(config.tradeLogFile).toBe(path.join(dir, 'data', 'trade-log.jsonl'));
    expect(config.news.calendarFile).toBe(path.join(dir, 'data', 'news-calendar.json'));
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.risk)).toBe(true);
  });

  it('leaves the calendar file unset when a feed URL is configured', () => {
    fs.writeFileSync(path.join(dir, 'config', 'session.json'), JSON.stringify({
      instruments: ['EURUSD'],
      news: { calendarUrl: 'https://calendar.example.com/week.json' },
    }));

    expect(loadConfig(ENV, dir).news.calendarFile).toBeUndefined();
  });

  it('raises ConfigError for a missing or unreadable file', () => {
    expect(() => loadConfig(ENV, dir)).toThrow(ConfigError);

    fs.writeFileSync(path.join(dir, 'config', 'session.json'), '{ nope');
    expect(() => loadConfig(ENV, dir)).toThrow(/is not valid JSON/);
  });

  it('strips credentials from the public view', () => {
    fs.writeFileSync(path.join(dir, 'config', 'session.json'), JSON.stringify({ instruments: ['EURUSD'] }));
    const config = loadConfig({ ...ENV, DATABASE_URL: 'postgres://localhost/test' }, dir);

    const visible = publicConfig(config);
    expect('password' in visible).toBe(false);
    expect('databaseUrl' in visible).toBe(false);
    expect(visible.email).toBe('trader@example.com');
  });
});
