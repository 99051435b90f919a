import { describe, it, expect } from 'vitest';
import { RiskManager, type RiskManagerOptions } from '../riskManager.js';

const BASE: RiskManagerOptions = {
  assets: ['EURUSD', 'GBPUSD'],
  timezone: 'UTC',
  baseStake: 2,
  stopLossAmount: 20,
  stopLossConsecutive: 10,
  stopWinAmount: 30,
  strategy: 'fixed',
  martingaleFactor: 2.2,
  maxMartingaleSteps: 2,
  sorosLevel: 2,
  useMartingaleIfHighChance: false,
  useSorosIfLowPayout: false,
  minPayoutForSoros: 0.8,
  cooldownSeconds: 0,
};

function setup(overrides: Partial<RiskManagerOptions> = {}) {
  let now = new Date('2026-10-19T10:00:00Z');
  const risk = new RiskManager({ ...BASE, ...overrides }, () => now);
  return {
    risk,
    advance(seconds: number): void {
      now = new Date(now.getTime() + seconds * 1000);
    },
  };
}

/** Places a stake and resolves it; returns the stake used */
function trade(risk: RiskManager, win: boolean, payout: number = 0.8, instrument: string = 'EURUSD', highChance: boolean = true): number {
  const stake = risk.nextStake(instrument, highChance, payout);
  risk.registerOutcome(instrument, win);
  return stake;
}

describe('RiskManager.canTrade', () => {
  it('allows configured assets and rejects unknown ones', () => {
    const { risk } = setup();
    expect(risk.canTrade('EURUSD')).toBe(true);
    expect(risk.canTrade('BTCUSD')).toBe(false);
  });

  it('blocks after the daily loss limit', () => {
    const { risk } = setup({ stopLossAmount: 5 });
    trade(risk, false);
    trade(risk, false);
    expect(risk.canTrade('GBPUSD')).toBe(true);

    trade(risk, false);
    expect(risk.canTrade('GBPUSD')).toBe(false);
    expect(risk.getSnapshot().blockedReason).toBe('stop loss -6 <= -5');
  });

  it('blocks after consecutive losses and a win clears the streak', () => {
    const { risk } = setup({ stopLossConsecutive: 3 });
    trade(risk, false);
    trade(risk, false);
    trade(risk, true);
    trade(risk, false);
    trade(risk, false);
    expect(risk.canTrade('EURUSD')).toBe(true);

    trade(risk, false);
    expect(risk.canTrade('EURUSD')).toBe(false);
    expect(risk.getSnapshot().blockedReason).toBe('3 consecutive losses');
  });

  it('blocks once the daily profit target is met', () => {
    const { risk } = setup({ stopWinAmount: 3 });
    trade(risk, true, 0.9);
    expect(risk.canTrade('EURUSD')).toBe(true);

    trade(risk, true, 0.9);
    expect(risk.canTrade('EURUSD')).toBe(false);
    expect(risk.getSnapshot().blockedReason).toBe('stop win 3.6 >= 3');
  });

  it('enforces the per-asset cooldown', () => {
    const { risk, advance } = setup({ cooldownSeconds: 120 });
    trade(risk, true);

    expect(risk.canTrade('EURUSD')).toBe(false);
    expect(risk.canTrade('GBPUSD')).toBe(true);
    advance(119);
    expect(risk.canTrade('EURUSD')).toBe(false);
    advance(1);
    expect(risk.canTrade('EURUSD')).toBe(true);
  });

  it('resets the day counters on a new calendar day', () => {
    const { risk, advance } = setup({ stopLossAmount: 3 });
    trade(risk, false);
    trade(risk, false);
    expect(risk.canTrade('EURUSD')).toBe(false);

    advance(24 * 3600);
    expect(risk.canTrade('EURUSD')).toBe(true);
    expect(risk.getSnapshot()).toEqual({
      dayKey: '2026-10-20',
      netProfit: 0,
      wins: 0,
      losses: 0,
      consecutiveLosses: 0,
      blockedReason: null,
    });
  });
});

describe('RiskManager staking', () => {
  it('fixed strategy always stakes the base amount', () => {
    const { risk } = setup();
    expect([trade(risk, false), trade(risk, false), trade(risk, true)]).toEqual([2, 2, 2]);
  });

  it('martingale multiplies after losses up to the step limit', () => {
    const { risk } = setup({ strategy: 'martingale' });
    const stakes = [trade(risk, false), trade(risk, false), trade(risk, false), trade(risk, false)];

    expect(stakes).toEqual([2, 4.4, 9.68, 2]);
    expect(risk.getSnapshot().netProfit).toBe(-18.08);
  });

  it('martingale returns to base after a win', () => {
    const { risk } = setup({ strategy: 'martingale' });
    const stakes = [trade(risk, false), trade(risk, true), trade(risk, true)];

    expect(stakes).toEqual([2, 4.4, 2]);
    expect(risk.getSnapshot().netProfit).toBe(3.12);
  });

  it('keeps recovery stakes per asset', () => {
    const { risk } = setup({ strategy: 'martingale' });
    trade(risk, false, 0.8, 'EURUSD');

    expect(risk.nextStake('GBPUSD', true, 0.8)).toBe(2);
    expect(risk.nextStake('EURUSD', true, 0.8)).toBe(4.4);
  });

  it('can apply martingale only to high-chance setups', () => {
    const { risk } = setup({ useMartingaleIfHighChance: true });
    trade(risk, false);

    expect(risk.nextStake('EURUSD', false, 0.8)).toBe(2);
    expect(risk.nextStake('EURUSD', true, 0.8)).toBe(4.4);
  });

  it('soros reinvests the profit up to the configured level', () => {
    const { risk } = setup({ strategy: 'soros' });
    const stakes = [trade(risk, true), trade(risk, true), trade(risk, true), trade(risk, true)];

    expect(stakes).toEqual([2, 3.6, 6.48, 2]);
  });

  it('soros stays at base on a low payout unless allowed', () => {
    const strict = setup({ strategy: 'soros' });
    trade(strict.risk, true, 0.75);
    expect(strict.risk.nextStake('EURUSD', true, 0.75)).toBe(2);

    const lenient = setup({ strategy: 'soros', useSorosIfLowPayout: true });
    trade(lenient.risk, true, 0.75);
    expect(lenient.risk.nextStake('EURUSD', true, 0.75)).toBe(3.5);
  });

  it('a loss ends the soros cycle', () => {
    const { risk } = setup({ strategy: 'soros' });
    const stakes = [trade(risk, true), trade(risk, false), trade(risk, true)];

    expect(stakes).toEqual([2, 3.6, 2]);
  });
});
