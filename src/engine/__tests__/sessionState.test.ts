import { describe, it, expect } from 'vitest';
import { SessionState } from '../sessionState.js';

describe('SessionState', () => {
  it('starts empty', () => {
    expect(new SessionState().snapshot()).toEqual({ dailyWins: 0, lastTradeDate: null });
  });

  it('first observed day counts as a rollover', () => {
    const state = new SessionState();
    expect(state.observeDate('2026-10-19')).toBe(true);
    expect(state.lastTradeDate).toBe('2026-10-19');
  });

  it('keeps wins within the same day', () => {
    const state = new SessionState();
    state.observeDate('2026-10-19');
    state.recordWin();
    state.recordWin();

    expect(state.observeDate('2026-10-19')).toBe(false);
    expect(state.dailyWins).toBe(2);
  });

  it('resets wins when the day advances', () => {
    const state = new SessionState({ dailyWins: 3, lastTradeDate: '2026-10-18' });

    expect(state.observeDate('2026-10-19')).toBe(true);
    expect(state.snapshot()).toEqual({ dailyWins: 0, lastTradeDate: '2026-10-19' });
  });

  it('does not reset on an earlier date', () => {
    const state = new SessionState({ dailyWins: 1, lastTradeDate: '2026-10-19' });

    expect(state.observeDate('2026-10-18')).toBe(false);
    expect(state.dailyWins).toBe(1);
  });
});
