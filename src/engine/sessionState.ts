/**
 * Session State
 * Daily win count and the last observed calendar day. In memory only:
 * a restart starts the day from zero.
 */

export interface SessionStateSnapshot {
  dailyWins: number;
  lastTradeDate: string | null;
}

export class SessionState {
  private wins: number;
  private lastDate: string | null;

  constructor(initial: Partial<SessionStateSnapshot> = {}) {
    this.wins = initial.dailyWins ?? 0;
    this.lastDate = initial.lastTradeDate ?? null;
  }

  get dailyWins(): number {
    return this.wins;
  }

  get lastTradeDate(): string | null {
    return this.lastDate;
  }

  /**
   * Records today's date key. Returns true when the day rolled over and the
   * win count was reset.
   */
  observeDate(today: string): boolean {
    const rolled = this.lastDate === null || this.lastDate < today;
    if (rolled) {
      this.wins = 0;
    }
    this.lastDate = today;
    return rolled;
  }

  recordWin(): void {
    this.wins++;
  }

  snapshot(): SessionStateSnapshot {
    return { dailyWins: this.wins, lastTradeDate: this.lastDate };
  }
}
