/**
 * News Calendar Gate
 * Blocks trading around high-impact economic releases.
 *
 * Events come from a JSON file or an HTTP feed and are cached for
 * refreshMinutes. A failed refresh keeps serving the last good calendar.
 */

import fsPromises from 'fs/promises';
import type { NewsGate } from '../types/collaborators.js';
import { NewsCalendarSchema, type NewsEvent } from '../validation/schemas.js';
import { FetchError, errorMessage } from './errors.js';
import { createLogger } from './logger.js';

const logger = createLogger('NewsGate');

export interface NewsGateOptions {
  calendarFile?: string;
  calendarUrl?: string;
  refreshMinutes: number;
  bufferMinutes: number;
  /** Only events for these currencies count. All currencies when absent. */
  currencies?: readonly string[];
  fetchImpl?: typeof fetch;
  clock?: () => Date;
}

export class NewsCalendarGate implements NewsGate {
  private readonly options: NewsGateOptions;
  private readonly fetchImpl: typeof fetch;
  private readonly clock: () => Date;
  private readonly currencies: Set<string> | null;

  private events: NewsEvent[] = [];
  private loadedAt: number | null = null;
  private hasLoaded: boolean = false;

  constructor(options: NewsGateOptions) {
    if (!options.calendarFile && !options.calendarUrl) {
      throw new Error('NewsCalendarGate needs a calendarFile or calendarUrl');
    }
    this.options = options;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.clock = options.clock ?? (() => new Date());
    this.currencies = options.currencies && options.currencies.length > 0
      ? new Set(options.currencies.map(c => c.toUpperCase()))
      : null;
  }

  async hasImminentHighImpactEvent(): Promise<boolean> {
    await this.refreshIfStale();

    const now = this.clock().getTime();
    const bufferMs = this.options.bufferMinutes * 60 * 1000;

    const hit = this.events.find(event => {
      if (event.impact !== 'high') return false;
      if (this.currencies && !this.currencies.has(event.currency)) return false;
      return Math.abs(Date.parse(event.time) - now) <= bufferMs;
    });

    if (hit) {
      logger.info(`High-impact event nearby: ${hit.currency} ${hit.title || '(untitled)'} at ${hit.time}`);
      return true;
    }
    return false;
  }

  /** Upcoming high-impact events, soonest first */
  upcoming(limit: number = 5): NewsEvent[] {
    const now = this.clock().getTime();
    return this.events
      .filter(e => e.impact === 'high' && Date.parse(e.time) >= now)
      .sort((a, b) => Date.parse(a.time) - Date.parse(b.time))
      .slice(0, limit);
  }

  // ═══════════════════════════════════════════════════════════════
  // LOADING
  // ═══════════════════════════════════════════════════════════════

  private async refreshIfStale(): Promise<void> {
    const now = this.clock().getTime();
    const maxAgeMs = this.options.refreshMinutes * 60 * 1000;
    if (this.loadedAt !== null && now - this.loadedAt < maxAgeMs) return;

    try {
      this.events = await this.load();
      this.hasLoaded = true;
      logger.debug(`Calendar refreshed: ${this.events.length} events`);
    } catch (error) {
      if (!this.hasLoaded) {
        throw error;
      }
      logger.warn('Calendar refresh failed - keeping previous events', {
        error: errorMessage(error),
        events: this.events.length,
      });
    }
    this.loadedAt = now;
  }

  private async load(): Promise<NewsEvent[]> {
    const raw = this.options.calendarUrl
      ? await this.loadFromUrl(this.options.calendarUrl)
      : await this.loadFromFile(this.options.calendarFile ?? '');

    const parsed = NewsCalendarSchema.safeParse(raw);
    if (!parsed.success) {
      const first = parsed.error.issues[0];
      throw new FetchError(`News calendar is invalid at ${first?.path.join('.') ?? '(root)'}: ${first?.message ?? 'unknown issue'}`);
    }
    return parsed.data;
  }

  private async loadFromFile(filePath: string): Promise<unknown> {
    try {
      const content = await fsPromises.readFile(filePath, 'utf-8');
      return JSON.parse(content);
    } catch (error) {
      throw new FetchError(`Cannot read news calendar ${filePath}: ${errorMessage(error)}`, null, { cause: error });
    }
  }

  private async loadFromUrl(url: string): Promise<unknown> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, { headers: { Accept: 'application/json' } });
    } catch (error) {
      throw new FetchError(`News feed unreachable: ${errorMessage(error)}`, null, { cause: error });
    }
    if (!response.ok) {
      throw new FetchError(`News feed error: ${response.status} ${response.statusText}`);
    }
    return response.json();
  }
}
