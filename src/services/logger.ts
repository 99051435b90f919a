/**
 * Logger Service
 * Leveled console logging with a context tag per module.
 *
 * LOG_LEVEL  = debug | info | warn | error   (default info)
 * LOG_FORMAT = text | json                   (default text)
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'text' | 'json';

const LOG_COLORS = {
  debug: '\x1b[36m',  // Cyan
  info: '\x1b[32m',   // Green
  warn: '\x1b[33m',   // Yellow
  error: '\x1b[31m',  // Red
  reset: '\x1b[0m',
};

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

export function resolveLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : 'info';
}

export function resolveLogFormat(value: string | undefined): LogFormat {
  return value?.trim().toLowerCase() === 'json' ? 'json' : 'text';
}

/**
 * Errors serialize to {} under JSON.stringify; flatten them first.
 */
function serializeData(data: unknown): unknown {
  if (data instanceof Error) {
    return { name: data.name, message: data.message };
  }
  if (data && typeof data === 'object' && !Array.isArray(data)) {
    const out: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      out[key] = value instanceof Error ? { name: value.name, message: value.message } : value;
    }
    return out;
  }
  return data;
}

export class Logger {
  private readonly minLevel: LogLevel;
  private readonly format: LogFormat;
  private readonly context: string;

  constructor(context: string = 'App') {
    this.context = context;
    this.minLevel = resolveLogLevel(process.env.LOG_LEVEL);
    this.format = resolveLogFormat(process.env.LOG_FORMAT);
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.minLevel];
  }

  formatMessage(level: LogLevel, message: string, data?: unknown): string {
    const timestamp = new Date().toISOString();

    if (this.format === 'json') {
      const line: Record<string, unknown> = { timestamp, level, context: this.context, message };
      if (data !== undefined) {
        line.data = serializeData(data);
      }
      return JSON.stringify(line);
    }

    const color = LOG_COLORS[level];
    const reset = LOG_COLORS.reset;
    const levelUpper = level.toUpperCase().padEnd(5);

    let output = `${color}[${timestamp}] [${levelUpper}] [${this.context}]${reset} ${message}`;

    if (data !== undefined) {
      output += ` ${JSON.stringify(serializeData(data))}`;
    }

    return output;
  }

  debug(message: string, data?: unknown): void {
    if (this.shouldLog('debug')) {
      console.log(this.formatMessage('debug', message, data));
    }
  }

  info(message: string, data?: unknown): void {
    if (this.shouldLog('info')) {
      console.log(this.formatMessage('info', message, data));
    }
  }

  warn(message: string, data?: unknown): void {
    if (this.shouldLog('warn')) {
      console.warn(this.formatMessage('warn', message, data));
    }
  }

  error(message: string, data?: unknown): void {
    if (this.shouldLog('error')) {
      console.error(this.formatMessage('error', message, data));
    }
  }
}

export function createLogger(context: string): Logger {
  return new Logger(context);
}
