/**
 * Engine Errors
 *
 * ConnectionError is fatal: no session, no trading.
 * FetchError / ExecutionError / TimeoutError are per-instrument and recoverable.
 * ConfigError is raised before the loop starts.
 */

export type EngineErrorCode =
  | 'CONNECTION'
  | 'FETCH'
  | 'EXECUTION'
  | 'TIMEOUT'
  | 'CONFIG';

export class EngineError extends Error {
  public readonly code: EngineErrorCode;
  public readonly recoverable: boolean;

  constructor(code: EngineErrorCode, message: string, recoverable: boolean, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EngineError';
    this.code = code;
    this.recoverable = recoverable;
  }
}

export class ConnectionError extends EngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONNECTION', message, false, options);
    this.name = 'ConnectionError';
  }
}

export class FetchError extends EngineError {
  public readonly instrument: string | null;

  constructor(message: string, instrument: string | null = null, options?: { cause?: unknown }) {
    super('FETCH', message, true, options);
    this.name = 'FetchError';
    this.instrument = instrument;
  }
}

export class ExecutionError extends EngineError {
  public readonly instrument: string;

  constructor(message: string, instrument: string, options?: { cause?: unknown }) {
    super('EXECUTION', message, true, options);
    this.name = 'ExecutionError';
    this.instrument = instrument;
  }
}

export class TimeoutError extends EngineError {
  public readonly orderId: string;
  public readonly waitedMs: number;

  constructor(orderId: string, waitedMs: number) {
    super('TIMEOUT', `Outcome for order ${orderId} not resolved after ${waitedMs}ms`, true);
    this.name = 'TimeoutError';
    this.orderId = orderId;
    this.waitedMs = waitedMs;
  }
}

export interface ConfigIssue {
  field: string;
  message: string;
}

export class ConfigError extends EngineError {
  public readonly issues: ConfigIssue[];

  constructor(message: string, issues: ConfigIssue[] = []) {
    super('CONFIG', message, false);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
