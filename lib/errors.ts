/**
 * Error classes for the reporter.
 * The CLI maps these onto exit codes; fetchers turn them into degraded outcomes.
 */

export class ReporterError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ReporterError';
    this.code = code;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  toJSON() {
    return {
      error: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

export class MissingCredentialsError extends ReporterError {
  public readonly missing: string[];

  constructor(missing: string[]) {
    super(`Missing EdgeGrid credentials: ${missing.join(', ')}`, 'MISSING_CREDENTIALS', { missing });
    this.name = 'MissingCredentialsError';
    this.missing = missing;
  }
}

export class HttpError extends ReporterError {
  public readonly status: number;
  public readonly path: string;
  public readonly body: string;

  constructor(status: number, path: string, body: string) {
    super(`GET ${path} failed with HTTP ${status}`, 'HTTP_ERROR', { status, path });
    this.name = 'HttpError';
    this.status = status;
    this.path = path;
    this.body = body;
  }
}

export class TimeoutError extends ReporterError {
  public readonly phase: 'connect' | 'read';

  constructor(phase: 'connect' | 'read', path: string, ms: number) {
    super(`${phase} timeout after ${ms}ms for ${path}`, 'TIMEOUT', { phase, path, ms });
    this.name = 'TimeoutError';
    this.phase = phase;
  }
}

export class PropertyListingError extends ReporterError {
  constructor(message: string, cause?: unknown) {
    super(message, 'PROPERTY_LISTING_FAILED');
    this.name = 'PropertyListingError';
    this.cause = cause;
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
