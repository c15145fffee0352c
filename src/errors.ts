// src/errors.ts
// Error taxonomy shared by the scanner, the scoring pipeline and the CLI.

// ============================================================================
// BASE
// ============================================================================

export class RadarError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'RadarError';
  }
}

// ============================================================================
// RUN-LEVEL
// ============================================================================

/** Invalid configuration or missing credentials. Fatal for the run. */
export class ConfigError extends RadarError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'ConfigError';
  }
}

export class ScanAbortedError extends RadarError {
  constructor(public readonly signal: string) {
    super(`Scan interrupted by ${signal}`);
    this.name = 'ScanAbortedError';
  }
}

// ============================================================================
// COLLABORATORS
// ============================================================================

/** The data source has no such repository or object. Expected for optional files. */
export class NotFoundError extends RadarError {
  constructor(public readonly resource: string, cause?: unknown) {
    super(`Not found: ${resource}`, cause);
    this.name = 'NotFoundError';
  }
}

/** Network, timeout, throttling or server-side failure. Safe to retry. */
export class TransientSourceError extends RadarError {
  constructor(
    message: string,
    public readonly status?: number,
    cause?: unknown
  ) {
    super(message, cause);
    this.name = 'TransientSourceError';
  }
}

export class BreakerOpenError extends RadarError {
  constructor(
    public readonly breakerName: string,
    public readonly retryInMs: number
  ) {
    super(`Breaker '${breakerName}' is open; retry in ${Math.ceil(retryInMs / 1000)}s`);
    this.name = 'BreakerOpenError';
  }
}

export class OracleError extends RadarError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'OracleError';
  }
}

// ============================================================================
// HELPERS
// ============================================================================

export function isRetryableError(error: unknown): boolean {
  if (error instanceof TransientSourceError) return true;
  if (error instanceof RadarError) return false;
  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return (
      message.includes('timeout') ||
      message.includes('etimedout') ||
      message.includes('econnreset') ||
      message.includes('fetch failed')
    );
  }
  return false;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
