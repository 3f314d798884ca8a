import type { ErrorKind } from '../types/result.ts';

export interface IngestErrorOptions {
  cause?: unknown;
}

/** Base class for every error raised by the ingestion core. */
export class IngestError extends Error {
  constructor(message: string, options?: IngestErrorOptions) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
  }
}

/** Malformed or missing tabular input. Fatal for the whole run. */
export class SchemaError extends IngestError {
  constructor(
    message: string,
    readonly column?: string,
    options?: IngestErrorOptions
  ) {
    super(message, options);
  }
}

export class ConfigError extends IngestError {
  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
  }
}

/** Batch-scoped failure; retryable until the attempt ceiling is reached. */
export abstract class WriteError extends IngestError {
  abstract readonly kind: ErrorKind;
}

export class ConnectionError extends WriteError {
  readonly kind = 'connection' as const;
}

export class TimeoutError extends WriteError {
  readonly kind = 'timeout' as const;
}

export class RejectionError extends WriteError {
  readonly kind = 'rejection' as const;

  constructor(
    readonly status: number,
    readonly bodySnippet: string
  ) {
    super(`HTTP ${status}: ${bodySnippet || 'No response body'}`);
  }
}

export class UnexpectedError extends WriteError {
  readonly kind = 'unexpected' as const;
}

/** Map anything thrown during a send to a WriteError. */
export function classifyWriteError(err: unknown): WriteError {
  if (err instanceof WriteError) return err;
  const msg = err instanceof Error ? err.message : String(err);
  return new UnexpectedError(msg, { cause: err });
}
