// Error taxonomy for the capture, decision and ledger layers

export type PipelineErrorCode =
  | 'SCRAPE_FAILURE'
  | 'DECISION_PARSE_FAILURE'
  | 'INVALID_AMOUNT'
  | 'INSUFFICIENT_FUNDS'
  | 'COMPLETION_TIMEOUT'
  | 'COMPLETION_ERROR'
  | 'PERSISTENCE_ERROR'
  | 'CONFIG_ERROR'
  | 'RUN_CANCELLED';

export abstract class PipelineError extends Error {
  abstract readonly code: PipelineErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export type ScrapeFailureReason = 'timeout' | 'parse_error' | 'navigation_error';

export class ScrapeFailure extends PipelineError {
  readonly code = 'SCRAPE_FAILURE';

  constructor(
    readonly reason: ScrapeFailureReason,
    readonly coin: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`[${reason}] ${coin}: ${message}`, options);
  }
}

export class DecisionParseFailure extends PipelineError {
  readonly code = 'DECISION_PARSE_FAILURE';

  constructor(readonly rawResponse: string) {
    super(`Model returned an unrecognized decision: "${rawResponse.substring(0, 80)}"`);
  }
}

export class InvalidAmount extends PipelineError {
  readonly code = 'INVALID_AMOUNT';

  constructor(readonly amount: number) {
    super(`Amount must be a positive number, got ${amount}`);
  }
}

export class InsufficientFunds extends PipelineError {
  readonly code = 'INSUFFICIENT_FUNDS';

  constructor(
    readonly userId: string,
    readonly coin: string,
    readonly requested: number,
    readonly available: number
  ) {
    super(`Insufficient capital for ${userId}/${coin}: requested $${requested.toFixed(2)}, available $${available.toFixed(2)}`);
  }
}

export class CompletionTimeout extends PipelineError {
  readonly code = 'COMPLETION_TIMEOUT';

  constructor(readonly timeoutMs: number, options?: { cause?: unknown }) {
    super(`Completion did not finish within ${timeoutMs}ms`, options);
  }
}

export class CompletionError extends PipelineError {
  readonly code = 'COMPLETION_ERROR';
}

export class PersistenceError extends PipelineError {
  readonly code = 'PERSISTENCE_ERROR';

  constructor(readonly operation: string, readonly table: string, options?: { cause?: unknown }) {
    super(`Persistence ${operation} on ${table} failed: ${describeError(options?.cause)}`, options);
  }
}

export class ConfigError extends PipelineError {
  readonly code = 'CONFIG_ERROR';
}

export class RunCancelled extends PipelineError {
  readonly code = 'RUN_CANCELLED';

  constructor(readonly coin: string) {
    super(`Run for ${coin} was cancelled`);
  }
}

/**
 * Message of an unknown caught value, for logs and result records.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (error === undefined) {
    return 'unknown error';
  }
  return String(error);
}

export function throwIfAborted(signal: AbortSignal | undefined, coin: string): void {
  if (signal?.aborted) {
    throw new RunCancelled(coin);
  }
}
