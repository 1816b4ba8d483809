export type InvestigationErrorKind =
  | 'TransientDependencyFailure'
  | 'ModelRequestError'
  | 'RetryExhausted'
  | 'ToolError'
  | 'FatalConfigurationError'
  | 'CaseRejected';

/**
 * Base class for every failure the investigator raises on purpose.
 * `kind` is stable and safe to serialise; `name` follows the subclass.
 */
export class InvestigationError extends Error {
  readonly kind: InvestigationErrorKind;

  constructor(kind: InvestigationErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
  }
}

export type TransientReason = 'timeout' | 'rate_limit' | 'unavailable' | 'network';

/** Timeouts, rate limits, dropped connections. Eligible for retry. */
export class TransientDependencyFailure extends InvestigationError {
  readonly reason: TransientReason;

  constructor(reason: TransientReason, message: string, options?: { cause?: unknown }) {
    super('TransientDependencyFailure', message, options);
    this.reason = reason;
  }
}

/** The model provider rejected the request itself (bad parameters, unknown model). */
export class ModelRequestError extends InvestigationError {
  readonly status?: number;

  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super('ModelRequestError', message, options);
    this.status = status;
  }
}

export class RetryExhaustedError extends InvestigationError {
  readonly attempts: number;

  constructor(attempts: number, cause: unknown) {
    super('RetryExhausted', `Gave up after ${attempts} attempt(s): ${errorMessage(cause)}`, { cause });
    this.attempts = attempts;
  }
}

/** Thrown by tool handlers when the data they need is unavailable. */
export class ToolError extends InvestigationError {
  readonly details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super('ToolError', message);
    this.details = details;
  }
}

/** Missing credentials or invalid settings. Never retried. */
export class FatalConfigurationError extends InvestigationError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = [], options?: { cause?: unknown }) {
    super('FatalConfigurationError', message, options);
    this.issues = issues;
  }
}

export class CaseValidationError extends InvestigationError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('CaseRejected', message);
    this.issues = issues;
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  try {
    return JSON.stringify(err);
  } catch {
    return String(err);
  }
}
