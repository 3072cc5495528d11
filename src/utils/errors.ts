// src/utils/errors.ts
import type { Logger } from 'pino';

export type ErrorCategory =
  | 'validation'
  | 'insufficiency'
  | 'state-conflict'
  | 'guard'
  | 'authorization'
  | 'oracle'
  | 'invariant';

const CATEGORY_BY_CODE = {
  ZeroAmount: 'validation',
  ZeroCollateral: 'validation',
  ZeroRepay: 'validation',
  InvalidDuration: 'validation',
  InvalidParams: 'validation',
  PoolNotFound: 'validation',
  InsufficientBalance: 'insufficiency',
  InsufficientCollateral: 'insufficiency',
  InsufficientLiquidity: 'insufficiency',
  InsufficientFunds: 'insufficiency',
  Unavailable: 'insufficiency',
  AlreadyBorrowed: 'state-conflict',
  NoActiveLoan: 'state-conflict',
  SelfLiquidation: 'state-conflict',
  NotYetLiquidatable: 'state-conflict',
  NoCollateral: 'state-conflict',
  PoolExists: 'state-conflict',
  ReentrantCall: 'guard',
  Unauthorized: 'authorization',
  StaleOrUnavailable: 'oracle',
  InvariantViolation: 'invariant',
} as const satisfies Record<string, ErrorCategory>;

export type LedgerErrorCode = keyof typeof CATEGORY_BY_CODE;

/**
 * Tagged failure raised by every ledger operation. `code` names the exact
 * condition; `details` carries the amounts involved (bigints allowed).
 */
export class LedgerError extends Error {
  readonly code: LedgerErrorCode;
  readonly category: ErrorCategory;
  readonly details: Record<string, unknown>;

  constructor(code: LedgerErrorCode, message?: string, details: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(message ?? code, options);
    this.name = 'LedgerError';
    this.code = code;
    this.category = CATEGORY_BY_CODE[code];
    this.details = details;
  }
}

export function isLedgerError(err: unknown, code?: LedgerErrorCode): err is LedgerError {
  return err instanceof LedgerError && (code === undefined || err.code === code);
}

export function invariant(condition: boolean, message: string, details: Record<string, unknown> = {}): asserts condition {
  if (!condition) throw new LedgerError('InvariantViolation', message, details);
}

export function normalizeError(err: unknown) {
  if (err instanceof LedgerError) {
    return { name: err.name, code: err.code, category: err.category, message: err.message };
  }
  if (err instanceof Error) {
    return {
      name: err.name || 'Error',
      message: err.message || 'unknown',
      stack: err.stack || '',
    };
  }
  return {
    name: typeof err,
    message: String(err),
    stack: '',
  };
}

/** Tagged failures are expected outcomes and log at warn; anything else is an error. */
export function logFailure(log: Logger, ctx: Record<string, unknown>, err: unknown) {
  const info = normalizeError(err);
  if (err instanceof LedgerError) log.warn({ ...ctx, error: info, details: err.details }, 'ledger_op_rejected');
  else log.error({ ...ctx, error: info }, 'ledger_op_failed');
}
