/**
 * Safely extract an error message from an unknown catch value.
 */
export function getErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  return 'Unknown error';
}

// ─── Error Taxonomy ─────────────────────────────────────────────────

export type ErrorCategory =
  | 'validation'
  | 'state'
  | 'oracle'
  | 'funding'
  | 'authorization'
  | 'concurrency';

/**
 * Every failure code the engine can raise, mapped to its category.
 */
export const ERROR_CATEGORIES = {
  INVALID_FID: 'validation',
  INVALID_PRICE: 'validation',
  INVALID_DURATION: 'validation',
  INVALID_PERIOD: 'validation',
  MAX_PERIOD_EXCEEDED: 'validation',
  INVALID_ADDRESS: 'validation',

  ALREADY_EXISTS: 'state',
  NOT_FOUND: 'state',
  ALREADY_PREMIUM: 'state',
  ALREADY_ADMIN: 'state',
  NOT_ADMIN: 'state',
  USER_IS_PLUS: 'state',

  INVALID_ORACLE_PRICE: 'oracle',
  INVALID_ORACLE_UPDATE: 'oracle',
  INVALID_ORACLE_ROUND: 'oracle',
  ORACLE_TIMEOUT: 'oracle',

  INSUFFICIENT_FUNDS: 'funding',
  REFUND_FAILED: 'funding',
  WITHDRAWAL_FAILED: 'funding',

  NOT_OWNER: 'authorization',
  NOT_PERMITTED: 'authorization',

  REENTRANT_CALL: 'concurrency',
} as const satisfies Record<string, ErrorCategory>;

export type MembershipErrorCode = keyof typeof ERROR_CATEGORIES;

/**
 * Thrown by every engine operation that rejects. Nothing is mutated
 * when one of these escapes an entry point.
 */
export class MembershipError extends Error {
  public readonly code: MembershipErrorCode;
  public readonly category: ErrorCategory;

  constructor(code: MembershipErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MembershipError';
    this.code = code;
    this.category = ERROR_CATEGORIES[code];
  }
}

/**
 * Narrow an unknown value to a MembershipError, optionally with a given code.
 */
export function isMembershipError(err: unknown, code?: MembershipErrorCode): err is MembershipError {
  if (!(err instanceof MembershipError)) return false;
  return code === undefined || err.code === code;
}
