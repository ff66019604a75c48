/**
 * Extract an error message from an unknown thrown value
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return 'Unknown error';
}

export type ReferralErrorCode =
  | 'INVALID_FORMAT'
  | 'UNKNOWN_CODE'
  | 'CODE_TAKEN'
  | 'SELF_REFERRAL'
  | 'ALREADY_REFERRED'
  | 'CIRCULAR_REFERRAL';

/**
 * A referral operation was refused. Nothing was written.
 */
export class ReferralError extends Error {
  readonly code: ReferralErrorCode;

  constructor(code: ReferralErrorCode, message: string) {
    super(message);
    this.name = 'ReferralError';
    this.code = code;
  }
}

export class ReferralCodeExhaustedError extends Error {
  readonly attempts: number;

  constructor(attempts: number) {
    super(`Could not generate a unique referral code after ${attempts} attempts`);
    this.name = 'ReferralCodeExhaustedError';
    this.attempts = attempts;
  }
}

export class DuplicateWalletError extends Error {
  constructor(userId: string) {
    super(`A wallet already exists for user ${userId}`);
    this.name = 'DuplicateWalletError';
  }
}

export class UnknownUserError extends Error {
  readonly userId: string;

  constructor(userId: string) {
    super(`No wallet registered for user ${userId}`);
    this.name = 'UnknownUserError';
    this.userId = userId;
  }
}

export class TimeoutError extends Error {
  constructor(label: string, ms: number) {
    super(`${label} timed out after ${ms}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * SQLite reports constraint failures as e.g. "UNIQUE constraint failed: wallets.referral_code"
 */
export function isUniqueViolation(error: unknown, column?: string): boolean {
  if (!(error instanceof Error)) return false;
  const code = 'code' in error ? error.code : undefined;
  if (code !== 'SQLITE_CONSTRAINT_UNIQUE' && code !== 'SQLITE_CONSTRAINT_PRIMARYKEY') {
    return false;
  }
  return column === undefined || error.message.includes(column);
}
