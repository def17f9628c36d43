export const LedgerErrorCodes = {
  INVALID_AMOUNT: 'INVALID_AMOUNT',
  INSUFFICIENT_BALANCE: 'INSUFFICIENT_BALANCE',
  ZERO_RATE: 'ZERO_RATE',
  INSUFFICIENT_FUNDING: 'INSUFFICIENT_FUNDING',
  WINDOW_ACTIVE: 'WINDOW_ACTIVE',
  NOT_AUTHORIZED: 'NOT_AUTHORIZED',
  TRANSFER_FAILED: 'TRANSFER_FAILED',
  INVALID_DURATION: 'INVALID_DURATION',
  CLOCK_REGRESSION: 'CLOCK_REGRESSION',
  REENTRANT_CALL: 'REENTRANT_CALL',
} as const;

export type LedgerErrorCode = (typeof LedgerErrorCodes)[keyof typeof LedgerErrorCodes];

/**
 * Failure of a ledger operation. The ledger state is unchanged when one is thrown.
 */
export class LedgerError extends Error {
  readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LedgerError';
    this.code = code;
  }
}

export function isLedgerError(err: unknown, code?: LedgerErrorCode): err is LedgerError {
  return err instanceof LedgerError && (code === undefined || err.code === code);
}
