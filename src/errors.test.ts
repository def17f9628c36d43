import { LedgerError, LedgerErrorCodes, isLedgerError } from './errors';

describe('LedgerError', () => {
  it('should carry its code, name and message', () => {
    const err = new LedgerError(LedgerErrorCodes.ZERO_RATE, 'rate is zero');
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('LedgerError');
    expect(err.code).toBe('ZERO_RATE');
    expect(err.message).toBe('rate is zero');
  });

  it('should keep the cause', () => {
    const cause = new Error('disk full');
    const err = new LedgerError(LedgerErrorCodes.TRANSFER_FAILED, 'transfer threw', { cause });
    expect(err.cause).toBe(cause);
  });
});

describe('isLedgerError', () => {
  const err = new LedgerError(LedgerErrorCodes.NOT_AUTHORIZED, 'nope');

  it('should match any ledger error without a code', () => {
    expect(isLedgerError(err)).toBe(true);
    expect(isLedgerError(new Error('nope'))).toBe(false);
    expect(isLedgerError('NOT_AUTHORIZED')).toBe(false);
    expect(isLedgerError(undefined)).toBe(false);
  });

  it('should match on code when given', () => {
    expect(isLedgerError(err, LedgerErrorCodes.NOT_AUTHORIZED)).toBe(true);
    expect(isLedgerError(err, LedgerErrorCodes.WINDOW_ACTIVE)).toBe(false);
  });
});
