import { errorCategory, isSettlementError, SettlementError, SettlementErrorCode } from '../src';

describe('SettlementError', () => {
  it('should carry code, details and cause', () => {
    const cause = new Error('declined');
    const error = new SettlementError(SettlementErrorCode.TRANSFER_FAILED, 'Transfer of leg 1 failed', { legIndex: 1 }, cause);

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('SettlementError');
    expect(error.details).toEqual({ legIndex: 1 });
    expect(error.cause).toBe(cause);
    expect(error.category).toBe('external_dependency');
  });

  it('should default to empty details and no cause', () => {
    const error = new SettlementError(SettlementErrorCode.EXPIRED, 'Swap expired');

    expect(error.details).toEqual({});
    expect(error.cause).toBeUndefined();
  });

  it('should map codes onto the error taxonomy', () => {
    expect(errorCategory(SettlementErrorCode.INVALID_SIGNATURE)).toBe('authorization');
    expect(errorCategory(SettlementErrorCode.NOT_REGISTERED)).toBe('authorization');
    expect(errorCategory(SettlementErrorCode.ALREADY_SETTLED)).toBe('state_conflict');
    expect(errorCategory(SettlementErrorCode.REENTRANT_CALL)).toBe('state_conflict');
    expect(errorCategory(SettlementErrorCode.WRONG_PAYMENT_AMOUNT)).toBe('value');
    expect(errorCategory(SettlementErrorCode.WITHDRAWAL_TRANSFER_FAILED)).toBe('external_dependency');
  });

  it('should narrow by code', () => {
    const error: unknown = new SettlementError(SettlementErrorCode.NAME_TAKEN, 'Username already taken');

    expect(isSettlementError(error)).toBe(true);
    expect(isSettlementError(error, SettlementErrorCode.NAME_TAKEN)).toBe(true);
    expect(isSettlementError(error, SettlementErrorCode.ALREADY_REGISTERED)).toBe(false);
    expect(isSettlementError(new Error('plain'))).toBe(false);
  });
});
