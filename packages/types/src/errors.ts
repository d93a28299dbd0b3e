export enum SettlementErrorCode {
  // Authorization
  INVALID_SIGNATURE = 'INVALID_SIGNATURE',
  UNAUTHORIZED_CALLER = 'UNAUTHORIZED_CALLER',
  NOT_REGISTERED = 'NOT_REGISTERED',

  // State conflict
  ALREADY_SETTLED = 'ALREADY_SETTLED',
  ALREADY_REGISTERED = 'ALREADY_REGISTERED',
  NAME_TAKEN = 'NAME_TAKEN',
  ITEM_UNAVAILABLE = 'ITEM_UNAVAILABLE',
  REENTRANT_CALL = 'REENTRANT_CALL',

  // Caller input
  EXPIRED = 'EXPIRED',
  INVALID_ORDER = 'INVALID_ORDER',
  INVALID_PRICE = 'INVALID_PRICE',
  SELF_PURCHASE = 'SELF_PURCHASE',
  WRONG_PAYMENT_AMOUNT = 'WRONG_PAYMENT_AMOUNT',
  NOTHING_TO_WITHDRAW = 'NOTHING_TO_WITHDRAW',
  INSUFFICIENT_FUNDS = 'INSUFFICIENT_FUNDS',

  // External dependency
  TRANSFER_FAILED = 'TRANSFER_FAILED',
  WITHDRAWAL_TRANSFER_FAILED = 'WITHDRAWAL_TRANSFER_FAILED'
}

export type SettlementErrorCategory =
  | 'authorization'
  | 'state_conflict'
  | 'value'
  | 'external_dependency';

const CATEGORIES: Record<SettlementErrorCode, SettlementErrorCategory> = {
  [SettlementErrorCode.INVALID_SIGNATURE]: 'authorization',
  [SettlementErrorCode.UNAUTHORIZED_CALLER]: 'authorization',
  [SettlementErrorCode.NOT_REGISTERED]: 'authorization',
  [SettlementErrorCode.ALREADY_SETTLED]: 'state_conflict',
  [SettlementErrorCode.ALREADY_REGISTERED]: 'state_conflict',
  [SettlementErrorCode.NAME_TAKEN]: 'state_conflict',
  [SettlementErrorCode.ITEM_UNAVAILABLE]: 'state_conflict',
  [SettlementErrorCode.REENTRANT_CALL]: 'state_conflict',
  [SettlementErrorCode.EXPIRED]: 'value',
  [SettlementErrorCode.INVALID_ORDER]: 'value',
  [SettlementErrorCode.INVALID_PRICE]: 'value',
  [SettlementErrorCode.SELF_PURCHASE]: 'value',
  [SettlementErrorCode.WRONG_PAYMENT_AMOUNT]: 'value',
  [SettlementErrorCode.NOTHING_TO_WITHDRAW]: 'value',
  [SettlementErrorCode.INSUFFICIENT_FUNDS]: 'value',
  [SettlementErrorCode.TRANSFER_FAILED]: 'external_dependency',
  [SettlementErrorCode.WITHDRAWAL_TRANSFER_FAILED]: 'external_dependency',
};

export function errorCategory(code: SettlementErrorCode): SettlementErrorCategory {
  return CATEGORIES[code];
}

/**
 * Failure of a settlement operation. Whatever raised it, the enclosing call
 * has been (or is being) rolled back in full.
 */
export class SettlementError extends Error {
  constructor(
    public readonly code: SettlementErrorCode,
    message: string,
    public readonly details: Record<string, unknown> = {},
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'SettlementError';
  }

  get category(): SettlementErrorCategory {
    return errorCategory(this.code);
  }
}

export function isSettlementError(error: unknown, code?: SettlementErrorCode): error is SettlementError {
  return error instanceof SettlementError && (code === undefined || error.code === code);
}
