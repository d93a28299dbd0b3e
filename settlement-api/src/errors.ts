import { SettlementError, SettlementErrorCategory } from '@swapledger/types';
import { toJsonSafe } from '@swapledger/utils';
import { ErrorResponse } from './models/types';

const STATUS_BY_CATEGORY: Record<SettlementErrorCategory, number> = {
  authorization: 403,
  state_conflict: 409,
  value: 400,
  external_dependency: 502,
};

export function httpStatusFor(error: SettlementError): number {
  return STATUS_BY_CATEGORY[error.category];
}

export function settlementErrorResponse(error: SettlementError): ErrorResponse {
  return {
    error: error.code,
    message: error.message,
    details: toJsonSafe(error.details),
  };
}
