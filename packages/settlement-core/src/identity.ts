import { ZeroAddress, getAddress, isAddress } from 'ethers';
import { AssetHandle, Identity, SettlementError, SettlementErrorCode } from '@swapledger/types';

export const NATIVE_ASSET: AssetHandle = ZeroAddress;

export const MAX_UINT256 = (1n << 256n) - 1n;

/**
 * Checksummed form of `value`, or INVALID_ORDER naming the offending field
 */
export function toIdentity(value: string, field: string): Identity {
  if (typeof value !== 'string' || !isAddress(value)) {
    throw new SettlementError(SettlementErrorCode.INVALID_ORDER, `Invalid ${field} address`, {
      field,
      value,
    });
  }
  return getAddress(value);
}

export function toUint256(value: bigint, field: string): bigint {
  if (typeof value !== 'bigint' || value < 0n || value > MAX_UINT256) {
    throw new SettlementError(SettlementErrorCode.INVALID_ORDER, `${field} is not a uint256`, {
      field,
      value: String(value),
    });
  }
  return value;
}

export function sameIdentity(a: Identity, b: Identity): boolean {
  return a.toLowerCase() === b.toLowerCase();
}
