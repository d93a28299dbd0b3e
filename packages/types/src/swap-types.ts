import type { AssetHandle, Identity } from './common';

/**
 * Exchange terms signed by the initiator. Transient: only the fingerprint and
 * the settlement outcome are ever stored.
 *
 * Field order is part of the wire contract for both the fingerprint and the
 * signed typed data.
 */
export interface SwapOrder {
  id: bigint;
  initiator: Identity;
  counterparty: Identity;
  assetA: AssetHandle;
  assetB: AssetHandle;
  amountA: bigint;
  amountB: bigint;
  expiry: bigint;
}

export enum SwapStatus {
  UNSEEN = 'unseen',
  EXECUTED = 'executed',
  CANCELLED = 'cancelled'
}

export interface SigningDomain {
  name: string;
  version: string;
  chainId: bigint;
  verifyingContract: Identity;
}
