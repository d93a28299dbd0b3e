/**
 * @swapledger/types - Shared type definitions
 */

export * from './common';
export * from './swap-types';
export * from './marketplace-types';
export * from './errors';

import type { AssetHandle, Identity } from './common';

export interface TransferLeg {
  asset: AssetHandle;
  from: Identity;
  to: Identity;
  amount: bigint;
}

// Events published when a top-level call commits
export type LedgerEvent =
  | { type: 'SwapExecuted'; fingerprint: string }
  | { type: 'SwapCancelled'; fingerprint: string }
  | { type: 'ParticipantRegistered'; identity: Identity; name: string }
  | { type: 'ItemListed'; id: number; name: string; price: bigint; owner: Identity }
  | { type: 'ItemSold'; id: number; seller: Identity; buyer: Identity; price: bigint }
  | { type: 'FundsWithdrawn'; identity: Identity; amount: bigint };

export type LedgerEventType = LedgerEvent['type'];

export interface CallReceipt<T> {
  result: T;
  events: LedgerEvent[];
  caller: Identity;
  timestamp: bigint;
}

export interface EngineConfig {
  /** EIP-712 domain name */
  domainName: string;
  /** EIP-712 domain version */
  domainVersion: string;
  chainId: bigint;
  /** Identity of the swap settlement service (EIP-712 verifyingContract) */
  swapServiceAddress: Identity;
  /** Identity holding marketplace escrow */
  marketplaceAddress: Identity;
}
