import { solidityPackedKeccak256 } from 'ethers';
import { SwapOrder } from '@swapledger/types';

/**
 * Packed layout of an order: every field is fixed width, so direct
 * concatenation cannot make two different orders encode alike.
 */
export const SWAP_ORDER_PACKED_TYPES: readonly string[] = [
  'uint256', // id
  'address', // initiator
  'address', // counterparty
  'address', // assetA
  'address', // assetB
  'uint256', // amountA
  'uint256', // amountB
  'uint256', // expiry
];

export function packedSwapOrderValues(order: SwapOrder): readonly (bigint | string)[] {
  return [
    order.id,
    order.initiator,
    order.counterparty,
    order.assetA,
    order.assetB,
    order.amountA,
    order.amountB,
    order.expiry,
  ];
}

/**
 * Derives the settlement key of an order: keccak256 over the tightly packed
 * fields. Pure; the same eight values always give the same fingerprint.
 */
export class FingerprintService {
  fingerprint(order: SwapOrder): string {
    return solidityPackedKeccak256(SWAP_ORDER_PACKED_TYPES, packedSwapOrderValues(order));
  }
}
