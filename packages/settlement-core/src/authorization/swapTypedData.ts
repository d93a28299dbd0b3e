import { TypedDataDomain, TypedDataField } from 'ethers';
import { SigningDomain, SwapOrder } from '@swapledger/types';

/**
 * EIP-712 struct of a swap order. Names and order of the members are fixed by
 * the signing wire format.
 */
export const SWAP_TYPES: Record<string, TypedDataField[]> = {
  Swap: [
    { name: 'swapId', type: 'uint256' },
    { name: 'initiator', type: 'address' },
    { name: 'counterparty', type: 'address' },
    { name: 'tokenX', type: 'address' },
    { name: 'tokenY', type: 'address' },
    { name: 'amountX', type: 'uint256' },
    { name: 'amountY', type: 'uint256' },
    { name: 'expiration', type: 'uint256' },
  ],
};

export interface SwapTypedValue extends Record<string, bigint | string> {
  swapId: bigint;
  initiator: string;
  counterparty: string;
  tokenX: string;
  tokenY: string;
  amountX: bigint;
  amountY: bigint;
  expiration: bigint;
}

export function toSwapTypedValue(order: SwapOrder): SwapTypedValue {
  return {
    swapId: order.id,
    initiator: order.initiator,
    counterparty: order.counterparty,
    tokenX: order.assetA,
    tokenY: order.assetB,
    amountX: order.amountA,
    amountY: order.amountB,
    expiration: order.expiry,
  };
}

export function toTypedDataDomain(domain: SigningDomain): TypedDataDomain {
  return {
    name: domain.name,
    version: domain.version,
    chainId: domain.chainId,
    verifyingContract: domain.verifyingContract,
  };
}
