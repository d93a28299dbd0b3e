import { SwapOrder, TransferLeg } from '@swapledger/types';
import { toIdentity, toUint256 } from '../identity';

/**
 * Order with every field range-checked and every address checksummed
 */
export function normalizeSwapOrder(order: SwapOrder): SwapOrder {
  return {
    id: toUint256(order.id, 'id'),
    initiator: toIdentity(order.initiator, 'initiator'),
    counterparty: toIdentity(order.counterparty, 'counterparty'),
    assetA: toIdentity(order.assetA, 'assetA'),
    assetB: toIdentity(order.assetB, 'assetB'),
    amountA: toUint256(order.amountA, 'amountA'),
    amountB: toUint256(order.amountB, 'amountB'),
    expiry: toUint256(order.expiry, 'expiry'),
  };
}

/**
 * Leg A (initiator pays assetA) always precedes leg B (counterparty pays assetB)
 */
export function swapLegs(order: SwapOrder): [TransferLeg, TransferLeg] {
  return [
    { asset: order.assetA, from: order.initiator, to: order.counterparty, amount: order.amountA },
    { asset: order.assetB, from: order.counterparty, to: order.initiator, amount: order.amountB },
  ];
}
