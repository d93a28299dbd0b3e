import { Signer } from 'ethers';
import { SigningDomain, SwapOrder } from '@swapledger/types';
import { SWAP_TYPES, toSwapTypedValue, toTypedDataDomain } from './swapTypedData';

/**
 * Initiator side: sign an order for later settlement by the counterparty
 */
export async function signSwapOrder(
  signer: Pick<Signer, 'signTypedData'>,
  domain: SigningDomain,
  order: SwapOrder
): Promise<string> {
  return signer.signTypedData(toTypedDataDomain(domain), SWAP_TYPES, toSwapTypedValue(order));
}
