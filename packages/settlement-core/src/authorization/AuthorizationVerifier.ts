import { TypedDataEncoder, recoverAddress } from 'ethers';
import {
  Identity,
  SettlementError,
  SettlementErrorCode,
  SigningDomain,
  SwapOrder,
} from '@swapledger/types';
import { sameIdentity } from '../identity';
import { SWAP_TYPES, toSwapTypedValue, toTypedDataDomain } from './swapTypedData';

/**
 * Authorization Verifier
 *
 * Binds an order to the EIP-712 hash its initiator signed and recovers the
 * signer from a signature. The domain (name, version, chain id and verifying
 * service) is part of the hash; a signature only verifies under the domain it
 * was made for.
 */
export class AuthorizationVerifier {
  private readonly encoder = TypedDataEncoder.from(SWAP_TYPES);

  constructor(private readonly domain: SigningDomain) {}

  getDomain(): SigningDomain {
    return { ...this.domain };
  }

  domainSeparator(): string {
    return TypedDataEncoder.hashDomain(toTypedDataDomain(this.domain));
  }

  /**
   * The digest an initiator signs for `order`
   */
  signingHash(order: SwapOrder): string {
    return TypedDataEncoder.hash(toTypedDataDomain(this.domain), SWAP_TYPES, toSwapTypedValue(order));
  }

  /**
   * EIP-712 struct hash of the order alone (no domain)
   */
  structHash(order: SwapOrder): string {
    return this.encoder.hash(toSwapTypedValue(order));
  }

  recoverSigner(order: SwapOrder, signature: string): Identity {
    try {
      return recoverAddress(this.signingHash(order), signature);
    } catch (error) {
      throw new SettlementError(
        SettlementErrorCode.INVALID_SIGNATURE,
        'Invalid signature',
        { reason: 'malformed' },
        error
      );
    }
  }

  /**
   * Recovers the signer and requires it to be the order's initiator
   */
  verify(order: SwapOrder, signature: string): Identity {
    const signer = this.recoverSigner(order, signature);
    if (!sameIdentity(signer, order.initiator)) {
      throw new SettlementError(SettlementErrorCode.INVALID_SIGNATURE, 'Invalid signature', {
        reason: 'signer mismatch',
        recovered: signer,
        initiator: order.initiator,
      });
    }
    return signer;
  }
}
