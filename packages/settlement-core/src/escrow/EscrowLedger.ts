import { Identity, SettlementError, SettlementErrorCode } from '@swapledger/types';
import { Logger } from '@swapledger/utils';
import { LedgerState } from '../state/LedgerState';
import { AssetTransferPort } from '../transfer/AssetTransferPort';
import { NATIVE_ASSET } from '../identity';

/**
 * Pending proceeds per participant, held in native value by `escrowAccount`.
 * Balances are pooled: a credit is not tied to the listing that produced it.
 */
export class EscrowLedger {
  constructor(
    private readonly state: LedgerState,
    private readonly port: AssetTransferPort,
    private readonly escrowAccount: Identity,
    private readonly logger: Logger
  ) {}

  balanceOf(identity: Identity): bigint {
    return this.state.getParticipant(identity)?.pendingBalance ?? 0n;
  }

  credit(identity: Identity, amount: bigint): bigint {
    const next = this.balanceOf(identity) + amount;
    this.state.setPendingBalance(identity, next);
    return next;
  }

  /**
   * Pays out the caller's whole pending balance. The balance is zeroed
   * before the transfer runs, so a re-entrant withdraw sees nothing to take.
   */
  async withdraw(identity: Identity): Promise<bigint> {
    const amount = this.balanceOf(identity);
    if (amount === 0n) {
      throw new SettlementError(SettlementErrorCode.NOTHING_TO_WITHDRAW, 'No funds to withdraw', { identity });
    }

    this.state.setPendingBalance(identity, 0n);

    const leg = { asset: NATIVE_ASSET, from: this.escrowAccount, to: identity, amount };
    let paid: boolean;
    try {
      paid = await this.port.transfer(this.escrowAccount, leg);
    } catch (error) {
      throw this.transferFailure(identity, amount, error);
    }
    if (!paid) {
      throw this.transferFailure(identity, amount);
    }

    this.logger.debug('Escrow paid out', { identity, amount: amount.toString() });
    return amount;
  }

  private transferFailure(identity: Identity, amount: bigint, cause?: unknown): SettlementError {
    return new SettlementError(
      SettlementErrorCode.WITHDRAWAL_TRANSFER_FAILED,
      'Transfer failed',
      { identity, amount: amount.toString() },
      cause
    );
  }
}
