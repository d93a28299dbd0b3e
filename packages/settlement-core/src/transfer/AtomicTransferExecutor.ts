import { Identity, SettlementError, SettlementErrorCode, TransferLeg } from '@swapledger/types';
import { Logger } from '@swapledger/utils';
import { AssetTransferPort } from './AssetTransferPort';

/**
 * Moves one or two legs as a single logical unit, strictly in the order
 * given. The first leg that is declined or throws aborts the operation with
 * TRANSFER_FAILED; undoing earlier legs is the enclosing host frame's job.
 */
export class AtomicTransferExecutor {
  constructor(
    private readonly port: AssetTransferPort,
    private readonly logger: Logger
  ) {}

  async execute(operator: Identity, legs: readonly TransferLeg[]): Promise<void> {
    if (legs.length < 1 || legs.length > 2) {
      throw new RangeError(`Expected one or two transfer legs, got ${legs.length}`);
    }

    for (const [legIndex, leg] of legs.entries()) {
      let accepted: boolean;
      try {
        accepted = await this.port.transfer(operator, leg);
      } catch (error) {
        throw this.legFailure(legIndex, leg, error);
      }
      if (!accepted) {
        throw this.legFailure(legIndex, leg);
      }

      this.logger.debug('Transfer leg completed', {
        legIndex,
        asset: leg.asset,
        from: leg.from,
        to: leg.to,
        amount: leg.amount.toString(),
      });
    }
  }

  private legFailure(legIndex: number, leg: TransferLeg, cause?: unknown): SettlementError {
    return new SettlementError(
      SettlementErrorCode.TRANSFER_FAILED,
      `Transfer of leg ${legIndex} failed`,
      {
        legIndex,
        asset: leg.asset,
        from: leg.from,
        to: leg.to,
        amount: leg.amount.toString(),
      },
      cause
    );
  }
}
