import { SettlementError, SettlementErrorCode, SwapOrder, SwapStatus } from '@swapledger/types';
import { AuthorizationVerifier } from '../authorization/AuthorizationVerifier';
import { FingerprintService } from '../fingerprint/FingerprintService';
import { CallContext } from '../host/ExecutionHost';
import { sameIdentity } from '../identity';
import { LedgerState } from './LedgerState';

/**
 * Per-fingerprint lifecycle: UNSEEN -> EXECUTED | CANCELLED, both terminal.
 *
 * Guard clauses run in a fixed order and the first one that fails decides
 * the reported error. Orders passed in must already be normalized.
 */
export class SettlementStateMachine {
  constructor(
    private readonly state: LedgerState,
    private readonly verifier: AuthorizationVerifier,
    private readonly fingerprints: FingerprintService
  ) {}

  status(fingerprint: string): SwapStatus {
    return this.state.swapStatus(fingerprint);
  }

  /**
   * Checks signature, expiry, caller and status, then records the order as
   * executed. Returns the fingerprint.
   */
  execute(order: SwapOrder, signature: string, ctx: CallContext): string {
    const fingerprint = this.fingerprints.fingerprint(order);

    this.verifier.verify(order, signature);

    if (ctx.timestamp >= order.expiry) {
      throw new SettlementError(SettlementErrorCode.EXPIRED, 'Swap expired', {
        fingerprint,
        expiry: order.expiry.toString(),
        now: ctx.timestamp.toString(),
      });
    }

    if (!sameIdentity(ctx.caller, order.counterparty)) {
      throw new SettlementError(SettlementErrorCode.UNAUTHORIZED_CALLER, 'Only counterparty can execute', {
        fingerprint,
        caller: ctx.caller,
      });
    }

    this.requireUnseen(fingerprint);
    this.state.markSettled(fingerprint, SwapStatus.EXECUTED);
    return fingerprint;
  }

  /**
   * Checks signature, caller and status, then records the order as cancelled
   */
  cancel(order: SwapOrder, signature: string, ctx: CallContext): string {
    const fingerprint = this.fingerprints.fingerprint(order);

    this.verifier.verify(order, signature);

    if (!sameIdentity(ctx.caller, order.initiator)) {
      throw new SettlementError(SettlementErrorCode.UNAUTHORIZED_CALLER, 'Only initiator can cancel', {
        fingerprint,
        caller: ctx.caller,
      });
    }

    this.requireUnseen(fingerprint);
    this.state.markSettled(fingerprint, SwapStatus.CANCELLED);
    return fingerprint;
  }

  private requireUnseen(fingerprint: string): void {
    const status = this.state.swapStatus(fingerprint);
    if (status === SwapStatus.EXECUTED) {
      throw new SettlementError(SettlementErrorCode.ALREADY_SETTLED, 'Swap already executed', { fingerprint, status });
    }
    if (status === SwapStatus.CANCELLED) {
      throw new SettlementError(SettlementErrorCode.ALREADY_SETTLED, 'Swap has been cancelled', { fingerprint, status });
    }
  }
}
