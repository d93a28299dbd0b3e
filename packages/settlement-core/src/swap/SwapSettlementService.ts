/**
 * Swap Settlement Service
 *
 * Settles signed bilateral swaps. The initiator signs the order off the
 * critical path; the named counterparty submits it with the signature. On
 * success both legs move exactly once and SwapExecuted carries the order's
 * fingerprint.
 *
 * @module SwapSettlementService
 */

import { Identity, SwapOrder, SwapStatus } from '@swapledger/types';
import { Logger } from '@swapledger/utils';
import { CallContext } from '../host/ExecutionHost';
import { ReentrancyGuard } from '../guard/ReentrancyGuard';
import { SettlementStateMachine } from '../state/SettlementStateMachine';
import { AtomicTransferExecutor } from '../transfer/AtomicTransferExecutor';
import { normalizeSwapOrder, swapLegs } from './order';

export class SwapSettlementService {
  private readonly guard = new ReentrancyGuard('swap');

  constructor(
    /** Operator identity spending both parties' allowances */
    public readonly address: Identity,
    private readonly stateMachine: SettlementStateMachine,
    private readonly executor: AtomicTransferExecutor,
    private readonly logger: Logger
  ) {}

  /**
   * Execute a signed swap as its counterparty. The order is marked executed
   * before either leg moves.
   */
  async executeSwap(ctx: CallContext, order: SwapOrder, signature: string): Promise<string> {
    return this.guard.run('executeSwap', async () => {
      const terms = normalizeSwapOrder(order);
      const fingerprint = this.stateMachine.execute(terms, signature, ctx);

      await this.executor.execute(this.address, swapLegs(terms));

      ctx.emit({ type: 'SwapExecuted', fingerprint });
      this.logger.info('Swap executed', {
        fingerprint,
        initiator: terms.initiator,
        counterparty: terms.counterparty,
        amountA: terms.amountA.toString(),
        amountB: terms.amountB.toString(),
      });
      return fingerprint;
    });
  }

  /**
   * Cancel a signed swap as its initiator. Moves no value.
   */
  async cancelSwap(ctx: CallContext, order: SwapOrder, signature: string): Promise<string> {
    const terms = normalizeSwapOrder(order);
    const fingerprint = this.stateMachine.cancel(terms, signature, ctx);

    ctx.emit({ type: 'SwapCancelled', fingerprint });
    this.logger.info('Swap cancelled', { fingerprint, initiator: terms.initiator });
    return fingerprint;
  }

  status(fingerprint: string): SwapStatus {
    return this.stateMachine.status(fingerprint);
  }
}
