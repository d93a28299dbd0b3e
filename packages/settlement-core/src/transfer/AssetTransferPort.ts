import { Identity, TransferLeg } from '@swapledger/types';

/**
 * Value-transfer primitive supplied by the host.
 *
 * Untrusted: an implementation may decline (resolve false), throw, or call
 * back into the engine before it returns. `operator` is the identity moving
 * the funds; when it differs from `leg.from` the move spends an allowance
 * `leg.from` granted to `operator`.
 */
export interface AssetTransferPort {
  transfer(operator: Identity, leg: TransferLeg): Promise<boolean>;
}
