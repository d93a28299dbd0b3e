import { SettlementError, SettlementErrorCode } from '@swapledger/types';

/**
 * Re-entry lock for operations that mutate state and then call untrusted
 * transfer code. Released on every exit path.
 */
export class ReentrancyGuard {
  private holder: string | null = null;

  constructor(private readonly scope: string) {}

  async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    if (this.holder !== null) {
      throw new SettlementError(SettlementErrorCode.REENTRANT_CALL, 'Reentrant call', {
        scope: this.scope,
        operation,
        heldBy: this.holder,
      });
    }

    this.holder = operation;
    try {
      return await fn();
    } finally {
      this.holder = null;
    }
  }

  isLocked(): boolean {
    return this.holder !== null;
  }
}
