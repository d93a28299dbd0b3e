/**
 * Execution Host
 *
 * Stands in for the ledger runtime the settlement services were designed
 * against:
 * - top-level calls are serialized (FIFO)
 * - each call runs in a frame; registered state journals an undo step per
 *   write, and a throw replays the frame's steps in reverse
 * - calls made while a frame is open (an untrusted transfer re-entering the
 *   engine) run inline as nested frames, which act as savepoints
 * - nested frames are strictly LIFO: a frame holds at most one nested call
 *   at a time and cannot finish before it settles
 * - events are buffered and published only when the top-level call commits
 *
 * @module ExecutionHost
 */

import { AsyncLocalStorage } from 'async_hooks';
import { EventEmitter } from 'events';
import { getAddress, isAddress } from 'ethers';
import {
  CallReceipt,
  Identity,
  LedgerEvent,
  SettlementError,
  SettlementErrorCode,
} from '@swapledger/types';
import { Logger, SerialQueue } from '@swapledger/utils';
import { Clock } from './Clock';
import { Journaled, ValueCarrier, WriteJournal } from './WriteJournal';

export interface CallContext {
  readonly caller: Identity;
  /** Seconds; fixed for a top-level call and everything nested in it */
  readonly timestamp: bigint;
  /** Native value attached to this call */
  readonly value: bigint;
  readonly depth: number;
  emit(event: LedgerEvent): void;
}

export interface CallOptions {
  value?: bigint;
  /** Account credited with the attached value */
  recipient?: Identity;
}

export type Operation<T> = (ctx: CallContext) => Promise<T>;

export interface HostStats {
  committed: number;
  reverted: number;
  queued: number;
  /** Undo steps held for the call in progress */
  journaled: number;
}

interface Frame {
  context: CallContext;
  events: LedgerEvent[];
  open: boolean;
  /** Set once the operation has returned or thrown */
  returned: boolean;
  /** Journal length at frame entry */
  mark: number;
  /** Nested calls started from this frame that have not settled yet */
  children: Set<Promise<unknown>>;
  /** Set when the frame wrote state while a nested call was still running */
  interleaved: boolean;
}

export class ExecutionHost extends EventEmitter {
  private readonly frames = new AsyncLocalStorage<Frame>();
  private readonly queue = new SerialQueue();
  private readonly journal: Array<() => void> = [];
  private readonly writes: WriteJournal = { record: (undo) => this.record(undo) };
  private valueCarrier?: ValueCarrier;
  private committed = 0;
  private reverted = 0;

  constructor(
    private readonly clock: Clock,
    private readonly logger: Logger
  ) {
    super();
  }

  /**
   * Enroll state in frame rollback
   */
  register(resource: Journaled): void {
    resource.attachJournal(this.writes);
  }

  setValueCarrier(carrier: ValueCarrier): void {
    this.valueCarrier = carrier;
  }

  /**
   * Run `operation` on behalf of `caller` as one atomic unit.
   *
   * Outside a frame the call waits its turn behind earlier top-level calls.
   * Inside an open frame it runs immediately as a nested frame; its events
   * join the parent's if it succeeds.
   */
  async call<T>(caller: Identity, operation: Operation<T>, options: CallOptions = {}): Promise<CallReceipt<T>> {
    const parent = this.frames.getStore();
    if (parent?.open) {
      return this.callNested(parent, caller, operation, options);
    }

    return this.queue.run(async () => {
      const receipt = await this.runFrame(undefined, caller, operation, options);
      this.committed++;
      this.publish(receipt.events);
      return receipt;
    });
  }

  /**
   * Whether the current async context is inside an open frame
   */
  inCall(): boolean {
    return this.frames.getStore()?.open === true;
  }

  getStats(): HostStats {
    return {
      committed: this.committed,
      reverted: this.reverted,
      queued: this.queue.size,
      journaled: this.journal.length,
    };
  }

  private callNested<T>(
    parent: Frame,
    caller: Identity,
    operation: Operation<T>,
    options: CallOptions
  ): Promise<CallReceipt<T>> {
    if (parent.children.size > 0 || parent.returned) {
      throw new SettlementError(
        SettlementErrorCode.REENTRANT_CALL,
        parent.returned
          ? 'Nested call opened after its caller returned'
          : 'Nested call opened while another nested call is still running',
        { caller, depth: parent.context.depth + 1 }
      );
    }

    const child = this.runFrame(parent, caller, operation, options);
    parent.children.add(child);
    const settled = (): void => {
      parent.children.delete(child);
    };
    void child.then(settled, settled);
    return child;
  }

  private async runFrame<T>(
    parent: Frame | undefined,
    caller: Identity,
    operation: Operation<T>,
    options: CallOptions
  ): Promise<CallReceipt<T>> {
    if (typeof caller !== 'string' || !isAddress(caller)) {
      throw new SettlementError(SettlementErrorCode.UNAUTHORIZED_CALLER, 'Invalid caller identity', {
        caller,
      });
    }

    const frame: Frame = {
      events: [],
      open: true,
      returned: false,
      mark: this.journal.length,
      children: new Set(),
      interleaved: false,
      context: {
        caller: getAddress(caller),
        timestamp: parent ? parent.context.timestamp : this.clock.now(),
        value: options.value ?? 0n,
        depth: parent ? parent.context.depth + 1 : 0,
        emit: (event: LedgerEvent) => {
          if (!frame.open) {
            throw new Error(`Event ${event.type} emitted after its call returned`);
          }
          frame.events.push(event);
        },
      },
    };

    try {
      const result = await this.frames.run(frame, async () => {
        this.attachValue(frame.context, options.recipient);
        return operation(frame.context);
      });
      frame.returned = true;
      await this.joinChildren(frame);
      if (frame.interleaved) {
        throw new SettlementError(
          SettlementErrorCode.REENTRANT_CALL,
          'State changed while a nested call was still running',
          { caller: frame.context.caller, depth: frame.context.depth }
        );
      }

      frame.open = false;
      if (parent) {
        parent.events.push(...frame.events);
      } else {
        this.journal.length = 0;
      }
      return {
        result,
        events: frame.events,
        caller: frame.context.caller,
        timestamp: frame.context.timestamp,
      };
    } catch (error) {
      frame.returned = true;
      await this.settleChildren(frame);
      frame.open = false;
      if (!parent || parent.open) {
        this.rollback(frame.mark);
      } else {
        this.logger.error('Nested call failed after its caller closed; undo skipped', error, {
          caller: frame.context.caller,
          depth: frame.context.depth,
        });
      }
      if (!parent) {
        this.journal.length = 0;
        this.reverted++;
      }
      this.logger.warn('Call reverted', {
        caller: frame.context.caller,
        depth: frame.context.depth,
        code: error instanceof SettlementError ? error.code : undefined,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }

  /**
   * Fails the frame if its operation returned before a nested call it
   * started had settled. Waits for that call first so nothing it does
   * lands after the frame's own undo.
   */
  private async joinChildren(frame: Frame): Promise<void> {
    const pending = frame.children.size;
    if (pending === 0) {
      return;
    }
    await this.settleChildren(frame);
    throw new SettlementError(
      SettlementErrorCode.REENTRANT_CALL,
      'Call returned while a nested call was still running',
      { caller: frame.context.caller, depth: frame.context.depth, pending }
    );
  }

  private async settleChildren(frame: Frame): Promise<void> {
    while (frame.children.size > 0) {
      await Promise.allSettled([...frame.children]);
    }
  }

  private record(undo: () => void): void {
    const frame = this.frames.getStore();
    if (!frame?.open) {
      return;
    }
    if (frame.children.size > 0) {
      frame.interleaved = true;
    }
    this.journal.push(undo);
  }

  private rollback(mark: number): void {
    while (this.journal.length > mark) {
      const undo = this.journal.pop();
      undo?.();
    }
  }

  /**
   * Hands committed events to subscribers. A subscriber that throws is
   * logged and skipped; the call it observes has already committed.
   */
  private publish(events: LedgerEvent[]): void {
    for (const event of events) {
      for (const name of ['event', event.type]) {
        for (const listener of this.rawListeners(name)) {
          try {
            const outcome: unknown = listener.call(this, event);
            if (outcome instanceof Promise) {
              void outcome.catch((error: unknown) => this.listenerFailed(name, event, error));
            }
          } catch (error) {
            this.listenerFailed(name, event, error);
          }
        }
      }
    }
  }

  private listenerFailed(name: string, event: LedgerEvent, error: unknown): void {
    this.logger.error('Event listener failed', error, { listener: name, event: event.type });
  }

  private attachValue(context: CallContext, recipient: Identity | undefined): void {
    if (context.value === 0n) {
      return;
    }
    if (context.value < 0n) {
      throw new SettlementError(SettlementErrorCode.INSUFFICIENT_FUNDS, 'Attached value cannot be negative', {
        value: context.value.toString(),
      });
    }
    if (!this.valueCarrier || !recipient) {
      throw new Error('Value attached to a call without a value carrier and recipient');
    }
    if (!this.valueCarrier.moveNative(context.caller, recipient, context.value)) {
      throw new SettlementError(SettlementErrorCode.INSUFFICIENT_FUNDS, 'Insufficient funds for attached value', {
        caller: context.caller,
        value: context.value.toString(),
      });
    }
  }
}
