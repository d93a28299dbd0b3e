/**
 * In-Memory Asset Ledger
 *
 * Token balances and allowances per asset address, with the native asset at
 * the zero address. Plays the host's value-transfer primitive for the
 * settlement services: `transfer` follows ERC-20 `transferFrom` semantics
 * and then runs the recipient's receive hook, which may call back into the
 * engine.
 *
 * Registered with the execution host: every balance or allowance change made
 * inside a call is journaled and undone if the call fails.
 */

import { AssetHandle, Identity, TransferLeg } from '@swapledger/types';
import { Journaled, ValueCarrier, WriteJournal } from '../host/WriteJournal';
import { NATIVE_ASSET, toIdentity } from '../identity';
import { AssetTransferPort } from './AssetTransferPort';

export type ReceiveHook = (leg: TransferLeg) => Promise<void> | void;

export class InMemoryAssetLedger implements AssetTransferPort, ValueCarrier, Journaled {
  private readonly balances = new Map<string, bigint>();
  private readonly allowances = new Map<string, bigint>();
  private readonly hooks = new Map<Identity, ReceiveHook>();
  private journal?: WriteJournal;

  attachJournal(journal: WriteJournal): void {
    this.journal = journal;
  }

  mint(asset: AssetHandle, to: Identity, amount: bigint): bigint {
    requireNonNegative(amount);
    const key = balanceKey(asset, to);
    const next = (this.balances.get(key) ?? 0n) + amount;
    this.write(this.balances, key, next);
    return next;
  }

  balanceOf(asset: AssetHandle, holder: Identity): bigint {
    return this.balances.get(balanceKey(asset, holder)) ?? 0n;
  }

  approve(asset: AssetHandle, owner: Identity, spender: Identity, amount: bigint): void {
    requireNonNegative(amount);
    this.write(this.allowances, allowanceKey(asset, owner, spender), amount);
  }

  allowance(asset: AssetHandle, owner: Identity, spender: Identity): bigint {
    return this.allowances.get(allowanceKey(asset, owner, spender)) ?? 0n;
  }

  /**
   * Install (or with `undefined`, remove) the code that runs whenever
   * `holder` receives a transfer
   */
  onReceive(holder: Identity, hook: ReceiveHook | undefined): void {
    const identity = toIdentity(holder, 'holder');
    if (hook) {
      this.hooks.set(identity, hook);
    } else {
      this.hooks.delete(identity);
    }
  }

  async transfer(operator: Identity, leg: TransferLeg): Promise<boolean> {
    if (leg.amount < 0n) {
      return false;
    }

    const spendsAllowance = operator.toLowerCase() !== leg.from.toLowerCase();
    const allowanceId = allowanceKey(leg.asset, leg.from, operator);
    const allowed = this.allowances.get(allowanceId) ?? 0n;
    if (spendsAllowance && allowed < leg.amount) {
      return false;
    }
    if (!this.debit(leg.asset, leg.from, leg.amount)) {
      return false;
    }
    if (spendsAllowance) {
      this.write(this.allowances, allowanceId, allowed - leg.amount);
    }
    this.mint(leg.asset, leg.to, leg.amount);

    const hook = this.hooks.get(toIdentity(leg.to, 'recipient'));
    if (hook) {
      await hook({ ...leg });
    }
    return true;
  }

  /**
   * Native value attached to a call. Moves without running receive hooks.
   */
  moveNative(from: Identity, to: Identity, amount: bigint): boolean {
    if (amount < 0n || !this.debit(NATIVE_ASSET, from, amount)) {
      return false;
    }
    this.mint(NATIVE_ASSET, to, amount);
    return true;
  }

  private debit(asset: AssetHandle, holder: Identity, amount: bigint): boolean {
    const key = balanceKey(asset, holder);
    const balance = this.balances.get(key) ?? 0n;
    if (balance < amount) {
      return false;
    }
    this.write(this.balances, key, balance - amount);
    return true;
  }

  private write(table: Map<string, bigint>, key: string, value: bigint): void {
    const previous = table.get(key);
    table.set(key, value);
    this.journal?.record(() => {
      if (previous === undefined) {
        table.delete(key);
      } else {
        table.set(key, previous);
      }
    });
  }
}

function balanceKey(asset: AssetHandle, holder: Identity): string {
  return `${asset.toLowerCase()}:${holder.toLowerCase()}`;
}

function allowanceKey(asset: AssetHandle, owner: Identity, spender: Identity): string {
  return `${asset.toLowerCase()}:${owner.toLowerCase()}:${spender.toLowerCase()}`;
}

function requireNonNegative(amount: bigint): void {
  if (amount < 0n) {
    throw new RangeError(`Amount cannot be negative: ${amount}`);
  }
}
