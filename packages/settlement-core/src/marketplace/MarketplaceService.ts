/**
 * Marketplace Service
 *
 * Registered participants list items, buy them with native value attached
 * to the call, and withdraw their pooled sale proceeds.
 *
 * @module MarketplaceService
 */

import {
  Identity,
  Listing,
  Participant,
  SettlementError,
  SettlementErrorCode,
} from '@swapledger/types';
import { Logger } from '@swapledger/utils';
import { CallContext } from '../host/ExecutionHost';
import { ReentrancyGuard } from '../guard/ReentrancyGuard';
import { EscrowLedger } from '../escrow/EscrowLedger';
import { LedgerState } from '../state/LedgerState';
import { sameIdentity } from '../identity';

export class MarketplaceService {
  private readonly guard = new ReentrancyGuard('marketplace');

  constructor(
    /** Account holding buyers' payments until sellers withdraw */
    public readonly address: Identity,
    private readonly state: LedgerState,
    private readonly escrow: EscrowLedger,
    private readonly logger: Logger
  ) {}

  async registerParticipant(ctx: CallContext, name: string): Promise<Participant> {
    if (this.state.getParticipant(ctx.caller)?.registered) {
      throw new SettlementError(SettlementErrorCode.ALREADY_REGISTERED, 'User already registered', {
        identity: ctx.caller,
      });
    }
    if (this.state.isNameTaken(name)) {
      throw new SettlementError(SettlementErrorCode.NAME_TAKEN, 'Username already taken', { name });
    }

    const participant = this.state.addParticipant(ctx.caller, name);
    ctx.emit({ type: 'ParticipantRegistered', identity: ctx.caller, name });
    this.logger.info('Participant registered', { identity: ctx.caller, name });
    return participant;
  }

  async listItem(ctx: CallContext, name: string, description: string, price: bigint): Promise<Listing> {
    this.requireRegistered(ctx.caller);
    if (price <= 0n) {
      throw new SettlementError(SettlementErrorCode.INVALID_PRICE, 'Price must be greater than zero', {
        price: price.toString(),
      });
    }

    const listing = this.state.addListing(name, description, price, ctx.caller);
    ctx.emit({ type: 'ItemListed', id: listing.id, name, price, owner: ctx.caller });
    this.logger.info('Item listed', { itemId: listing.id, owner: ctx.caller, price: price.toString() });
    return listing;
  }

  /**
   * Buy `itemId` paying `ctx.value`, which must equal the price exactly.
   * The price is credited to the seller's pending balance.
   */
  async buyItem(ctx: CallContext, itemId: number): Promise<Listing> {
    return this.guard.run('buyItem', async () => {
      this.requireRegistered(ctx.caller);

      const listing = this.state.getListing(itemId);
      if (!listing || !listing.available) {
        throw new SettlementError(SettlementErrorCode.ITEM_UNAVAILABLE, 'Item is not available', { itemId });
      }
      if (sameIdentity(listing.owner, ctx.caller)) {
        throw new SettlementError(SettlementErrorCode.SELF_PURCHASE, 'Cannot buy your own item', { itemId });
      }
      if (ctx.value !== listing.price) {
        throw new SettlementError(SettlementErrorCode.WRONG_PAYMENT_AMOUNT, 'Incorrect payment amount', {
          itemId,
          price: listing.price.toString(),
          paid: ctx.value.toString(),
        });
      }

      const seller = listing.owner;
      const sold = this.state.markSold(itemId, ctx.caller);
      this.escrow.credit(seller, listing.price);

      ctx.emit({ type: 'ItemSold', id: itemId, seller, buyer: ctx.caller, price: listing.price });
      this.logger.info('Item sold', { itemId, seller, buyer: ctx.caller, price: listing.price.toString() });
      return sold;
    });
  }

  /**
   * Pay out the caller's pending balance in full
   */
  async withdraw(ctx: CallContext): Promise<bigint> {
    return this.guard.run('withdraw', async () => {
      this.requireRegistered(ctx.caller);

      const amount = await this.escrow.withdraw(ctx.caller);
      ctx.emit({ type: 'FundsWithdrawn', identity: ctx.caller, amount });
      this.logger.info('Funds withdrawn', { identity: ctx.caller, amount: amount.toString() });
      return amount;
    });
  }

  getParticipant(identity: Identity): Participant | undefined {
    return this.state.getParticipant(identity);
  }

  getItem(id: number): Listing | undefined {
    return this.state.getListing(id);
  }

  listingCount(): number {
    return this.state.listingCount();
  }

  pendingBalanceOf(identity: Identity): bigint {
    return this.escrow.balanceOf(identity);
  }

  private requireRegistered(identity: Identity): void {
    if (!this.state.getParticipant(identity)?.registered) {
      throw new SettlementError(SettlementErrorCode.NOT_REGISTERED, 'User not registered', { identity });
    }
  }
}
