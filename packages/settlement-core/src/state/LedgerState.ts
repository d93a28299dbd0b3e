import {
  Identity,
  Listing,
  Participant,
  SettlementError,
  SettlementErrorCode,
  SwapStatus,
} from '@swapledger/types';
import { Journaled, WriteJournal } from '../host/WriteJournal';

export type SettledStatus = SwapStatus.EXECUTED | SwapStatus.CANCELLED;

/**
 * Process-wide ledger state: settlement outcomes by fingerprint, participants
 * and listings. Starts empty; entries are never deleted.
 *
 * Reads hand out copies, so the only way to change a record is through the
 * methods below, all of which run inside a host frame and journal an undo
 * step for what they change.
 */
export class LedgerState implements Journaled {
  private readonly settlements = new Map<string, SettledStatus>();
  private readonly participants = new Map<Identity, Participant>();
  private readonly names = new Map<string, Identity>();
  private readonly listings = new Map<number, Listing>();
  private lastListingId = 0;
  private journal?: WriteJournal;

  attachJournal(journal: WriteJournal): void {
    this.journal = journal;
  }

  // Settlements

  swapStatus(fingerprint: string): SwapStatus {
    return this.settlements.get(fingerprint) ?? SwapStatus.UNSEEN;
  }

  /**
   * One-way transition out of UNSEEN
   */
  markSettled(fingerprint: string, status: SettledStatus): void {
    const current = this.settlements.get(fingerprint);
    if (current !== undefined) {
      throw new SettlementError(SettlementErrorCode.ALREADY_SETTLED, `Swap already ${current}`, {
        fingerprint,
        status: current,
      });
    }
    this.settlements.set(fingerprint, status);
    this.journal?.record(() => this.settlements.delete(fingerprint));
  }

  settledCount(): number {
    return this.settlements.size;
  }

  // Participants

  getParticipant(identity: Identity): Participant | undefined {
    const participant = this.participants.get(identity);
    return participant ? { ...participant } : undefined;
  }

  isNameTaken(name: string): boolean {
    return this.names.has(name);
  }

  addParticipant(identity: Identity, displayName: string): Participant {
    if (this.participants.has(identity)) {
      throw new SettlementError(SettlementErrorCode.ALREADY_REGISTERED, 'User already registered', { identity });
    }
    if (this.names.has(displayName)) {
      throw new SettlementError(SettlementErrorCode.NAME_TAKEN, 'Username already taken', { name: displayName });
    }

    const participant: Participant = {
      identity,
      displayName,
      registered: true,
      pendingBalance: 0n,
    };
    this.participants.set(identity, participant);
    this.names.set(displayName, identity);
    this.journal?.record(() => {
      this.participants.delete(identity);
      this.names.delete(displayName);
    });
    return { ...participant };
  }

  setPendingBalance(identity: Identity, amount: bigint): void {
    const participant = this.participants.get(identity);
    if (!participant) {
      throw new SettlementError(SettlementErrorCode.NOT_REGISTERED, 'User not registered', { identity });
    }
    if (amount < 0n) {
      throw new RangeError(`Pending balance cannot be negative: ${amount}`);
    }
    const previous = participant.pendingBalance;
    participant.pendingBalance = amount;
    this.journal?.record(() => {
      participant.pendingBalance = previous;
    });
  }

  // Listings

  addListing(name: string, description: string, price: bigint, owner: Identity): Listing {
    const listing: Listing = {
      id: ++this.lastListingId,
      name,
      description,
      price,
      available: true,
      owner,
    };
    this.listings.set(listing.id, listing);
    this.journal?.record(() => {
      this.listings.delete(listing.id);
      this.lastListingId = listing.id - 1;
    });
    return { ...listing };
  }

  getListing(id: number): Listing | undefined {
    const listing = this.listings.get(id);
    return listing ? { ...listing } : undefined;
  }

  /**
   * Flips availability and hands the listing to the buyer in one step
   */
  markSold(id: number, buyer: Identity): Listing {
    const listing = this.listings.get(id);
    if (!listing || !listing.available) {
      throw new SettlementError(SettlementErrorCode.ITEM_UNAVAILABLE, 'Item is not available', { itemId: id });
    }
    const seller = listing.owner;
    listing.available = false;
    listing.owner = buyer;
    this.journal?.record(() => {
      listing.available = true;
      listing.owner = seller;
    });
    return { ...listing };
  }

  listingCount(): number {
    return this.lastListingId;
  }
}
