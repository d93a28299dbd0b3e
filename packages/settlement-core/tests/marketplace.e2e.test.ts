import { Wallet, id } from 'ethers';
import { LedgerEvent, SettlementErrorCode } from '@swapledger/types';
import { NATIVE_ASSET } from '../src/identity';
import { ManualClock } from '../src/host/Clock';
import { SettlementEngine } from '../src/SettlementEngine';
import { captureAsyncError, engineConfig, MARKETPLACE, NOW, silentLogger } from './fixtures';

const alice = new Wallet(id('test-alice'));
const bob = new Wallet(id('test-bob'));
const carol = new Wallet(id('test-carol'));

describe('Marketplace', () => {
  let engine: SettlementEngine;

  const nativeOf = (identity: string) => engine.assets.balanceOf(NATIVE_ASSET, identity);

  beforeEach(() => {
    engine = new SettlementEngine({ config: engineConfig, clock: new ManualClock(NOW), logger: silentLogger() });
    engine.assets.mint(NATIVE_ASSET, bob.address, 1000n);
  });

  async function sellerWithItem(price = 50n) {
    await engine.registerParticipant(alice.address, 'alice');
    await engine.registerParticipant(bob.address, 'bob');
    const { result: item } = await engine.listItem(alice.address, 'Lamp', 'Brass desk lamp', price);
    return item;
  }

  describe('registerParticipant', () => {
    it('should register a participant and emit ParticipantRegistered', async () => {
      const receipt = await engine.registerParticipant(alice.address, 'alice');

      expect(receipt.result).toEqual({
        identity: alice.address,
        displayName: 'alice',
        registered: true,
        pendingBalance: 0n,
      });
      expect(receipt.events).toEqual([{ type: 'ParticipantRegistered', identity: alice.address, name: 'alice' }]);
      expect(engine.getParticipant(alice.address.toLowerCase())).toEqual(receipt.result);
    });

    it('should reject registering the same identity twice', async () => {
      await engine.registerParticipant(alice.address, 'alice');

      const error = await captureAsyncError(engine.registerParticipant(alice.address, 'alice'));

      expect(error).toMatchObject({ code: SettlementErrorCode.ALREADY_REGISTERED, message: 'User already registered' });
    });

    it('should reject a name taken by another identity', async () => {
      await engine.registerParticipant(alice.address, 'alice');

      const error = await captureAsyncError(engine.registerParticipant(bob.address, 'alice'));

      expect(error).toMatchObject({ code: SettlementErrorCode.NAME_TAKEN, message: 'Username already taken' });
      expect(engine.getParticipant(bob.address)).toBeUndefined();
    });
  });

  describe('listItem', () => {
    it('should assign ids from 1', async () => {
      await engine.registerParticipant(alice.address, 'alice');

      const first = await engine.listItem(alice.address, 'Lamp', 'Brass desk lamp', 50n);
      const second = await engine.listItem(alice.address, 'Chair', '', 70n);

      expect(first.result.id).toBe(1);
      expect(second.result.id).toBe(2);
      expect(first.events).toEqual([{ type: 'ItemListed', id: 1, name: 'Lamp', price: 50n, owner: alice.address }]);
      expect(engine.listingCount()).toBe(2);
      expect(engine.getItem(1)).toEqual({
        id: 1,
        name: 'Lamp',
        description: 'Brass desk lamp',
        price: 50n,
        available: true,
        owner: alice.address,
      });
    });

    it('should require registration', async () => {
      const error = await captureAsyncError(engine.listItem(alice.address, 'Lamp', '', 50n));

      expect(error).toMatchObject({ code: SettlementErrorCode.NOT_REGISTERED });
    });

    it('should reject a zero price', async () => {
      await engine.registerParticipant(alice.address, 'alice');

      const error = await captureAsyncError(engine.listItem(alice.address, 'Lamp', '', 0n));

      expect(error).toMatchObject({ code: SettlementErrorCode.INVALID_PRICE });
      expect(engine.listingCount()).toBe(0);
    });
  });

  describe('buyItem', () => {
    it('should reject a payment that differs from the price and return the payment', async () => {
      const item = await sellerWithItem(50n);

      for (const payment of [49n, 51n]) {
        const error = await captureAsyncError(engine.buyItem(bob.address, item.id, payment));
        expect(error).toMatchObject({ code: SettlementErrorCode.WRONG_PAYMENT_AMOUNT });
      }

      expect(nativeOf(bob.address)).toBe(1000n);
      expect(nativeOf(MARKETPLACE)).toBe(0n);
      expect(engine.getItem(item.id)?.available).toBe(true);
    });

    it('should sell at the exact price and credit the seller', async () => {
      const item = await sellerWithItem(50n);

      const receipt = await engine.buyItem(bob.address, item.id, 50n);

      expect(receipt.events).toEqual([
        { type: 'ItemSold', id: item.id, seller: alice.address, buyer: bob.address, price: 50n },
      ]);
      expect(receipt.result).toMatchObject({ available: false, owner: bob.address });
      expect(engine.pendingBalanceOf(alice.address)).toBe(50n);
      expect(nativeOf(bob.address)).toBe(950n);
      expect(nativeOf(MARKETPLACE)).toBe(50n);
    });

    it('should reject buying a sold or unknown item', async () => {
      const item = await sellerWithItem();
      await engine.buyItem(bob.address, item.id, 50n);

      const sold = await captureAsyncError(engine.buyItem(bob.address, item.id, 50n));
      const unknown = await captureAsyncError(engine.buyItem(bob.address, 99, 50n));

      expect(sold).toMatchObject({ code: SettlementErrorCode.ITEM_UNAVAILABLE, message: 'Item is not available' });
      expect(unknown).toMatchObject({ code: SettlementErrorCode.ITEM_UNAVAILABLE });
    });

    it('should reject buying your own item', async () => {
      const item = await sellerWithItem();
      engine.assets.mint(NATIVE_ASSET, alice.address, 50n);

      const error = await captureAsyncError(engine.buyItem(alice.address, item.id, 50n));

      expect(error).toMatchObject({ code: SettlementErrorCode.SELF_PURCHASE });
      expect(nativeOf(alice.address)).toBe(50n);
    });

    it('should require the buyer to be registered', async () => {
      const item = await sellerWithItem();
      engine.assets.mint(NATIVE_ASSET, carol.address, 50n);

      const error = await captureAsyncError(engine.buyItem(carol.address, item.id, 50n));

      expect(error).toMatchObject({ code: SettlementErrorCode.NOT_REGISTERED });
      expect(nativeOf(carol.address)).toBe(50n);
    });

    it('should fail when the buyer cannot cover the payment', async () => {
      const item = await sellerWithItem(50n);
      await engine.registerParticipant(carol.address, 'carol');

      const error = await captureAsyncError(engine.buyItem(carol.address, item.id, 50n));

      expect(error).toMatchObject({ code: SettlementErrorCode.INSUFFICIENT_FUNDS });
      expect(engine.getItem(item.id)?.available).toBe(true);
    });
  });

  describe('withdraw', () => {
    it('should pay out exactly the pending balance once', async () => {
      const item = await sellerWithItem(50n);
      await engine.buyItem(bob.address, item.id, 50n);

      const receipt = await engine.withdraw(alice.address);

      expect(receipt.result).toBe(50n);
      expect(receipt.events).toEqual([{ type: 'FundsWithdrawn', identity: alice.address, amount: 50n }]);
      expect(engine.pendingBalanceOf(alice.address)).toBe(0n);
      expect(nativeOf(alice.address)).toBe(50n);
      expect(nativeOf(MARKETPLACE)).toBe(0n);

      const again = await captureAsyncError(engine.withdraw(alice.address));
      expect(again).toMatchObject({ code: SettlementErrorCode.NOTHING_TO_WITHDRAW });
    });

    it('should pool proceeds from several sales', async () => {
      const lamp = await sellerWithItem(50n);
      const { result: chair } = await engine.listItem(alice.address, 'Chair', '', 70n);
      await engine.buyItem(bob.address, lamp.id, 50n);
      await engine.buyItem(bob.address, chair.id, 70n);

      expect(engine.pendingBalanceOf(alice.address)).toBe(120n);
      await expect(engine.withdraw(alice.address)).resolves.toMatchObject({ result: 120n });
    });

    it('should require registration', async () => {
      const error = await captureAsyncError(engine.withdraw(carol.address));

      expect(error).toMatchObject({ code: SettlementErrorCode.NOT_REGISTERED });
    });

    it('should refuse a re-entrant withdraw and pay only once', async () => {
      const item = await sellerWithItem(50n);
      await engine.buyItem(bob.address, item.id, 50n);
      const nestedErrors: unknown[] = [];
      engine.assets.onReceive(alice.address, async () => {
        nestedErrors.push(await captureAsyncError(engine.withdraw(alice.address)));
      });

      const receipt = await engine.withdraw(alice.address);

      expect(receipt.result).toBe(50n);
      expect(nestedErrors).toHaveLength(1);
      expect(nestedErrors[0]).toMatchObject({ code: SettlementErrorCode.REENTRANT_CALL });
      expect(receipt.events).toEqual([{ type: 'FundsWithdrawn', identity: alice.address, amount: 50n }]);
      expect(nativeOf(alice.address)).toBe(50n);
      expect(engine.pendingBalanceOf(alice.address)).toBe(0n);
    });

    it('should roll back the withdrawal when the re-entry error escapes', async () => {
      const item = await sellerWithItem(50n);
      await engine.buyItem(bob.address, item.id, 50n);
      const published: LedgerEvent[] = [];
      engine.on('event', (event) => published.push(event));
      engine.assets.onReceive(alice.address, async () => {
        await engine.withdraw(alice.address);
      });

      const error = await captureAsyncError(engine.withdraw(alice.address));

      expect(error).toMatchObject({ code: SettlementErrorCode.WITHDRAWAL_TRANSFER_FAILED });
      expect(error instanceof Error ? error.cause : undefined).toMatchObject({
        code: SettlementErrorCode.REENTRANT_CALL,
      });
      expect(engine.pendingBalanceOf(alice.address)).toBe(50n);
      expect(nativeOf(alice.address)).toBe(0n);
      expect(nativeOf(MARKETPLACE)).toBe(50n);
      expect(published).toEqual([]);
    });
  });
});
