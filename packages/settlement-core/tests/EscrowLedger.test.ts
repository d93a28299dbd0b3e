import { SettlementErrorCode } from '@swapledger/types';
import { EscrowLedger } from '../src/escrow/EscrowLedger';
import { NATIVE_ASSET } from '../src/identity';
import { LedgerState } from '../src/state/LedgerState';
import { InMemoryAssetLedger } from '../src/transfer/InMemoryAssetLedger';
import { captureAsyncError, initiator, MARKETPLACE, silentLogger } from './fixtures';

describe('EscrowLedger', () => {
  let state: LedgerState;
  let assets: InMemoryAssetLedger;
  let escrow: EscrowLedger;

  beforeEach(() => {
    state = new LedgerState();
    assets = new InMemoryAssetLedger();
    escrow = new EscrowLedger(state, assets, MARKETPLACE, silentLogger());
    state.addParticipant(initiator.address, 'alice');
  });

  describe('credit', () => {
    it('should pool credits per participant', () => {
      escrow.credit(initiator.address, 50n);
      escrow.credit(initiator.address, 70n);

      expect(escrow.balanceOf(initiator.address)).toBe(120n);
      expect(state.getParticipant(initiator.address)?.pendingBalance).toBe(120n);
    });

    it('should refuse to credit an unregistered identity', () => {
      expect(() => escrow.credit(MARKETPLACE, 1n)).toThrow('User not registered');
    });
  });

  describe('withdraw', () => {
    it('should pay out the whole balance from the escrow account', async () => {
      assets.mint(NATIVE_ASSET, MARKETPLACE, 120n);
      escrow.credit(initiator.address, 120n);

      await expect(escrow.withdraw(initiator.address)).resolves.toBe(120n);

      expect(escrow.balanceOf(initiator.address)).toBe(0n);
      expect(assets.balanceOf(NATIVE_ASSET, initiator.address)).toBe(120n);
      expect(assets.balanceOf(NATIVE_ASSET, MARKETPLACE)).toBe(0n);
    });

    it('should fail with NOTHING_TO_WITHDRAW on a zero balance', async () => {
      const error = await captureAsyncError(escrow.withdraw(initiator.address));

      expect(error).toMatchObject({ code: SettlementErrorCode.NOTHING_TO_WITHDRAW, message: 'No funds to withdraw' });
    });

    it('should zero the balance before the transfer runs', async () => {
      assets.mint(NATIVE_ASSET, MARKETPLACE, 30n);
      escrow.credit(initiator.address, 30n);
      const seenDuringTransfer: bigint[] = [];
      assets.onReceive(initiator.address, () => {
        seenDuringTransfer.push(escrow.balanceOf(initiator.address));
      });

      await escrow.withdraw(initiator.address);

      expect(seenDuringTransfer).toEqual([0n]);
    });

    it('should report a declined transfer', async () => {
      escrow.credit(initiator.address, 30n);

      const error = await captureAsyncError(escrow.withdraw(initiator.address));

      expect(error).toMatchObject({
        code: SettlementErrorCode.WITHDRAWAL_TRANSFER_FAILED,
        message: 'Transfer failed',
        details: { identity: initiator.address, amount: '30' },
      });
    });

    it('should report a throwing recipient with its cause', async () => {
      const cause = new Error('recipient rejects');
      assets.mint(NATIVE_ASSET, MARKETPLACE, 30n);
      escrow.credit(initiator.address, 30n);
      assets.onReceive(initiator.address, () => {
        throw cause;
      });

      const error = await captureAsyncError(escrow.withdraw(initiator.address));

      expect(error).toMatchObject({ code: SettlementErrorCode.WITHDRAWAL_TRANSFER_FAILED });
      expect(error instanceof Error ? error.cause : undefined).toBe(cause);
    });
  });
});
