import { Wallet, id } from 'ethers';
import { EngineConfig, SigningDomain, SwapOrder } from '@swapledger/types';
import { Logger } from '@swapledger/utils';
import { CallContext } from '../src/host/ExecutionHost';
import { ManualClock } from '../src/host/Clock';
import { SettlementEngine } from '../src/SettlementEngine';

export const initiator = new Wallet(id('test-initiator'));
export const counterparty = new Wallet(id('test-counterparty'));
export const outsider = new Wallet(id('test-outsider'));

// Digit-only addresses are already in checksum form
export const TOKEN_X = '0x1000000000000000000000000000000000000001';
export const TOKEN_Y = '0x2000000000000000000000000000000000000002';
export const SWAP_SERVICE = '0x3000000000000000000000000000000000000003';
export const MARKETPLACE = '0x4000000000000000000000000000000000000004';

export const NOW = 1_700_000_000n;

export const engineConfig: EngineConfig = {
  domainName: 'SwapLedger',
  domainVersion: '1',
  chainId: 31337n,
  swapServiceAddress: SWAP_SERVICE,
  marketplaceAddress: MARKETPLACE,
};

export const signingDomain: SigningDomain = {
  name: engineConfig.domainName,
  version: engineConfig.domainVersion,
  chainId: engineConfig.chainId,
  verifyingContract: SWAP_SERVICE,
};

export function silentLogger(): Logger {
  return new Logger('test', { silent: true });
}

export function makeOrder(overrides: Partial<SwapOrder> = {}): SwapOrder {
  return {
    id: 1n,
    initiator: initiator.address,
    counterparty: counterparty.address,
    assetA: TOKEN_X,
    assetB: TOKEN_Y,
    amountA: 100n,
    amountB: 200n,
    expiry: NOW + 3600n,
    ...overrides,
  };
}

export function makeContext(caller: string, timestamp: bigint = NOW): CallContext {
  return {
    caller,
    timestamp,
    value: 0n,
    depth: 0,
    emit: jest.fn(),
  };
}

/**
 * Engine at NOW with 1000 of TOKEN_X held by the initiator and 1000 of
 * TOKEN_Y held by the counterparty, both fully approved to the swap service
 */
export async function createSwapFixture() {
  const clock = new ManualClock(NOW);
  const engine = new SettlementEngine({ config: engineConfig, clock, logger: silentLogger() });

  engine.assets.mint(TOKEN_X, initiator.address, 1000n);
  engine.assets.mint(TOKEN_Y, counterparty.address, 1000n);
  await engine.approve(initiator.address, TOKEN_X, SWAP_SERVICE, 1000n);
  await engine.approve(counterparty.address, TOKEN_Y, SWAP_SERVICE, 1000n);

  return { engine, clock };
}

export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}

export async function captureAsyncError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('Expected promise to reject');
}
