/**
 * Settlement Engine
 *
 * Owns the process-wide ledger state and runs every operation through the
 * execution host on behalf of an explicit caller.
 *
 * @module SettlementEngine
 */

import {
  AssetHandle,
  CallReceipt,
  EngineConfig,
  Identity,
  LedgerEvent,
  LedgerEventType,
  Listing,
  Participant,
  SigningDomain,
  SwapOrder,
  SwapStatus,
} from '@swapledger/types';
import { Logger } from '@swapledger/utils';
import { AuthorizationVerifier } from './authorization/AuthorizationVerifier';
import { EscrowLedger } from './escrow/EscrowLedger';
import { FingerprintService } from './fingerprint/FingerprintService';
import { Clock, SystemClock } from './host/Clock';
import { ExecutionHost } from './host/ExecutionHost';
import { toIdentity } from './identity';
import { MarketplaceService } from './marketplace/MarketplaceService';
import { LedgerState } from './state/LedgerState';
import { SettlementStateMachine } from './state/SettlementStateMachine';
import { SwapSettlementService } from './swap/SwapSettlementService';
import { normalizeSwapOrder } from './swap/order';
import { AtomicTransferExecutor } from './transfer/AtomicTransferExecutor';
import { InMemoryAssetLedger } from './transfer/InMemoryAssetLedger';

export interface SettlementEngineOptions {
  config: EngineConfig;
  clock?: Clock;
  assets?: InMemoryAssetLedger;
  logger?: Logger;
}

export class SettlementEngine {
  readonly host: ExecutionHost;
  readonly assets: InMemoryAssetLedger;
  readonly swaps: SwapSettlementService;
  readonly marketplace: MarketplaceService;

  private readonly state = new LedgerState();
  private readonly fingerprints = new FingerprintService();
  private readonly verifier: AuthorizationVerifier;
  private readonly logger: Logger;

  constructor(options: SettlementEngineOptions) {
    const { config } = options;
    this.logger = options.logger ?? new Logger('SettlementEngine');
    this.assets = options.assets ?? new InMemoryAssetLedger();

    const swapServiceAddress = toIdentity(config.swapServiceAddress, 'swapServiceAddress');
    const marketplaceAddress = toIdentity(config.marketplaceAddress, 'marketplaceAddress');

    this.host = new ExecutionHost(options.clock ?? new SystemClock(), this.logger.child('host'));
    this.host.register(this.state);
    this.host.register(this.assets);
    this.host.setValueCarrier(this.assets);

    this.verifier = new AuthorizationVerifier({
      name: config.domainName,
      version: config.domainVersion,
      chainId: config.chainId,
      verifyingContract: swapServiceAddress,
    });

    this.swaps = new SwapSettlementService(
      swapServiceAddress,
      new SettlementStateMachine(this.state, this.verifier, this.fingerprints),
      new AtomicTransferExecutor(this.assets, this.logger.child('transfer')),
      this.logger.child('swap')
    );

    this.marketplace = new MarketplaceService(
      marketplaceAddress,
      this.state,
      new EscrowLedger(this.state, this.assets, marketplaceAddress, this.logger.child('escrow')),
      this.logger.child('marketplace')
    );

    this.logger.info('Settlement engine initialized', {
      chainId: config.chainId.toString(),
      swapService: swapServiceAddress,
      marketplace: marketplaceAddress,
    });
  }

  // Swap settlement

  async executeSwap(caller: Identity, order: SwapOrder, signature: string): Promise<CallReceipt<string>> {
    return this.host.call(caller, (ctx) => this.swaps.executeSwap(ctx, order, signature));
  }

  async cancelSwap(caller: Identity, order: SwapOrder, signature: string): Promise<CallReceipt<string>> {
    return this.host.call(caller, (ctx) => this.swaps.cancelSwap(ctx, order, signature));
  }

  // Marketplace

  async registerParticipant(caller: Identity, name: string): Promise<CallReceipt<Participant>> {
    return this.host.call(caller, (ctx) => this.marketplace.registerParticipant(ctx, name));
  }

  async listItem(caller: Identity, name: string, description: string, price: bigint): Promise<CallReceipt<Listing>> {
    return this.host.call(caller, (ctx) => this.marketplace.listItem(ctx, name, description, price));
  }

  /**
   * `paymentAmount` travels as native value from the caller to the
   * marketplace account and comes back if the purchase fails
   */
  async buyItem(caller: Identity, itemId: number, paymentAmount: bigint): Promise<CallReceipt<Listing>> {
    return this.host.call(caller, (ctx) => this.marketplace.buyItem(ctx, itemId), {
      value: paymentAmount,
      recipient: this.marketplace.address,
    });
  }

  async withdraw(caller: Identity): Promise<CallReceipt<bigint>> {
    return this.host.call(caller, (ctx) => this.marketplace.withdraw(ctx));
  }

  // Assets

  /**
   * Grant `spender` an allowance over the caller's `asset`, the way a token
   * holder approves the swap service before settlement
   */
  async approve(caller: Identity, asset: AssetHandle, spender: Identity, amount: bigint): Promise<CallReceipt<void>> {
    const assetId = toIdentity(asset, 'asset');
    const spenderId = toIdentity(spender, 'spender');
    return this.host.call(caller, async (ctx) => {
      this.assets.approve(assetId, ctx.caller, spenderId, amount);
    });
  }

  // Views

  hashSwap(order: SwapOrder): string {
    return this.fingerprints.fingerprint(normalizeSwapOrder(order));
  }

  signingHash(order: SwapOrder): string {
    return this.verifier.signingHash(normalizeSwapOrder(order));
  }

  domain(): SigningDomain {
    return this.verifier.getDomain();
  }

  swapStatus(fingerprint: string): SwapStatus {
    return this.swaps.status(fingerprint);
  }

  getParticipant(identity: Identity): Participant | undefined {
    return this.marketplace.getParticipant(toIdentity(identity, 'identity'));
  }

  getItem(id: number): Listing | undefined {
    return this.marketplace.getItem(id);
  }

  listingCount(): number {
    return this.marketplace.listingCount();
  }

  pendingBalanceOf(identity: Identity): bigint {
    return this.marketplace.pendingBalanceOf(toIdentity(identity, 'identity'));
  }

  /**
   * Subscribe to committed events, all of them or one type
   */
  on(type: LedgerEventType | 'event', listener: (event: LedgerEvent) => void): this {
    this.host.on(type, listener);
    return this;
  }
}
