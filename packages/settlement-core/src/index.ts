/**
 * @swapledger/settlement-core - Signature-authorized swap settlement and
 * escrow marketplace
 */

export * from './SettlementEngine';
export * from './identity';
export * from './host/Clock';
export * from './host/ExecutionHost';
export * from './host/WriteJournal';
export * from './state/LedgerState';
export * from './state/SettlementStateMachine';
export * from './fingerprint/FingerprintService';
export * from './authorization/AuthorizationVerifier';
export * from './authorization/swapTypedData';
export * from './authorization/signing';
export * from './guard/ReentrancyGuard';
export * from './transfer/AssetTransferPort';
export * from './transfer/AtomicTransferExecutor';
export * from './transfer/InMemoryAssetLedger';
export * from './escrow/EscrowLedger';
export * from './swap/order';
export * from './swap/SwapSettlementService';
export * from './marketplace/MarketplaceService';
