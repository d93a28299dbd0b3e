/**
 * Default configuration for the settlement API
 * Local development network (Chain ID: 31337)
 */

export const DEFAULT_CONFIG = {
  port: 3002,
  host: '0.0.0.0',
  logLevel: 'info',

  // Signing domain
  chainId: 31337n,
  domainName: 'SwapLedger',
  domainVersion: '1',
  swapServiceAddress: '0x5fbdb2315678afecb367f032d93f642f64180aa3',
  marketplaceAddress: '0xe7f1725e7734ce288f8367e1bb143e90bb3f0512',

  // Security
  authMaxSkewSeconds: 300,
  rateLimitMax: 100,
  enableDevMint: false,
};

export type DefaultConfig = typeof DEFAULT_CONFIG;

export function getDefaultConfig(): DefaultConfig {
  return { ...DEFAULT_CONFIG };
}
