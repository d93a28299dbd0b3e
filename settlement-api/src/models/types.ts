/**
 * Settlement API - Type Definitions
 */

export interface ApiConfig {
  port: number;
  host: string;
  logLevel: string;
  logFile?: string;

  // Signing domain
  chainId: bigint;
  domainName: string;
  domainVersion: string;
  swapServiceAddress: string;
  marketplaceAddress: string;

  // Security
  authMaxSkewSeconds: number;
  rateLimitMax: number;
  /** Exposes POST /api/v1/assets/mint; never enable outside local networks */
  enableDevMint: boolean;
}

export interface ErrorResponse {
  error: string;
  message: string;
  details?: unknown;
}
