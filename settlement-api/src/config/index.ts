import { config as dotenvConfig } from 'dotenv';
import { ethers } from 'ethers';
import { ApiConfig } from '../models/types';
import { getDefaultConfig } from './default';

// Load environment variables
dotenvConfig();

type Env = Record<string, string | undefined>;

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: Env = process.env): ApiConfig {
  const defaults = getDefaultConfig();

  return {
    port: env.PORT ? parseInt(env.PORT, 10) : defaults.port,
    host: env.HOST || defaults.host,
    logLevel: env.LOG_LEVEL || defaults.logLevel,
    logFile: env.LOG_FILE,

    chainId: env.CHAIN_ID ? parseBigInt(env.CHAIN_ID, 'CHAIN_ID') : defaults.chainId,
    domainName: env.DOMAIN_NAME || defaults.domainName,
    domainVersion: env.DOMAIN_VERSION || defaults.domainVersion,
    swapServiceAddress: env.SWAP_SERVICE_ADDRESS || defaults.swapServiceAddress,
    marketplaceAddress: env.MARKETPLACE_ADDRESS || defaults.marketplaceAddress,

    authMaxSkewSeconds: env.AUTH_MAX_SKEW_SECONDS
      ? parseInt(env.AUTH_MAX_SKEW_SECONDS, 10)
      : defaults.authMaxSkewSeconds,
    rateLimitMax: env.RATE_LIMIT_MAX ? parseInt(env.RATE_LIMIT_MAX, 10) : defaults.rateLimitMax,
    enableDevMint: env.ENABLE_DEV_MINT ? env.ENABLE_DEV_MINT === 'true' : defaults.enableDevMint,
  };
}

/**
 * Validate configuration
 */
export function validateConfig(config: ApiConfig): void {
  if (!Number.isInteger(config.port) || config.port <= 0 || config.port > 65535) {
    throw new Error(`Invalid port: ${config.port}`);
  }

  if (config.chainId <= 0n) {
    throw new Error('Invalid chain ID');
  }

  if (!config.domainName || !config.domainVersion) {
    throw new Error('Signing domain name and version are required');
  }

  for (const address of [config.swapServiceAddress, config.marketplaceAddress]) {
    if (!ethers.isAddress(address)) {
      throw new Error(`Invalid service address: ${address}`);
    }
  }

  if (ethers.getAddress(config.swapServiceAddress) === ethers.getAddress(config.marketplaceAddress)) {
    throw new Error('Swap service and marketplace must use different addresses');
  }

  if (!Number.isInteger(config.authMaxSkewSeconds) || config.authMaxSkewSeconds <= 0) {
    throw new Error('Auth max skew must be a positive number of seconds');
  }

  if (!Number.isInteger(config.rateLimitMax) || config.rateLimitMax <= 0) {
    throw new Error('Rate limit must be greater than 0');
  }
}

function parseBigInt(value: string, name: string): bigint {
  if (!/^\d+$/.test(value)) {
    throw new Error(`${name} must be a non-negative integer`);
  }
  return BigInt(value);
}
