/**
 * Engine bootstrap for the API process
 */

import { SettlementEngine } from '@swapledger/settlement-core';
import { EngineConfig } from '@swapledger/types';
import { Logger } from '@swapledger/utils';
import { ApiConfig } from '../models/types';

export function toEngineConfig(config: ApiConfig): EngineConfig {
  return {
    domainName: config.domainName,
    domainVersion: config.domainVersion,
    chainId: config.chainId,
    swapServiceAddress: config.swapServiceAddress,
    marketplaceAddress: config.marketplaceAddress,
  };
}

export function createEngine(config: ApiConfig): SettlementEngine {
  const logger = new Logger('settlement-api', { level: config.logLevel, logFile: config.logFile });
  return new SettlementEngine({ config: toEngineConfig(config), logger });
}
