/**
 * Settlement API - Main Entry Point
 * HTTP surface over the swap settlement engine and marketplace
 */

import { loadConfig, validateConfig } from './config';
import { installShutdown } from './lifecycle';
import { buildServer } from './server';
import { createEngine } from './services/engine.service';

async function main() {
  const config = loadConfig();
  validateConfig(config);

  const engine = createEngine(config);
  const fastify = await buildServer(engine, config, {
    logger: {
      level: config.logLevel,
      transport: {
        target: 'pino-pretty',
        options: {
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
        },
      },
    },
  });
  installShutdown(fastify, engine);

  await fastify.listen({ port: config.port, host: config.host });

  const domain = engine.domain();
  fastify.log.info(
    {
      domain: `${domain.name} v${domain.version}`,
      chainId: domain.chainId.toString(),
      swapService: config.swapServiceAddress,
      marketplace: config.marketplaceAddress,
      devMint: config.enableDevMint,
    },
    `Settlement API accepting signed calls on ${config.host}:${config.port}`
  );
  fastify.log.info(
    { maxSkewSeconds: config.authMaxSkewSeconds, rateLimitMax: config.rateLimitMax },
    'Caller signatures checked with single-use nonces'
  );
}

main().catch((err) => {
  console.error('Settlement API failed to start:', err);
  process.exit(1);
});
