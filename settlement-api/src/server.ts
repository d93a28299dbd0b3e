/**
 * Settlement API - Fastify server
 */

import Fastify, { FastifyInstance, FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import { ZodError } from 'zod';
import { SettlementEngine } from '@swapledger/settlement-core';
import { isSettlementError } from '@swapledger/types';
import { registerApiRoutes } from './routes/api.routes';
import { httpStatusFor, settlementErrorResponse } from './errors';
import { ApiConfig } from './models/types';

export interface BuildServerOptions {
  logger?: FastifyServerOptions['logger'];
}

export async function buildServer(
  engine: SettlementEngine,
  config: ApiConfig,
  options: BuildServerOptions = {}
): Promise<FastifyInstance> {
  const fastify = Fastify({ logger: options.logger ?? false });

  fastify.decorateRequest('caller', null);

  // Register plugins
  await fastify.register(cors, {
    origin: true,
  });

  await fastify.register(helmet, {
    contentSecurityPolicy: false, // Disable for API
  });

  await fastify.register(rateLimit, {
    max: config.rateLimitMax,
    timeWindow: '1 minute',
  });

  fastify.setErrorHandler((error, request, reply) => {
    if (error instanceof ZodError) {
      return reply.code(400).send({
        error: 'Invalid request',
        message: error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; '),
        details: error.issues,
      });
    }

    if (isSettlementError(error)) {
      const statusCode = httpStatusFor(error);
      request.log.warn({ code: error.code, statusCode }, error.message);
      return reply.code(statusCode).send(settlementErrorResponse(error));
    }

    if (error.statusCode !== undefined && error.statusCode < 500) {
      return reply.code(error.statusCode).send({ error: error.name, message: error.message });
    }

    request.log.error(error);
    return reply.code(500).send({
      error: 'Internal server error',
      message: error instanceof Error ? error.message : 'Unknown error',
    });
  });

  await registerApiRoutes(fastify, engine, config);

  return fastify;
}
