/**
 * API Routes for the Settlement API
 */

import { FastifyInstance, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { isAddress } from 'ethers';
import { SettlementEngine } from '@swapledger/settlement-core';
import { Identity } from '@swapledger/types';
import { toJsonSafe } from '@swapledger/utils';
import { NonceRegistry, requireCaller } from '../middleware/caller-auth.middleware';
import { ApiConfig } from '../models/types';

// Request schemas
const AddressSchema = z.string().refine((value) => isAddress(value), { message: 'Invalid address' });

const UintSchema = z
  .string()
  .regex(/^\d+$/, 'Expected a decimal integer string')
  .transform((value) => BigInt(value));

const SignatureSchema = z.string().regex(/^0x[0-9a-fA-F]*$/, 'Expected a hex signature');

const SwapOrderSchema = z.object({
  id: UintSchema,
  initiator: AddressSchema,
  counterparty: AddressSchema,
  assetA: AddressSchema,
  assetB: AddressSchema,
  amountA: UintSchema,
  amountB: UintSchema,
  expiry: UintSchema,
});

const SignedOrderSchema = z.object({
  order: SwapOrderSchema,
  signature: SignatureSchema,
});

const RegisterSchema = z.object({
  name: z.string().min(1).max(64),
});

const ListItemSchema = z.object({
  name: z.string().min(1).max(128),
  description: z.string().max(1024).default(''),
  price: UintSchema,
});

const BuyItemSchema = z.object({
  payment: UintSchema,
});

const ApproveSchema = z.object({
  asset: AddressSchema,
  spender: AddressSchema,
  amount: UintSchema,
});

const MintSchema = z.object({
  asset: AddressSchema,
  to: AddressSchema,
  amount: UintSchema,
});

const ItemIdSchema = z.coerce.number().int().nonnegative();
const FingerprintSchema = z.string().regex(/^0x[0-9a-fA-F]{64}$/, 'Expected a 32-byte hex fingerprint');

function callerOf(request: FastifyRequest): Identity {
  if (!request.caller) {
    throw new Error(`Route ${request.method} ${request.url} is missing caller authentication`);
  }
  return request.caller;
}

export async function registerApiRoutes(fastify: FastifyInstance, engine: SettlementEngine, config: ApiConfig) {
  const nonces = new NonceRegistry(config.authMaxSkewSeconds);
  fastify.addHook('onClose', async () => nonces.close());
  const authenticate = requireCaller({ maxSkewSeconds: config.authMaxSkewSeconds, nonces });

  /**
   * GET /api/v1/health
   */
  fastify.get('/api/v1/health', async () => {
    return {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      ...engine.host.getStats(),
    };
  });

  /**
   * GET /api/v1/domain
   * Signing domain initiators must sign orders under
   */
  fastify.get('/api/v1/domain', async () => {
    return toJsonSafe(engine.domain());
  });

  // Swaps

  /**
   * POST /api/v1/swaps/hash
   * Fingerprint and signing hash of an order
   */
  fastify.post('/api/v1/swaps/hash', async (request) => {
    const { order } = z.object({ order: SwapOrderSchema }).parse(request.body);
    return {
      fingerprint: engine.hashSwap(order),
      signingHash: engine.signingHash(order),
    };
  });

  /**
   * GET /api/v1/swaps/:fingerprint
   */
  fastify.get<{ Params: { fingerprint: string } }>('/api/v1/swaps/:fingerprint', async (request) => {
    const fingerprint = FingerprintSchema.parse(request.params.fingerprint);
    return { fingerprint, status: engine.swapStatus(fingerprint) };
  });

  /**
   * POST /api/v1/swaps/execute
   * Settle a signed order; the caller must be its counterparty
   */
  fastify.post('/api/v1/swaps/execute', { preHandler: authenticate }, async (request) => {
    const { order, signature } = SignedOrderSchema.parse(request.body);
    const receipt = await engine.executeSwap(callerOf(request), order, signature);
    return toJsonSafe(receipt);
  });

  /**
   * POST /api/v1/swaps/cancel
   * Cancel a signed order; the caller must be its initiator
   */
  fastify.post('/api/v1/swaps/cancel', { preHandler: authenticate }, async (request) => {
    const { order, signature } = SignedOrderSchema.parse(request.body);
    const receipt = await engine.cancelSwap(callerOf(request), order, signature);
    return toJsonSafe(receipt);
  });

  // Marketplace

  /**
   * POST /api/v1/participants
   */
  fastify.post('/api/v1/participants', { preHandler: authenticate }, async (request, reply) => {
    const { name } = RegisterSchema.parse(request.body);
    const receipt = await engine.registerParticipant(callerOf(request), name);
    return reply.code(201).send(toJsonSafe(receipt));
  });

  /**
   * GET /api/v1/participants/:identity
   */
  fastify.get<{ Params: { identity: string } }>('/api/v1/participants/:identity', async (request, reply) => {
    const identity = AddressSchema.parse(request.params.identity);
    const participant = engine.getParticipant(identity);
    if (!participant) {
      return reply.code(404).send({ error: 'Not found', message: 'Participant not registered' });
    }
    return toJsonSafe(participant);
  });

  /**
   * GET /api/v1/participants/:identity/balance
   * Pending sale proceeds
   */
  fastify.get<{ Params: { identity: string } }>('/api/v1/participants/:identity/balance', async (request) => {
    const identity = AddressSchema.parse(request.params.identity);
    return { identity, pendingBalance: engine.pendingBalanceOf(identity).toString() };
  });

  /**
   * GET /api/v1/items
   */
  fastify.get('/api/v1/items', async () => {
    return { count: engine.listingCount() };
  });

  /**
   * POST /api/v1/items
   */
  fastify.post('/api/v1/items', { preHandler: authenticate }, async (request, reply) => {
    const { name, description, price } = ListItemSchema.parse(request.body);
    const receipt = await engine.listItem(callerOf(request), name, description, price);
    return reply.code(201).send(toJsonSafe(receipt));
  });

  /**
   * GET /api/v1/items/:id
   */
  fastify.get<{ Params: { id: string } }>('/api/v1/items/:id', async (request, reply) => {
    const id = ItemIdSchema.parse(request.params.id);
    const item = engine.getItem(id);
    if (!item) {
      return reply.code(404).send({ error: 'Not found', message: 'Item does not exist' });
    }
    return toJsonSafe(item);
  });

  /**
   * POST /api/v1/items/:id/buy
   * `payment` is native value moved from the caller with the call
   */
  fastify.post<{ Params: { id: string } }>(
    '/api/v1/items/:id/buy',
    { preHandler: authenticate },
    async (request) => {
      const id = ItemIdSchema.parse(request.params.id);
      const { payment } = BuyItemSchema.parse(request.body);
      const receipt = await engine.buyItem(callerOf(request), id, payment);
      return toJsonSafe(receipt);
    }
  );

  /**
   * POST /api/v1/withdrawals
   */
  fastify.post('/api/v1/withdrawals', { preHandler: authenticate }, async (request) => {
    const receipt = await engine.withdraw(callerOf(request));
    return toJsonSafe(receipt);
  });

  // Assets

  /**
   * POST /api/v1/assets/approve
   */
  fastify.post('/api/v1/assets/approve', { preHandler: authenticate }, async (request) => {
    const { asset, spender, amount } = ApproveSchema.parse(request.body);
    const receipt = await engine.approve(callerOf(request), asset, spender, amount);
    return toJsonSafe(receipt);
  });

  /**
   * GET /api/v1/assets/:asset/balances/:holder
   */
  fastify.get<{ Params: { asset: string; holder: string } }>(
    '/api/v1/assets/:asset/balances/:holder',
    async (request) => {
      const asset = AddressSchema.parse(request.params.asset);
      const holder = AddressSchema.parse(request.params.holder);
      return { asset, holder, balance: engine.assets.balanceOf(asset, holder).toString() };
    }
  );

  if (config.enableDevMint) {
    /**
     * POST /api/v1/assets/mint
     * Local networks only
     */
    fastify.post('/api/v1/assets/mint', { preHandler: authenticate }, async (request) => {
      const { asset, to, amount } = MintSchema.parse(request.body);
      const receipt = await engine.host.call(callerOf(request), async () => engine.assets.mint(asset, to, amount));
      return toJsonSafe(receipt);
    });
    fastify.log.warn('Development mint endpoint enabled');
  }
}
