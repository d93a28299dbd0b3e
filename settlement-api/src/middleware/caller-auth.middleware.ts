/**
 * Caller Authentication Middleware
 *
 * Every mutating request names its caller and proves it with an EIP-191
 * signature over the request:
 *
 *   swapledger:<METHOD>:<url>:<timestamp>:<nonce>:<keccak256(body)>
 *
 * where `body` is the JSON text of the parsed request body ('' when there
 * is none) and `timestamp` is in unix seconds. A nonce is accepted once per
 * caller for as long as its timestamp could still pass the skew check.
 */

import { FastifyReply, FastifyRequest } from 'fastify';
import { getAddress, hexlify, isAddress, keccak256, randomBytes, toUtf8Bytes, verifyMessage } from 'ethers';
import NodeCache from 'node-cache';
import { Identity } from '@swapledger/types';

export const CALLER_ADDRESS_HEADER = 'x-caller-address';
export const CALLER_TIMESTAMP_HEADER = 'x-caller-timestamp';
export const CALLER_NONCE_HEADER = 'x-caller-nonce';
export const CALLER_SIGNATURE_HEADER = 'x-caller-signature';

const NONCE_PATTERN = /^[A-Za-z0-9_-]{8,128}$/;

declare module 'fastify' {
  interface FastifyRequest {
    caller: Identity | null;
  }
}

export interface CallerAuthOptions {
  maxSkewSeconds: number;
  nonces: NonceRegistry;
  /** Unix seconds */
  now?: () => number;
}

/**
 * (caller, nonce) pairs seen recently. Entries expire once a request
 * carrying them would be stale anyway.
 */
export class NonceRegistry {
  private readonly seen: NodeCache;

  constructor(
    maxSkewSeconds: number,
    private readonly maxEntries = 100_000
  ) {
    this.seen = new NodeCache({
      stdTTL: maxSkewSeconds * 2 + 1,
      checkperiod: Math.max(1, maxSkewSeconds),
      useClones: false,
    });
  }

  /**
   * 'claimed' the first time a pair is seen, 'replayed' after that, and
   * 'full' when the registry cannot take another entry
   */
  claim(caller: Identity, nonce: string): 'claimed' | 'replayed' | 'full' {
    const key = `${caller.toLowerCase()}:${nonce}`;
    if (this.seen.has(key)) {
      return 'replayed';
    }
    if (this.seen.getStats().keys >= this.maxEntries) {
      return 'full';
    }
    this.seen.set(key, true);
    return 'claimed';
  }

  close(): void {
    this.seen.close();
  }
}

export function bodyDigest(body: unknown): string {
  return keccak256(toUtf8Bytes(body === undefined || body === null ? '' : JSON.stringify(body)));
}

export function callerAuthMessage(
  method: string,
  url: string,
  timestamp: number,
  nonce: string,
  body: unknown
): string {
  return `swapledger:${method.toUpperCase()}:${url}:${timestamp}:${nonce}:${bodyDigest(body)}`;
}

export interface SignRequestOptions {
  /** Unix seconds; defaults to now */
  timestamp?: number;
  /** Defaults to 16 random bytes, hex encoded */
  nonce?: string;
}

/**
 * Client side: headers authenticating one request
 */
export async function signCallerRequest(
  signer: { address: string; signMessage(message: string): Promise<string> },
  method: string,
  url: string,
  body: unknown,
  options: SignRequestOptions = {}
): Promise<Record<string, string>> {
  const timestamp = options.timestamp ?? Math.floor(Date.now() / 1000);
  const nonce = options.nonce ?? hexlify(randomBytes(16)).slice(2);
  const signature = await signer.signMessage(callerAuthMessage(method, url, timestamp, nonce, body));
  return {
    [CALLER_ADDRESS_HEADER]: signer.address,
    [CALLER_TIMESTAMP_HEADER]: String(timestamp),
    [CALLER_NONCE_HEADER]: nonce,
    [CALLER_SIGNATURE_HEADER]: signature,
  };
}

/**
 * preHandler that rejects unauthenticated requests with 401 and otherwise
 * sets `request.caller`
 */
export function requireCaller(options: CallerAuthOptions) {
  const now = options.now ?? (() => Math.floor(Date.now() / 1000));

  return async (request: FastifyRequest, reply: FastifyReply) => {
    const address = headerValue(request, CALLER_ADDRESS_HEADER);
    const timestampHeader = headerValue(request, CALLER_TIMESTAMP_HEADER);
    const nonce = headerValue(request, CALLER_NONCE_HEADER);
    const signature = headerValue(request, CALLER_SIGNATURE_HEADER);

    if (!address || !timestampHeader || !nonce || !signature) {
      return reply.code(401).send({ error: 'Unauthorized', message: 'Missing caller authentication headers' });
    }
    if (!isAddress(address)) {
      return reply.code(401).send({ error: 'Unauthorized', message: 'Invalid caller address' });
    }
    if (!/^\d+$/.test(timestampHeader)) {
      return reply.code(401).send({ error: 'Unauthorized', message: 'Invalid caller timestamp' });
    }
    if (!NONCE_PATTERN.test(nonce)) {
      return reply.code(401).send({ error: 'Unauthorized', message: 'Invalid caller nonce' });
    }

    const timestamp = parseInt(timestampHeader, 10);
    if (Math.abs(now() - timestamp) > options.maxSkewSeconds) {
      return reply.code(401).send({ error: 'Unauthorized', message: 'Stale request' });
    }

    let signer: string;
    try {
      signer = verifyMessage(
        callerAuthMessage(request.method, request.url, timestamp, nonce, request.body),
        signature
      );
    } catch (error) {
      request.log.debug({ err: error }, 'Caller signature could not be recovered');
      return reply.code(401).send({ error: 'Unauthorized', message: 'Invalid caller signature' });
    }

    if (signer.toLowerCase() !== address.toLowerCase()) {
      return reply.code(401).send({ error: 'Unauthorized', message: 'Invalid caller signature' });
    }

    const claim = options.nonces.claim(address, nonce);
    if (claim === 'replayed') {
      return reply.code(401).send({ error: 'Unauthorized', message: 'Replayed request' });
    }
    if (claim === 'full') {
      request.log.warn('Nonce registry full; refusing request');
      return reply.code(429).send({ error: 'Too Many Requests', message: 'Too many recent requests' });
    }

    request.caller = getAddress(address);
  };
}

function headerValue(request: FastifyRequest, name: string): string | undefined {
  const value = request.headers[name];
  return Array.isArray(value) ? value[0] : value;
}
