import { Wallet, id, verifyMessage } from 'ethers';
import {
  callerAuthMessage,
  NonceRegistry,
  signCallerRequest,
} from '../src/middleware/caller-auth.middleware';

const alice = new Wallet(id('test-alice'));

describe('NonceRegistry', () => {
  let registry: NonceRegistry;

  beforeEach(() => {
    registry = new NonceRegistry(300, 2);
  });

  afterEach(() => {
    registry.close();
  });

  it('should claim a nonce once per caller', () => {
    expect(registry.claim(alice.address, 'nonce-0001')).toBe('claimed');
    expect(registry.claim(alice.address.toLowerCase(), 'nonce-0001')).toBe('replayed');
  });

  it('should refuse new entries when full', () => {
    registry.claim(alice.address, 'nonce-0001');
    registry.claim(alice.address, 'nonce-0002');

    expect(registry.claim(alice.address, 'nonce-0003')).toBe('full');
    expect(registry.claim(alice.address, 'nonce-0001')).toBe('replayed');
  });
});

describe('signCallerRequest', () => {
  it('should sign the method, url, timestamp, nonce and body', async () => {
    const body = { name: 'alice' };

    const headers = await signCallerRequest(alice, 'post', '/api/v1/participants', body, {
      timestamp: 1_700_000_000,
      nonce: 'nonce-0001',
    });

    expect(headers['x-caller-address']).toBe(alice.address);
    expect(headers['x-caller-timestamp']).toBe('1700000000');
    expect(headers['x-caller-nonce']).toBe('nonce-0001');
    expect(
      verifyMessage(
        callerAuthMessage('POST', '/api/v1/participants', 1_700_000_000, 'nonce-0001', body),
        headers['x-caller-signature']
      )
    ).toBe(alice.address);
  });

  it('should generate a fresh nonce per request', async () => {
    const first = await signCallerRequest(alice, 'POST', '/api/v1/withdrawals', {});
    const second = await signCallerRequest(alice, 'POST', '/api/v1/withdrawals', {});

    expect(first['x-caller-nonce']).toMatch(/^[0-9a-f]{32}$/);
    expect(first['x-caller-nonce']).not.toBe(second['x-caller-nonce']);
  });
});
