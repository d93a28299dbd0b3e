import { toJsonSafe } from '../src/serialize';

describe('toJsonSafe', () => {
  it('should turn bigints into decimal strings at any depth', () => {
    const value = {
      amount: 115792089237316195423570985008687907853269984665640564039457584007913129639935n,
      legs: [{ amount: 100n }, { amount: 200n }],
      nested: { id: 1, name: 'lamp', available: true, owner: null },
    };

    expect(toJsonSafe(value)).toEqual({
      amount: '115792089237316195423570985008687907853269984665640564039457584007913129639935',
      legs: [{ amount: '100' }, { amount: '200' }],
      nested: { id: 1, name: 'lamp', available: true, owner: null },
    });
  });

  it('should leave primitives other than bigint untouched', () => {
    expect(toJsonSafe(42)).toBe(42);
    expect(toJsonSafe('text')).toBe('text');
    expect(toJsonSafe(undefined)).toBeUndefined();
  });
});
