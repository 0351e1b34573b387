import { describe, it, expect } from 'vitest';
import { generateRandomSeed, hashStringToSeed, toNumericSeed } from '../../../src/utils/seed-manager.js';

describe('seed-manager', () => {
  it('should hash string seeds to a stable 32-bit number', () => {
    const seed = hashStringToSeed('eduhub');

    expect(seed).toBe(hashStringToSeed('eduhub'));
    expect(Number.isInteger(seed)).toBe(true);
    expect(seed).toBeGreaterThanOrEqual(0);
    expect(seed).toBeLessThanOrEqual(0xffffffff);
    expect(seed).not.toBe(hashStringToSeed('eduhub2'));
  });

  it('should pass numeric seeds through', () => {
    expect(toNumericSeed(42)).toBe(42);
    expect(toNumericSeed('42')).toBe(hashStringToSeed('42'));
  });

  it('should generate 64-character hex seeds', () => {
    const seed = generateRandomSeed();

    expect(seed).toMatch(/^[0-9a-f]{64}$/);
    expect(generateRandomSeed()).not.toBe(seed);
  });
});
