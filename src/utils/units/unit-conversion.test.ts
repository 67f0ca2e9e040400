/**
 * Unit Conversion Utilities - Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { convertWei, weiToEth, weiToGwei } from './unit-conversion.js';

describe('Unit Conversion', () => {
  describe('weiToEth', () => {
    it('should convert whole and fractional ether', () => {
      expect(weiToEth(1_000_000_000_000_000_000n)).toBe(1);
      expect(weiToEth(500_000_000_000_000_000n)).toBe(0.5);
      expect(weiToEth(0n)).toBe(0);
    });

    it('should convert 2 gwei × 21000 gas to 0.000042 ether', () => {
      expect(weiToEth(2_000_000_000n * 21_000n)).toBe(0.000042);
    });

    it('should not overflow for a billion ether', () => {
      expect(weiToEth(10n ** 27n)).toBe(1_000_000_000);
    });

    it('should accept decimal and hex strings', () => {
      expect(weiToEth('250000000000000000')).toBe(0.25);
      expect(weiToEth('0xde0b6b3a7640000')).toBe(1);
    });
  });

  describe('weiToGwei', () => {
    it('should convert to gwei', () => {
      expect(weiToGwei(30_000_000_000n)).toBe(30);
      expect(weiToGwei(1_500_000_000n)).toBe(1.5);
      expect(weiToGwei(1n)).toBe(0.000000001);
    });

    it('should accept safe integers', () => {
      expect(weiToGwei(2_000_000_000)).toBe(2);
    });
  });

  describe('fallback', () => {
    it('should return 0 for malformed strings', () => {
      expect(weiToEth('not-a-number')).toBe(0);
      expect(weiToGwei('')).toBe(0);
      expect(weiToEth('1.5')).toBe(0);
    });

    it('should return 0 for negative amounts', () => {
      expect(weiToEth(-1n)).toBe(0);
      expect(convertWei('-1000', 9)).toBe(0);
    });

    it('should return 0 for unsafe or fractional numbers', () => {
      expect(weiToGwei(0.5)).toBe(0);
      expect(weiToGwei(Number.MAX_SAFE_INTEGER + 10)).toBe(0);
    });
  });
});
