import { describe, it, expect } from 'vitest';
import {
  CryptoRandomSource,
  SeededRandomSource,
  defaultRandomSource,
  fnv1a32,
  uint64ToFloat64,
} from '../rng.js';
import { EntropySourceError } from '../../types/errors.js';
import { ErrorCode } from '../../errors/codes.js';

describe('RNG utilities', () => {
  describe('fnv1a32', () => {
    it('computes correct FNV-1a hash for known strings', () => {
      expect(fnv1a32('')).toBe(2166136261);
      expect(fnv1a32('a')).toBe(3826002220);
    });

    it('returns uint32 values', () => {
      const hash = fnv1a32('passforge');
      expect(hash).toBe(hash >>> 0);
    });
  });

  describe('uint64ToFloat64', () => {
    it('maps zero to zero', () => {
      expect(uint64ToFloat64(0n)).toBe(0);
    });

    it('maps the largest 64-bit value strictly below one', () => {
      const max = (1n << 64n) - 1n;
      expect(uint64ToFloat64(max)).toBe((2 ** 53 - 1) / 2 ** 53);
      expect(uint64ToFloat64(max)).toBeLessThan(1);
    });

    it('uses the top 53 bits and ignores the low 11', () => {
      expect(uint64ToFloat64(1n << 63n)).toBe(0.5);
      expect(uint64ToFloat64((1n << 63n) | 0x7ffn)).toBe(0.5);
      expect(uint64ToFloat64(1n << 11n)).toBe(2 ** -53);
    });
  });

  describe('CryptoRandomSource', () => {
    /*
     * Estimate pi with a Monte Carlo method. A biased source would land
     * far from the true value.
     */
    it('is roughly uniform over the unit square', () => {
      const rnd = new CryptoRandomSource();

      let circle = 0;
      const samples = 10_000;
      for (let i = 0; i < samples; i++) {
        const x = rnd.nextFloat64();
        const y = rnd.nextFloat64();
        if (x * x + y * y <= 1.0) circle++;
      }

      const pi = (4.0 * circle) / samples;
      expect(Math.abs(pi - Math.PI)).toBeLessThan(0.1);
    });

    it('nextFloat64() returns values in [0, 1)', () => {
      const rnd = new CryptoRandomSource();
      for (let i = 0; i < 1000; i++) {
        const val = rnd.nextFloat64();
        expect(val).toBeGreaterThanOrEqual(0);
        expect(val).toBeLessThan(1);
      }
    });

    it('reads eight bytes big-endian per draw', () => {
      const rnd = new CryptoRandomSource((buffer) => {
        expect(buffer.length).toBe(8);
        buffer.set([0x01, 0x02, 0x03, 0x04, 0x05, 0x06, 0x07, 0x08]);
      });
      expect(rnd.nextUint64()).toBe(0x0102030405060708n);
    });

    it('fails loudly when the byte source fails', () => {
      const failure = new Error('entropy pool unavailable');
      const rnd = new CryptoRandomSource(() => {
        throw failure;
      });

      expect(() => rnd.nextFloat64()).toThrow(EntropySourceError);
      try {
        rnd.nextUint64();
      } catch (error) {
        if (!(error instanceof EntropySourceError)) throw error;
        expect(error.errorCode).toBe(ErrorCode.ENTROPY_SOURCE_FAILURE);
        expect(error.severity).toBe('fatal');
        expect(error.cause).toBe(failure);
        return;
      }
      expect.unreachable('nextUint64() should have thrown');
    });

    it('ignores seeding', () => {
      const rnd = new CryptoRandomSource((buffer) => buffer.fill(0xff));
      rnd.seed(42);
      expect(rnd.nextUint64()).toBe((1n << 64n) - 1n);
    });
  });

  describe('SeededRandomSource', () => {
    it('produces deterministic sequence for given seed and label', () => {
      const a = new SeededRandomSource(42, 'weights');
      const b = new SeededRandomSource(42, 'weights');
      const seqA = Array.from({ length: 5 }, () => a.nextUint64());
      const seqB = Array.from({ length: 5 }, () => b.nextUint64());
      expect(seqA).toEqual(seqB);
    });

    it('produces different sequences for different seeds or labels', () => {
      const base = new SeededRandomSource(1, 'x').nextUint64();
      expect(new SeededRandomSource(2, 'x').nextUint64()).not.toBe(base);
      expect(new SeededRandomSource(1, 'y').nextUint64()).not.toBe(base);
    });

    it('returns 64-bit values', () => {
      const rnd = new SeededRandomSource(0);
      for (let i = 0; i < 100; i++) {
        const v = rnd.nextUint64();
        expect(v >= 0n && v < 1n << 64n).toBe(true);
      }
    });

    it('produces reasonable distribution over [0, 1)', () => {
      const rnd = new SeededRandomSource(777, '/test/distribution');
      const samples = 10000;
      const buckets = 10;
      const counts = new Array<number>(buckets).fill(0);

      for (let i = 0; i < samples; i++) {
        const val = rnd.nextFloat64();
        counts[Math.floor(val * buckets)]++;
      }

      const expected = samples / buckets;
      const margin = expected * 0.3;
      for (const count of counts) {
        expect(count).toBeGreaterThan(expected - margin);
        expect(count).toBeLessThan(expected + margin);
      }
    });
  });

  it('defaultRandomSource() is shared across calls', () => {
    expect(defaultRandomSource()).toBe(defaultRandomSource());
    expect(defaultRandomSource()).toBeInstanceOf(CryptoRandomSource);
  });
});
