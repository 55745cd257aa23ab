// Uniform random sources: 64-bit draws and doubles in [0, 1).

import { randomFillSync } from 'node:crypto';
import { Buffer } from 'node:buffer';

import { EntropySourceError } from '../types/errors.js';

const MASK_64 = (1n << 64n) - 1n;
const TWO_POW_53 = 2 ** 53;

/**
 * A source of uniformly distributed bits.
 *
 * `nextFloat64()` MUST return a double in [0, 1) derived from `nextUint64()`.
 * Implementations are not required to be safe for use across workers;
 * construct one per worker.
 */
export interface RandomSource {
  nextUint64(): bigint;
  nextFloat64(): number;
}

/**
 * Maps 64 uniform bits onto [0, 1) by keeping the top 53 bits, which is
 * exactly the mantissa width of a double.
 */
export function uint64ToFloat64(value: bigint): number {
  return Number((value & MASK_64) >> 11n) / TWO_POW_53;
}

/**
 * 32-bit FNV-1a hash of a string over UTF-16 code units.
 * offset-basis: 2166136261, prime: 16777619, modulo 2^32
 */
export function fnv1a32(s: string): number {
  let x = 2166136261 >>> 0;
  for (let i = 0; i < s.length; i++) {
    x ^= s.charCodeAt(i);
    x = Math.imul(x, 16777619) >>> 0;
  }
  return x >>> 0;
}

export type ByteFiller = (buffer: Uint8Array) => void;

const fillFromCrypto: ByteFiller = (buffer) => {
  randomFillSync(buffer);
};

/**
 * Random source backed by the operating system CSPRNG.
 *
 * Every draw reads eight fresh bytes (big-endian). A failing byte source
 * raises EntropySourceError; there is no fallback generator.
 */
export class CryptoRandomSource implements RandomSource {
  readonly #buffer = Buffer.alloc(8);

  constructor(private readonly fill: ByteFiller = fillFromCrypto) {}

  /** The OS seeds its own source; explicit seeds are ignored. */
  seed(_seed?: number): void {}

  nextUint64(): bigint {
    try {
      this.fill(this.#buffer);
    } catch (cause) {
      throw new EntropySourceError(
        'secure random byte source failed',
        cause instanceof Error ? cause : new Error(String(cause))
      );
    }
    return this.#buffer.readBigUInt64BE(0);
  }

  nextFloat64(): number {
    return uint64ToFloat64(this.nextUint64());
  }
}

function splitMix64(seed: bigint): bigint {
  let z = (seed + 0x9e3779b97f4a7c15n) & MASK_64;
  z = ((z ^ (z >> 30n)) * 0xbf58476d1ce4e5b9n) & MASK_64;
  z = ((z ^ (z >> 27n)) * 0x94d049bb133111ebn) & MASK_64;
  return z ^ (z >> 31n);
}

/**
 * Deterministic xorshift64* source for reproducible tests and benchmarks.
 * Initialization: s0 = splitmix64(((seed >>> 0) << 32) | fnv1a32(label))
 *
 * Not cryptographically secure. Never use it to produce real passwords.
 */
export class SeededRandomSource implements RandomSource {
  #state: bigint;

  constructor(seed: number, label = '') {
    const mixed = splitMix64(
      (BigInt(seed >>> 0) << 32n) | BigInt(fnv1a32(label))
    );
    // xorshift has a fixed point at zero
    this.#state = mixed === 0n ? 0x9e3779b97f4a7c15n : mixed;
  }

  nextUint64(): bigint {
    let x = this.#state;
    x ^= x >> 12n;
    x ^= (x << 25n) & MASK_64;
    x ^= x >> 27n;
    this.#state = x;
    return (x * 0x2545f4914f6cdd1dn) & MASK_64;
  }

  nextFloat64(): number {
    return uint64ToFloat64(this.nextUint64());
  }
}

let processSource: CryptoRandomSource | undefined;

/** Process-wide crypto-backed source used when callers supply none. */
export function defaultRandomSource(): RandomSource {
  processSource ??= new CryptoRandomSource();
  return processSource;
}
