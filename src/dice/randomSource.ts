import { randomInt } from 'crypto';
import { RandomSource } from './types.js';

function assertRange(low: number, highInclusive: number): void {
  if (!Number.isSafeInteger(low) || !Number.isSafeInteger(highInclusive) || highInclusive < low) {
    throw new RangeError(`Invalid range [${low}, ${highInclusive}]`);
  }
}

/** FNV-1a hash so string seeds (session ids, turn keys) map to a 32-bit seed. */
export function hashSeed(input: string): number {
  let hash = 2166136261;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, 16777619);
  }
  return hash >>> 0;
}

/**
 * Deterministic mulberry32 generator. Two sources created from the same seed
 * produce the same sequence of draws.
 */
export function createSeededRandom(seedInput: number | string): RandomSource {
  const seed = typeof seedInput === 'string' ? hashSeed(seedInput) : seedInput >>> 0;
  let current = seed;
  const nextFloat = () => {
    current = (current + 0x6d2b79f5) | 0;
    let t = Math.imul(current ^ (current >>> 15), 1 | current);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
  return {
    seed,
    nextInt(low: number, highInclusive: number): number {
      assertRange(low, highInclusive);
      return low + Math.floor(nextFloat() * (highInclusive - low + 1));
    }
  };
}

/** Live-play source backed by the platform CSPRNG. */
export function createCryptoRandom(): RandomSource {
  return {
    nextInt(low: number, highInclusive: number): number {
      assertRange(low, highInclusive);
      if (low === highInclusive) return low;
      return randomInt(low, highInclusive + 1);
    }
  };
}

/**
 * Replays a fixed list of values in order. Throws when the list runs out or
 * when a value does not fit the range the caller asked for.
 */
export function createFixedSequence(values: readonly number[]): RandomSource & { readonly remaining: number } {
  let cursor = 0;
  return {
    get remaining() {
      return values.length - cursor;
    },
    nextInt(low: number, highInclusive: number): number {
      assertRange(low, highInclusive);
      if (cursor >= values.length) {
        throw new RangeError(`Fixed sequence exhausted after ${values.length} draws`);
      }
      const value = values[cursor++];
      if (value < low || value > highInclusive) {
        throw new RangeError(`Fixed value ${value} is outside [${low}, ${highInclusive}]`);
      }
      return value;
    }
  };
}
