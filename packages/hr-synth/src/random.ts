/**
 * Seeded pseudorandom streams.
 *
 * Every component receives an explicit `SeededRandom`; nothing reads global
 * random state. Per-employee streams come from `deriveSeed`, so a row's draws
 * depend only on (master seed, stream label, employee index) and never on the
 * order in which employees are processed.
 */

import { MAX_SEED } from './types.js';

export class SeededRandom {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  /** Uniform in [0, 1). mulberry32. */
  next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let x = this.state;
    x = Math.imul(x ^ (x >>> 15), x | 1);
    x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
  }

  /** Integer in [min, max], both inclusive. */
  int(min: number, max: number): number {
    return Math.floor(this.next() * (max - min + 1)) + min;
  }

  /** Float in [min, max). */
  float(min: number, max: number): number {
    return this.next() * (max - min) + min;
  }

  bool(probability = 0.5): boolean {
    return this.next() < probability;
  }

  pick<T>(items: readonly T[]): T {
    if (items.length === 0) {
      throw new RangeError('Cannot pick from an empty list');
    }
    return items[Math.floor(this.next() * items.length)];
  }

  /**
   * Draw a key from `[value, weight]` pairs. Weights need not sum to one.
   */
  weighted<T>(entries: ReadonlyArray<readonly [T, number]>): T {
    const total = entries.reduce((sum, [, weight]) => sum + Math.max(0, weight), 0);
    if (entries.length === 0 || total <= 0) {
      throw new RangeError('Cannot draw from an empty or zero-weight distribution');
    }
    let roll = this.next() * total;
    for (const [value, weight] of entries) {
      roll -= Math.max(0, weight);
      if (roll < 0) return value;
    }
    return entries[entries.length - 1][0];
  }

  /** Exponential waiting time with the given mean. */
  exponential(mean: number): number {
    if (mean <= 0) return 0;
    return -Math.log(1 - this.next()) * mean;
  }
}

/**
 * Derive an independent 32-bit seed for a named sub-stream.
 */
export function deriveSeed(masterSeed: number, stream: string, index = 0): number {
  // FNV-1a over the stream key, then a murmur3 finalizer
  let hash = 0x811c9dc5;
  const key = `${masterSeed >>> 0}:${stream}:${index}`;
  for (let i = 0; i < key.length; i++) {
    hash ^= key.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  hash ^= hash >>> 16;
  hash = Math.imul(hash, 0x85ebca6b);
  hash ^= hash >>> 13;
  hash = Math.imul(hash, 0xc2b2ae35);
  hash ^= hash >>> 16;
  return hash >>> 0;
}

export function createStream(masterSeed: number, stream: string, index = 0): SeededRandom {
  return new SeededRandom(deriveSeed(masterSeed, stream, index));
}

export function randomSeed(): number {
  return Math.floor(Math.random() * (MAX_SEED + 1));
}
