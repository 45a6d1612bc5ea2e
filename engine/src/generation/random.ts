/**
 * docveil: Seeded Random Source
 *
 * xorshift128+ seeded through splitmix32. One instance per pipeline
 * invocation; it is never shared between batches.
 *
 * @module generation/random
 */

import { randomInt } from 'node:crypto';

export interface RandomSource {
  /** Uniform float in [0, 1) */
  next(): number;
  /** Uniform integer in [min, max), `max` exclusive */
  nextInt(min: number, max: number): number;
  pick<T>(items: readonly T[]): T;
}

export class Xorshift128Plus implements RandomSource {
  private s0: number;
  private s1: number;

  constructor(seed: number) {
    this.s0 = splitmix32(seed);
    this.s1 = splitmix32(this.s0);
    if (this.s0 === 0 && this.s1 === 0) {
      this.s0 = 1;
    }
  }

  next(): number {
    let s1 = this.s0;
    const s0 = this.s1;
    this.s0 = s0;
    s1 ^= s1 << 23;
    s1 ^= s1 >>> 17;
    s1 ^= s0;
    s1 ^= s0 >>> 26;
    this.s1 = s1;
    return ((this.s0 + this.s1) >>> 0) / 0x100000000;
  }

  nextInt(min: number, max: number): number {
    return Math.floor(this.next() * (max - min)) + min;
  }

  pick<T>(items: readonly T[]): T {
    const item = items[this.nextInt(0, items.length)];
    if (item === undefined) {
      throw new RangeError('Cannot pick from an empty list');
    }
    return item;
  }
}

function splitmix32(state: number): number {
  state |= 0;
  state = (state + 0x9e3779b9) | 0;
  let t = state ^ (state >>> 16);
  t = Math.imul(t, 0x21f0aaad);
  t = t ^ (t >>> 15);
  t = Math.imul(t, 0x735a2d97);
  t = t ^ (t >>> 15);
  return t >>> 0;
}

/**
 * Fresh seed from the operating system's CSPRNG
 */
export function drawSeed(): number {
  return randomInt(0, 0x7fffffff);
}

export function createRandom(seed: number = drawSeed()): RandomSource {
  return new Xorshift128Plus(seed);
}
