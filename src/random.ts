/**
 * Random sources for the encoder's fallback choices.
 */

import type { RandomSource } from './types.ts';

export const systemRandom: RandomSource = {
  next: () => Math.random(),
};

/**
 * Deterministic mulberry32 generator, for reproducible derivations.
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return {
    next(): number {
      state = (state + 0x6d2b79f5) >>> 0;
      let t = state;
      t = Math.imul(t ^ (t >>> 15), t | 1);
      t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    },
  };
}

/**
 * Pick an index proportionally to `weights`.
 * Falls back to uniform when the weights carry no mass.
 */
export function weightedChoice(weights: readonly number[], random: RandomSource): number {
  if (!weights.length) {
    throw new Error('Cannot choose from an empty weight list');
  }

  const total = weights.reduce((a, b) => a + b, 0);
  if (total <= 0) {
    return Math.min(Math.floor(random.next() * weights.length), weights.length - 1);
  }

  const r = random.next() * total;
  let cumulative = 0.0;
  for (let i = 0; i < weights.length; i++) {
    cumulative += weights[i];
    if (r < cumulative) {
      return i;
    }
  }

  return weights.length - 1;
}
