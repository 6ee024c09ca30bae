/**
 * Letter-frequency heuristic for "does this read like English".
 */

import type { NaturalnessGate } from './types.ts';
import { naturalnessOptionsSchema, parseOptions, type NaturalnessOptions } from './config.ts';

/**
 * Relative frequency of each letter in English prose.
 */
export const ENGLISH_LETTER_FREQUENCIES: Readonly<Record<string, number>> = {
  a: 0.08167,
  b: 0.01492,
  c: 0.02782,
  d: 0.04253,
  e: 0.12702,
  f: 0.02228,
  g: 0.02015,
  h: 0.06094,
  i: 0.06966,
  j: 0.00153,
  k: 0.00772,
  l: 0.04025,
  m: 0.02406,
  n: 0.06749,
  o: 0.07507,
  p: 0.01929,
  q: 0.00095,
  r: 0.05987,
  s: 0.06327,
  t: 0.09056,
  u: 0.02758,
  v: 0.00978,
  w: 0.0236,
  x: 0.0015,
  y: 0.01974,
  z: 0.00074,
};

export const HIGH_FREQUENCY_LETTERS = ['e', 't', 'a', 'o', 'i', 'n', 's'] as const;
export const LOW_FREQUENCY_LETTERS = ['z', 'q', 'x'] as const;

export interface LetterHistogram {
  /** Every alphabetic character, accented or not. */
  total: number;
  /** a-z only. */
  counts: Map<string, number>;
}

const LETTER = /\p{L}/u;

/**
 * Case-folded letter counts. Frequencies are taken against all letters, while
 * only a-z have a reference share to compare with.
 */
export function letterHistogram(text: string): LetterHistogram {
  const counts = new Map<string, number>();
  let total = 0;
  for (const ch of text.toLowerCase()) {
    if (!LETTER.test(ch)) continue;
    total++;
    if (ch >= 'a' && ch <= 'z') {
      counts.set(ch, (counts.get(ch) ?? 0) + 1);
    }
  }
  return { total, counts };
}

export function relativeFrequencies(histogram: LetterHistogram): Map<string, number> {
  const frequencies = new Map<string, number>();
  if (!histogram.total) return frequencies;
  for (const [letter, count] of histogram.counts) {
    frequencies.set(letter, count / histogram.total);
  }
  return frequencies;
}

/**
 * 1 - min(meanAbsDeviation / scale, 1) over the full 26-letter table.
 */
export function naturalityOf(frequencies: ReadonlyMap<string, number>, deviationScale = 0.05): number {
  const letters = Object.keys(ENGLISH_LETTER_FREQUENCIES);
  let deviation = 0;
  for (const letter of letters) {
    deviation += Math.abs((frequencies.get(letter) ?? 0) - ENGLISH_LETTER_FREQUENCIES[letter]);
  }
  const average = deviation / letters.length;
  return 1 - Math.min(average / deviationScale, 1.0);
}

export class NaturalnessEvaluator implements NaturalnessGate {
  private readonly minLetters: number;
  private readonly tolerance: number;
  private readonly deviationScale: number;

  constructor(options?: NaturalnessOptions) {
    const parsed = parseOptions(naturalnessOptionsSchema, options);
    this.minLetters = parsed.minLetters;
    this.tolerance = parsed.tolerance;
    this.deviationScale = parsed.deviationScale;
  }

  /**
   * Encoder gate. Short samples always pass. A frequent key letter fails in
   * either direction; a rare key letter only fails when over-represented.
   * Missing z, q or x is tolerated deliberately, not an oversight.
   */
  isNatural(text: string): boolean {
    const histogram = letterHistogram(text);
    if (histogram.total < this.minLetters) return true;

    const observed = relativeFrequencies(histogram);
    for (const letter of HIGH_FREQUENCY_LETTERS) {
      const expected = ENGLISH_LETTER_FREQUENCIES[letter];
      if (Math.abs((observed.get(letter) ?? 0) - expected) > this.tolerance * expected) {
        return false;
      }
    }
    for (const letter of LOW_FREQUENCY_LETTERS) {
      const expected = ENGLISH_LETTER_FREQUENCIES[letter];
      if ((observed.get(letter) ?? 0) - expected > this.tolerance * expected) {
        return false;
      }
    }
    return true;
  }

  /**
   * Detector diagnostic in [0, 1].
   */
  score(text: string): number {
    const histogram = letterHistogram(text);
    if (histogram.total < this.minLetters) return 1.0;
    return naturalityOf(relativeFrequencies(histogram), this.deviationScale);
  }
}
