/**
 * Ranks candidate keys (and messages) against an extracted bit string.
 *
 * A heuristic nearest-match search, not a cryptographic attack: confidences
 * are bit-agreement ratios and never claim certainty.
 */

import type { RecoveryCandidate } from './types.ts';
import { DEFAULT_CANDIDATE_MESSAGES } from './types.ts';
import { derivePayload } from './payload.ts';
import { bitSimilarity, isBitString } from './bits.ts';
import { keySearchOptionsSchema, parseOptions, type KeySearchOptions } from './config.ts';
import { CodecOptionsError } from './errors.ts';
import { log } from './logger.ts';

interface ResolvedSearch {
  messages: readonly string[];
  similarityThreshold: number;
  keyOnlyBits: number;
  keyOnlyThreshold: number;
}

function assessKey(bits: string, key: string, search: ResolvedSearch): RecoveryCandidate | null {
  for (const message of search.messages) {
    const guess = derivePayload(message, key, bits.length);
    const confidence = bitSimilarity(bits, guess);
    if (confidence > search.similarityThreshold) {
      return { key, message, note: 'message match', confidence };
    }
  }

  // Hash of the key alone, compared over its first keyOnlyBits bits
  const keyBits = derivePayload('', key, search.keyOnlyBits);
  const confidence = bitSimilarity(bits, keyBits);
  if (confidence > search.keyOnlyThreshold) {
    return { key, message: null, note: 'possible key', confidence };
  }
  return null;
}

/**
 * Candidates sorted by descending confidence; equal confidences keep key
 * order. Keys that clear neither threshold are left out.
 */
export function recoverKeys(
  bits: string,
  candidateKeys: readonly string[],
  options?: KeySearchOptions
): RecoveryCandidate[] {
  const opts = parseOptions(keySearchOptionsSchema, options);
  if (!isBitString(bits)) {
    throw new CodecOptionsError(["bits must contain only '0' and '1'"]);
  }
  if (!bits.length) {
    log.keySearch.warn('Nothing to search: empty bit string');
    return [];
  }

  const search: ResolvedSearch = {
    messages: opts.messages ?? DEFAULT_CANDIDATE_MESSAGES,
    similarityThreshold: opts.similarityThreshold,
    keyOnlyBits: opts.keyOnlyBits,
    keyOnlyThreshold: opts.keyOnlyThreshold,
  };

  const ranked: RecoveryCandidate[] = [];
  for (const key of candidateKeys) {
    try {
      const candidate = assessKey(bits, key, search);
      if (candidate) ranked.push(candidate);
    } catch (error) {
      log.keySearch.error(
        'Key candidate failed, continuing search',
        { key },
        error instanceof Error ? error : new Error(String(error))
      );
    }
  }

  // Array.prototype.sort is stable, so ties stay in input order
  return ranked.sort((a, b) => b.confidence - a.confidence);
}
