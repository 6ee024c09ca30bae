/**
 * Fixed-length payload derivation from a message and key.
 */

import { createHash } from 'node:crypto';
import { fitBits, hexToBits } from './bits.ts';
import { parseOptions, payloadBitsSchema } from './config.ts';

/**
 * SHA-256 over `message + key`, read as an unsigned integer, written in
 * binary, left-padded to `bits` and cut to exactly `bits` characters.
 *
 * Pure: the brute-force key search depends on it.
 */
export function derivePayload(message: string, key: string, bits: number): string {
  const length = parseOptions(payloadBitsSchema, bits);
  const digest = createHash('sha256').update(message + key, 'utf8').digest('hex');
  return fitBits(hexToBits(digest), length);
}
