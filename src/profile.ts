/**
 * Codec profiles: the grammar and slot conventions both parties must share.
 *
 * Wire format: base64(msgpack(profile)), zlib-deflated when that is smaller.
 * Compression is auto-detected on import: zlib streams start with 0x78,
 * msgpack maps with 0x80-0x8f.
 */

import { encode as msgpackEncode, decode as msgpackDecode } from '@msgpack/msgpack';
import pako from 'pako';
import { z } from 'zod';
import type { CodecProfile } from './types.ts';
import { DEFAULT_PAYLOAD_BITS, DEFAULT_START_SYMBOL, PROFILE_VERSION } from './types.ts';
import { parseGrammar, type GrammarModel } from './grammar.ts';
import { unreadSymbols } from './detector.ts';
import { ProfileFormatError } from './errors.ts';
import { log } from './logger.ts';

const ZLIB_HEADER = 0x78;

const profileSchema = z.object({
  version: z.literal(PROFILE_VERSION),
  grammar: z.string().min(1),
  startSymbol: z.string().min(1),
  marker: z.string().min(1),
  slotSymbols: z.array(z.string()).nullable(),
  excludedSymbols: z.array(z.string()),
  payloadBits: z.number().int().min(0),
});

export interface ProfileInput {
  grammar: string;
  marker: string;
  startSymbol?: string;
  slotSymbols?: string[];
  excludedSymbols?: string[];
  payloadBits?: number;
}

/**
 * Everything needed to run both sides of the codec from one profile.
 */
export interface OpenedProfile {
  grammar: GrammarModel;
  payloadBits: number;
  /** Symbols the detector never reads; the encoder must not spend bits on them. */
  reservedSymbols: string[];
  marker: string;
  slotSymbols: string[] | undefined;
  excludedSymbols: string[];
}

function validateProfile(value: unknown): CodecProfile {
  const parsed = profileSchema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join('.') || 'profile'}: ${issue.message}`
    );
    throw new ProfileFormatError(`Invalid codec profile: ${issues.join('; ')}`);
  }
  return parsed.data;
}

/**
 * Parse the profile's grammar and derive matching encode/detect settings.
 */
export function openProfile(profile: CodecProfile): OpenedProfile {
  const grammar = parseGrammar(profile.grammar, { startSymbol: profile.startSymbol });

  for (const symbol of [...(profile.slotSymbols ?? []), ...profile.excludedSymbols]) {
    if (!grammar.has(symbol)) {
      throw new ProfileFormatError(`Profile names unknown grammar symbol '${symbol}'`);
    }
  }

  const reservedSymbols = unreadSymbols(grammar, {
    slotSymbols: profile.slotSymbols ?? undefined,
    excludedSymbols: profile.excludedSymbols,
  });

  return {
    grammar,
    payloadBits: profile.payloadBits,
    reservedSymbols,
    marker: profile.marker,
    slotSymbols: profile.slotSymbols ?? undefined,
    excludedSymbols: profile.excludedSymbols,
  };
}

/**
 * Build and check a profile. The grammar must parse and every named symbol
 * must exist.
 */
export function createProfile(input: ProfileInput): CodecProfile {
  const profile = validateProfile({
    version: PROFILE_VERSION,
    grammar: input.grammar,
    startSymbol: input.startSymbol ?? DEFAULT_START_SYMBOL,
    marker: input.marker,
    slotSymbols: input.slotSymbols ?? null,
    excludedSymbols: input.excludedSymbols ?? [],
    payloadBits: input.payloadBits ?? DEFAULT_PAYLOAD_BITS,
  });
  openProfile(profile);
  return profile;
}

export function exportProfile(profile: CodecProfile): string {
  let body: Uint8Array = new Uint8Array(msgpackEncode(validateProfile(profile)));

  const compressed = pako.deflate(body, { level: 9 });
  if (compressed.length < body.length) {
    body = compressed;
  }

  log.profile.debug('Exported profile', { bytes: body.length });
  return Buffer.from(body).toString('base64');
}

export function importProfile(blob: string): CodecProfile {
  const bytes = new Uint8Array(Buffer.from(blob.trim(), 'base64'));
  if (!bytes.length) {
    throw new ProfileFormatError('Empty profile blob');
  }

  let decoded: unknown;
  try {
    const body = bytes[0] === ZLIB_HEADER ? pako.inflate(bytes) : bytes;
    decoded = msgpackDecode(body);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ProfileFormatError(`Unreadable profile blob: ${detail}`);
  }

  return validateProfile(decoded);
}
