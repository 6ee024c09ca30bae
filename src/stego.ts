/**
 * High-level entry points: message + key -> carrier text, carrier text ->
 * bits and ranked key guesses.
 */

import type { CodecProfile, DetectionResult, EncodeResult, RecoveryCandidate } from './types.ts';
import { GrammarModel, parseGrammar } from './grammar.ts';
import { HuffmanCodeBuilder } from './huffman.ts';
import { StegoEncoder } from './encoder.ts';
import { StegoDetector, unreadSymbols } from './detector.ts';
import { derivePayload } from './payload.ts';
import { recoverKeys } from './key-search.ts';
import { loadWordlist } from './files.ts';
import { openProfile } from './profile.ts';
import {
  detectMessageOptionsSchema,
  encodeOptionsSchema,
  parseOptions,
  type DetectMessageOptions,
  type EncodeOptions,
} from './config.ts';

export interface DetectionReport extends DetectionResult {
  recovery?: RecoveryCandidate[];
}

export type ProfileEncodeOptions = Pick<EncodeOptions, 'maxBits' | 'maxAttempts' | 'random' | 'naturalness'>;
export type ProfileDetectOptions = Pick<
  DetectMessageOptions,
  'keys' | 'messages' | 'wordlistPath' | 'similarityThreshold' | 'keyOnlyBits' | 'keyOnlyThreshold'
>;

// Code tables are append-only, so one builder per grammar serves every call
const builders = new WeakMap<GrammarModel, HuffmanCodeBuilder>();

function codeBuilderFor(grammar: GrammarModel): HuffmanCodeBuilder {
  let builder = builders.get(grammar);
  if (!builder) {
    builder = new HuffmanCodeBuilder(grammar);
    builders.set(grammar, builder);
  }
  return builder;
}

/**
 * Derive the payload from (message, key) and embed it in a sentence.
 * Symbols a detector cannot read back are always reserved.
 */
export function encodeMessage(
  grammar: GrammarModel,
  message: string,
  key: string,
  options?: EncodeOptions
): EncodeResult {
  const opts = parseOptions(encodeOptionsSchema, options);
  const payload = derivePayload(message, key, opts.payloadBits);
  // Never spend bits where a default detector cannot read them back
  const reservedSymbols = [...new Set([...opts.reservedSymbols, ...unreadSymbols(grammar)])];
  return new StegoEncoder(grammar, codeBuilderFor(grammar)).encode(payload, { ...opts, reservedSymbols });
}

/**
 * Extract bits from carrier text and, when keys are given, rank them.
 * Grammar text is parsed leniently.
 */
export function detectMessage(
  grammar: GrammarModel | string,
  text: string,
  options: DetectMessageOptions
): DetectionReport {
  const opts = parseOptions(detectMessageOptionsSchema, options);
  const model =
    grammar instanceof GrammarModel
      ? grammar
      : parseGrammar(grammar, { startSymbol: opts.startSymbol, strict: false });

  const result: DetectionReport = new StegoDetector(model, codeBuilderFor(model)).detect(text, opts);
  if (!opts.keys) return result;

  const messages = opts.messages ?? (opts.wordlistPath ? loadWordlist(opts.wordlistPath) : undefined);
  result.recovery = recoverKeys(result.bits, opts.keys, {
    messages,
    similarityThreshold: opts.similarityThreshold,
    keyOnlyBits: opts.keyOnlyBits,
    keyOnlyThreshold: opts.keyOnlyThreshold,
  });
  return result;
}

export function encodeWithProfile(
  profile: CodecProfile,
  message: string,
  key: string,
  options: ProfileEncodeOptions = {}
): EncodeResult {
  const opened = openProfile(profile);
  return encodeMessage(opened.grammar, message, key, {
    ...options,
    payloadBits: opened.payloadBits,
    reservedSymbols: opened.reservedSymbols,
  });
}

export function detectWithProfile(
  profile: CodecProfile,
  text: string,
  options: ProfileDetectOptions = {}
): DetectionReport {
  const opened = openProfile(profile);
  return detectMessage(opened.grammar, text, {
    ...options,
    marker: opened.marker,
    slotSymbols: opened.slotSymbols,
    excludedSymbols: opened.excludedSymbols,
  });
}

/**
 * Maximum theoretical embeddable bits for a grammar.
 */
export function grammarCapacity(grammar: GrammarModel): number {
  return grammar.capacity();
}
