/**
 * Shared types for the grammar steganography codec.
 */

/**
 * One weighted production alternative of a grammar symbol.
 */
export interface Alternative {
  /** Surface form: tokens joined by a single space, quotes stripped. */
  text: string;
  tokens: readonly string[];
  weight: number;
}

/**
 * Per-symbol mapping from alternative text to its prefix-free codeword.
 */
export type CodeTable = ReadonlyMap<string, string>;

/**
 * Source of uniform random numbers in [0, 1).
 */
export interface RandomSource {
  next(): number;
}

/**
 * Anything that can accept or reject a generated sentence.
 */
export interface NaturalnessGate {
  isNatural(text: string): boolean;
}

/**
 * A payload-carrying choice made during a derivation.
 */
export interface SlotChoice {
  symbol: string;
  alternative: string;
  codeword: string;
  /** Payload bits consumed by this choice ('' when chosen at random). */
  bits: string;
}

/**
 * Outcome of one encode call.
 */
export interface EncodeResult {
  text: string;
  payload: string;
  embeddedBits: string;
  bitsEmbedded: number;
  attempts: number;
  natural: boolean;
  choices: SlotChoice[];
}

/**
 * Character offsets into the analysed text, end exclusive.
 */
export interface TextSpan {
  start: number;
  end: number;
}

export interface SlotMatch {
  symbol: string;
  alternative: string;
  codeword: string;
  span: TextSpan;
  /** Set when the span overlaps a slot matched earlier in the same sentence. */
  overlaps: boolean;
}

/**
 * Outcome of one detect call.
 */
export interface DetectionResult {
  detected: boolean;
  bits: string;
  matches: SlotMatch[];
  skipped: string[];
  sentence: string | null;
  naturality: number;
}

export type RecoveryNote = 'message match' | 'possible key';

export interface RecoveryCandidate {
  key: string;
  message: string | null;
  note: RecoveryNote;
  confidence: number;
}

/**
 * Shareable agreement between an encoding and a detecting party.
 */
export interface CodecProfile {
  version: number;
  grammar: string;
  startSymbol: string;
  marker: string;
  slotSymbols: string[] | null;
  excludedSymbols: string[];
  payloadBits: number;
}

/**
 * Codec constants.
 */
export const DEFAULT_START_SYMBOL = 'Start';
export const DEFAULT_PAYLOAD_BITS = 96;
export const DEFAULT_MAX_ATTEMPTS = 15;
export const DEFAULT_MAX_DERIVATION_STEPS = 10_000;
export const WEIGHT_TOLERANCE = 0.01;
export const STATIC_PSEUDO_SYMBOL = 'static';
export const PROFILE_VERSION = 1;

/**
 * Candidate messages tried when the caller supplies no wordlist.
 */
export const DEFAULT_CANDIDATE_MESSAGES: readonly string[] = [
  'hello',
  'hi',
  'yes',
  'no',
  'help',
  'secret',
  'test',
  'attack',
  'retreat',
  'meet',
  'go',
  'stop',
];
