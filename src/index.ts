export * from './types.ts';
export * from './errors.ts';
export { GrammarModel, parseGrammar, surfaceText } from './grammar.ts';
export { HuffmanCodeBuilder, buildHuffmanCodes } from './huffman.ts';
export { derivePayload } from './payload.ts';
export {
  NaturalnessEvaluator,
  ENGLISH_LETTER_FREQUENCIES,
  letterHistogram,
  naturalityOf,
} from './naturalness.ts';
export { StegoEncoder, formatSentence, type DerivationPhase } from './encoder.ts';
export {
  StegoDetector,
  findCarrierSentence,
  splitSentences,
  unreadSymbols,
  type SlotSelection,
} from './detector.ts';
export { recoverKeys } from './key-search.ts';
export { loadGrammarFile, loadWordlist } from './files.ts';
export {
  createProfile,
  exportProfile,
  importProfile,
  openProfile,
  type ProfileInput,
  type OpenedProfile,
} from './profile.ts';
export {
  encodeMessage,
  detectMessage,
  encodeWithProfile,
  detectWithProfile,
  grammarCapacity,
  type DetectionReport,
} from './stego.ts';
export { createSeededRandom, systemRandom, weightedChoice } from './random.ts';
export { initLogging, log } from './logger.ts';
export type {
  DetectOptions,
  DetectMessageOptions,
  EncodeOptions,
  GrammarOptions,
  KeySearchOptions,
  NaturalnessOptions,
  LogLevel,
} from './config.ts';
