/**
 * Top-down derivation that steers a grammar's choices with payload bits.
 *
 * Each attempt moves PENDING (symbols left to expand) -> TERMINAL_COLLECTION
 * (only terminals remain, the sentence is formatted) -> ACCEPTED or RETRY,
 * depending on the naturalness gate. The retry loop is bounded; once it runs
 * out the last candidate is returned anyway.
 */

import type { Alternative, EncodeResult, NaturalnessGate, RandomSource, SlotChoice } from './types.ts';
import { surfaceText, type GrammarModel } from './grammar.ts';
import { HuffmanCodeBuilder } from './huffman.ts';
import { NaturalnessEvaluator } from './naturalness.ts';
import { systemRandom, weightedChoice } from './random.ts';
import { isBitString, matchesAt } from './bits.ts';
import { encodeOptionsSchema, parseOptions, type EncodeOptions } from './config.ts';
import { CodecOptionsError, DerivationLimitError } from './errors.ts';
import { log } from './logger.ts';

export type DerivationPhase = 'PENDING' | 'TERMINAL_COLLECTION' | 'ACCEPTED' | 'RETRY';

/**
 * Per-attempt state; discarded once the attempt is judged.
 */
interface DerivationState {
  pending: string[];
  cursor: number;
  used: Set<string>;
  words: string[];
  choices: SlotChoice[];
}

interface DerivationContext {
  payload: string;
  random: RandomSource;
  reserved: ReadonlySet<string>;
  maxSteps: number;
}

interface Derivation {
  text: string;
  cursor: number;
  choices: SlotChoice[];
}

/**
 * Join terminals with single spaces, attach punctuation to the preceding
 * word and make sure the sentence ends in . ? ! or :
 */
export function formatSentence(words: readonly string[]): string {
  let text = surfaceText(words);
  if (!/[.?!:]$/.test(text)) {
    text += '.';
  }
  return text;
}

export class StegoEncoder {
  readonly codes: HuffmanCodeBuilder;

  constructor(
    private readonly grammar: GrammarModel,
    codes?: HuffmanCodeBuilder
  ) {
    this.codes = codes ?? new HuffmanCodeBuilder(grammar);
  }

  /**
   * Embed as much of `payload` as the grammar allows into one sentence.
   */
  encode(payload: string, options?: EncodeOptions): EncodeResult {
    const opts = parseOptions(encodeOptionsSchema, options);
    if (!isBitString(payload)) {
      throw new CodecOptionsError(["payload must contain only '0' and '1'"]);
    }

    const bits = opts.maxBits === undefined ? payload : payload.slice(0, opts.maxBits);
    const gate: NaturalnessGate = opts.naturalness ?? new NaturalnessEvaluator();
    const context: DerivationContext = {
      payload: bits,
      random: opts.random ?? systemRandom,
      reserved: new Set(opts.reservedSymbols),
      maxSteps: opts.maxDerivationSteps,
    };

    let attempts = 0;
    let candidate: Derivation;
    do {
      attempts++;
      candidate = this.derive(context);
      if (gate.isNatural(candidate.text)) {
        log.encoder.debug('Candidate accepted', { attempts, phase: 'ACCEPTED' satisfies DerivationPhase });
        return this.toResult(candidate, bits, attempts, true);
      }
      log.encoder.debug('Candidate rejected by naturalness check', {
        attempts,
        phase: 'RETRY' satisfies DerivationPhase,
      });
    } while (attempts < opts.maxAttempts);

    log.encoder.warn('Naturalness retries exhausted, returning last candidate', {
      attempts,
      text: candidate.text,
    });
    return this.toResult(candidate, bits, attempts, false);
  }

  private toResult(candidate: Derivation, payload: string, attempts: number, natural: boolean): EncodeResult {
    if (candidate.cursor < payload.length) {
      log.encoder.info('Grammar capacity below payload length', {
        requested: payload.length,
        embedded: candidate.cursor,
      });
    }
    return {
      text: candidate.text,
      payload,
      embeddedBits: payload.slice(0, candidate.cursor),
      bitsEmbedded: candidate.cursor,
      attempts,
      natural,
      choices: candidate.choices,
    };
  }

  /**
   * One leftmost-first derivation from the start symbol.
   */
  private derive(context: DerivationContext): Derivation {
    const state: DerivationState = {
      pending: [this.grammar.startSymbol],
      cursor: 0,
      used: new Set(),
      words: [],
      choices: [],
    };

    let steps = 0;
    let symbol = state.pending.shift();
    while (symbol !== undefined) {
      if (this.grammar.isTerminal(symbol)) {
        state.words.push(symbol);
      } else {
        if (++steps > context.maxSteps) {
          throw new DerivationLimitError(context.maxSteps);
        }
        const chosen = this.choose(symbol, state, context);
        state.pending.unshift(...chosen.tokens);
      }
      symbol = state.pending.shift();
    }

    return {
      text: formatSentence(state.words),
      cursor: state.cursor,
      choices: state.choices,
    };
  }

  private choose(symbol: string, state: DerivationState, context: DerivationContext): Alternative {
    const alternatives = this.grammar.alternatives(symbol);
    if (alternatives.length === 1) {
      return alternatives[0];
    }

    const codes = this.codes.codesFor(symbol);
    const eligible =
      !context.reserved.has(symbol) && !state.used.has(symbol) && state.cursor < context.payload.length;

    if (eligible) {
      for (const alt of alternatives) {
        const codeword = codes.get(alt.text) ?? '';
        if (matchesAt(context.payload, state.cursor, codeword)) {
          state.cursor += codeword.length;
          state.used.add(symbol);
          state.choices.push({ symbol, alternative: alt.text, codeword, bits: codeword });
          return alt;
        }
      }
    }

    const alt = alternatives[weightedChoice(alternatives.map((a) => a.weight), context.random)];
    state.choices.push({ symbol, alternative: alt.text, codeword: codes.get(alt.text) ?? '', bits: '' });
    return alt;
  }
}
