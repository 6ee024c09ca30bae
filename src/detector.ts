/**
 * Locates the carrier sentence and rebuilds the embedded bits from the
 * alternatives that appear in it.
 *
 * Reconstruction is best effort: every slot symbol's alternative is assumed
 * to appear once, unmodified, in the carrier sentence. When alternatives of
 * different slots share text, slot order is the only disambiguator; such
 * matches are flagged with `overlaps` rather than trusted silently.
 */

import type { CodeTable, DetectionResult, SlotMatch, TextSpan } from './types.ts';
import { surfaceText, type GrammarModel } from './grammar.ts';
import { HuffmanCodeBuilder } from './huffman.ts';
import { NaturalnessEvaluator } from './naturalness.ts';
import { detectOptionsSchema, parseOptions, type DetectOptions } from './config.ts';
import { log } from './logger.ts';

export interface SentenceSpan {
  text: string;
  start: number;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

const WORD_CHAR = /[\p{L}\p{N}_]/u;

/**
 * Case-insensitive match of `phrase` that does not start or end inside a word.
 * The boundary is only checked on a side where the phrase itself has a word
 * character, so "," or "!" still match right after a word.
 */
export function wordPattern(phrase: string): RegExp {
  const before = WORD_CHAR.test(phrase.charAt(0)) ? '(?<![\\p{L}\\p{N}_])' : '';
  const after = WORD_CHAR.test(phrase.charAt(phrase.length - 1)) ? '(?![\\p{L}\\p{N}_])' : '';
  return new RegExp(`${before}${escapeRegExp(phrase)}${after}`, 'iu');
}

/**
 * Split on . ! ? keeping each sentence's offset into `text`.
 */
export function splitSentences(text: string): SentenceSpan[] {
  const sentences: SentenceSpan[] = [];
  for (const hit of text.matchAll(/[^.!?]+[.!?]*/g)) {
    const raw = hit[0];
    const lead = raw.length - raw.trimStart().length;
    const trimmed = raw.trim();
    if (!trimmed || hit.index === undefined) continue;
    sentences.push({ text: trimmed, start: hit.index + lead });
  }
  return sentences;
}

export function findCarrierSentence(text: string, marker: string): SentenceSpan | null {
  const pattern = wordPattern(marker);
  return splitSentences(text).find((sentence) => pattern.test(sentence.text)) ?? null;
}

export interface SlotSelection {
  slotSymbols?: readonly string[];
  excludedSymbols?: readonly string[];
}

/**
 * Multi-alternative symbols a detector with this selection never reads: the
 * start symbol, excluded symbols, symbols with a non-terminal alternative and,
 * given an explicit slot list, everything outside it. An encoder must reserve
 * these to stay in step.
 */
export function unreadSymbols(grammar: GrammarModel, selection: SlotSelection = {}): string[] {
  const excluded = new Set([grammar.startSymbol, ...(selection.excludedSymbols ?? [])]);
  const textual = new Set(grammar.textualSymbols());
  const slots = selection.slotSymbols ? new Set(selection.slotSymbols) : null;
  return grammar
    .multiAlternativeSymbols()
    .filter(
      (symbol) => excluded.has(symbol) || !textual.has(symbol) || (slots !== null && !slots.has(symbol))
    );
}

function spansOverlap(a: TextSpan, b: TextSpan): boolean {
  return a.start < b.end && b.start < a.end;
}

export class StegoDetector {
  readonly codes: HuffmanCodeBuilder;

  constructor(
    private readonly grammar: GrammarModel,
    codes?: HuffmanCodeBuilder,
    private readonly evaluator: NaturalnessEvaluator = new NaturalnessEvaluator()
  ) {
    this.codes = codes ?? new HuffmanCodeBuilder(grammar);
  }

  /**
   * Code tables for every payload-bearing symbol: two or more alternatives,
   * all of them terminal-only, not the start symbol, not explicitly excluded.
   * Declaration order.
   */
  payloadTables(excludedSymbols: readonly string[] = []): Map<string, CodeTable> {
    const excluded = new Set([this.grammar.startSymbol, ...excludedSymbols]);
    const tables = new Map<string, CodeTable>();
    for (const symbol of this.grammar.textualSymbols()) {
      if (excluded.has(symbol)) continue;
      tables.set(symbol, this.codes.codesFor(symbol));
    }
    return tables;
  }

  detect(text: string, options: DetectOptions): DetectionResult {
    const opts = parseOptions(detectOptionsSchema, options);

    const sentence = findCarrierSentence(text, opts.marker);
    if (!sentence) {
      log.detector.info('No carrier sentence found', { marker: opts.marker });
      return { detected: false, bits: '', matches: [], skipped: [], sentence: null, naturality: 0 };
    }

    const tables = this.payloadTables(opts.excludedSymbols);
    const slots = opts.slotSymbols ?? [...tables.keys()];
    const matches: SlotMatch[] = [];
    const skipped: string[] = [];
    let bits = '';

    for (const symbol of slots) {
      const table = tables.get(symbol);
      if (!table) {
        log.detector.warn('Slot is not a payload-bearing symbol, skipped', { symbol });
        skipped.push(symbol);
        continue;
      }

      const match = this.matchSlot(symbol, table, sentence, matches);
      if (!match) {
        log.detector.warn('No alternative of slot found in carrier sentence', { symbol });
        skipped.push(symbol);
        continue;
      }

      matches.push(match);
      bits += match.codeword;
    }

    // Without an explicit list, bits are read in the order they appear
    if (!opts.slotSymbols) {
      matches.sort((a, b) => a.span.start - b.span.start);
      bits = matches.map((match) => match.codeword).join('');
    }

    return {
      detected: bits.length > 0,
      bits,
      matches,
      skipped,
      sentence: sentence.text,
      naturality: this.evaluator.score(sentence.text),
    };
  }

  /**
   * First alternative, in declaration order, found in the sentence.
   */
  private matchSlot(
    symbol: string,
    table: CodeTable,
    sentence: SentenceSpan,
    earlier: readonly SlotMatch[]
  ): SlotMatch | null {
    for (const alt of this.grammar.alternatives(symbol)) {
      if (!this.grammar.isTerminalOnly(alt)) continue;

      const hit = wordPattern(surfaceText(alt.tokens)).exec(sentence.text);
      if (!hit) continue;

      const span = { start: sentence.start + hit.index, end: sentence.start + hit.index + hit[0].length };
      const overlaps = earlier.some((m) => spansOverlap(m.span, span));
      if (overlaps) {
        log.detector.warn('Slot match overlaps an earlier slot', { symbol, alternative: alt.text });
      }

      return { symbol, alternative: alt.text, codeword: table.get(alt.text) ?? '', span, overlaps };
    }
    return null;
  }
}
