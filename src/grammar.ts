/**
 * Weighted context-free grammar: parsing, validation and the immutable model
 * the encoder and detector share.
 *
 * Rule syntax, one rule per line:
 *
 *   SYMBOL -> ALT1 [p1] | ALT2 [p2] | ...
 *
 * Lines starting with '#' are comments. Terminals may be quoted ('...' or
 * "...") to keep spaces inside a single token. A token is a terminal when it
 * is not itself a rule name.
 */

import type { Alternative } from './types.ts';
import { STATIC_PSEUDO_SYMBOL, WEIGHT_TOLERANCE } from './types.ts';
import { GrammarIncompleteError, GrammarSyntaxError } from './errors.ts';
import { grammarOptionsSchema, parseOptions, type GrammarOptions } from './config.ts';
import { log } from './logger.ts';

const SYMBOL_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;
const TOKEN_PATTERN = /'[^']*'|"[^"]*"|\||[^\s|]+/g;

/**
 * How a run of terminals reads in a generated sentence: single spaces, with
 * punctuation attached to the preceding word.
 */
export function surfaceText(tokens: readonly string[]): string {
  return tokens.join(' ').replace(/\s+([.,;:!?])/g, '$1').trim();
}

interface RhsToken {
  value: string;
  quoted: boolean;
}

interface RawAlternative {
  tokens: string[];
  weight: number | undefined;
  line: number;
}

export class GrammarModel {
  readonly startSymbol: string;
  readonly warnings: readonly string[];
  private readonly rules: ReadonlyMap<string, readonly Alternative[]>;

  constructor(
    startSymbol: string,
    rules: ReadonlyMap<string, readonly Alternative[]>,
    warnings: readonly string[] = []
  ) {
    if (!rules.has(startSymbol)) {
      throw new GrammarIncompleteError(startSymbol);
    }

    const frozen = new Map<string, readonly Alternative[]>();
    for (const [symbol, alternatives] of rules) {
      frozen.set(
        symbol,
        Object.freeze(
          alternatives.map((alt) =>
            Object.freeze({ text: alt.text, tokens: Object.freeze([...alt.tokens]), weight: alt.weight })
          )
        )
      );
    }

    this.startSymbol = startSymbol;
    this.rules = frozen;
    this.warnings = Object.freeze([...warnings]);
  }

  /**
   * Rule names in declaration order.
   */
  symbols(): string[] {
    return [...this.rules.keys()];
  }

  has(symbol: string): boolean {
    return this.rules.has(symbol);
  }

  isTerminal(token: string): boolean {
    return !this.rules.has(token);
  }

  alternatives(symbol: string): readonly Alternative[] {
    const alternatives = this.rules.get(symbol);
    if (!alternatives) {
      throw new Error(`Unknown grammar symbol '${symbol}'`);
    }
    return alternatives;
  }

  /**
   * True when every token of the alternative is a terminal, i.e. its text
   * appears verbatim in generated sentences.
   */
  isTerminalOnly(alternative: Alternative): boolean {
    return alternative.tokens.every((token) => this.isTerminal(token));
  }

  /**
   * Symbols with a real choice to make.
   */
  multiAlternativeSymbols(): string[] {
    return this.symbols().filter((symbol) => this.alternatives(symbol).length > 1);
  }

  /**
   * Multi-alternative symbols whose every alternative is terminal-only, so
   * the choice made for them can be read back from the sentence text.
   */
  textualSymbols(): string[] {
    return this.multiAlternativeSymbols().filter((symbol) =>
      this.alternatives(symbol).every((alt) => this.isTerminalOnly(alt))
    );
  }

  /**
   * Maximum theoretical embeddable bits: floor(log2(k)) summed over every
   * multi-alternative symbol except the reserved static pseudo-symbol.
   */
  capacity(): number {
    let bits = 0;
    for (const symbol of this.multiAlternativeSymbols()) {
      if (symbol === STATIC_PSEUDO_SYMBOL) continue;
      bits += Math.floor(Math.log2(this.alternatives(symbol).length));
    }
    return bits;
  }
}

function tokenizeRhs(rhs: string, line: number): RhsToken[] {
  const tokens: RhsToken[] = [];
  for (const hit of rhs.matchAll(TOKEN_PATTERN)) {
    const raw = hit[0];
    const first = raw[0];
    if ((first === "'" || first === '"') && (raw.length < 2 || !raw.endsWith(first))) {
      throw new GrammarSyntaxError(line, `unterminated quote in ${raw}`);
    }
    if (raw.length >= 2 && (first === "'" || first === '"')) {
      tokens.push({ value: raw.slice(1, -1), quoted: true });
    } else if (raw === '->') {
      throw new GrammarSyntaxError(line, "unexpected second '->'");
    } else {
      tokens.push({ value: raw, quoted: false });
    }
  }
  return tokens;
}

function splitOnBars(tokens: RhsToken[]): RhsToken[][] {
  const groups: RhsToken[][] = [[]];
  for (const token of tokens) {
    if (!token.quoted && token.value === '|') {
      groups.push([]);
    } else {
      groups[groups.length - 1].push(token);
    }
  }
  return groups;
}

function parseProbability(
  raw: string,
  line: number,
  strict: boolean,
  warnings: string[]
): number {
  const match = raw.match(/^\[([^\]]*)\]$/);
  const inner = match ? match[1].trim() : '';
  const value = Number(inner);
  if (!inner || !Number.isFinite(value)) {
    throw new GrammarSyntaxError(line, `malformed probability ${raw}`);
  }

  if (value < 0 || value > 1) {
    if (strict) {
      throw new GrammarSyntaxError(line, `probability ${value} outside [0, 1]`);
    }
    warnings.push(`line ${line}: probability ${value} outside [0, 1], using 1.0`);
    return 1.0;
  }
  return value;
}

function parseAlternative(
  group: RhsToken[],
  line: number,
  strict: boolean,
  warnings: string[]
): RawAlternative {
  let weight: number | undefined;
  const tokens: string[] = [];

  for (let i = 0; i < group.length; i++) {
    const token = group[i];
    if (!token.quoted && token.value.startsWith('[')) {
      if (i !== group.length - 1) {
        throw new GrammarSyntaxError(line, `probability ${token.value} must end its alternative`);
      }
      weight = parseProbability(token.value, line, strict, warnings);
    } else {
      tokens.push(token.value);
    }
  }

  if (!tokens.length) {
    throw new GrammarSyntaxError(line, 'empty alternative');
  }
  return { tokens, weight, line };
}

/**
 * Fill undeclared weights and renormalise when the sum is off by more than
 * the tolerance. Declaration order is preserved.
 */
function resolveWeights(symbol: string, rows: RawAlternative[], warnings: string[]): number[] {
  if (rows.length === 1) return [1];

  const declared = rows.filter((row) => row.weight !== undefined);
  let weights: number[];
  if (!declared.length) {
    weights = rows.map(() => 1 / rows.length);
  } else {
    const declaredSum = declared.reduce((acc, row) => acc + (row.weight ?? 0), 0);
    const missing = rows.length - declared.length;
    const share = missing ? Math.max(0, 1 - declaredSum) / missing : 0;
    weights = rows.map((row) => row.weight ?? share);
  }

  const total = weights.reduce((a, b) => a + b, 0);
  if (total <= 0) {
    warnings.push(`${symbol}: all weights are zero, using uniform weights`);
    return rows.map(() => 1 / rows.length);
  }

  if (Math.abs(total - 1) > WEIGHT_TOLERANCE) {
    warnings.push(`${symbol}: weights sum to ${Number(total.toFixed(6))}, renormalised`);
    return weights.map((w) => w / total);
  }
  return weights;
}

/**
 * Parse grammar text into an immutable model.
 * Nothing is constructed unless the whole text is valid.
 */
export function parseGrammar(text: string, options?: GrammarOptions): GrammarModel {
  const { startSymbol, strict } = parseOptions(grammarOptionsSchema, options);
  const grouped = new Map<string, RawAlternative[]>();
  const warnings: string[] = [];

  text.split(/\r?\n/g).forEach((rawLine, index) => {
    const line = index + 1;
    const trimmed = rawLine.trim();
    if (!trimmed || trimmed.startsWith('#')) return;

    const arrow = trimmed.indexOf('->');
    if (arrow === -1) {
      throw new GrammarSyntaxError(line, "expected 'SYMBOL -> ALT [p] | ALT [p] ...'");
    }

    const lhs = trimmed.slice(0, arrow).trim();
    if (!SYMBOL_PATTERN.test(lhs)) {
      throw new GrammarSyntaxError(line, `invalid symbol name '${lhs}'`);
    }

    const rows = grouped.get(lhs) ?? [];
    for (const group of splitOnBars(tokenizeRhs(trimmed.slice(arrow + 2), line))) {
      rows.push(parseAlternative(group, line, strict, warnings));
    }
    grouped.set(lhs, rows);
  });

  if (!grouped.has(startSymbol)) {
    throw new GrammarIncompleteError(startSymbol);
  }

  const rules = new Map<string, Alternative[]>();
  for (const [symbol, rows] of grouped) {
    const seen = new Set<string>();
    for (const row of rows) {
      const altText = row.tokens.join(' ');
      if (seen.has(altText)) {
        throw new GrammarSyntaxError(row.line, `duplicate alternative '${altText}' for ${symbol}`);
      }
      seen.add(altText);
    }

    const weights = resolveWeights(symbol, rows, warnings);
    rules.set(
      symbol,
      rows.map((row, i) => ({ text: row.tokens.join(' '), tokens: row.tokens, weight: weights[i] }))
    );
  }

  for (const warning of warnings) {
    log.grammar.warn(warning);
  }
  log.grammar.debug('Grammar parsed', { symbols: rules.size, startSymbol });

  return new GrammarModel(startSymbol, rules, warnings);
}
