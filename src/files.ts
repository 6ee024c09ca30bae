/**
 * Caller-side file helpers for grammars and candidate wordlists.
 */

import { readFileSync } from 'node:fs';
import { GrammarFileNotFoundError, StegoError } from './errors.ts';
import { parseGrammar, type GrammarModel } from './grammar.ts';
import type { GrammarOptions } from './config.ts';

function readText(path: string, missing: (path: string) => Error): string {
  try {
    return readFileSync(path, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw missing(path);
    }
    throw error;
  }
}

export function loadGrammarFile(path: string, options?: GrammarOptions): GrammarModel {
  return parseGrammar(readText(path, (p) => new GrammarFileNotFoundError(p)), options);
}

/**
 * One candidate per line; blank lines and '#' comments are ignored.
 */
export function loadWordlist(path: string): string[] {
  return readText(path, (p) => new StegoError(`Wordlist not found: ${p}`))
    .split(/\r?\n/g)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}
