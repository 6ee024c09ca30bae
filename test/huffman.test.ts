import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'node:url';

import { buildHuffmanCodes, HuffmanCodeBuilder } from '../src/huffman.ts';
import { parseGrammar } from '../src/grammar.ts';
import { loadGrammarFile } from '../src/files.ts';

const TRAVEL_GRAMMAR = fileURLToPath(new URL('./fixtures/travel.grammar', import.meta.url));

function isPrefixFree(codes: string[]): boolean {
  return codes.every((a, i) => codes.every((b, j) => i === j || !b.startsWith(a)));
}

describe('buildHuffmanCodes', () => {
  it('gives dyadic weights codeword lengths of -log2(w)', () => {
    expect(buildHuffmanCodes([0.5, 0.25, 0.125, 0.125])).toEqual(['0', '10', '110', '111']);
  });

  it('breaks weight ties by declaration order', () => {
    expect(buildHuffmanCodes([0.5, 0.5])).toEqual(['0', '1']);
    expect(buildHuffmanCodes([0.25, 0.25, 0.25, 0.25])).toEqual(['00', '01', '10', '11']);
    expect(buildHuffmanCodes([1 / 3, 1 / 3, 1 / 3])).toEqual(['10', '11', '0']);
  });

  it('assigns the empty codeword to a lone alternative', () => {
    expect(buildHuffmanCodes([1])).toEqual(['']);
    expect(buildHuffmanCodes([])).toEqual([]);
  });

  it('produces one distinct prefix-free codeword per alternative', () => {
    const weights = [0.3, 0.05, 0.2, 0.15, 0.1, 0.1, 0.07, 0.03];
    const codes = buildHuffmanCodes(weights);

    expect(codes).toHaveLength(weights.length);
    expect(new Set(codes).size).toBe(weights.length);
    expect(isPrefixFree(codes)).toBe(true);
    // Kraft equality holds for a full binary tree
    expect(codes.reduce((sum, code) => sum + 2 ** -code.length, 0)).toBe(1);
  });
});

describe('HuffmanCodeBuilder', () => {
  it('maps each alternative text to its codeword', () => {
    const builder = new HuffmanCodeBuilder(loadGrammarFile(TRAVEL_GRAMMAR));

    expect([...builder.codesFor('VERB')]).toEqual([
      ['walked', '0'],
      ['drove', '10'],
      ['flew', '111'],
      ['sailed', '110'],
    ]);
    expect([...builder.codesFor('TIME')]).toEqual([
      ['yesterday', '0'],
      ['at dawn', '11'],
      ['last winter', '10'],
    ]);
  });

  it('maps single-alternative symbols to the empty codeword', () => {
    const builder = new HuffmanCodeBuilder(loadGrammarFile(TRAVEL_GRAMMAR));

    const codes = builder.codesFor('Start');
    expect(codes.size).toBe(1);
    expect([...codes.values()]).toEqual(['']);
  });

  it('returns the cached table on later calls', () => {
    const builder = new HuffmanCodeBuilder(loadGrammarFile(TRAVEL_GRAMMAR));

    expect(builder.isCached('CITY')).toBe(false);
    const first = builder.codesFor('CITY');
    expect(builder.isCached('CITY')).toBe(true);
    expect(builder.codesFor('CITY')).toBe(first);
    expect([...first]).toEqual([
      ['Boston', '00'],
      ['Denver', '01'],
      ['Austin', '10'],
      ['Seattle', '11'],
    ]);
  });

  it('splits a concatenation of codewords back into alternatives', () => {
    const builder = new HuffmanCodeBuilder(loadGrammarFile(TRAVEL_GRAMMAR));

    expect(builder.decode('VERB', '0110111100')).toEqual(['walked', 'sailed', 'flew', 'drove', 'walked']);
    expect(builder.decode('VERB', '')).toEqual([]);
  });

  it('rejects an incomplete trailing codeword', () => {
    const builder = new HuffmanCodeBuilder(loadGrammarFile(TRAVEL_GRAMMAR));

    expect(() => builder.decode('VERB', '011')).toThrow(/incomplete codeword/);
  });

  it('refuses unknown symbols', () => {
    const builder = new HuffmanCodeBuilder(parseGrammar('Start -> a | b'));

    expect(() => builder.codesFor('Nope')).toThrow(/Unknown grammar symbol/);
  });
});
