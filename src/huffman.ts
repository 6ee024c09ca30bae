/**
 * Minimum-redundancy prefix codes over a symbol's weighted alternatives.
 */

import type { CodeTable } from './types.ts';
import type { GrammarModel } from './grammar.ts';
import { log } from './logger.ts';

/**
 * Huffman tree node. Leaves carry the alternative's declaration index.
 */
interface HuffmanNode {
  weight: number;
  index: number | null; // null for internal nodes
  left: HuffmanNode | null;
  right: HuffmanNode | null;
  seq?: number; // Sequence number for tie-breaking
}

/**
 * Priority queue using a simple sorted array with deterministic tie-breaking.
 *
 * Leaves are pushed in declaration order, so equal weights pop in that order,
 * and a merged node always loses ties against anything pushed before it.
 */
class PriorityQueue {
  private items: HuffmanNode[] = [];
  private seqCounter = 0;

  push(node: HuffmanNode): void {
    node.seq = this.seqCounter++;
    this.items.push(node);
    this.items.sort((a, b) => {
      if (a.weight !== b.weight) return a.weight - b.weight;
      return (a.seq ?? 0) - (b.seq ?? 0);
    });
  }

  pop(): HuffmanNode {
    const node = this.items.shift();
    if (!node) {
      throw new Error('Huffman queue exhausted');
    }
    return node;
  }

  get length(): number {
    return this.items.length;
  }
}

function buildHuffmanTree(weights: readonly number[]): HuffmanNode | null {
  if (weights.length === 0) return null;

  const pq = new PriorityQueue();
  weights.forEach((weight, index) => {
    pq.push({ weight, index, left: null, right: null });
  });

  while (pq.length > 1) {
    const left = pq.pop();
    const right = pq.pop();
    pq.push({ weight: left.weight + right.weight, index: null, left, right });
  }

  return pq.pop();
}

function collectCodes(node: HuffmanNode | null, prefix: string, codes: string[]): void {
  if (node === null) return;

  if (node.index !== null) {
    codes[node.index] = prefix;
  } else {
    collectCodes(node.left, prefix + '0', codes);
    collectCodes(node.right, prefix + '1', codes);
  }
}

/**
 * Codewords indexed like `weights`. A single weight gets the empty codeword:
 * there is no choice to encode.
 */
export function buildHuffmanCodes(weights: readonly number[]): string[] {
  const codes: string[] = new Array<string>(weights.length).fill('');
  if (weights.length < 2) return codes;
  collectCodes(buildHuffmanTree(weights), '', codes);
  return codes;
}

/**
 * Builds and caches one code table per grammar symbol. The cache is
 * append-only; a hit never triggers a rebuild.
 */
export class HuffmanCodeBuilder {
  private readonly tables = new Map<string, CodeTable>();
  private readonly trees = new Map<string, HuffmanNode | null>();

  constructor(private readonly grammar: GrammarModel) {}

  codesFor(symbol: string): CodeTable {
    const cached = this.tables.get(symbol);
    if (cached) return cached;

    const alternatives = this.grammar.alternatives(symbol);
    const codewords = buildHuffmanCodes(alternatives.map((alt) => alt.weight));
    const table: CodeTable = new Map(alternatives.map((alt, i) => [alt.text, codewords[i]]));

    this.tables.set(symbol, table);
    log.huffman.debug('Built code table', { symbol, size: table.size });
    return table;
  }

  isCached(symbol: string): boolean {
    return this.tables.has(symbol);
  }

  /**
   * Split a concatenation of the symbol's codewords back into alternatives.
   */
  decode(symbol: string, bits: string): string[] {
    const alternatives = this.grammar.alternatives(symbol);
    if (alternatives.length < 2) {
      if (bits.length) throw new Error(`${symbol} has a single alternative and carries no bits`);
      return [];
    }

    let tree = this.trees.get(symbol);
    if (tree === undefined) {
      tree = buildHuffmanTree(alternatives.map((alt) => alt.weight));
      this.trees.set(symbol, tree);
    }
    if (tree === null) return [];

    const result: string[] = [];
    let node: HuffmanNode = tree;
    for (const bit of bits) {
      const next: HuffmanNode | null = bit === '0' ? node.left : bit === '1' ? node.right : null;
      if (next === null) {
        throw new Error(`Invalid codeword bit '${bit}' for ${symbol}`);
      }
      node = next;
      if (node.index !== null) {
        result.push(alternatives[node.index].text);
        node = tree;
      }
    }

    if (node !== tree) {
      throw new Error(`Trailing incomplete codeword for ${symbol}`);
    }
    return result;
  }
}
