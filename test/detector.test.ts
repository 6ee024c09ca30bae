import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'node:url';

import {
  StegoDetector,
  findCarrierSentence,
  splitSentences,
  unreadSymbols,
  wordPattern,
} from '../src/detector.ts';
import { StegoEncoder } from '../src/encoder.ts';
import { parseGrammar } from '../src/grammar.ts';
import { loadGrammarFile } from '../src/files.ts';
import { CodecOptionsError } from '../src/errors.ts';

const TRAVEL_GRAMMAR = fileURLToPath(new URL('./fixtures/travel.grammar', import.meta.url));
const CARRIER = 'The traveler sailed to Boston at dawn with nobody.';

const acceptAll = { isNatural: () => true };

/**
 * Encode `payload` with `grammarText` and read it straight back.
 */
function roundTrip(grammarText: string, payload: string) {
  const grammar = parseGrammar(grammarText);
  const encoded = new StegoEncoder(grammar).encode(payload, { naturalness: acceptAll });
  const detected = new StegoDetector(grammar).detect(encoded.text, { marker: 'traveler' });
  return { encoded, detected };
}

describe('splitSentences', () => {
  it('keeps terminators and offsets', () => {
    expect(splitSentences('Nice day. Where to?  Home!')).toEqual([
      { text: 'Nice day.', start: 0 },
      { text: 'Where to?', start: 10 },
      { text: 'Home!', start: 21 },
    ]);
  });

  it('keeps trailing text without a terminator', () => {
    expect(splitSentences('One. two')).toEqual([
      { text: 'One.', start: 0 },
      { text: 'two', start: 5 },
    ]);
  });
});

describe('findCarrierSentence', () => {
  it('matches the marker as a whole word, ignoring case', () => {
    const text = 'Travelers rest. The TRAVELER left. Bye.';
    expect(findCarrierSentence(text, 'traveler')).toEqual({ text: 'The TRAVELER left.', start: 16 });
  });

  it('returns null when no sentence holds the marker', () => {
    expect(findCarrierSentence('Nothing here.', 'traveler')).toBeNull();
  });
});

describe('wordPattern', () => {
  it('checks word boundaries only on word-character edges', () => {
    expect(wordPattern('to').test('toward')).toBe(false);
    expect(wordPattern('to').test('go to.')).toBe(true);
    expect(wordPattern('Hi,').test('Hi, there')).toBe(true);
    expect(wordPattern('.').test('Denver.')).toBe(true);
    expect(wordPattern('!').exec('Wait. Go!')?.index).toBe(8);
  });
});

describe('unreadSymbols', () => {
  it('lists symbols whose choice cannot be read back from the text', () => {
    const grammar = parseGrammar(
      'Start -> "The" "traveler" "went" PLACE .\nPLACE -> "to" CITY | "home"\nCITY -> "Boston" [0.5] | "Denver" [0.5]'
    );

    expect(unreadSymbols(grammar)).toEqual(['PLACE']);
    expect(unreadSymbols(grammar, { excludedSymbols: ['CITY'] })).toEqual(['PLACE', 'CITY']);
    expect(unreadSymbols(grammar, { slotSymbols: [] })).toEqual(['PLACE', 'CITY']);
  });
});

describe('StegoDetector', () => {
  it('recovers the bits the encoder embedded', () => {
    const grammar = loadGrammarFile(TRAVEL_GRAMMAR);
    const encoded = new StegoEncoder(grammar).encode('110001111', { naturalness: { isNatural: () => true } });

    const result = new StegoDetector(grammar).detect(encoded.text, { marker: 'traveler' });

    expect(result.detected).toBe(true);
    expect(result.bits).toBe(encoded.embeddedBits);
    expect(result.sentence).toBe(CARRIER);
    expect(result.skipped).toEqual([]);
  });

  it('reports each slot match with its span in the original text', () => {
    const detector = new StegoDetector(loadGrammarFile(TRAVEL_GRAMMAR));

    const result = detector.detect(`Nice day. ${CARRIER} Bye!`, { marker: 'traveler' });

    expect(result.bits).toBe('110001111');
    expect(result.matches).toEqual([
      { symbol: 'VERB', alternative: 'sailed', codeword: '110', span: { start: 23, end: 29 }, overlaps: false },
      { symbol: 'CITY', alternative: 'Boston', codeword: '00', span: { start: 33, end: 39 }, overlaps: false },
      { symbol: 'TIME', alternative: 'at dawn', codeword: '11', span: { start: 40, end: 47 }, overlaps: false },
      { symbol: 'COMPANION', alternative: 'nobody', codeword: '11', span: { start: 53, end: 59 }, overlaps: false },
    ]);
    expect(result.naturality).toBeCloseTo(0.62815, 4);
  });

  it('matches alternatives regardless of case', () => {
    const detector = new StegoDetector(loadGrammarFile(TRAVEL_GRAMMAR));

    const result = detector.detect(CARRIER.toUpperCase(), { marker: 'traveler' });

    expect(result.bits).toBe('110001111');
  });

  it('returns an empty result without a carrier sentence', () => {
    const detector = new StegoDetector(loadGrammarFile(TRAVEL_GRAMMAR));

    expect(detector.detect('Sailed to Boston at dawn.', { marker: 'traveler' })).toEqual({
      detected: false,
      bits: '',
      matches: [],
      skipped: [],
      sentence: null,
      naturality: 0,
    });
  });

  it('skips slots with no alternative in the sentence', () => {
    const detector = new StegoDetector(loadGrammarFile(TRAVEL_GRAMMAR));

    const result = detector.detect('The traveler walked to Paris yesterday with nobody.', { marker: 'traveler' });

    expect(result.bits).toBe('0011');
    expect(result.skipped).toEqual(['CITY']);
    expect(result.matches.map((match) => match.symbol)).toEqual(['VERB', 'TIME', 'COMPANION']);
  });

  it('reads only the listed slots, in the listed order', () => {
    const detector = new StegoDetector(loadGrammarFile(TRAVEL_GRAMMAR));

    const result = detector.detect(CARRIER, { marker: 'traveler', slotSymbols: ['COMPANION', 'VERB', 'Start'] });

    expect(result.bits).toBe('11110');
    expect(result.skipped).toEqual(['Start']);
  });

  it('leaves excluded symbols out', () => {
    const detector = new StegoDetector(loadGrammarFile(TRAVEL_GRAMMAR));

    const result = detector.detect(CARRIER, { marker: 'traveler', excludedSymbols: ['TIME'] });

    expect(result.bits).toBe('1100011');
    expect([...detector.payloadTables(['TIME']).keys()]).toEqual(['VERB', 'CITY', 'COMPANION']);
  });

  it('flags slots whose match overlaps an earlier one', () => {
    const grammar = parseGrammar(
      'Start -> "Look" A B\nA -> "red" [0.5] | "blue" [0.5]\nB -> "red fox" [0.5] | "grey fox" [0.5]'
    );

    const result = new StegoDetector(grammar).detect('Look red fox.', { marker: 'look' });

    expect(result.bits).toBe('00');
    expect(result.matches.map((match) => [match.alternative, match.overlaps])).toEqual([
      ['red', false],
      ['red fox', true],
    ]);
  });

  it('requires a marker', () => {
    const detector = new StegoDetector(loadGrammarFile(TRAVEL_GRAMMAR));

    expect(() => detector.detect(CARRIER, { marker: '' })).toThrow(CodecOptionsError);
  });

  it('reads alternatives that carry punctuation', () => {
    const { encoded, detected } = roundTrip(
      'Start -> GREET "traveler" CITY .\nGREET -> "Hi" "," | "Hello" ","\nCITY -> "Boston" [0.5] | "Denver" [0.5]',
      '01'
    );

    expect(encoded.text).toBe('Hi, traveler Denver.');
    expect(encoded.embeddedBits).toBe('01');
    expect(detected.bits).toBe('01');
    expect(detected.matches[0]).toEqual({
      symbol: 'GREET',
      alternative: 'Hi ,',
      codeword: '0',
      span: { start: 0, end: 3 },
      overlaps: false,
    });
  });

  it('reads punctuation-only alternatives attached to the previous word', () => {
    const grammar = 'Start -> "The" "traveler" CITY END\nCITY -> "Boston" [0.5] | "Denver" [0.5]\nEND -> "." | "!"';

    const period = roundTrip(grammar, '10');
    expect(period.encoded.text).toBe('The traveler Denver.');
    expect(period.detected.bits).toBe('10');
    expect(period.detected.skipped).toEqual([]);

    const bang = roundTrip(grammar, '11');
    expect(bang.encoded.text).toBe('The traveler Denver!');
    expect(bang.detected.bits).toBe('11');
  });

  it('reads default slots in sentence order, not declaration order', () => {
    const { encoded, detected } = roundTrip(
      'Start -> "The" "traveler" VERB "to" CITY .\n' +
        'CITY -> "Boston" [0.5] | "Denver" [0.5]\n' +
        'VERB -> "walked" [0.5] | "drove" [0.5]',
      '01'
    );

    expect(encoded.text).toBe('The traveler walked to Denver.');
    expect(detected.bits).toBe('01');
    expect(detected.matches.map((match) => match.symbol)).toEqual(['VERB', 'CITY']);
  });

  it('does not read symbols with non-terminal alternatives', () => {
    const detector = new StegoDetector(
      parseGrammar(
        'Start -> "The" "traveler" "went" PLACE .\nPLACE -> "to" CITY | "home"\nCITY -> "Boston" [0.5] | "Denver" [0.5]'
      )
    );

    expect([...detector.payloadTables().keys()]).toEqual(['CITY']);
    expect(detector.detect('The traveler went to Denver.', { marker: 'traveler' }).bits).toBe('1');
  });
});
