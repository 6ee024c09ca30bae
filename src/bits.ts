/**
 * Bit-string utilities. Bit strings are plain strings of '0' and '1'.
 */

/**
 * Interpret a hex digest as an unsigned integer and write it in binary,
 * without leading zeros (an all-zero digest yields '0').
 */
export function hexToBits(hex: string): string {
  if (!/^[0-9a-fA-F]+$/.test(hex)) {
    throw new Error(`Not a hex string: '${hex}'`);
  }
  return BigInt(`0x${hex}`).toString(2);
}

/**
 * Left-pad with zeros to at least `length`, then keep exactly the first
 * `length` characters.
 */
export function fitBits(bits: string, length: number): string {
  return bits.padStart(length, '0').slice(0, length);
}

/**
 * Does `codeword` occur verbatim in `bits` starting at `cursor`?
 * A codeword running past the end of `bits` never matches.
 */
export function matchesAt(bits: string, cursor: number, codeword: string): boolean {
  if (codeword.length === 0 || cursor + codeword.length > bits.length) return false;
  return bits.startsWith(codeword, cursor);
}

/**
 * Fraction of positions where two bit strings agree, over the shorter length.
 */
export function bitSimilarity(a: string, b: string): number {
  const length = Math.min(a.length, b.length);
  if (length === 0) return 0;

  let same = 0;
  for (let i = 0; i < length; i++) {
    if (a[i] === b[i]) same++;
  }
  return same / length;
}

export function isBitString(value: string): boolean {
  return /^[01]*$/.test(value);
}
