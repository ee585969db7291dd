// Crockford's base32 alphabet: digits and uppercase letters without I, L, O, U
export const ALPHABET = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';

export const BITS_PER_SYMBOL = 5;

const SYMBOL_MASK = (1 << BITS_PER_SYMBOL) - 1;

// char code -> value, -1 for anything outside the alphabet
const DECODE_TABLE: readonly number[] = (() => {
  const table = new Array<number>(128).fill(-1);
  for (let i = 0; i < ALPHABET.length; i++) {
    table[ALPHABET.charCodeAt(i)] = i;
  }
  return table;
})();

export function encodeSymbol(value: number): string {
  return ALPHABET.charAt(value & SYMBOL_MASK);
}

/**
 * Returns the 5-bit value of an alphabet symbol, or undefined when the
 * character is not one. Lowercase letters are not symbols.
 */
export function decodeSymbol(char: string): number | undefined {
  if (char.length !== 1) return undefined;
  const value = DECODE_TABLE[char.charCodeAt(0)];
  return value === undefined || value < 0 ? undefined : value;
}

export function isSymbol(char: string): boolean {
  return decodeSymbol(char) !== undefined;
}
