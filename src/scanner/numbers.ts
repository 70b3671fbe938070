import { codeUnitsToString } from './chars';

// Numeric literal evaluation.

// Largest value carried on a token through the small-integer fast path.
export const SMI_MAX_VALUE = 0x7fffffff;
// Decimal literals longer than this never take the fast path.
export const SMI_MAX_DIGITS = 10;

const IMPLICIT_OCTAL = /^0[0-7]+$/;

/**
 * Parses numeric literal text the way the language reads it: decimal with
 * fraction and exponent, `0x`/`0o`/`0b` prefixes, and legacy octal written
 * with a leading zero (`010` is 8, `019` is 19).
 */
export function stringToDouble(text: string): number {
	if (IMPLICIT_OCTAL.test(text)) return parseInt(text, 8);
	if (text.length === 0) return NaN;
	return Number(text);
}

/** Canonical property-key spelling of a number. */
export function numberToString(value: number): string {
	if (!Number.isFinite(value)) return 'Infinity';
	return String(value);
}

export function oneByteToDouble(bytes: Uint8Array): number {
	return stringToDouble(codeUnitsToString(bytes));
}
