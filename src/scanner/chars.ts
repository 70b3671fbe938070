// Code point classification used by the scanner. All predicates take a full
// code point (surrogate pairs already combined) or END_OF_INPUT.

export const END_OF_INPUT: number = -1;

export const MAX_ASCII = 0x7f;
export const MAX_LATIN1 = 0xff;
export const MAX_UTF16_UNIT = 0xffff;
export const MAX_CODE_POINT = 0x10ffff;

const ZWNJ = 0x200c;
const ZWJ = 0x200d;
const NBSP = 0x00a0;
const ZWNBSP = 0xfeff;

const ID_START = /^\p{ID_Start}$/u;
const ID_CONTINUE = /^\p{ID_Continue}$/u;
const SPACE_SEPARATOR = /^\p{Space_Separator}$/u;

// ASCII lookup tables; everything above falls back to the Unicode property regexes.
const ASCII_ID_START = new Uint8Array(128);
const ASCII_ID_PART = new Uint8Array(128);
for (let c = 0; c < 128; c++) {
	const start = (c >= 0x61 && c <= 0x7a) || (c >= 0x41 && c <= 0x5a) || c === 0x24 || c === 0x5f || c === 0x5c;
	ASCII_ID_START[c] = start ? 1 : 0;
	ASCII_ID_PART[c] = start || (c >= 0x30 && c <= 0x39) ? 1 : 0;
}

function matchesProperty(re: RegExp, c: number): boolean {
	if (c < 0 || c > MAX_CODE_POINT) return false;
	return re.test(String.fromCodePoint(c));
}

export function isLineTerminator(c: number): boolean {
	return c === 0x0a || c === 0x0d || c === 0x2028 || c === 0x2029;
}

export function isCarriageReturn(c: number): boolean { return c === 0x0d; }
export function isLineFeed(c: number): boolean { return c === 0x0a; }

export function isWhiteSpace(c: number): boolean {
	if (c === 0x20 || c === 0x09 || c === 0x0b || c === 0x0c) return true;
	if (c <= MAX_ASCII) return false;
	return c === NBSP || c === ZWNBSP || matchesProperty(SPACE_SEPARATOR, c);
}

export function isWhiteSpaceOrLineTerminator(c: number): boolean {
	return isWhiteSpace(c) || isLineTerminator(c);
}

// '\\' counts as an identifier start/part so that escapes reach the identifier scanner.
export function isIdentifierStart(c: number): boolean {
	if (c < 0) return false;
	if (c <= MAX_ASCII) return ASCII_ID_START[c] === 1;
	return matchesProperty(ID_START, c);
}

export function isIdentifierPart(c: number): boolean {
	if (c < 0) return false;
	if (c <= MAX_ASCII) return ASCII_ID_PART[c] === 1;
	return c === ZWNJ || c === ZWJ || matchesProperty(ID_CONTINUE, c);
}

export function isDecimalDigit(c: number): boolean { return c >= 0x30 && c <= 0x39; }
export function isOctalDigit(c: number): boolean { return c >= 0x30 && c <= 0x37; }
export function isBinaryDigit(c: number): boolean { return c === 0x30 || c === 0x31; }
export function isHexDigit(c: number): boolean { return hexValue(c) >= 0; }

const DECODE_CHUNK = 8192;

/** Decodes code units to a string, in chunks so long literals stay off the call stack. */
export function codeUnitsToString(units: Uint8Array | Uint16Array): string {
	if (units.length <= DECODE_CHUNK) return String.fromCharCode(...units);
	let out = '';
	for (let i = 0; i < units.length; i += DECODE_CHUNK) {
		out += String.fromCharCode(...units.subarray(i, i + DECODE_CHUNK));
	}
	return out;
}

/** Value of a hex digit, or -1. */
export function hexValue(c: number): number {
	if (c >= 0x30 && c <= 0x39) return c - 0x30;
	const lower = c | 0x20;
	if (lower >= 0x61 && lower <= 0x66) return lower - 0x61 + 10;
	return -1;
}

export function isLeadSurrogate(unit: number): boolean { return unit >= 0xd800 && unit <= 0xdbff; }
export function isTrailSurrogate(unit: number): boolean { return unit >= 0xdc00 && unit <= 0xdfff; }

export function combineSurrogatePair(lead: number, trail: number): number {
	return ((lead - 0xd800) << 10) + (trail - 0xdc00) + 0x10000;
}

export function leadSurrogate(codePoint: number): number {
	return 0xd800 + ((codePoint - 0x10000) >> 10);
}

export function trailSurrogate(codePoint: number): number {
	return 0xdc00 + ((codePoint - 0x10000) & 0x3ff);
}

const CHAR_CODES = {
	TAB: 0x09,
	LF: 0x0a,
	VT: 0x0b,
	FF: 0x0c,
	CR: 0x0d,
	SPACE: 0x20,
	BANG: 0x21,
	DQUOTE: 0x22,
	HASH: 0x23,
	DOLLAR: 0x24,
	PERCENT: 0x25,
	AMP: 0x26,
	SQUOTE: 0x27,
	LPAREN: 0x28,
	RPAREN: 0x29,
	STAR: 0x2a,
	PLUS: 0x2b,
	COMMA: 0x2c,
	MINUS: 0x2d,
	DOT: 0x2e,
	SLASH: 0x2f,
	ZERO: 0x30,
	SEVEN: 0x37,
	EIGHT: 0x38,
	NINE: 0x39,
	COLON: 0x3a,
	SEMI: 0x3b,
	LT: 0x3c,
	EQ: 0x3d,
	GT: 0x3e,
	QUESTION: 0x3f,
	AT: 0x40,
	UPPER_B: 0x42,
	UPPER_E: 0x45,
	UPPER_O: 0x4f,
	UPPER_X: 0x58,
	LBRACK: 0x5b,
	BACKSLASH: 0x5c,
	RBRACK: 0x5d,
	CARET: 0x5e,
	UNDERSCORE: 0x5f,
	BACKTICK: 0x60,
	LOWER_B: 0x62,
	LOWER_E: 0x65,
	LOWER_F: 0x66,
	LOWER_G: 0x67,
	LOWER_I: 0x69,
	LOWER_M: 0x6d,
	LOWER_N: 0x6e,
	LOWER_O: 0x6f,
	LOWER_R: 0x72,
	LOWER_T: 0x74,
	LOWER_U: 0x75,
	LOWER_V: 0x76,
	LOWER_X: 0x78,
	LOWER_Y: 0x79,
	LBRACE: 0x7b,
	PIPE: 0x7c,
	RBRACE: 0x7d,
	TILDE: 0x7e,
} as const;

// Char codes the scanner switches on. Typed as plain numbers so that a
// comparison against the lookahead does not narrow it across advance().
export const CH: Readonly<Record<keyof typeof CHAR_CODES, number>> = CHAR_CODES;
