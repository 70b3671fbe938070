// Token model shared by the scanner and its consumers.

export type Span = { start: number; end: number };

export const INVALID_SPAN: Readonly<Span> = Object.freeze({ start: -1, end: -1 });

export function isValidSpan(span: Span): boolean {
	return span.start >= 0 && span.end >= span.start;
}

export const PUNCTUATORS = [
	'(', ')', '[', ']', '{', '}', ':', ';', '.', '...', '?', '=>', ',', '~', '!',
	'=', '+=', '-=', '*=', '/=', '%=', '**=', '<<=', '>>=', '>>>=', '&=', '|=', '^=',
	'||', '&&', '|', '^', '&', '<<', '>>', '>>>', '+', '-', '*', '/', '%', '**',
	'==', '!=', '===', '!==', '<', '>', '<=', '>=', '++', '--',
] as const;
export type Punctuator = typeof PUNCTUATORS[number];

// Reserved words that scan to their own token kind.
export const KEYWORDS = [
	'break', 'case', 'catch', 'class', 'const', 'continue', 'debugger', 'default', 'delete',
	'do', 'else', 'export', 'extends', 'false', 'finally', 'for', 'function', 'if', 'import',
	'in', 'instanceof', 'let', 'new', 'null', 'return', 'static', 'super', 'switch', 'this',
	'throw', 'true', 'try', 'typeof', 'var', 'void', 'while', 'with', 'yield',
] as const;
export type Keyword = typeof KEYWORDS[number];

export const FUTURE_STRICT_RESERVED_WORDS = ['implements', 'interface', 'package', 'private', 'protected', 'public'] as const;
export const FUTURE_RESERVED_WORDS = ['enum'] as const;

export type LiteralToken = '<identifier>' | '<number>' | '<string>' | '<template-span>' | '<template-tail>' | '<regexp>';
export type SyntheticToken =
	| LiteralToken
	| '<future-reserved>'
	| '<future-strict-reserved>'
	| '<escaped-keyword>'
	| '<escaped-strict-reserved>'
	| '<illegal>'
	| '<eos>'
	// internal: never handed to a consumer
	| '<whitespace>'
	| '<uninitialized>';

export type Token = Punctuator | Keyword | SyntheticToken;

const PUNCTUATOR_SET: ReadonlySet<string> = new Set<string>(PUNCTUATORS);

const KEYWORD_TOKENS: ReadonlyMap<string, Token> = (() => {
	const map = new Map<string, Token>();
	for (const k of KEYWORDS) map.set(k, k);
	for (const k of FUTURE_STRICT_RESERVED_WORDS) map.set(k, '<future-strict-reserved>');
	for (const k of FUTURE_RESERVED_WORDS) map.set(k, '<future-reserved>');
	return map;
})();

const MAX_KEYWORD_LENGTH = 10;

/** Classifies a plain (unescaped) identifier spelling. */
export function keywordOrIdentifier(word: string): Token {
	if (word.length < 2 || word.length > MAX_KEYWORD_LENGTH) return '<identifier>';
	return KEYWORD_TOKENS.get(word) ?? '<identifier>';
}

export function isPunctuator(token: Token): token is Punctuator {
	return PUNCTUATOR_SET.has(token);
}

export function isKeyword(token: Token): token is Keyword {
	return KEYWORD_TOKENS.get(token) === token;
}

export function isReservedWordToken(token: Token): boolean {
	return isKeyword(token)
		|| token === '<future-reserved>'
		|| token === '<future-strict-reserved>'
		|| token === '<escaped-keyword>'
		|| token === '<escaped-strict-reserved>';
}

// Strict-mode reserved words that are plain identifiers in sloppy code.
export function isStrictReservedWord(token: Token): boolean {
	return token === 'let' || token === 'static' || token === 'yield'
		|| token === '<future-strict-reserved>' || token === '<escaped-strict-reserved>';
}

// Tokens whose descriptor keeps its scanned text.
export function keepsLiteral(token: Token): boolean {
	return token === '<identifier>' || isStrictReservedWord(token)
		|| token === '<escaped-keyword>' || token === '<number>' || token === '<string>'
		|| token === '<template-span>' || token === '<template-tail>' || token === '<regexp>';
}

export function isTemplateToken(token: Token): boolean {
	return token === '<template-span>' || token === '<template-tail>';
}

/** Source text of a fixed token, or null for tokens carrying a literal. */
export function tokenString(token: Token): string | null {
	if (isPunctuator(token) || isKeyword(token)) return token;
	return null;
}

// Tokens the scanner produces from a single ASCII character without entering the full scan.
export const ONE_CHAR_TOKENS: ReadonlyMap<number, Token> = new Map<number, Token>([
	[0x28, '('], [0x29, ')'], [0x5b, '['], [0x5d, ']'], [0x7b, '{'], [0x7d, '}'],
	[0x3a, ':'], [0x3b, ';'], [0x2c, ','], [0x3f, '?'], [0x7e, '~'],
]);
