import type { Span } from './tokens';

// Lexical error kinds. The scanner only reports a kind and a span; rendering
// text is left to the diagnostics layer.
export const SCANNER_ERRORS = {
	UNTERMINATED_STRING: 'unterminated-string',
	UNTERMINATED_TEMPLATE: 'unterminated-template',
	UNTERMINATED_COMMENT: 'unterminated-comment',
	INVALID_HEX_ESCAPE: 'invalid-hex-escape',
	INVALID_UNICODE_ESCAPE: 'invalid-unicode-escape',
	UNDEFINED_UNICODE_CODE_POINT: 'undefined-unicode-code-point',
	MALFORMED_NUMBER: 'malformed-number',
	TEMPLATE_OCTAL_LITERAL: 'template-octal-literal',
	UNTERMINATED_REGEXP: 'unterminated-regexp',
	MALFORMED_REGEXP_FLAGS: 'malformed-regexp-flags',
} as const;
export type ScannerErrorKind = typeof SCANNER_ERRORS[keyof typeof SCANNER_ERRORS];

export interface ScannerError {
	kind: ScannerErrorKind;
	location: Span;
}

/** Thrown when a caller breaks the scanner's usage contract. */
export class ScannerContractError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'ScannerContractError';
	}
}
