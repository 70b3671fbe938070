import type { DiagnosticSeverity, Range } from 'vscode-languageserver/node';
import { SCANNER_ERRORS, type ScannerErrorKind } from './scanner';

export const SCRIPT_DIAGCODES = {
	UNTERMINATED_STRING: 'SCN001',
	UNTERMINATED_TEMPLATE: 'SCN002',
	UNTERMINATED_COMMENT: 'SCN003',
	INVALID_HEX_ESCAPE: 'SCN004',
	INVALID_UNICODE_ESCAPE: 'SCN005',
	UNDEFINED_UNICODE_CODE_POINT: 'SCN006',
	MALFORMED_NUMBER: 'SCN007',
	TEMPLATE_OCTAL_LITERAL: 'SCN008',
	UNTERMINATED_REGEXP: 'SCN009',
	MALFORMED_REGEXP_FLAGS: 'SCN010',
	UNEXPECTED_TOKEN: 'SCN100',
	STRICT_OCTAL_LITERAL: 'SCN101',
	HTML_COMMENT: 'SCN102',
	DUPLICATE_KEY: 'SCN103',
} as const;
export type DiagCode = typeof SCRIPT_DIAGCODES[keyof typeof SCRIPT_DIAGCODES];

export const SCANNER_ERROR_CODES: Readonly<Record<ScannerErrorKind, DiagCode>> = {
	[SCANNER_ERRORS.UNTERMINATED_STRING]: SCRIPT_DIAGCODES.UNTERMINATED_STRING,
	[SCANNER_ERRORS.UNTERMINATED_TEMPLATE]: SCRIPT_DIAGCODES.UNTERMINATED_TEMPLATE,
	[SCANNER_ERRORS.UNTERMINATED_COMMENT]: SCRIPT_DIAGCODES.UNTERMINATED_COMMENT,
	[SCANNER_ERRORS.INVALID_HEX_ESCAPE]: SCRIPT_DIAGCODES.INVALID_HEX_ESCAPE,
	[SCANNER_ERRORS.INVALID_UNICODE_ESCAPE]: SCRIPT_DIAGCODES.INVALID_UNICODE_ESCAPE,
	[SCANNER_ERRORS.UNDEFINED_UNICODE_CODE_POINT]: SCRIPT_DIAGCODES.UNDEFINED_UNICODE_CODE_POINT,
	[SCANNER_ERRORS.MALFORMED_NUMBER]: SCRIPT_DIAGCODES.MALFORMED_NUMBER,
	[SCANNER_ERRORS.TEMPLATE_OCTAL_LITERAL]: SCRIPT_DIAGCODES.TEMPLATE_OCTAL_LITERAL,
	[SCANNER_ERRORS.UNTERMINATED_REGEXP]: SCRIPT_DIAGCODES.UNTERMINATED_REGEXP,
	[SCANNER_ERRORS.MALFORMED_REGEXP_FLAGS]: SCRIPT_DIAGCODES.MALFORMED_REGEXP_FLAGS,
};

const DIAG_VALUE_SET = new Set<string>(Object.values(SCRIPT_DIAGCODES));

// Build name->code mapping from the enum to avoid duplication.
const DIAG_NAME_MAP: Record<string, DiagCode> = (() => {
	const map: Record<string, DiagCode> = {};
	for (const [enumName, code] of Object.entries(SCRIPT_DIAGCODES)) {
		map[enumName.toLowerCase().replace(/_/g, '-')] = code;
	}
	return map;
})();

function isDiagCode(value: string): value is DiagCode {
	return DIAG_VALUE_SET.has(value);
}

/** Accepts a code (`SCN101`, any case) or a friendly name (`strict-octal-literal`, `strict_octal_literal`). */
export function normalizeDiagCode(raw: string | null | undefined): DiagCode | null {
	if (!raw) return null;
	const trimmed = raw.trim();
	if (!trimmed) return null;
	const upper = trimmed.toUpperCase();
	if (isDiagCode(upper)) return upper;
	const canon = trimmed.toLowerCase().replace(/[-_]/g, '-');
	return DIAG_NAME_MAP[canon] ?? null;
}

export interface Diag { range: Range; message: string; severity?: DiagnosticSeverity; code: DiagCode; }
