import { DiagnosticSeverity } from 'vscode-languageserver/node';
import type { TextDocument } from 'vscode-languageserver-textdocument';
import { SCANNER_ERROR_CODES, SCRIPT_DIAGCODES, normalizeDiagCode, type Diag, type DiagCode } from './analysisTypes';
import type { ScannerErrorKind, Span } from './scanner';
import type { TokenizeResult } from './tokenize';
import { AssertNever } from './utils';

export interface LexicalDiagnosticSettings {
	// Report legacy octal literals and escapes
	strict: boolean;
	disabled: ReadonlySet<DiagCode>;
}

// Parse user-provided disabled diagnostics (codes or friendly names) into canonical codes.
export function parseDisabledDiagList(input: unknown): Set<DiagCode> {
	const out = new Set<DiagCode>();
	const entries = Array.isArray(input) ? input : typeof input === 'string' ? input.split(/[,\s]+/) : [];
	for (const raw of entries) {
		if (typeof raw !== 'string') continue;
		const code = normalizeDiagCode(raw);
		if (code) out.add(code);
	}
	return out;
}

export function filterDiagnostics(diags: ReadonlyArray<Diag>, disabled: ReadonlySet<DiagCode>): Diag[] {
	if (!disabled.size) return [...diags];
	return diags.filter(d => !disabled.has(d.code));
}

export function scannerErrorMessage(kind: ScannerErrorKind): string {
	switch (kind) {
		case 'unterminated-string': return 'Unterminated string literal';
		case 'unterminated-template': return 'Unterminated template literal';
		case 'unterminated-comment': return 'Unterminated block comment';
		case 'invalid-hex-escape': return 'Invalid hexadecimal escape sequence';
		case 'invalid-unicode-escape': return 'Invalid Unicode escape sequence';
		case 'undefined-unicode-code-point': return 'Undefined Unicode code-point';
		case 'malformed-number': return 'Invalid or unexpected numeric literal';
		case 'template-octal-literal': return 'Octal escape sequences are not allowed in template strings';
		case 'unterminated-regexp': return 'Invalid regular expression: missing /';
		case 'malformed-regexp-flags': return 'Invalid regular expression flags';
		default: return AssertNever(kind, `Unknown scanner error kind: ${String(kind)}`);
	}
}

function overlaps(a: Span, b: Span): boolean {
	return a.start < b.end && b.start < a.end;
}

/**
 * Turns a tokenize result into editor diagnostics: the latched scanner error,
 * stray characters, legacy octal (strict mode only), HTML-like comments and
 * duplicate object literal keys.
 */
export function collectLexicalDiagnostics(doc: TextDocument, result: TokenizeResult, settings: LexicalDiagnosticSettings): Diag[] {
	const out: Diag[] = [];
	const text = doc.getText();
	const range = (span: Span) => ({ start: doc.positionAt(span.start), end: doc.positionAt(span.end) });

	const error = result.error;
	if (error) {
		out.push({
			range: range(error.location),
			message: scannerErrorMessage(error.kind),
			severity: DiagnosticSeverity.Error,
			code: SCANNER_ERROR_CODES[error.kind],
		});
	}

	for (const t of result.tokens) {
		if (t.token !== '<illegal>') continue;
		if (error && overlaps(t.span, error.location)) continue;
		out.push({
			range: range(t.span),
			message: `Invalid or unexpected token '${text.slice(t.span.start, t.span.end)}'`,
			severity: DiagnosticSeverity.Error,
			code: SCRIPT_DIAGCODES.UNEXPECTED_TOKEN,
		});
	}

	if (settings.strict) {
		for (const span of result.octalPositions) {
			const isEscape = text.charCodeAt(span.start - 1) === 0x5c;
			out.push({
				range: range(span),
				message: isEscape
					? 'Octal escape sequences are not allowed in strict mode'
					: 'Octal literals are not allowed in strict mode',
				severity: DiagnosticSeverity.Error,
				code: SCRIPT_DIAGCODES.STRICT_OCTAL_LITERAL,
			});
		}
	}

	if (result.foundHtmlComment && result.htmlCommentSpan) {
		out.push({
			range: range(result.htmlCommentSpan),
			message: 'HTML-like comment',
			severity: DiagnosticSeverity.Warning,
			code: SCRIPT_DIAGCODES.HTML_COMMENT,
		});
	}

	for (const dup of result.duplicateKeys) {
		const what = dup.kind === 'data' ? 'property' : dup.kind;
		out.push({
			range: range(dup.span),
			message: `Duplicate ${what} '${dup.key}' in object literal`,
			severity: DiagnosticSeverity.Warning,
			code: SCRIPT_DIAGCODES.DUPLICATE_KEY,
		});
	}

	return filterDiagnostics(out, settings.disabled);
}
