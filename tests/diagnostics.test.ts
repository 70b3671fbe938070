import { describe, it, expect } from 'vitest';
import { DiagnosticSeverity } from 'vscode-languageserver/node';
import { SCANNER_ERROR_CODES, normalizeDiagCode, type DiagCode } from '../src/analysisTypes';
import { collectLexicalDiagnostics, parseDisabledDiagList, scannerErrorMessage } from '../src/diagnostics';
import { SCANNER_ERRORS } from '../src/scanner';
import { tokenize } from '../src/tokenize';
import { docFrom } from './testUtils';

function diagsFor(code: string, opts: { strict?: boolean; disabled?: DiagCode[] } = {}) {
	const doc = docFrom(code);
	return collectLexicalDiagnostics(doc, tokenize(code), {
		strict: opts.strict ?? false,
		disabled: new Set(opts.disabled ?? []),
	});
}

const at = (line: number, from: number, to: number) => ({
	start: { line, character: from },
	end: { line, character: to },
});

describe('lexical diagnostics', () => {
	it('reports the scanner error once', () => {
		expect(diagsFor("'abc")).toEqual([{
			range: at(0, 0, 4),
			message: 'Unterminated string literal',
			severity: DiagnosticSeverity.Error,
			code: 'SCN001',
		}]);
	});

	it('reports stray characters', () => {
		expect(diagsFor('a # b')).toEqual([{
			range: at(0, 2, 3),
			message: "Invalid or unexpected token '#'",
			severity: DiagnosticSeverity.Error,
			code: 'SCN100',
		}]);
	});

	it('reports legacy octal only in strict mode', () => {
		expect(diagsFor('x = 017')).toEqual([]);
		expect(diagsFor('x = 017', { strict: true })).toEqual([{
			range: at(0, 4, 7),
			message: 'Octal literals are not allowed in strict mode',
			severity: DiagnosticSeverity.Error,
			code: 'SCN101',
		}]);
		expect(diagsFor("'\\01'", { strict: true }).map(d => [d.message, d.range])).toEqual([
			['Octal escape sequences are not allowed in strict mode', at(0, 2, 4)],
		]);
	});

	it('warns about HTML-like comments', () => {
		expect(diagsFor('x <!-- y')).toEqual([{
			range: at(0, 1, 8),
			message: 'HTML-like comment',
			severity: DiagnosticSeverity.Warning,
			code: 'SCN102',
		}]);
		expect(diagsFor('x\n--> y').map(d => d.range)).toEqual([{ start: { line: 0, character: 1 }, end: { line: 1, character: 5 } }]);
	});

	it('warns about duplicate keys', () => {
		expect(diagsFor('o = {a: 1, a: 2}')).toEqual([{
			range: at(0, 11, 12),
			message: "Duplicate property 'a' in object literal",
			severity: DiagnosticSeverity.Warning,
			code: 'SCN103',
		}]);
		expect(diagsFor('o = {set a(v) {}, set a(v) {}}').map(d => d.message))
			.toEqual(["Duplicate setter 'a' in object literal"]);
	});

	it('reports across lines', () => {
		expect(diagsFor('a\nb # c').map(d => d.range)).toEqual([at(1, 2, 3)]);
	});

	it('drops disabled codes', () => {
		expect(diagsFor('o = {a: 1, a: 2}', { disabled: ['SCN103'] })).toEqual([]);
		expect(diagsFor("a # '", { disabled: ['SCN001'] }).map(d => d.code)).toEqual(['SCN100']);
	});
});

describe('disabled diagnostic lists', () => {
	it('accepts codes and friendly names in any case', () => {
		const set = parseDisabledDiagList(['scn001', 'Strict_Octal_Literal', 'bogus', 42]);
		expect([...set]).toEqual(['SCN001', 'SCN101']);
	});

	it('splits a string list on commas and whitespace', () => {
		const set = parseDisabledDiagList('SCN102, html-comment  unterminated-regexp');
		expect([...set]).toEqual(['SCN102', 'SCN009']);
	});

	it('ignores anything else', () => {
		expect(parseDisabledDiagList(undefined).size).toBe(0);
		expect(parseDisabledDiagList({ disable: ['SCN001'] }).size).toBe(0);
	});

	it('normalises single codes', () => {
		expect(normalizeDiagCode(' scn103 ')).toBe('SCN103');
		expect(normalizeDiagCode('duplicate-key')).toBe('SCN103');
		expect(normalizeDiagCode('unexpected_token')).toBe('SCN100');
		expect(normalizeDiagCode('')).toBeNull();
		expect(normalizeDiagCode(null)).toBeNull();
		expect(normalizeDiagCode('SCN999')).toBeNull();
	});
});

describe('scanner error messages', () => {
	it('has a message and a code for every error kind', () => {
		for (const kind of Object.values(SCANNER_ERRORS)) {
			expect(scannerErrorMessage(kind).length).toBeGreaterThan(0);
			expect(SCANNER_ERROR_CODES[kind]).toMatch(/^SCN0\d\d$/);
		}
		expect(SCANNER_ERROR_CODES['malformed-number']).toBe('SCN007');
		expect(scannerErrorMessage('unterminated-regexp')).toBe('Invalid regular expression: missing /');
	});
});
