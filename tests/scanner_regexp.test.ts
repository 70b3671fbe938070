import { describe, it, expect } from 'vitest';
import { REGEXP_FLAGS, ScannerContractError } from '../src/scanner';
import { scannerFor } from './testUtils';

describe('scanner regular expressions', () => {
	it('rescans a division token as a pattern with flags', () => {
		const s = scannerFor('a = /ab+c/gi;');
		s.next();
		s.next();
		expect(s.peek()).toBe('/');
		expect(s.scanRegExpPattern(false)).toBe(true);
		expect(s.peek()).toBe('<regexp>');
		expect(s.nextLiteral()).toBe('ab+c');
		expect(s.scanRegExpFlags()).toBe(REGEXP_FLAGS.g | REGEXP_FLAGS.i);
		expect(s.next()).toBe('<regexp>');
		expect(s.currentLiteral()).toBe('ab+c');
		expect(s.currentRawLiteral()).toBe('gi');
		expect(s.location()).toEqual({ start: 4, end: 12 });
		expect(s.next()).toBe(';');
	});

	it('starts the pattern with = after /=', () => {
		const s = scannerFor('x = /=a/');
		s.next();
		s.next();
		expect(s.peek()).toBe('/=');
		expect(s.scanRegExpPattern(true)).toBe(true);
		expect(s.scanRegExpFlags()).toBe(0);
		s.next();
		expect(s.currentLiteral()).toBe('=a');
		expect(s.currentRawLiteral()).toBe('');
		expect(s.location()).toEqual({ start: 4, end: 8 });
	});

	it('does not end the pattern inside a class or after a backslash', () => {
		const cls = scannerFor('/[/]/');
		expect(cls.scanRegExpPattern(false)).toBe(true);
		expect(cls.nextLiteral()).toBe('[/]');
		expect(cls.peekLocation()).toEqual({ start: 0, end: 5 });

		const esc = scannerFor('/a\\/b/');
		expect(esc.scanRegExpPattern(false)).toBe(true);
		expect(esc.nextLiteral()).toBe('a\\/b');
	});

	it('reports unterminated patterns', () => {
		const eof = scannerFor('/abc');
		expect(eof.scanRegExpPattern(false)).toBe(false);
		expect(eof.error()).toBe('unterminated-regexp');
		expect(eof.errorLocation()).toEqual({ start: 0, end: 4 });
		expect(eof.next()).toBe('<illegal>');
		expect(eof.currentLiteral()).toBeNull();

		const newline = scannerFor('/ab\nc/');
		expect(newline.scanRegExpPattern(false)).toBe(false);
		expect(newline.errorLocation()).toEqual({ start: 0, end: 3 });

		const escapedNewline = scannerFor('/a\\\n/');
		expect(escapedNewline.scanRegExpPattern(false)).toBe(false);
	});

	it('accepts every flag once', () => {
		const s = scannerFor('/a/gimuy');
		s.scanRegExpPattern(false);
		expect(s.scanRegExpFlags()).toBe(31);
	});

	it('rejects repeated and unknown flags', () => {
		const repeated = scannerFor('/a/gg');
		repeated.scanRegExpPattern(false);
		expect(repeated.scanRegExpFlags()).toBeNull();
		expect(repeated.error()).toBe('malformed-regexp-flags');
		expect(repeated.errorLocation()).toEqual({ start: 4, end: 5 });
		expect(repeated.next()).toBe('<illegal>');
		expect(repeated.location()).toEqual({ start: 0, end: 5 });

		const unknown = scannerFor('/a/x');
		unknown.scanRegExpPattern(false);
		expect(unknown.scanRegExpFlags()).toBeNull();
		expect(unknown.errorLocation()).toEqual({ start: 3, end: 4 });
	});

	it('enforces the calling contract', () => {
		const notSlash = scannerFor('a');
		expect(() => notSlash.scanRegExpPattern(false)).toThrow(ScannerContractError);
		expect(() => notSlash.scanRegExpFlags()).toThrow(ScannerContractError);

		const slashEq = scannerFor('/=a/');
		expect(() => slashEq.scanRegExpPattern(false)).toThrow(ScannerContractError);

		const peeked = scannerFor('/a/');
		peeked.peekAhead();
		expect(() => peeked.scanRegExpPattern(false)).toThrow(ScannerContractError);
	});
});
