import { describe, it, expect } from 'vitest';
import { ScannerContractError } from '../src/scanner';
import { scanOne, scannerFor, tokensOf } from './testUtils';

describe('scanner numbers', () => {
	it('gives small integers a fast-path value', () => {
		const s = scanOne('42');
		expect(s.currentToken()).toBe('<number>');
		expect(s.currentLiteral()).toBe('42');
		expect(s.smiValue()).toBe(42);
		expect(s.doubleValue()).toBe(42);
		expect(s.containsDot()).toBe(false);
		expect(scanOne('0').smiValue()).toBe(0);
	});

	it('limits the fast path to 31-bit values of at most ten digits', () => {
		expect(scanOne('2147483647').smiValue()).toBe(2147483647);
		const big = scanOne('2147483648');
		expect(big.smiValue()).toBeNull();
		expect(big.doubleValue()).toBe(2147483648);
		expect(scanOne('12345678901').smiValue()).toBeNull();
	});

	it('scans fractions and exponents', () => {
		const frac = scanOne('1.5');
		expect(frac.smiValue()).toBeNull();
		expect(frac.doubleValue()).toBe(1.5);
		expect(frac.containsDot()).toBe(true);

		const lead = scanOne('.5');
		expect(lead.currentToken()).toBe('<number>');
		expect(lead.currentLiteral()).toBe('.5');
		expect(lead.location()).toEqual({ start: 0, end: 2 });
		expect(lead.doubleValue()).toBe(0.5);

		expect(scanOne('1e3').doubleValue()).toBe(1000);
		expect(scanOne('1e3').smiValue()).toBeNull();
		expect(scanOne('1E-2').doubleValue()).toBe(0.01);
		expect(scanOne('1.e2').doubleValue()).toBe(100);
		expect(scanOne('1.5e3').doubleValue()).toBe(1500);
	});

	it('scans prefixed integers', () => {
		expect(scanOne('0x1F').doubleValue()).toBe(31);
		expect(scanOne('0X1f').doubleValue()).toBe(31);
		expect(scanOne('0x1e5').doubleValue()).toBe(485);
		expect(scanOne('0o17').doubleValue()).toBe(15);
		expect(scanOne('0b101').doubleValue()).toBe(5);
		expect(scanOne('0B11').doubleValue()).toBe(3);
		expect(scanOne('0x10').smiValue()).toBeNull();
	});

	it('records legacy octal literals', () => {
		const octal = scanOne('017');
		expect(octal.doubleValue()).toBe(15);
		expect(octal.smiValue()).toBeNull();
		expect(octal.octalPosition()).toEqual({ start: 0, end: 3 });
		octal.clearOctalPosition();
		expect(octal.octalPosition()).toEqual({ start: -1, end: -1 });
	});

	it('reads 08 and 018 as decimal', () => {
		const s = scanOne('018');
		expect(s.doubleValue()).toBe(18);
		expect(s.octalPosition()).toEqual({ start: -1, end: -1 });
		expect(scanOne('08').smiValue()).toBe(8);
	});

	it.each([
		['0x', { start: 0, end: 2 }],
		['0b2', { start: 0, end: 2 }],
		['0o8', { start: 0, end: 2 }],
		['1e', { start: 0, end: 2 }],
		['1e+', { start: 0, end: 3 }],
		['3in', { start: 0, end: 1 }],
		['1_000', { start: 0, end: 1 }],
		['0x1g', { start: 0, end: 3 }],
		['0x1p', { start: 0, end: 3 }],
	])('rejects %s', (src, location) => {
		const s = scanOne(src);
		expect(s.currentToken()).toBe('<illegal>');
		expect(s.error()).toBe('malformed-number');
		expect(s.errorLocation()).toEqual(location);
		expect(s.location()).toEqual(location);
		expect(s.smiValue()).toBeNull();
		expect(() => s.doubleValue()).toThrow(ScannerContractError);
	});

	it('resumes after a malformed number', () => {
		expect(tokensOf('3in')).toEqual(['<illegal>', 'in']);
		expect(tokensOf('0b2')).toEqual(['<illegal>', '<number>']);
	});

	it('rejects an exponent on prefixed numbers', () => {
		const s = scanOne('0b1e1');
		expect(s.currentToken()).toBe('<illegal>');
		expect(s.errorLocation()).toEqual({ start: 0, end: 3 });
	});

	it('scans a full decimal literal as one token', () => {
		const s = scanOne('123.45e2');
		expect(s.currentToken()).toBe('<number>');
		expect(s.location()).toEqual({ start: 0, end: 8 });
		expect(s.doubleValue()).toBe(12345);
		expect(s.next()).toBe('<eos>');
	});

	it('keeps producing tokens after a malformed prefix', () => {
		const s = scanOne('0x');
		expect(s.error()).toBe('malformed-number');
		expect(s.errorLocation()).toEqual({ start: 0, end: 2 });
		expect(s.next()).toBe('<eos>');
		expect(s.location()).toEqual({ start: 2, end: 3 });
	});

	it('latches only the first error', () => {
		const s = scannerFor("0x '\\x");
		while (s.next() !== '<eos>') continue;
		expect(s.error()).toBe('malformed-number');
		expect(s.errorLocation()).toEqual({ start: 0, end: 2 });
	});
});
