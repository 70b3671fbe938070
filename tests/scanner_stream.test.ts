import { describe, it, expect } from 'vitest';
import { ChunkedCharacterStream, Scanner, ScannerContractError } from '../src/scanner';
import { scannerFor, tokensOf } from './testUtils';

function chunkedScanner(chunks: string[]): Scanner {
	const s = new Scanner();
	s.initialize(new ChunkedCharacterStream(chunks));
	return s;
}

describe('scanning chunked input', () => {
	it('matches scanning the joined text', () => {
		const s = chunkedScanner(['var x', ' = 1', '0;']);
		const out: string[] = [];
		for (let t = s.next(); t !== '<eos>'; t = s.next()) out.push(t);
		expect(out).toEqual(tokensOf('var x = 10;'));
		expect(out).toEqual(['var', '<identifier>', '=', '<number>', ';']);
	});

	it('joins literals across chunk boundaries', () => {
		const s = chunkedScanner(['var x', ' = 1', '0;']);
		s.next();
		s.next();
		s.next();
		s.next();
		expect(s.currentLiteral()).toBe('10');
		expect(s.location()).toEqual({ start: 8, end: 10 });
	});

	it('joins surrogate pairs split across chunks', () => {
		const str = chunkedScanner(['"\uD83D', '\uDE00"']);
		str.next();
		expect(str.currentLiteral()).toBe('\u{1F600}');

		const ident = chunkedScanner(['a\uD835', '\uDC65']);
		ident.next();
		expect(ident.currentToken()).toBe('<identifier>');
		expect(ident.currentLiteral()).toBe('a\u{1D465}');
		expect(ident.location()).toEqual({ start: 0, end: 3 });
	});
});

describe('scanner seekForward', () => {
	it('makes the token at the target position the lookahead', () => {
		const s = scannerFor('a b c d');
		s.next();
		s.seekForward(6);
		expect(s.peekLocation()).toEqual({ start: 6, end: 7 });
		s.next();
		expect(s.currentLiteral()).toBe('d');
	});

	it('is a no-op at the lookahead position', () => {
		const s = scannerFor('a b c');
		s.next();
		s.seekForward(2);
		expect(s.peekLocation()).toEqual({ start: 2, end: 3 });
		expect(s.nextLiteral()).toBe('b');
	});

	it('does not count skipped line terminators', () => {
		const s = scannerFor('a\nb c');
		s.next();
		s.seekForward(4);
		expect(s.hasAnyLineTerminatorBeforeNext()).toBe(false);
		expect(s.nextLiteral()).toBe('c');
	});

	it('rejects seeking backwards or past a peeked token', () => {
		const s = scannerFor('a b c');
		s.next();
		s.next();
		expect(() => s.seekForward(0)).toThrow(ScannerContractError);
		s.peekAhead();
		expect(() => s.seekForward(5)).toThrow(ScannerContractError);
	});
});
