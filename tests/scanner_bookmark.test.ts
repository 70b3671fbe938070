import { describe, it, expect } from 'vitest';
import { ChunkedCharacterStream, Scanner, ScannerContractError, withBookmark } from '../src/scanner';
import { scannerFor } from './testUtils';

describe('scanner bookmarks', () => {
	it('rewinds to the bookmarked token', () => {
		const s = scannerFor('a b c d');
		s.next();
		expect(s.setBookmark()).toBe(true);
		expect(s.bookmarkHasBeenSet()).toBe(true);
		s.next();
		s.next();
		expect(s.currentLiteral()).toBe('c');
		s.resetToBookmark();
		expect(s.bookmarkHasBeenReset()).toBe(true);
		expect(s.currentToken()).toBe('<identifier>');
		expect(s.currentLiteral()).toBe('a');
		expect(s.nextLiteral()).toBe('b');
		s.next();
		expect(s.currentLiteral()).toBe('b');
		expect(s.location()).toEqual({ start: 2, end: 3 });
		s.next();
		expect(s.currentLiteral()).toBe('c');
	});

	it('allows one bookmark at a time', () => {
		const s = scannerFor('a b c');
		s.next();
		expect(s.setBookmark()).toBe(true);
		expect(s.setBookmark()).toBe(false);
		s.resetToBookmark();
		expect(s.setBookmark()).toBe(false);
		expect(() => s.resetToBookmark()).toThrow(ScannerContractError);
		s.dropBookmark();
		expect(s.bookmarkHasBeenReset()).toBe(false);
		expect(s.setBookmark()).toBe(true);
	});

	it('requires a bookmark before resetting', () => {
		expect(() => scannerFor('a').resetToBookmark()).toThrow(ScannerContractError);
	});

	it('clears errors raised after the bookmark', () => {
		const s = scannerFor('a b 0x');
		s.next();
		s.setBookmark();
		s.next();
		expect(s.error()).toBe('malformed-number');
		s.resetToBookmark();
		expect(s.hasError()).toBe(false);
		s.next();
		expect(s.error()).toBe('malformed-number');
	});

	it('keeps errors raised before the bookmark', () => {
		const s = scannerFor('0x a b');
		s.next();
		s.setBookmark();
		s.next();
		s.resetToBookmark();
		expect(s.error()).toBe('malformed-number');
	});

	it('restores the octal position', () => {
		const s = scannerFor('a b 07');
		s.next();
		s.setBookmark();
		s.next();
		expect(s.octalPosition()).toEqual({ start: 4, end: 6 });
		s.resetToBookmark();
		expect(s.octalPosition()).toEqual({ start: -1, end: -1 });
	});

	it('restores template literals', () => {
		const s = scannerFor('`a${x}` y');
		s.next();
		s.setBookmark();
		s.next();
		s.next();
		s.resetToBookmark();
		expect(s.currentToken()).toBe('<template-span>');
		expect(s.currentLiteral()).toBe('a');
		expect(s.currentRawLiteral()).toBe('a');
		expect(s.nextLiteral()).toBe('x');
	});

	it('refuses when a token has been peeked ahead', () => {
		const s = scannerFor('a b c');
		s.next();
		s.peekAhead();
		expect(s.setBookmark()).toBe(false);
	});

	it('refuses on streams that cannot rewind', () => {
		const s = new Scanner();
		s.initialize(new ChunkedCharacterStream(['a b']));
		expect(s.setBookmark()).toBe(false);
		expect(s.bookmarkHasBeenSet()).toBe(false);
	});
});

describe('scanner bookmarks with lookahead', () => {
	it('restores state after mixed next and peekAhead calls', () => {
		const s = scannerFor('a b c d');
		s.next();
		expect(s.setBookmark()).toBe(true);
		expect(s.peekAhead()).toBe('<identifier>');
		s.next();
		expect(s.peekAhead()).toBe('<identifier>');
		s.next();
		expect(s.currentLiteral()).toBe('c');
		expect(s.nextLiteral()).toBe('d');
		s.resetToBookmark();
		expect(s.currentToken()).toBe('<identifier>');
		expect(s.peek()).toBe('<identifier>');
		expect(s.currentLiteral()).toBe('a');
		expect(s.nextLiteral()).toBe('b');
		expect(s.peekAhead()).toBe('<identifier>');
		s.next();
		expect([s.currentLiteral(), s.nextLiteral()]).toEqual(['b', 'c']);
		s.next();
		expect([s.currentLiteral(), s.nextLiteral()]).toEqual(['c', 'd']);
		expect(s.peekAhead()).toBe('<eos>');
	});
});

describe('withBookmark', () => {
	it('drops the bookmark when the scope ends', () => {
		const s = scannerFor('a b c');
		s.next();
		const peeked = withBookmark(s, scope => {
			expect(scope.set()).toBe(true);
			s.next();
			s.next();
			scope.reset();
			expect(scope.hasBeenReset()).toBe(true);
			return s.nextLiteral();
		});
		expect(peeked).toBe('b');
		expect(s.bookmarkHasBeenSet()).toBe(false);
		expect(s.bookmarkHasBeenReset()).toBe(false);
	});

	it('drops the bookmark when the scope throws', () => {
		const s = scannerFor('a b');
		expect(() => withBookmark(s, scope => {
			scope.set();
			throw new Error('boom');
		})).toThrow('boom');
		expect(s.bookmarkHasBeenSet()).toBe(false);
	});
});
