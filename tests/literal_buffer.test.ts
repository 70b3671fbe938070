import { describe, it, expect } from 'vitest';
import { LiteralBuffer } from '../src/scanner';

function fill(text: string): LiteralBuffer {
	const b = new LiteralBuffer();
	for (const ch of text) b.addChar(ch.codePointAt(0) ?? 0);
	return b;
}

describe('LiteralBuffer', () => {
	it('keeps Latin-1 content narrow', () => {
		const b = fill('abé');
		expect(b.isOneByte()).toBe(true);
		expect(b.length()).toBe(3);
		expect(Array.from(b.oneByteLiteral())).toEqual([0x61, 0x62, 0xe9]);
		expect(b.toString()).toBe('abé');
	});

	it('widens on the first character above 0xFF and stays wide', () => {
		const b = fill('aαb');
		expect(b.isOneByte()).toBe(false);
		expect(b.length()).toBe(3);
		expect(Array.from(b.twoByteLiteral())).toEqual([0x61, 0x3b1, 0x62]);
		expect(b.toString()).toBe('aαb');
	});

	it('stores astral code points as one surrogate pair', () => {
		const b = fill('x\u{1F600}');
		expect(b.isOneByte()).toBe(false);
		expect(b.length()).toBe(3);
		expect(Array.from(b.twoByteLiteral())).toEqual([0x78, 0xd83d, 0xde00]);
		expect(b.toString()).toBe('x\u{1F600}');
	});

	it('reassembles a code point added as two surrogate halves', () => {
		const b = new LiteralBuffer();
		b.addChar(0xd83d);
		b.addChar(0xde00);
		expect(b.length()).toBe(2);
		expect(Array.from(b.twoByteLiteral())).toEqual([0xd83d, 0xde00]);
		expect(b.toString()).toBe('\u{1F600}');
		expect(b.toString().codePointAt(0)).toBe(0x1f600);
	});

	it('grows by a factor of four from an initial capacity of 64 bytes', () => {
		const b = new LiteralBuffer();
		expect(b.capacity).toBe(0);
		b.addChar(0x61);
		expect(b.capacity).toBe(64);
		for (let i = 1; i < 64; i++) b.addChar(0x61);
		expect(b.capacity).toBe(64);
		b.addChar(0x61);
		expect(b.capacity).toBe(256);
		expect(b.length()).toBe(65);
	});

	it('widens in place when the wide form fits', () => {
		const b = fill('0123456789');
		b.addChar(0x3c0);
		expect(b.capacity).toBe(64);
		expect(b.toString()).toBe('0123456789π');
	});

	it('widens into a larger store when the wide form does not fit', () => {
		const text = 'abcdefghij'.repeat(4);
		const b = fill(text);
		b.addChar(0x3c0);
		expect(b.capacity).toBe(320);
		expect(b.toString()).toBe(text + 'π');
	});

	it('matches contextual keywords only on exact narrow content', () => {
		expect(fill('get').isContextualKeyword('get')).toBe(true);
		expect(fill('gets').isContextualKeyword('get')).toBe(false);
		expect(fill('ge').isContextualKeyword('get')).toBe(false);
		const wide = fill('α');
		expect(wide.isContextualKeyword('α')).toBe(false);
	});

	it('reduces length by characters and never below zero', () => {
		const narrow = fill('abc');
		narrow.reduceLength(1);
		expect(narrow.toString()).toBe('ab');
		narrow.reduceLength(10);
		expect(narrow.length()).toBe(0);

		const wide = fill('αβγ');
		wide.reduceLength(2);
		expect(wide.toString()).toBe('α');
	});

	it('reset returns to empty narrow content', () => {
		const b = fill('α');
		b.reset();
		expect(b.isOneByte()).toBe(true);
		expect(b.length()).toBe(0);
		expect(b.toString()).toBe('');
		b.addChar(0x7a);
		expect(b.toString()).toBe('z');
	});

	it('copies content and width from another buffer', () => {
		const src = fill('kλ');
		const dst = fill('previous');
		dst.copyFrom(src);
		expect(dst.isOneByte()).toBe(false);
		expect(dst.toString()).toBe('kλ');
		src.addChar(0x61);
		expect(dst.toString()).toBe('kλ');
		dst.copyFrom(null);
		expect(dst.length()).toBe(0);
	});

	it('decodes long content', () => {
		const b = new LiteralBuffer();
		for (let i = 0; i < 20000; i++) b.addChar(0x78);
		expect(b.toString()).toBe('x'.repeat(20000));
	});
});
