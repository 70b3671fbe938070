import { numberToString, oneByteToDouble } from './numbers';

const INITIAL_STORE_SIZE = 64;
const MAX_CANONICAL_LENGTH = 15;

interface Entry {
	offset: number;
	size: number;
	value: number;
}

/**
 * Detects repeated property keys.
 *
 * Each distinct key is encoded once into an append-only byte store as a
 * base-128 length prefix of `(byteLength << 1) | isOneByte` followed by the
 * key bytes; a hash index maps encodings to the value given on first insert.
 */
export class DuplicateFinder {
	private store = new Uint8Array(INITIAL_STORE_SIZE);
	private used = 0;
	private readonly index = new Map<number, Entry[]>();

	/** Returns `value` for a new key, otherwise the value stored when the key was first added. */
	addOneByteSymbol(key: Uint8Array, value: number): number {
		return this.addSymbol(key, true, value);
	}

	addTwoByteSymbol(key: Uint16Array, value: number): number {
		return this.addSymbol(new Uint8Array(key.buffer, key.byteOffset, key.byteLength), false, value);
	}

	/** Adds `text` narrow when every unit fits in a byte, wide otherwise. */
	addString(text: string, value: number): number {
		let narrow = true;
		for (let i = 0; i < text.length && narrow; i++) narrow = text.charCodeAt(i) <= 0xff;
		if (narrow) return this.addOneByteSymbol(Uint8Array.from(text, ch => ch.charCodeAt(0)), value);
		const units = new Uint16Array(text.length);
		for (let i = 0; i < text.length; i++) units[i] = text.charCodeAt(i);
		return this.addTwoByteSymbol(units, value);
	}

	/**
	 * Adds numeric literal text under its canonical number spelling, so `1`,
	 * `1.0`, `0x1` and `01` all name the same key.
	 */
	addNumber(key: Uint8Array, value: number): number {
		if (isNumberCanonical(key)) return this.addOneByteSymbol(key, value);
		const canonical = numberToString(oneByteToDouble(key));
		return this.addOneByteSymbol(Uint8Array.from(canonical, ch => ch.charCodeAt(0)), value);
	}

	get size(): number {
		let n = 0;
		for (const bucket of this.index.values()) n += bucket.length;
		return n;
	}

	private addSymbol(key: Uint8Array, isOneByte: boolean, value: number): number {
		const offset = this.used;
		this.backupKey(key, isOneByte);
		const size = this.used - offset;
		const hash = this.hash(offset, size);
		const bucket = this.index.get(hash);
		if (bucket) {
			for (const entry of bucket) {
				if (this.sameEncoding(entry, offset, size)) {
					// Already stored: drop the copy just written.
					this.used = offset;
					return entry.value;
				}
			}
			bucket.push({ offset, size, value });
		} else {
			this.index.set(hash, [{ offset, size, value }]);
		}
		return value;
	}

	private backupKey(key: Uint8Array, isOneByte: boolean): void {
		const tagged = key.length * 2 + (isOneByte ? 1 : 0);
		this.reserve(key.length + 5);
		// Most significant heptet first, high bit set on all but the last.
		if (tagged >= 1 << 7) {
			if (tagged >= 1 << 14) {
				if (tagged >= 1 << 21) {
					if (tagged >= 1 << 28) this.store[this.used++] = ((tagged / 2 ** 28) & 0x7f) | 0x80;
					this.store[this.used++] = ((tagged >>> 21) & 0x7f) | 0x80;
				}
				this.store[this.used++] = ((tagged >>> 14) & 0x7f) | 0x80;
			}
			this.store[this.used++] = ((tagged >>> 7) & 0x7f) | 0x80;
		}
		this.store[this.used++] = tagged & 0x7f;
		this.store.set(key, this.used);
		this.used += key.length;
	}

	private reserve(extra: number): void {
		if (this.used + extra <= this.store.length) return;
		let capacity = this.store.length * 2;
		while (capacity < this.used + extra) capacity *= 2;
		const next = new Uint8Array(capacity);
		next.set(this.store.subarray(0, this.used));
		this.store = next;
	}

	// FNV-1a over the encoded key.
	private hash(offset: number, size: number): number {
		let h = 2166136261 >>> 0;
		for (let i = offset; i < offset + size; i++) {
			h ^= this.store[i];
			h = Math.imul(h, 16777619);
		}
		return h >>> 0;
	}

	private sameEncoding(entry: Entry, offset: number, size: number): boolean {
		if (entry.size !== size) return false;
		for (let i = 0; i < size; i++) {
			if (this.store[entry.offset + i] !== this.store[offset + i]) return false;
		}
		return true;
	}
}

/**
 * Conservative test for text already in canonical number form: at most 15
 * characters, an integer part that is a single zero or has no leading zero,
 * and no trailing zero after the decimal point.
 */
export function isNumberCanonical(text: Uint8Array): boolean {
	const length = text.length;
	if (length === 0 || length > MAX_CANONICAL_LENGTH) return false;
	const isDigit = (b: number) => b >= 0x30 && b <= 0x39;
	let pos = 0;
	if (text[0] === 0x30) {
		pos = 1;
	} else {
		while (pos < length && isDigit(text[pos])) pos++;
		if (pos === 0) return false;
	}
	if (pos === length) return true;
	if (text[pos] !== 0x2e) return false;
	pos++;
	let lastDigitIsZero = true;
	while (pos < length) {
		const b = text[pos];
		if (!isDigit(b)) return false;
		lastDigitIsZero = b === 0x30;
		pos++;
	}
	return !lastDigitIsZero;
}
