import { MAX_LATIN1, MAX_UTF16_UNIT, codeUnitsToString, leadSurrogate, trailSurrogate } from './chars';

const INITIAL_CAPACITY = 16;
const GROWTH_FACTOR = 4;
// A single growth step never adds more than this many bytes.
const MAX_GROWTH = 1024 * 1024;

/**
 * Growable buffer holding the characters of one literal.
 *
 * Content starts narrow (Latin-1, one byte per character) and is widened in
 * place to UTF-16 the first time a character above 0xFF arrives. It stays
 * wide until {@link reset}.
 */
export class LiteralBuffer {
	private bytes: Uint8Array = new Uint8Array(0);
	private units: Uint16Array = new Uint16Array(0);
	// Length in bytes.
	private position = 0;
	private oneByte = true;

	addChar(codePoint: number): void {
		if (this.oneByte) {
			if (codePoint <= MAX_LATIN1) {
				if (this.position >= this.bytes.length) this.expand();
				this.bytes[this.position++] = codePoint;
				return;
			}
			this.convertToTwoByte();
		}
		if (codePoint <= MAX_UTF16_UNIT) {
			if (this.position + 2 > this.bytes.length) this.expand();
			this.units[this.position >> 1] = codePoint;
			this.position += 2;
			return;
		}
		// Both halves are written by the same call.
		while (this.position + 4 > this.bytes.length) this.expand();
		this.units[this.position >> 1] = leadSurrogate(codePoint);
		this.units[(this.position >> 1) + 1] = trailSurrogate(codePoint);
		this.position += 4;
	}

	isOneByte(): boolean {
		return this.oneByte;
	}

	/** Number of characters (bytes when narrow, UTF-16 units when wide). */
	length(): number {
		return this.oneByte ? this.position : this.position >> 1;
	}

	get capacity(): number {
		return this.bytes.length;
	}

	/** Borrowed view; valid until the buffer is next modified. */
	oneByteLiteral(): Uint8Array {
		return this.bytes.subarray(0, this.position);
	}

	/** Borrowed view; valid until the buffer is next modified. */
	twoByteLiteral(): Uint16Array {
		return this.units.subarray(0, this.position >> 1);
	}

	// Matches only narrow content of exactly the keyword's length.
	isContextualKeyword(keyword: string): boolean {
		if (!this.oneByte || this.position !== keyword.length) return false;
		for (let i = 0; i < keyword.length; i++) {
			if (this.bytes[i] !== keyword.charCodeAt(i)) return false;
		}
		return true;
	}

	/** Drops the last `n` characters. */
	reduceLength(n: number): void {
		const delta = this.oneByte ? n : n * 2;
		this.position = Math.max(0, this.position - delta);
	}

	reset(): void {
		this.position = 0;
		this.oneByte = true;
	}

	copyFrom(other: LiteralBuffer | null): void {
		if (!other) {
			this.reset();
			return;
		}
		this.oneByte = other.oneByte;
		this.position = other.position;
		if (this.position > this.bytes.length) this.replaceStore(new Uint8Array(other.bytes.length));
		this.bytes.set(other.bytes.subarray(0, other.position));
	}

	toString(): string {
		return codeUnitsToString(this.oneByte ? this.oneByteLiteral() : this.twoByteLiteral());
	}

	private newCapacity(minCapacity: number): number {
		const capacity = Math.max(minCapacity, this.bytes.length);
		return Math.min(capacity * GROWTH_FACTOR, capacity + MAX_GROWTH);
	}

	private expand(): void {
		const store = new Uint8Array(this.newCapacity(INITIAL_CAPACITY));
		store.set(this.bytes.subarray(0, this.position));
		this.replaceStore(store);
	}

	private convertToTwoByte(): void {
		const wideSize = this.position * 2;
		if (wideSize >= this.bytes.length) {
			const store = new Uint8Array(this.newCapacity(wideSize));
			const units = new Uint16Array(store.buffer);
			for (let i = 0; i < this.position; i++) units[i] = this.bytes[i];
			this.replaceStore(store);
		} else {
			// In place, back to front: unit i only overwrites bytes at or after i.
			for (let i = this.position - 1; i >= 0; i--) {
				const b = this.bytes[i];
				this.units[i] = b;
			}
		}
		this.position = wideSize;
		this.oneByte = false;
	}

	private replaceStore(store: Uint8Array): void {
		this.bytes = store;
		this.units = new Uint16Array(store.buffer, store.byteOffset, store.length >> 1);
	}
}
