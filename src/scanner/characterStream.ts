import { END_OF_INPUT } from './chars';
import { ScannerContractError } from './errors';

/**
 * Source of UTF-16 code units for the scanner.
 *
 * Subclasses supply blocks of text through {@link readBlock}; the base class
 * keeps the current block, a cursor into it and the absolute position. The
 * position also advances once for every read at end of input, so reading the
 * end marker of an `n`-unit source leaves `pos()` at `n + 1`.
 */
export abstract class CharacterStream {
	protected buffer = '';
	protected cursor = 0;
	protected position = 0;

	advance(): number {
		if (this.cursor < this.buffer.length || this.readBlock()) {
			this.position++;
			return this.buffer.charCodeAt(this.cursor++);
		}
		this.position++;
		return END_OF_INPUT;
	}

	pos(): number {
		return this.position;
	}

	/**
	 * Skips up to `n` code units, draining the current block before asking for
	 * more. Returns the number of units skipped, which is less than `n` only at
	 * end of input. Must not be directly followed by {@link pushBack}.
	 */
	seekForward(n: number): number {
		const buffered = Math.min(n, this.buffer.length - this.cursor);
		this.cursor += buffered;
		this.position += buffered;
		if (buffered === n) return n;
		const skipped = this.slowSeekForward(n - buffered);
		this.position += skipped;
		return buffered + skipped;
	}

	/** Undoes one {@link advance}. Pushing back END_OF_INPUT only rewinds the position. */
	pushBack(unit: number): void {
		if (this.position <= 0) throw new ScannerContractError('pushBack before any advance');
		this.position--;
		if (unit === END_OF_INPUT) return;
		if (this.cursor > 0) {
			this.cursor--;
			return;
		}
		this.slowPushBack(unit);
	}

	/** Returns false when the source cannot rewind. */
	setBookmark(): boolean {
		return false;
	}

	resetToBookmark(): void {
		throw new ScannerContractError(`${this.constructor.name} does not support bookmarks`);
	}

	// Loads the next non-empty block into `buffer` and rewinds `cursor`; false at end of input.
	protected abstract readBlock(): boolean;

	protected slowSeekForward(n: number): number {
		let skipped = 0;
		while (skipped < n && this.readBlock()) {
			const step = Math.min(n - skipped, this.buffer.length);
			this.cursor = step;
			skipped += step;
		}
		return skipped;
	}

	// The unit to restore precedes the current block.
	protected slowPushBack(unit: number): void {
		this.buffer = String.fromCharCode(unit) + this.buffer;
		this.cursor = 0;
	}
}

/** Whole-text source; supports bookmarks. */
export class StringCharacterStream extends CharacterStream {
	private bookmark: { cursor: number; position: number } | null = null;

	constructor(text: string, start = 0, end = text.length) {
		super();
		this.buffer = text.slice(start, end);
	}

	override setBookmark(): boolean {
		this.bookmark = { cursor: this.cursor, position: this.position };
		return true;
	}

	override resetToBookmark(): void {
		if (!this.bookmark) throw new ScannerContractError('no stream bookmark to reset to');
		this.cursor = this.bookmark.cursor;
		this.position = this.bookmark.position;
	}

	protected readBlock(): boolean {
		return false;
	}
}

/**
 * Streaming source over an iterable of text chunks (for example the pieces of
 * a file read incrementally). Chunks are pulled lazily; no bookmarks.
 */
export class ChunkedCharacterStream extends CharacterStream {
	private readonly chunks: Iterator<string>;
	private exhausted = false;

	constructor(chunks: Iterable<string>) {
		super();
		this.chunks = chunks[Symbol.iterator]();
	}

	protected readBlock(): boolean {
		while (!this.exhausted) {
			const step = this.chunks.next();
			if (step.done) {
				this.exhausted = true;
				break;
			}
			if (step.value.length === 0) continue;
			this.buffer = step.value;
			this.cursor = 0;
			return true;
		}
		return false;
	}
}
