import {
	CH,
	END_OF_INPUT,
	MAX_ASCII,
	MAX_CODE_POINT,
	MAX_UTF16_UNIT,
	combineSurrogatePair,
	hexValue,
	isBinaryDigit,
	isCarriageReturn,
	isDecimalDigit,
	isHexDigit,
	isIdentifierPart,
	isIdentifierStart,
	isLeadSurrogate,
	isLineFeed,
	isLineTerminator,
	isOctalDigit,
	isTrailSurrogate,
	isWhiteSpace,
	isWhiteSpaceOrLineTerminator,
	leadSurrogate,
	trailSurrogate,
} from './chars';
import { CharacterStream, StringCharacterStream } from './characterStream';
import type { DuplicateFinder } from './duplicateFinder';
import { SCANNER_ERRORS, ScannerContractError, type ScannerError, type ScannerErrorKind } from './errors';
import { LiteralBuffer } from './literalBuffer';
import { SMI_MAX_DIGITS, SMI_MAX_VALUE, stringToDouble } from './numbers';
import {
	INVALID_SPAN,
	ONE_CHAR_TOKENS,
	type Span,
	type Token,
	isStrictReservedWord,
	keepsLiteral,
	keywordOrIdentifier,
} from './tokens';

export interface ScannerOptions {
	/** Scan `**` and `**=` as operators (default true). */
	allowExponentiationOperator?: boolean;
	/** Treat `<!--` and line-leading `-->` as single-line comments (default true). */
	allowHtmlComments?: boolean;
}

export const REGEXP_FLAGS = {
	g: 1,
	i: 2,
	m: 4,
	y: 8,
	u: 16,
} as const;

export type BookmarkState = 'not-set' | 'set' | 'applied';

interface TokenDesc {
	token: Token;
	start: number;
	end: number;
	literal: LiteralBuffer | null;
	rawLiteral: LiteralBuffer | null;
	smi: number | null;
}

interface Bookmark {
	c0: number;
	// Literal fields hold private copies.
	current: TokenDesc;
	next: TokenDesc;
	lineTerminatorBeforeNext: boolean;
	multilineCommentBeforeNext: boolean;
	error: ScannerError | null;
	octalPos: Span;
	htmlCommentFound: boolean;
}

type NumberKind = 'decimal' | 'hex' | 'octal' | 'implicit-octal' | 'binary';

const LITERAL_POOL_SIZE = 3;

function emptyDesc(): TokenDesc {
	return { token: '<uninitialized>', start: -1, end: -1, literal: null, rawLiteral: null, smi: null };
}

function copyDesc(to: TokenDesc, from: TokenDesc): void {
	to.token = from.token;
	to.start = from.start;
	to.end = from.end;
	to.literal = from.literal;
	to.rawLiteral = from.rawLiteral;
	to.smi = from.smi;
}

function clearDesc(desc: TokenDesc): void {
	desc.token = '<uninitialized>';
	desc.start = -1;
	desc.end = -1;
	desc.literal = null;
	desc.rawLiteral = null;
	desc.smi = null;
}

function cloneBuffer(buffer: LiteralBuffer | null): LiteralBuffer | null {
	if (!buffer) return null;
	const copy = new LiteralBuffer();
	copy.copyFrom(buffer);
	return copy;
}

function restoreBuffer(target: LiteralBuffer, saved: LiteralBuffer | null): LiteralBuffer | null {
	if (!saved) return null;
	target.copyFrom(saved);
	return target;
}

function pickFree(pool: readonly LiteralBuffer[], busy: LiteralBuffer | null, alsoBusy: LiteralBuffer | null): LiteralBuffer {
	for (const buffer of pool) {
		if (buffer === busy || buffer === alsoBusy) continue;
		buffer.reset();
		return buffer;
	}
	throw new ScannerContractError('no free literal buffer');
}

function containsEscapes(desc: TokenDesc): boolean {
	if (!desc.literal) return false;
	let sourceLength = desc.end - desc.start;
	if (desc.token === '<string>') sourceLength -= 2;
	return desc.literal.length() !== sourceLength;
}

function regExpFlag(c: number): number {
	switch (c) {
		case CH.LOWER_G: return REGEXP_FLAGS.g;
		case CH.LOWER_I: return REGEXP_FLAGS.i;
		case CH.LOWER_M: return REGEXP_FLAGS.m;
		case CH.LOWER_U: return REGEXP_FLAGS.u;
		case CH.LOWER_Y: return REGEXP_FLAGS.y;
		default: return 0;
	}
}

/**
 * Lexical scanner with one token of lookahead (two after {@link peekAhead})
 * and a single rewindable bookmark.
 *
 * The scanner keeps three token descriptors (current, next, next-next) and
 * two pools of three literal buffers, one for cooked text and one for raw
 * template text. A buffer is never referenced by two live descriptors.
 *
 * Lexical errors are latched: the first one is kept, later reports are
 * ignored, and scanning carries on with `<illegal>` tokens.
 */
export class Scanner {
	allowExponentiationOperator: boolean;
	allowHtmlComments: boolean;

	private source: CharacterStream = new StringCharacterStream('');
	private initialized = false;
	// One code point of lookahead; surrogate pairs are combined.
	private c0 = END_OF_INPUT;

	private readonly currentDesc = emptyDesc();
	private readonly nextDesc = emptyDesc();
	private readonly nextNextDesc = emptyDesc();
	// Holds `current` while peekAhead() scans past it.
	private readonly peekSaved = emptyDesc();
	private peeking = false;

	private readonly literalBuffers: readonly LiteralBuffer[];
	private readonly rawBuffers: readonly LiteralBuffer[];
	private readonly sourceUrlBuffer = new LiteralBuffer();
	private readonly sourceMappingUrlBuffer = new LiteralBuffer();
	private readonly magicCommentName = new LiteralBuffer();

	private lineTerminatorBeforeNext = false;
	private multilineCommentBeforeNext = false;
	private lineTerminatorAfterNext = false;

	private octalPos: Span = { ...INVALID_SPAN };
	private scannerError: ScannerError | null = null;
	private htmlCommentFound = false;

	private bookmarkState: BookmarkState = 'not-set';
	private bookmark: Bookmark | null = null;

	constructor(options: ScannerOptions = {}) {
		this.allowExponentiationOperator = options.allowExponentiationOperator ?? true;
		this.allowHtmlComments = options.allowHtmlComments ?? true;
		const literals: LiteralBuffer[] = [];
		const raws: LiteralBuffer[] = [];
		for (let i = 0; i < LITERAL_POOL_SIZE; i++) {
			literals.push(new LiteralBuffer());
			raws.push(new LiteralBuffer());
		}
		this.literalBuffers = literals;
		this.rawBuffers = raws;
	}

	/** Binds the scanner to its stream and scans the first token. */
	initialize(source: CharacterStream): void {
		if (this.initialized) throw new ScannerContractError('scanner is already bound to a stream');
		this.source = source;
		this.initialized = true;
		this.advance();
		// The first token counts as starting a line.
		this.lineTerminatorBeforeNext = true;
		this.scan();
	}

	// ---------------------------------------------------------------
	// Token stream
	// ---------------------------------------------------------------

	/** Consumes the lookahead token and returns it. */
	next(): Token {
		this.ensureInitialized();
		copyDesc(this.currentDesc, this.nextDesc);
		if (this.nextNextDesc.token !== '<uninitialized>') {
			copyDesc(this.nextDesc, this.nextNextDesc);
			clearDesc(this.nextNextDesc);
			this.lineTerminatorBeforeNext = this.lineTerminatorAfterNext;
			this.multilineCommentBeforeNext = false;
			return this.currentDesc.token;
		}
		this.lineTerminatorBeforeNext = false;
		this.multilineCommentBeforeNext = false;
		if (this.c0 >= 0 && this.c0 <= MAX_ASCII) {
			const token = ONE_CHAR_TOKENS.get(this.c0);
			if (token) {
				const pos = this.sourcePos();
				const next = this.nextDesc;
				next.token = token;
				next.start = pos;
				next.end = pos + 1;
				next.literal = null;
				next.rawLiteral = null;
				next.smi = null;
				this.advance();
				return this.currentDesc.token;
			}
		}
		this.scan();
		return this.currentDesc.token;
	}

	/** Scans the token after the lookahead without consuming anything. */
	peekAhead(): Token {
		this.ensureInitialized();
		if (this.nextNextDesc.token !== '<uninitialized>') return this.nextNextDesc.token;
		copyDesc(this.peekSaved, this.currentDesc);
		const lineTerminatorBefore = this.hasAnyLineTerminatorBeforeNext();
		this.peeking = true;
		try {
			this.next();
		} finally {
			this.peeking = false;
		}
		this.lineTerminatorAfterNext = this.hasAnyLineTerminatorBeforeNext();
		this.lineTerminatorBeforeNext = lineTerminatorBefore;
		this.multilineCommentBeforeNext = false;
		copyDesc(this.nextNextDesc, this.nextDesc);
		copyDesc(this.nextDesc, this.currentDesc);
		copyDesc(this.currentDesc, this.peekSaved);
		clearDesc(this.peekSaved);
		return this.nextNextDesc.token;
	}

	currentToken(): Token { return this.currentDesc.token; }
	peek(): Token { return this.nextDesc.token; }
	location(): Span { return { start: this.currentDesc.start, end: this.currentDesc.end }; }
	peekLocation(): Span { return { start: this.nextDesc.start, end: this.nextDesc.end }; }

	/** True when a line terminator, possibly inside a block comment, precedes the lookahead token. */
	hasAnyLineTerminatorBeforeNext(): boolean {
		return this.lineTerminatorBeforeNext || this.multilineCommentBeforeNext;
	}

	// ---------------------------------------------------------------
	// Literal access
	// ---------------------------------------------------------------

	currentLiteral(): string | null { return this.currentDesc.literal?.toString() ?? null; }
	nextLiteral(): string | null { return this.nextDesc.literal?.toString() ?? null; }
	currentRawLiteral(): string | null { return this.currentDesc.rawLiteral?.toString() ?? null; }
	nextRawLiteral(): string | null { return this.nextDesc.rawLiteral?.toString() ?? null; }

	literalOneByteString(): Uint8Array { return this.literalOf(this.currentDesc).oneByteLiteral(); }
	literalTwoByteString(): Uint16Array { return this.literalOf(this.currentDesc).twoByteLiteral(); }
	isLiteralOneByte(): boolean { return this.literalOf(this.currentDesc).isOneByte(); }
	literalLength(): number { return this.literalOf(this.currentDesc).length(); }

	nextLiteralOneByteString(): Uint8Array { return this.literalOf(this.nextDesc).oneByteLiteral(); }
	nextLiteralTwoByteString(): Uint16Array { return this.literalOf(this.nextDesc).twoByteLiteral(); }
	isNextLiteralOneByte(): boolean { return this.literalOf(this.nextDesc).isOneByte(); }

	rawLiteralOneByteString(): Uint8Array { return this.rawLiteralOf(this.currentDesc).oneByteLiteral(); }
	rawLiteralTwoByteString(): Uint16Array { return this.rawLiteralOf(this.currentDesc).twoByteLiteral(); }
	isRawLiteralOneByte(): boolean { return this.rawLiteralOf(this.currentDesc).isOneByte(); }

	literalContainsEscapes(): boolean { return containsEscapes(this.currentDesc); }
	nextLiteralContainsEscapes(): boolean { return containsEscapes(this.nextDesc); }

	isLiteralContextualKeyword(keyword: string): boolean {
		return this.currentDesc.literal?.isContextualKeyword(keyword) ?? false;
	}

	isNextContextualKeyword(keyword: string): boolean {
		return this.nextDesc.literal?.isContextualKeyword(keyword) ?? false;
	}

	/** Compares the current literal against `text`; escaped spellings only match when `allowEscapes`. */
	literalMatches(text: string, allowEscapes = true): boolean {
		const literal = this.currentDesc.literal;
		if (!literal || !literal.isContextualKeyword(text)) return false;
		return allowEscapes || !containsEscapes(this.currentDesc);
	}

	unescapedLiteralMatches(text: string): boolean {
		return this.literalMatches(text, false);
	}

	isGetOrSet(): { isGet: boolean; isSet: boolean } {
		const literal = this.currentDesc.literal;
		if (!literal || literal.length() !== 3 || containsEscapes(this.currentDesc)) return { isGet: false, isSet: false };
		const isGet = literal.isContextualKeyword('get');
		return { isGet, isSet: !isGet && literal.isContextualKeyword('set') };
	}

	// ---------------------------------------------------------------
	// Numbers
	// ---------------------------------------------------------------

	doubleValue(): number {
		return stringToDouble(this.literalOf(this.currentDesc).toString());
	}

	/** Small-integer value of the current number token, when it took the fast path. */
	smiValue(): number | null {
		return this.currentDesc.smi;
	}

	containsDot(): boolean {
		const literal = this.literalOf(this.currentDesc);
		if (!literal.isOneByte()) return false;
		return literal.oneByteLiteral().includes(CH.DOT);
	}

	/** Adds the current literal to `finder`; see {@link DuplicateFinder.addOneByteSymbol}. */
	findSymbol(finder: DuplicateFinder, value: number): number {
		const literal = this.literalOf(this.currentDesc);
		if (literal.isOneByte()) return finder.addOneByteSymbol(literal.oneByteLiteral(), value);
		return finder.addTwoByteSymbol(literal.twoByteLiteral(), value);
	}

	// ---------------------------------------------------------------
	// Errors and side channels
	// ---------------------------------------------------------------

	/** Span of the last legacy octal literal or escape. */
	octalPosition(): Span { return { ...this.octalPos }; }
	clearOctalPosition(): void { this.octalPos = { ...INVALID_SPAN }; }

	hasError(): boolean { return this.scannerError !== null; }
	error(): ScannerErrorKind | null { return this.scannerError?.kind ?? null; }
	errorLocation(): Span {
		return this.scannerError ? { ...this.scannerError.location } : { ...INVALID_SPAN };
	}

	foundHtmlComment(): boolean { return this.htmlCommentFound; }
	sourceUrl(): LiteralBuffer { return this.sourceUrlBuffer; }
	sourceMappingUrl(): LiteralBuffer { return this.sourceMappingUrlBuffer; }

	identifierIsFutureStrictReserved(name: string): boolean {
		if (name === 'let' || name === 'static') return true;
		return keywordOrIdentifier(name) === '<future-strict-reserved>';
	}

	/**
	 * Makes the token starting at `pos` the lookahead token. Only forward
	 * seeks to a token boundary are supported; the current token is left stale.
	 */
	seekForward(pos: number): void {
		this.ensureInitialized();
		if (pos === this.nextDesc.start) return;
		if (this.nextNextDesc.token !== '<uninitialized>') throw new ScannerContractError('seekForward with a token peeked ahead');
		const currentPos = this.sourcePos();
		if (pos < currentPos) throw new ScannerContractError(`cannot seek back from ${currentPos} to ${pos}`);
		if (pos !== currentPos) {
			const delta = pos - this.source.pos();
			if (delta < 0) throw new ScannerContractError(`cannot seek into the middle of a surrogate pair at ${pos}`);
			this.source.seekForward(delta);
			this.advance();
			// Whatever was skipped no longer counts.
			this.lineTerminatorBeforeNext = false;
			this.multilineCommentBeforeNext = false;
		}
		this.scan();
	}

	// ---------------------------------------------------------------
	// Consumer-driven scanning
	// ---------------------------------------------------------------

	/**
	 * Rescans the lookahead `/` (or `/=` when `seenEqual`) token as the start of
	 * a regular expression literal. On success the lookahead token becomes
	 * `<regexp>` with the pattern body as its literal.
	 */
	scanRegExpPattern(seenEqual: boolean): boolean {
		this.ensureInitialized();
		this.requireNoPeekAhead('scanRegExpPattern');
		const expected: Token = seenEqual ? '/=' : '/';
		if (this.nextDesc.token !== expected) {
			throw new ScannerContractError(`scanRegExpPattern expects '${expected}' but the lookahead is '${this.nextDesc.token}'`);
		}
		const next = this.nextDesc;
		const pos = this.sourcePos();
		next.start = pos - (seenEqual ? 2 : 1);
		next.end = pos - (seenEqual ? 1 : 0);
		next.rawLiteral = null;
		next.smi = null;
		let inCharacterClass = false;
		this.startLiteral();
		let complete = false;
		try {
			if (seenEqual) this.addLiteralChar(CH.EQ);
			while (this.c0 !== CH.SLASH || inCharacterClass) {
				if (this.c0 === END_OF_INPUT || isLineTerminator(this.c0)) return this.unterminatedRegExp();
				if (this.c0 === CH.BACKSLASH) {
					this.addLiteralCharAdvance();
					if (this.c0 === END_OF_INPUT || isLineTerminator(this.c0)) return this.unterminatedRegExp();
					this.addLiteralCharAdvance();
				} else {
					if (this.c0 === CH.LBRACK) inCharacterClass = true;
					if (this.c0 === CH.RBRACK) inCharacterClass = false;
					this.addLiteralCharAdvance();
				}
			}
			this.advance();
			complete = true;
			next.token = '<regexp>';
			next.end = this.sourcePos();
			return true;
		} finally {
			if (!complete) this.dropLiteral();
		}
	}

	/**
	 * Scans the flags after a regular expression body into the raw literal of
	 * the lookahead token. Returns the {@link REGEXP_FLAGS} bitmask, or null on
	 * an unknown or repeated flag (the token then becomes `<illegal>`).
	 */
	scanRegExpFlags(): number | null {
		this.ensureInitialized();
		if (this.nextDesc.token !== '<regexp>') {
			throw new ScannerContractError(`scanRegExpFlags expects a regexp lookahead but found '${this.nextDesc.token}'`);
		}
		this.startRawLiteral();
		let flags = 0;
		while (this.c0 !== END_OF_INPUT && isIdentifierPart(this.c0)) {
			const flag = regExpFlag(this.c0);
			if (flag === 0 || (flags & flag) !== 0) {
				this.reportErrorAt(this.sourcePos(), SCANNER_ERRORS.MALFORMED_REGEXP_FLAGS);
				while (this.c0 !== END_OF_INPUT && isIdentifierPart(this.c0)) this.advance();
				this.nextDesc.rawLiteral = null;
				this.nextDesc.token = '<illegal>';
				this.nextDesc.end = this.sourcePos();
				return null;
			}
			this.addRawLiteralChar(this.c0);
			this.advance();
			flags |= flag;
		}
		this.nextDesc.end = this.sourcePos();
		return flags;
	}

	/** Resumes a template literal when the lookahead `}` closes a substitution. */
	scanTemplateContinuation(): Token {
		this.ensureInitialized();
		this.requireNoPeekAhead('scanTemplateContinuation');
		if (this.nextDesc.token !== '}') {
			throw new ScannerContractError(`scanTemplateContinuation expects '}' but the lookahead is '${this.nextDesc.token}'`);
		}
		const next = this.nextDesc;
		next.start = this.sourcePos() - 1;
		next.literal = null;
		next.rawLiteral = null;
		next.smi = null;
		const token = this.scanTemplateSpan();
		next.token = token;
		next.end = this.sourcePos();
		return token;
	}

	// ---------------------------------------------------------------
	// Bookmarks
	// ---------------------------------------------------------------

	/**
	 * Saves the scanner state for one later {@link resetToBookmark}. Fails when
	 * the stream cannot rewind, a bookmark is outstanding or a token has been
	 * peeked ahead.
	 */
	setBookmark(): boolean {
		this.ensureInitialized();
		if (this.bookmarkState !== 'not-set') return false;
		if (this.nextNextDesc.token !== '<uninitialized>') return false;
		if (!this.source.setBookmark()) return false;
		this.bookmark = {
			c0: this.c0,
			current: { ...this.currentDesc, literal: cloneBuffer(this.currentDesc.literal), rawLiteral: cloneBuffer(this.currentDesc.rawLiteral) },
			next: { ...this.nextDesc, literal: cloneBuffer(this.nextDesc.literal), rawLiteral: cloneBuffer(this.nextDesc.rawLiteral) },
			lineTerminatorBeforeNext: this.lineTerminatorBeforeNext,
			multilineCommentBeforeNext: this.multilineCommentBeforeNext,
			error: this.scannerError,
			octalPos: { ...this.octalPos },
			htmlCommentFound: this.htmlCommentFound,
		};
		this.bookmarkState = 'set';
		return true;
	}

	resetToBookmark(): void {
		const saved = this.bookmark;
		if (this.bookmarkState !== 'set' || !saved) {
			throw new ScannerContractError(`resetToBookmark in state '${this.bookmarkState}'`);
		}
		this.source.resetToBookmark();
		this.c0 = saved.c0;
		copyDesc(this.currentDesc, saved.current);
		this.currentDesc.literal = restoreBuffer(pickFree(this.literalBuffers, null, null), saved.current.literal);
		this.currentDesc.rawLiteral = restoreBuffer(pickFree(this.rawBuffers, null, null), saved.current.rawLiteral);
		copyDesc(this.nextDesc, saved.next);
		this.nextDesc.literal = restoreBuffer(pickFree(this.literalBuffers, this.currentDesc.literal, null), saved.next.literal);
		this.nextDesc.rawLiteral = restoreBuffer(pickFree(this.rawBuffers, this.currentDesc.rawLiteral, null), saved.next.rawLiteral);
		clearDesc(this.nextNextDesc);
		this.lineTerminatorBeforeNext = saved.lineTerminatorBeforeNext;
		this.multilineCommentBeforeNext = saved.multilineCommentBeforeNext;
		this.scannerError = saved.error;
		this.octalPos = { ...saved.octalPos };
		this.htmlCommentFound = saved.htmlCommentFound;
		this.bookmark = null;
		this.bookmarkState = 'applied';
	}

	dropBookmark(): void {
		this.bookmark = null;
		this.bookmarkState = 'not-set';
	}

	bookmarkHasBeenSet(): boolean { return this.bookmarkState === 'set'; }
	bookmarkHasBeenReset(): boolean { return this.bookmarkState === 'applied'; }

	// ---------------------------------------------------------------
	// Low-level input
	// ---------------------------------------------------------------

	private ensureInitialized(): void {
		if (!this.initialized) throw new ScannerContractError('scanner used before initialize()');
	}

	private requireNoPeekAhead(operation: string): void {
		if (this.nextNextDesc.token !== '<uninitialized>') {
			throw new ScannerContractError(`${operation} cannot run while a token is peeked ahead`);
		}
	}

	// Position of c0 in code units.
	private sourcePos(): number {
		return this.source.pos() - (this.c0 > MAX_UTF16_UNIT ? 2 : 1);
	}

	private advance(captureRaw = false, checkSurrogate = true): void {
		if (captureRaw && this.c0 !== END_OF_INPUT) this.addRawLiteralChar(this.c0);
		this.c0 = this.source.advance();
		if (checkSurrogate) this.handleLeadSurrogate();
	}

	private handleLeadSurrogate(): void {
		if (!isLeadSurrogate(this.c0)) return;
		const c1 = this.source.advance();
		if (isTrailSurrogate(c1)) this.c0 = combineSurrogatePair(this.c0, c1);
		else this.source.pushBack(c1);
	}

	// Returns c0 to the stream and makes `ch` the lookahead.
	private pushBack(ch: number): void {
		if (this.c0 > MAX_UTF16_UNIT) {
			this.source.pushBack(trailSurrogate(this.c0));
			this.source.pushBack(leadSurrogate(this.c0));
		} else {
			this.source.pushBack(this.c0);
		}
		this.c0 = ch;
	}

	private select(token: Token): Token {
		this.advance();
		return token;
	}

	private selectIf(expected: number, then: Token, otherwise: Token): Token {
		this.advance();
		if (this.c0 === expected) {
			this.advance();
			return then;
		}
		return otherwise;
	}

	// ---------------------------------------------------------------
	// Literal buffers
	// ---------------------------------------------------------------

	private startLiteral(): void {
		const busy = this.peeking ? this.peekSaved.literal : null;
		this.nextDesc.literal = pickFree(this.literalBuffers, this.currentDesc.literal, busy);
	}

	private startRawLiteral(): void {
		const busy = this.peeking ? this.peekSaved.rawLiteral : null;
		this.nextDesc.rawLiteral = pickFree(this.rawBuffers, this.currentDesc.rawLiteral, busy);
	}

	private addLiteralChar(c: number): void {
		this.nextDesc.literal?.addChar(c);
	}

	private addRawLiteralChar(c: number): void {
		this.nextDesc.rawLiteral?.addChar(c);
	}

	private addLiteralCharAdvance(): void {
		this.addLiteralChar(this.c0);
		this.advance();
	}

	private reduceRawLiteralLength(n: number): void {
		this.nextDesc.rawLiteral?.reduceLength(n);
	}

	private dropLiteral(): void {
		this.nextDesc.literal = null;
		this.nextDesc.rawLiteral = null;
	}

	private literalOf(desc: TokenDesc): LiteralBuffer {
		if (!desc.literal) throw new ScannerContractError(`token '${desc.token}' carries no literal`);
		return desc.literal;
	}

	private rawLiteralOf(desc: TokenDesc): LiteralBuffer {
		if (!desc.rawLiteral) throw new ScannerContractError(`token '${desc.token}' carries no raw literal`);
		return desc.rawLiteral;
	}

	// ---------------------------------------------------------------
	// Errors
	// ---------------------------------------------------------------

	private reportError(kind: ScannerErrorKind, location: Span): void {
		if (this.scannerError) return;
		this.scannerError = { kind, location: { start: location.start, end: location.end } };
	}

	private reportErrorAt(pos: number, kind: ScannerErrorKind): void {
		this.reportError(kind, { start: pos, end: pos + 1 });
	}

	private unterminatedRegExp(): false {
		this.reportError(SCANNER_ERRORS.UNTERMINATED_REGEXP, { start: this.nextDesc.start, end: this.sourcePos() });
		this.nextDesc.token = '<illegal>';
		this.nextDesc.end = this.sourcePos();
		return false;
	}

	// ---------------------------------------------------------------
	// Scanning
	// ---------------------------------------------------------------

	private scan(): void {
		const next = this.nextDesc;
		next.literal = null;
		next.rawLiteral = null;
		next.smi = null;
		let token: Token;
		do {
			next.start = this.sourcePos();
			token = this.scanToken();
		} while (token === '<whitespace>');
		// The end-of-input token spans the one position past the last unit.
		next.end = token === '<eos>' ? next.start + 1 : this.sourcePos();
		next.token = token;
	}

	private scanToken(): Token {
		switch (this.c0) {
			case CH.DQUOTE:
			case CH.SQUOTE:
				return this.scanString();

			case CH.LT:
				// < <= << <<= <!--
				this.advance();
				if (this.c0 === CH.EQ) return this.select('<=');
				if (this.c0 === CH.LT) return this.selectIf(CH.EQ, '<<=', '<<');
				if (this.c0 === CH.BANG && this.allowHtmlComments) return this.scanHtmlComment();
				return '<';

			case CH.GT:
				// > >= >> >>= >>> >>>=
				this.advance();
				if (this.c0 === CH.EQ) return this.select('>=');
				if (this.c0 === CH.GT) {
					this.advance();
					if (this.c0 === CH.EQ) return this.select('>>=');
					if (this.c0 === CH.GT) return this.selectIf(CH.EQ, '>>>=', '>>>');
					return '>>';
				}
				return '>';

			case CH.EQ:
				// = == === =>
				this.advance();
				if (this.c0 === CH.EQ) return this.selectIf(CH.EQ, '===', '==');
				if (this.c0 === CH.GT) return this.select('=>');
				return '=';

			case CH.BANG:
				// ! != !==
				this.advance();
				if (this.c0 === CH.EQ) return this.selectIf(CH.EQ, '!==', '!=');
				return '!';

			case CH.PLUS:
				// + ++ +=
				this.advance();
				if (this.c0 === CH.PLUS) return this.select('++');
				if (this.c0 === CH.EQ) return this.select('+=');
				return '+';

			case CH.MINUS:
				// - -- --> -=
				this.advance();
				if (this.c0 === CH.MINUS) {
					this.advance();
					if (this.c0 === CH.GT && this.allowHtmlComments && this.hasAnyLineTerminatorBeforeNext()) {
						this.htmlCommentFound = true;
						return this.skipSingleLineComment();
					}
					return '--';
				}
				if (this.c0 === CH.EQ) return this.select('-=');
				return '-';

			case CH.STAR:
				// * *= ** **=
				this.advance();
				if (this.c0 === CH.STAR && this.allowExponentiationOperator) return this.selectIf(CH.EQ, '**=', '**');
				if (this.c0 === CH.EQ) return this.select('*=');
				return '*';

			case CH.PERCENT:
				return this.selectIf(CH.EQ, '%=', '%');

			case CH.SLASH:
				// / // /* /=
				this.advance();
				if (this.c0 === CH.SLASH) {
					this.advance();
					if (this.c0 === CH.HASH || this.c0 === CH.AT) {
						this.advance();
						return this.skipSourceUrlComment();
					}
					return this.skipToLineEnd();
				}
				if (this.c0 === CH.STAR) return this.skipMultiLineComment();
				if (this.c0 === CH.EQ) return this.select('/=');
				return '/';

			case CH.AMP:
				// & && &=
				this.advance();
				if (this.c0 === CH.AMP) return this.select('&&');
				if (this.c0 === CH.EQ) return this.select('&=');
				return '&';

			case CH.PIPE:
				// | || |=
				this.advance();
				if (this.c0 === CH.PIPE) return this.select('||');
				if (this.c0 === CH.EQ) return this.select('|=');
				return '|';

			case CH.CARET:
				return this.selectIf(CH.EQ, '^=', '^');

			case CH.DOT:
				// . ... and numbers starting with a period
				this.advance();
				if (isDecimalDigit(this.c0)) return this.scanNumber(true);
				if (this.c0 === CH.DOT) {
					this.advance();
					if (this.c0 === CH.DOT) return this.select('...');
					this.pushBack(CH.DOT);
				}
				return '.';

			case CH.BACKTICK:
				return this.scanTemplateStart();

			default: {
				if (this.c0 === END_OF_INPUT) return '<eos>';
				const single = ONE_CHAR_TOKENS.get(this.c0);
				if (single) return this.select(single);
				if (isIdentifierStart(this.c0)) return this.scanIdentifierOrKeyword();
				if (isDecimalDigit(this.c0)) return this.scanNumber(false);
				if (this.skipWhiteSpace()) return '<whitespace>';
				return this.select('<illegal>');
			}
		}
	}

	private skipWhiteSpace(): boolean {
		const start = this.sourcePos();
		while (this.c0 !== END_OF_INPUT) {
			if (isLineTerminator(this.c0)) this.lineTerminatorBeforeNext = true;
			else if (!isWhiteSpace(this.c0)) break;
			this.advance();
		}
		return this.sourcePos() !== start;
	}

	// c0 is the last character of the comment introducer.
	private skipSingleLineComment(): Token {
		this.advance();
		return this.skipToLineEnd();
	}

	// The line terminator is not part of the comment.
	private skipToLineEnd(): Token {
		while (this.c0 !== END_OF_INPUT && !isLineTerminator(this.c0)) this.advance();
		return '<whitespace>';
	}

	private skipSourceUrlComment(): Token {
		this.tryParseSourceUrlComment();
		return this.skipToLineEnd();
	}

	// Magic comments have the form //[#@] <name>=<value> with optional trailing whitespace.
	private tryParseSourceUrlComment(): void {
		if (!isWhiteSpace(this.c0)) return;
		this.advance();
		const name = this.magicCommentName;
		name.reset();
		while (this.c0 !== END_OF_INPUT && !isWhiteSpaceOrLineTerminator(this.c0) && this.c0 !== CH.EQ) {
			name.addChar(this.c0);
			this.advance();
		}
		let value: LiteralBuffer;
		if (name.isContextualKeyword('sourceURL')) value = this.sourceUrlBuffer;
		else if (name.isContextualKeyword('sourceMappingURL')) value = this.sourceMappingUrlBuffer;
		else return;
		if (this.c0 !== CH.EQ) return;
		this.advance();
		value.reset();
		while (this.c0 !== END_OF_INPUT && isWhiteSpace(this.c0)) this.advance();
		while (this.c0 !== END_OF_INPUT && !isLineTerminator(this.c0)) {
			if (this.c0 === CH.DQUOTE || this.c0 === CH.SQUOTE) {
				value.reset();
				break;
			}
			if (isWhiteSpace(this.c0)) break;
			value.addChar(this.c0);
			this.advance();
		}
		// Only whitespace may follow the value.
		while (this.c0 !== END_OF_INPUT && !isLineTerminator(this.c0)) {
			if (!isWhiteSpace(this.c0)) {
				value.reset();
				break;
			}
			this.advance();
		}
	}

	// c0 is the '*' of '/*'.
	private skipMultiLineComment(): Token {
		this.advance();
		while (this.c0 !== END_OF_INPUT) {
			const ch = this.c0;
			this.advance();
			// A comment spanning lines counts as a line terminator.
			if (this.c0 !== END_OF_INPUT && isLineTerminator(ch)) this.multilineCommentBeforeNext = true;
			if (ch === CH.STAR && this.c0 === CH.SLASH) {
				this.advance();
				return '<whitespace>';
			}
		}
		this.reportError(SCANNER_ERRORS.UNTERMINATED_COMMENT, { start: this.nextDesc.start, end: this.sourcePos() });
		return '<illegal>';
	}

	// c0 is the '!' of '<!'.
	private scanHtmlComment(): Token {
		this.advance();
		if (this.c0 === CH.MINUS) {
			this.advance();
			if (this.c0 === CH.MINUS) {
				this.htmlCommentFound = true;
				return this.skipSingleLineComment();
			}
			this.pushBack(CH.MINUS);
		}
		this.pushBack(CH.BANG);
		return '<';
	}

	private scanString(): Token {
		const quote = this.c0;
		this.advance(false, false);
		this.startLiteral();
		let complete = false;
		try {
			while (this.c0 !== quote && this.c0 !== END_OF_INPUT && !isLineTerminator(this.c0)) {
				const c = this.c0;
				this.advance(false, false);
				if (c !== CH.BACKSLASH) {
					this.addLiteralChar(c);
					continue;
				}
				if (this.c0 === END_OF_INPUT) break;
				if (!this.scanEscape(false, false)) return '<illegal>';
			}
			if (this.c0 !== quote) {
				this.reportError(SCANNER_ERRORS.UNTERMINATED_STRING, { start: this.nextDesc.start, end: this.sourcePos() });
				return '<illegal>';
			}
			complete = true;
			this.advance();
			return '<string>';
		} finally {
			if (!complete) this.dropLiteral();
		}
	}

	// The backslash has been consumed; c0 is the escaped character.
	private scanEscape(captureRaw: boolean, inTemplate: boolean): boolean {
		let c = this.c0;
		this.advance(captureRaw);

		// Escaped line terminators (CR LF counts as one) contribute nothing.
		if (!inTemplate && isLineTerminator(c)) {
			if (isCarriageReturn(c) && isLineFeed(this.c0)) this.advance(captureRaw);
			return true;
		}

		switch (c) {
			case CH.LOWER_B: c = 0x08; break;
			case CH.LOWER_F: c = 0x0c; break;
			case CH.LOWER_N: c = 0x0a; break;
			case CH.LOWER_R: c = 0x0d; break;
			case CH.LOWER_T: c = 0x09; break;
			case CH.LOWER_V: c = 0x0b; break;
			case CH.LOWER_U:
				c = this.scanUnicodeEscape(captureRaw);
				if (c < 0) return false;
				break;
			case CH.LOWER_X:
				c = this.scanHexNumber(captureRaw, 2, false);
				if (c < 0) return false;
				break;
			default:
				if (isOctalDigit(c)) {
					c = this.scanOctalEscape(c, 2, captureRaw, inTemplate);
					if (c < 0) return false;
				}
				// Any other escaped character stands for itself.
				break;
		}
		this.addLiteralChar(c);
		return true;
	}

	private scanOctalEscape(c: number, length: number, captureRaw: boolean, inTemplate: boolean): number {
		let x = c - CH.ZERO;
		let i = 0;
		for (; i < length; i++) {
			const d = this.c0 - CH.ZERO;
			if (d < 0 || d > 7) break;
			const nx = x * 8 + d;
			if (nx >= 256) break;
			x = nx;
			this.advance(captureRaw);
		}
		// A lone \0 is not an octal escape.
		if (c !== CH.ZERO || i > 0) {
			const pos = this.sourcePos();
			const span = { start: pos - i - 1, end: pos };
			if (inTemplate) {
				this.reportError(SCANNER_ERRORS.TEMPLATE_OCTAL_LITERAL, span);
				return -1;
			}
			this.octalPos = span;
		}
		return x;
	}

	// c0 is the first hex digit; the escape started two units earlier.
	private scanHexNumber(captureRaw: boolean, expectedLength: number, unicode: boolean): number {
		const begin = this.sourcePos() - 2;
		let x = 0;
		for (let i = 0; i < expectedLength; i++) {
			const d = hexValue(this.c0);
			if (d < 0) {
				const kind = unicode ? SCANNER_ERRORS.INVALID_UNICODE_ESCAPE : SCANNER_ERRORS.INVALID_HEX_ESCAPE;
				this.reportError(kind, { start: begin, end: begin + expectedLength + 2 });
				return -1;
			}
			x = x * 16 + d;
			this.advance(captureRaw);
		}
		return x;
	}

	// Accepts \uXXXX and \u{X...}; '\' and 'u' are already consumed.
	private scanUnicodeEscape(captureRaw: boolean): number {
		if (this.c0 !== CH.LBRACE) return this.scanHexNumber(captureRaw, 4, true);
		const begin = this.sourcePos() - 2;
		this.advance(captureRaw);
		const cp = this.scanUnlimitedLengthHexNumber(captureRaw, MAX_CODE_POINT, begin);
		if (cp < 0 || this.c0 !== CH.RBRACE) {
			this.reportErrorAt(this.sourcePos(), SCANNER_ERRORS.INVALID_UNICODE_ESCAPE);
			return -1;
		}
		this.advance(captureRaw);
		return cp;
	}

	private scanUnlimitedLengthHexNumber(captureRaw: boolean, maxValue: number, begin: number): number {
		let d = hexValue(this.c0);
		if (d < 0) return -1;
		let x = 0;
		while (d >= 0) {
			x = x * 16 + d;
			if (x > maxValue) {
				this.reportError(SCANNER_ERRORS.UNDEFINED_UNICODE_CODE_POINT, { start: begin, end: this.sourcePos() + 1 });
				return -1;
			}
			this.advance(captureRaw);
			d = hexValue(this.c0);
		}
		return x;
	}

	private scanIdentifierOrKeyword(): Token {
		this.startLiteral();
		let complete = false;
		try {
			let escaped = this.c0 === CH.BACKSLASH;
			if (!this.addIdentifierChar(isIdentifierStart)) return '<illegal>';
			while (this.c0 !== END_OF_INPUT && isIdentifierPart(this.c0)) {
				if (this.c0 === CH.BACKSLASH) escaped = true;
				if (!this.addIdentifierChar(isIdentifierPart)) return '<illegal>';
			}
			const token = this.classifyIdentifier(escaped);
			// Reserved words keep no text.
			complete = keepsLiteral(token);
			return token;
		} finally {
			if (!complete) this.dropLiteral();
		}
	}

	private addIdentifierChar(valid: (c: number) => boolean): boolean {
		if (this.c0 !== CH.BACKSLASH) {
			this.addLiteralCharAdvance();
			return true;
		}
		const begin = this.sourcePos();
		this.advance();
		if (this.c0 !== CH.LOWER_U) {
			this.reportError(SCANNER_ERRORS.INVALID_UNICODE_ESCAPE, { start: begin, end: begin + 2 });
			return false;
		}
		this.advance();
		const c = this.scanUnicodeEscape(false);
		if (c < 0) return false;
		// No escaped backslashes and no characters that are invalid at this position.
		if (c === CH.BACKSLASH || !valid(c)) {
			this.reportError(SCANNER_ERRORS.INVALID_UNICODE_ESCAPE, { start: begin, end: this.sourcePos() });
			return false;
		}
		this.addLiteralChar(c);
		return true;
	}

	private classifyIdentifier(escaped: boolean): Token {
		const literal = this.nextDesc.literal;
		if (!literal || !literal.isOneByte() || literal.length() > 10) return '<identifier>';
		const token = keywordOrIdentifier(literal.toString());
		if (!escaped || token === '<identifier>') return token;
		return isStrictReservedWord(token) ? '<escaped-strict-reserved>' : '<escaped-keyword>';
	}

	private scanDecimalDigits(): void {
		while (isDecimalDigit(this.c0)) this.addLiteralCharAdvance();
	}

	private malformedNumber(): Token {
		this.reportError(SCANNER_ERRORS.MALFORMED_NUMBER, { start: this.nextDesc.start, end: this.sourcePos() });
		return '<illegal>';
	}

	// c0 is the first digit of the number, or of its fraction when `seenPeriod`.
	private scanNumber(seenPeriod: boolean): Token {
		let kind: NumberKind = 'decimal';
		this.startLiteral();
		let complete = false;
		try {
			let atStart = !seenPeriod;
			const startPos = this.sourcePos();
			if (seenPeriod) {
				this.addLiteralChar(CH.DOT);
				this.scanDecimalDigits();
			} else {
				if (this.c0 === CH.ZERO) {
					this.addLiteralCharAdvance();
					const marker = this.c0 | 0x20;
					if (marker === CH.LOWER_X) {
						kind = 'hex';
						this.addLiteralCharAdvance();
						if (!isHexDigit(this.c0)) return this.malformedNumber();
						while (isHexDigit(this.c0)) this.addLiteralCharAdvance();
					} else if (marker === CH.LOWER_O) {
						kind = 'octal';
						this.addLiteralCharAdvance();
						if (!isOctalDigit(this.c0)) return this.malformedNumber();
						while (isOctalDigit(this.c0)) this.addLiteralCharAdvance();
					} else if (marker === CH.LOWER_B) {
						kind = 'binary';
						this.addLiteralCharAdvance();
						if (!isBinaryDigit(this.c0)) return this.malformedNumber();
						while (isBinaryDigit(this.c0)) this.addLiteralCharAdvance();
					} else if (isOctalDigit(this.c0)) {
						kind = 'implicit-octal';
						for (;;) {
							if (this.c0 === CH.EIGHT || this.c0 === CH.NINE) {
								// 08, 019: decimal after all
								atStart = false;
								kind = 'decimal';
								break;
							}
							if (!isOctalDigit(this.c0)) {
								this.octalPos = { start: startPos, end: this.sourcePos() };
								break;
							}
							this.addLiteralCharAdvance();
						}
					}
				}

				if (kind === 'decimal') {
					if (atStart) {
						let value = 0;
						while (isDecimalDigit(this.c0)) {
							value = value * 10 + (this.c0 - CH.ZERO);
							this.addLiteralCharAdvance();
						}
						const literal = this.nextDesc.literal;
						if (literal && literal.length() <= SMI_MAX_DIGITS && value <= SMI_MAX_VALUE
							&& this.c0 !== CH.DOT && this.c0 !== CH.LOWER_E && this.c0 !== CH.UPPER_E) {
							this.nextDesc.smi = value;
						}
					}
					this.scanDecimalDigits();
					if (this.c0 === CH.DOT) {
						this.addLiteralCharAdvance();
						this.scanDecimalDigits();
					}
				}
			}

			if (this.c0 === CH.LOWER_E || this.c0 === CH.UPPER_E) {
				// Only decimal literals take an exponent.
				if (kind !== 'decimal') return this.malformedNumber();
				this.addLiteralCharAdvance();
				if (this.c0 === CH.PLUS || this.c0 === CH.MINUS) this.addLiteralCharAdvance();
				if (!isDecimalDigit(this.c0)) return this.malformedNumber();
				this.scanDecimalDigits();
			}

			// A numeral may not run straight into a digit or an identifier.
			if (isDecimalDigit(this.c0) || isIdentifierStart(this.c0)) return this.malformedNumber();

			complete = true;
			return '<number>';
		} finally {
			if (!complete) {
				this.dropLiteral();
				this.nextDesc.smi = null;
			}
		}
	}

	// c0 is the opening backtick.
	private scanTemplateStart(): Token {
		this.nextDesc.start = this.sourcePos();
		this.advance();
		return this.scanTemplateSpan();
	}

	/**
	 * Scans template characters up to and including the closing backtick
	 * (`<template-tail>`) or `${` (`<template-span>`). Raw text is captured
	 * alongside the cooked text; CR and CRLF read as LF in both.
	 */
	private scanTemplateSpan(): Token {
		this.startLiteral();
		this.startRawLiteral();
		let complete = false;
		try {
			let result: Token = '<template-span>';
			for (;;) {
				let c = this.c0;
				if (c === END_OF_INPUT) return this.unterminatedTemplate();
				this.advance(true);
				if (c === CH.BACKTICK) {
					result = '<template-tail>';
					this.reduceRawLiteralLength(1);
					break;
				}
				if (c === CH.DOLLAR && this.c0 === CH.LBRACE) {
					this.advance(true);
					this.reduceRawLiteralLength(2);
					break;
				}
				if (c === CH.BACKSLASH) {
					if (this.c0 === END_OF_INPUT) return this.unterminatedTemplate();
					if (isLineTerminator(this.c0)) {
						// Line continuation: nothing cooked, raw keeps the (normalised) terminator.
						const last = this.c0;
						this.advance(true);
						if (isCarriageReturn(last)) {
							this.reduceRawLiteralLength(1);
							if (isLineFeed(this.c0)) this.advance(true);
							else this.addRawLiteralChar(CH.LF);
						}
					} else if (!this.scanEscape(true, true)) {
						return '<illegal>';
					}
					continue;
				}
				if (isCarriageReturn(c)) {
					this.reduceRawLiteralLength(1);
					if (isLineFeed(this.c0)) this.advance(true);
					else this.addRawLiteralChar(CH.LF);
					c = CH.LF;
				}
				this.addLiteralChar(c);
			}
			complete = true;
			return result;
		} finally {
			if (!complete) this.dropLiteral();
		}
	}

	private unterminatedTemplate(): Token {
		this.reportError(SCANNER_ERRORS.UNTERMINATED_TEMPLATE, { start: this.nextDesc.start, end: this.sourcePos() });
		return '<illegal>';
	}
}

/**
 * Scoped access to the scanner's bookmark: `set()` once, optionally
 * `reset()`, and always `release()` (which drops the bookmark).
 */
export class BookmarkScope {
	private readonly scanner: Scanner;

	constructor(scanner: Scanner) {
		this.scanner = scanner;
	}

	set(): boolean { return this.scanner.setBookmark(); }
	reset(): void { this.scanner.resetToBookmark(); }
	hasBeenSet(): boolean { return this.scanner.bookmarkHasBeenSet(); }
	hasBeenReset(): boolean { return this.scanner.bookmarkHasBeenReset(); }
	release(): void { this.scanner.dropBookmark(); }
}

/** Runs `fn` with a bookmark scope and drops the bookmark afterwards, however `fn` exits. */
export function withBookmark<T>(scanner: Scanner, fn: (scope: BookmarkScope) => T): T {
	const scope = new BookmarkScope(scanner);
	try {
		return fn(scope);
	} finally {
		scope.release();
	}
}
