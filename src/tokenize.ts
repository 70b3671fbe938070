import {
	CharacterStream,
	DuplicateFinder,
	FUTURE_RESERVED_WORDS,
	Scanner,
	StringCharacterStream,
	isKeyword,
	isPunctuator,
	isValidSpan,
	tokenString,
	type ScannerError,
	type ScannerOptions,
	type Span,
	type Token,
} from './scanner';

export type TokenizeOptions = ScannerOptions;

export interface ScannedToken {
	token: Token;
	span: Span;
	literal: string | null;
	// Raw text of template spans
	raw: string | null;
	smi: number | null;
	newlineBefore: boolean;
	// Regular expression flags (REGEXP_FLAGS bitmask)
	flags?: number;
}

export type PropertyKind = 'data' | 'getter' | 'setter';

export interface DuplicateKey {
	key: string;
	kind: PropertyKind;
	span: Span;
	// Where the key was first defined in the same object literal
	first: Span;
}

export interface TokenizeResult {
	// Always ends with the '<eos>' token.
	tokens: ScannedToken[];
	error: ScannerError | null;
	octalPositions: Span[];
	foundHtmlComment: boolean;
	// Gap between the tokens around the first HTML-like comment
	htmlCommentSpan: Span | null;
	sourceUrl: string | null;
	sourceMappingUrl: string | null;
	duplicateKeys: DuplicateKey[];
}

interface ObjectFrame {
	kind: 'object';
	expectKey: boolean;
	accessor: 'getter' | 'setter' | null;
	finders: Record<PropertyKind, DuplicateFinder>;
}

type Frame = { kind: 'block' } | { kind: 'group' } | { kind: 'template' } | ObjectFrame;

// Tokens after which '/' divides rather than starting a regular expression.
const OPERAND_END: ReadonlySet<Token> = new Set<Token>([
	')', ']', '++', '--',
	'<identifier>', '<number>', '<string>', '<regexp>', '<template-tail>',
	'<future-strict-reserved>', '<escaped-strict-reserved>', '<escaped-keyword>', '<illegal>',
	'this', 'super', 'null', 'true', 'false', 'let', 'static',
]);

// Tokens after which '{' starts an object literal.
const EXPRESSION_KEYWORDS: ReadonlySet<Token> = new Set<Token>([
	'return', 'throw', 'typeof', 'void', 'delete', 'in', 'instanceof', 'yield', 'new', 'case',
]);

const BLOCK_PUNCTUATORS: ReadonlySet<Token> = new Set<Token>([')', ']', '}', ';', '{', '=>', '++', '--']);

// Tokens that can name a property in an object literal.
function isPropertyName(token: Token): boolean {
	switch (token) {
		case '<identifier>':
		case '<string>':
		case '<number>':
		case '<future-reserved>':
		case '<future-strict-reserved>':
		case '<escaped-keyword>':
		case '<escaped-strict-reserved>':
			return true;
		default:
			return isKeyword(token);
	}
}

function newObjectFrame(): ObjectFrame {
	return {
		kind: 'object',
		expectKey: true,
		accessor: null,
		finders: { data: new DuplicateFinder(), getter: new DuplicateFinder(), setter: new DuplicateFinder() },
	};
}

function opensObjectLiteral(prev: Token | undefined, top: Frame | undefined): boolean {
	if (prev === undefined) return false;
	if (prev === '<template-span>') return true;
	if (EXPRESSION_KEYWORDS.has(prev)) return true;
	if (!isPunctuator(prev) || BLOCK_PUNCTUATORS.has(prev)) return false;
	// `case x: {` and labels open blocks; property values and ternaries do not.
	if (prev === ':') return top?.kind === 'object' || top?.kind === 'group';
	return true;
}

class Tokenizer {
	private readonly scanner: Scanner;
	private readonly tokens: ScannedToken[] = [];
	private readonly frames: Frame[] = [];
	private readonly octalPositions: Span[] = [];
	private readonly duplicateKeys: DuplicateKey[] = [];
	private htmlCommentSpan: Span | null = null;
	// Set when the last '}' closed a block, so a following '/' starts a regexp.
	private closedBlock = false;

	constructor(source: CharacterStream, options: TokenizeOptions) {
		this.scanner = new Scanner(options);
		this.scanner.initialize(source);
		this.noteHtmlComment(0);
	}

	run(): TokenizeResult {
		const scanner = this.scanner;
		for (;;) {
			let resumedTemplate = false;
			let flags: number | null = null;
			const lookahead = scanner.peek();
			if (lookahead === '}' && this.top()?.kind === 'template') {
				resumedTemplate = true;
				if (scanner.scanTemplateContinuation() !== '<template-span>') this.frames.pop();
			} else if ((lookahead === '/' || lookahead === '/=') && this.regExpAllowed()) {
				if (scanner.scanRegExpPattern(lookahead === '/=')) flags = scanner.scanRegExpFlags();
			}

			const newlineBefore = scanner.hasAnyLineTerminatorBeforeNext();
			const token = scanner.next();
			const scanned: ScannedToken = {
				token,
				span: scanner.location(),
				literal: scanner.currentLiteral(),
				raw: scanner.currentRawLiteral(),
				smi: scanner.smiValue(),
				newlineBefore,
			};
			if (flags !== null && token === '<regexp>') scanned.flags = flags;
			const index = this.tokens.length;
			this.tokens.push(scanned);

			this.collectOctalPosition();
			this.noteHtmlComment(scanned.span.end);
			if (token === '<eos>') break;
			this.trackStructure(token, index, resumedTemplate);
		}
		const sourceUrl = scanner.sourceUrl();
		const sourceMappingUrl = scanner.sourceMappingUrl();
		const errorKind = scanner.error();
		return {
			tokens: this.tokens,
			error: errorKind ? { kind: errorKind, location: scanner.errorLocation() } : null,
			octalPositions: this.octalPositions,
			foundHtmlComment: scanner.foundHtmlComment(),
			htmlCommentSpan: this.htmlCommentSpan,
			sourceUrl: sourceUrl.length() > 0 ? sourceUrl.toString() : null,
			sourceMappingUrl: sourceMappingUrl.length() > 0 ? sourceMappingUrl.toString() : null,
			duplicateKeys: this.duplicateKeys,
		};
	}

	private top(): Frame | undefined {
		return this.frames[this.frames.length - 1];
	}

	private previousToken(): Token | undefined {
		return this.tokens[this.tokens.length - 1]?.token;
	}

	private regExpAllowed(): boolean {
		const prev = this.previousToken();
		if (prev === undefined) return true;
		if (prev === '}') return this.closedBlock;
		return !OPERAND_END.has(prev);
	}

	private collectOctalPosition(): void {
		const octal = this.scanner.octalPosition();
		if (!isValidSpan(octal)) return;
		this.octalPositions.push(octal);
		this.scanner.clearOctalPosition();
	}

	// The flag flips while the scanner skips the comment in front of its lookahead token.
	private noteHtmlComment(from: number): void {
		if (this.htmlCommentSpan || !this.scanner.foundHtmlComment()) return;
		this.htmlCommentSpan = { start: from, end: this.scanner.peekLocation().start };
	}

	private trackStructure(token: Token, index: number, resumedTemplate: boolean): void {
		const top = this.top();
		if (top?.kind === 'object') this.trackProperty(top, token, index);
		switch (token) {
			case '{': {
				const prev = this.tokens[index - 1]?.token;
				this.frames.push(opensObjectLiteral(prev, top) ? newObjectFrame() : { kind: 'block' });
				break;
			}
			case '}': {
				const closed = this.frames.pop();
				this.closedBlock = closed?.kind === 'block';
				break;
			}
			case '(':
			case '[':
				this.frames.push({ kind: 'group' });
				break;
			case ')':
			case ']':
				if (top?.kind === 'group') this.frames.pop();
				break;
			case '<template-span>':
				if (!resumedTemplate) this.frames.push({ kind: 'template' });
				break;
			default:
				break;
		}
	}

	private trackProperty(frame: ObjectFrame, token: Token, index: number): void {
		if (token === ',') {
			frame.expectKey = true;
			frame.accessor = null;
			return;
		}
		if (!frame.expectKey) return;
		// Generator methods: `*name() {}`
		if (token === '*') return;
		if (!isPropertyName(token)) {
			frame.expectKey = false;
			frame.accessor = null;
			return;
		}
		const scanner = this.scanner;
		if (token === '<identifier>' && frame.accessor === null) {
			const { isGet, isSet } = scanner.isGetOrSet();
			if ((isGet || isSet) && (isPropertyName(scanner.peek()) || scanner.peek() === '[')) {
				frame.accessor = isGet ? 'getter' : 'setter';
				return;
			}
		}
		const kind: PropertyKind = frame.accessor ?? 'data';
		frame.expectKey = false;
		frame.accessor = null;
		this.checkDuplicate(frame.finders[kind], kind, token, index);
	}

	private checkDuplicate(finder: DuplicateFinder, kind: PropertyKind, token: Token, index: number): void {
		const scanner = this.scanner;
		let firstIndex: number;
		let key: string;
		if (token === '<number>') {
			firstIndex = finder.addNumber(scanner.literalOneByteString(), index);
			key = scanner.currentLiteral() ?? '';
		} else {
			const literal = scanner.currentLiteral();
			if (literal !== null) {
				firstIndex = scanner.findSymbol(finder, index);
				key = literal;
			} else {
				key = token === '<future-reserved>' ? FUTURE_RESERVED_WORDS[0] : tokenString(token) ?? '';
				firstIndex = finder.addString(key, index);
			}
		}
		if (firstIndex === index) return;
		const first = this.tokens[firstIndex];
		const current = this.tokens[index];
		if (!first || !current) return;
		this.duplicateKeys.push({ key, kind, span: current.span, first: first.span });
	}
}

/**
 * Scans a whole source into tokens, driving the scanner through regular
 * expressions, template substitutions and object literal keys.
 */
export function tokenize(source: string | CharacterStream, options: TokenizeOptions = {}): TokenizeResult {
	const stream = typeof source === 'string' ? new StringCharacterStream(source) : source;
	return new Tokenizer(stream, options).run();
}
