export { CharacterStream, ChunkedCharacterStream, StringCharacterStream } from './characterStream';
export { LiteralBuffer } from './literalBuffer';
export { DuplicateFinder, isNumberCanonical } from './duplicateFinder';
export { SCANNER_ERRORS, ScannerContractError, type ScannerError, type ScannerErrorKind } from './errors';
export { stringToDouble, numberToString } from './numbers';
export {
	BookmarkScope,
	REGEXP_FLAGS,
	Scanner,
	withBookmark,
	type BookmarkState,
	type ScannerOptions,
} from './scanner';
export {
	FUTURE_RESERVED_WORDS,
	FUTURE_STRICT_RESERVED_WORDS,
	INVALID_SPAN,
	KEYWORDS,
	PUNCTUATORS,
	isKeyword,
	isPunctuator,
	isReservedWordToken,
	isStrictReservedWord,
	isTemplateToken,
	isValidSpan,
	keywordOrIdentifier,
	tokenString,
	type Keyword,
	type Punctuator,
	type Span,
	type Token,
} from './tokens';
