import { SemanticTokens, SemanticTokensBuilder, SemanticTokensLegend } from 'vscode-languageserver/node';
import { TextDocument } from 'vscode-languageserver-textdocument';
import { isPunctuator, isReservedWordToken, isTemplateToken, type Token } from './scanner';
import type { ScannedToken, TokenizeResult } from './tokenize';

const tokenTypes = ['keyword', 'string', 'number', 'regexp', 'operator', 'variable', 'property'] as const;
const tokenModifiers = ['readonly'] as const;
type TokenType = typeof tokenTypes[number];

export const semanticTokensLegend: SemanticTokensLegend = {
	tokenTypes: Array.from(tokenTypes),
	tokenModifiers: Array.from(tokenModifiers)
};

// Literal-valued keywords are never assigned to.
const READONLY_KEYWORDS: ReadonlySet<Token> = new Set<Token>(['true', 'false', 'null', 'this', 'super']);

function classify(toks: ScannedToken[], i: number): TokenType | null {
	const t = toks[i].token;
	switch (t) {
		case '<identifier>':
			return toks[i - 1]?.token === '.' ? 'property' : 'variable';
		case '<string>':
			return 'string';
		case '<number>':
			return 'number';
		case '<regexp>':
			return 'regexp';
		case '<illegal>':
		case '<eos>':
			return null;
		default:
			if (isTemplateToken(t)) return 'string';
			if (isReservedWordToken(t)) return 'keyword';
			if (isPunctuator(t)) return 'operator';
			return null;
	}
}

export function buildSemanticTokens(doc: TextDocument, result: TokenizeResult): SemanticTokens {
	const b = new SemanticTokensBuilder();

	// Tokens may not span lines, so template literals are pushed one line at a time.
	function push(start: number, end: number, type: number, mods = 0) {
		const from = doc.positionAt(start);
		const to = doc.positionAt(end);
		if (from.line === to.line) {
			if (end > start) b.push(from.line, from.character, end - start, type, mods);
			return;
		}
		for (let line = from.line; line <= to.line; line++) {
			const segStart = line === from.line ? start : doc.offsetAt({ line, character: 0 });
			const segEnd = line === to.line ? end : doc.offsetAt({ line, character: Number.MAX_SAFE_INTEGER });
			if (segEnd <= segStart) continue;
			const pos = doc.positionAt(segStart);
			b.push(pos.line, pos.character, segEnd - segStart, type, mods);
		}
	}

	const toks = result.tokens;
	for (let i = 0; i < toks.length; i++) {
		const type = classify(toks, i);
		if (!type) continue;
		const t = toks[i];
		const mods = READONLY_KEYWORDS.has(t.token) ? bit('readonly') : 0;
		push(t.span.start, t.span.end, idx(type), mods);
	}

	return b.build();
}

function idx(name: TokenType): number {
	return tokenTypes.indexOf(name);
}

function bit(name: typeof tokenModifiers[number]): number {
	return 1 << tokenModifiers.indexOf(name);
}
