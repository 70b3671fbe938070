#!/usr/bin/env node
import {
	createConnection,
	TextDocuments,
	Diagnostic,
	DiagnosticSeverity,
	ProposedFeatures,
	InitializeParams,
	DidChangeConfigurationNotification,
	TextDocumentSyncKind,
	InitializeResult,
	type Connection,
	SemanticTokens,
	SemanticTokensParams,
} from 'vscode-languageserver/node';
import 'source-map-support/register.js';
import path from 'node:path';
import { TextDocument } from 'vscode-languageserver-textdocument';
import { URI } from 'vscode-uri';
import type { DiagCode } from './analysisTypes';
import { DEFAULT_CONFIG, loadConfig, mergeConfig, scannerOptionsFor, validateConfigInput, type ScannerConfig } from './config';
import { collectLexicalDiagnostics, parseDisabledDiagList } from './diagnostics';
import { semanticTokensLegend, buildSemanticTokens } from './semtok';
import { tokenize, type TokenizeResult } from './tokenize';
import { setsEqual, textHash } from './utils';

const connection: Connection = createConnection(ProposedFeatures.all);
const documents = new TextDocuments(TextDocument);

let config: ScannerConfig = mergeConfig(DEFAULT_CONFIG, {});
// Filesystem path of the first workspace folder; relative config paths resolve against it.
let workspaceRootPath = '';
let disabledDiagCodes = new Set<DiagCode>();

function updateDisabledDiagnostics(raw: unknown): boolean {
	const next = parseDisabledDiagList(raw);
	if (setsEqual(disabledDiagCodes, next)) return false;
	disabledDiagCodes = next;
	return true;
}

function scannerSection(settings: unknown): unknown {
	if (typeof settings === 'object' && settings !== null && 'scanner' in settings) return settings.scanner;
	return undefined;
}

// -------------------------------------------------
// Per-document scan cache
// -------------------------------------------------
type PipelineCache = {
	version: number;
	// FNV-1a of the text, in case the version does not bump
	textHash: number;
	result: TokenizeResult;
};
const pipelineCache = new Map<string, PipelineCache>(); // key: doc.uri

function getPipeline(doc: TextDocument): PipelineCache {
	const text = doc.getText();
	const currentTextHash = textHash(text);
	const hit = pipelineCache.get(doc.uri);
	if (hit && hit.version === doc.version && hit.textHash === currentTextHash) return hit;
	const result = tokenize(text, scannerOptionsFor(config));
	const entry: PipelineCache = { version: doc.version, textHash: currentTextHash, result };
	pipelineCache.set(doc.uri, entry);
	if (config.debug) console.warn(`[script-scanner] scanned ${doc.uri}: ${result.tokens.length} tokens`);
	return entry;
}

async function revalidateAllOpenDocs() {
	pipelineCache.clear();
	for (const d of documents.all()) await validateTextDocument(d);
}

// Loads the configured YAML file (or the bundled default) and layers `raw` settings over it.
async function applySettings(raw: unknown, origin: string): Promise<boolean> {
	const input = validateConfigInput(raw ?? {}, origin);
	let configPath = input.configPath?.trim() || undefined;
	if (configPath && !path.isAbsolute(configPath) && workspaceRootPath) configPath = path.resolve(workspaceRootPath, configPath);
	const { config: base, resolvedPath } = await loadConfig(configPath);
	const next = mergeConfig(base, input);
	if (next.debug) console.warn(`[script-scanner] configuration from ${resolvedPath} and ${origin}`);
	const changed = JSON.stringify(next) !== JSON.stringify(config);
	config = next;
	const disabledChanged = updateDisabledDiagnostics(config.diagnostics.disable);
	return changed || disabledChanged;
}

connection.onInitialize(async (params: InitializeParams): Promise<InitializeResult> => {
	const folder = params.workspaceFolders?.[0]?.uri ?? params.rootUri;
	if (folder) workspaceRootPath = URI.parse(folder).fsPath;
	try {
		await applySettings(params.initializationOptions, 'initializationOptions');
	} catch (e) {
		connection.console.error('[script-scanner] invalid initialization options, using defaults: ' + String(e));
		const { config: base } = await loadConfig();
		config = base;
		updateDisabledDiagnostics(config.diagnostics.disable);
	}

	const result: InitializeResult = {
		capabilities: {
			textDocumentSync: TextDocumentSyncKind.Incremental,
			semanticTokensProvider: {
				legend: semanticTokensLegend,
				range: false,
				full: true
			}
		}
	};
	return result;
});

connection.onInitialized(() => {
	connection.client.register(DidChangeConfigurationNotification.type, undefined)
		.catch(e => connection.console.error('[script-scanner] configuration registration failed: ' + String(e)));
	connection.console.log('[script-scanner] initialized');
});

// Manual cache clear request (invoked by client command)
connection.onRequest('scanner/clearCaches', async () => {
	try {
		connection.console.log('[script-scanner] clearCaches request: flushing caches');
		await revalidateAllOpenDocs();
		return { ok: true };
	} catch (e) {
		connection.console.error('[script-scanner] clearCaches failed: ' + String(e));
		return { ok: false, error: String(e) };
	}
});

// Token dump for a document, for tooling and debugging.
connection.onRequest('scanner/tokens', (params: { uri: string }) => {
	const doc = documents.get(params.uri);
	if (!doc) return null;
	return getPipeline(doc).result;
});

connection.onDidChangeConfiguration(async change => {
	try {
		if (await applySettings(scannerSection(change.settings), 'workspace settings')) await revalidateAllOpenDocs();
	} catch (e) {
		connection.console.error('[script-scanner] configuration rejected: ' + String(e));
	}
});

documents.onDidChangeContent(async change => {
	pipelineCache.delete(change.document.uri);
	await validateTextDocument(change.document);
});

documents.onDidClose(async e => {
	pipelineCache.delete(e.document.uri);
	try {
		await connection.sendDiagnostics({ uri: e.document.uri, diagnostics: [] });
	} catch (err) {
		connection.console.error(`[script-scanner] clearing diagnostics failed for ${e.document.uri}: ${String(err)}`);
	}
});

async function validateTextDocument(doc: TextDocument) {
	const { result } = getPipeline(doc);
	const diags: Diagnostic[] = collectLexicalDiagnostics(doc, result, { strict: config.strict, disabled: disabledDiagCodes })
		.map(d => ({
			range: d.range,
			severity: d.severity ?? DiagnosticSeverity.Warning,
			message: d.message,
			source: 'script-scanner',
			code: d.code
		}));
	try {
		await connection.sendDiagnostics({ uri: doc.uri, diagnostics: diags });
	} catch (e) {
		connection.console.error(`[script-scanner] sendDiagnostics failed for ${doc.uri}: ${String(e)}`);
	}
}

connection.languages.semanticTokens.on((params: SemanticTokensParams, token): SemanticTokens => {
	const doc = documents.get(params.textDocument.uri); if (!doc || !config.semanticTokens) return { data: [] };
	if (token?.isCancellationRequested) return { data: [] };
	const entry = getPipeline(doc);
	const current: SemanticTokens = buildSemanticTokens(doc, entry.result);
	current.resultId = String(doc.version) + ':' + Date.now();
	return current;
});

documents.listen(connection);
connection.listen();

// -----------------
// Lifecycle hooks
// -----------------
connection.onShutdown(() => {
	connection.console.log('[script-scanner] onShutdown: clearing caches');
	pipelineCache.clear();
});

connection.onExit(() => {
	connection.console.log('[script-scanner] onExit: terminating process');
	process.exit(0);
});
