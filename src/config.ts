import process from 'node:process';
import fs from 'node:fs/promises';
import path from 'node:path';
import yaml from 'js-yaml';
import Ajv2020 from 'ajv/dist/2020';
import schema from '../common/scannerConfigSchema.json';
import type { ScannerOptions } from './scanner';

export interface ScannerConfig {
	exponentiationOperator: boolean;
	htmlComments: boolean;
	strict: boolean;
	semanticTokens: boolean;
	debug: boolean;
	diagnostics: { disable: string[] };
}

// Shape accepted from YAML files and language server settings.
export interface ScannerConfigInput {
	exponentiationOperator?: boolean;
	htmlComments?: boolean;
	strict?: boolean;
	semanticTokens?: boolean;
	debug?: boolean;
	configPath?: string;
	diagnostics?: { disable?: string[] | string };
}

export const DEFAULT_CONFIG: Readonly<ScannerConfig> = Object.freeze({
	exponentiationOperator: true,
	htmlComments: true,
	strict: false,
	semanticTokens: true,
	debug: false,
	diagnostics: Object.freeze({ disable: [] }),
});

// Bundled defaults: beside the sources, or two levels up from the build output.
const BUNDLED_CONFIG_CANDIDATES = [
	path.resolve(__dirname, '..', 'common', 'scanner.yaml'),
	path.resolve(__dirname, '..', '..', 'common', 'scanner.yaml'),
];

const ajv = new Ajv2020({ allErrors: true, strict: false });
const validateInput = ajv.compile<ScannerConfigInput>(schema);

/** Checks an already-parsed value against the configuration schema. */
export function validateConfigInput(value: unknown, origin: string): ScannerConfigInput {
	if (validateInput(value)) return value;
	const msg = (validateInput.errors || []).map(e => `${e.instancePath} ${e.message}`).join('\n');
	throw new Error(`Scanner config "${origin}" schema validation failed:\n${msg}`);
}

/** Layers `input` over `base`; absent fields keep the base value. */
export function mergeConfig(base: Readonly<ScannerConfig>, input: ScannerConfigInput): ScannerConfig {
	const disable = input.diagnostics?.disable;
	return {
		exponentiationOperator: input.exponentiationOperator ?? base.exponentiationOperator,
		htmlComments: input.htmlComments ?? base.htmlComments,
		strict: input.strict ?? base.strict,
		semanticTokens: input.semanticTokens ?? base.semanticTokens,
		debug: input.debug ?? base.debug,
		diagnostics: {
			disable: disable === undefined ? [...base.diagnostics.disable]
				: typeof disable === 'string' ? disable.split(/[,\s]+/).filter(Boolean)
					: [...disable],
		},
	};
}

/** Parses YAML configuration text; an empty document yields the defaults. */
export function parseConfig(raw: string, origin: string): ScannerConfig {
	const obj: unknown = yaml.load(raw, { json: true });
	if (obj === undefined || obj === null) return mergeConfig(DEFAULT_CONFIG, {});
	return mergeConfig(DEFAULT_CONFIG, validateConfigInput(obj, origin));
}

export function scannerOptionsFor(config: Readonly<ScannerConfig>): ScannerOptions {
	return {
		allowExponentiationOperator: config.exponentiationOperator,
		allowHtmlComments: config.htmlComments,
	};
}

async function resolveConfigPath(configPath: string | undefined): Promise<{ raw: string; resolvedPath: string }> {
	const requested = configPath?.trim();
	const candidates: string[] = [];
	if (requested) {
		if (path.isAbsolute(requested)) candidates.push(requested);
		else {
			candidates.push(path.resolve(process.cwd(), requested));
			candidates.push(path.resolve(__dirname, requested));
		}
	}
	candidates.push(...BUNDLED_CONFIG_CANDIDATES);
	const seen = new Set<string>();
	let lastErr: unknown;
	for (const candidate of candidates) {
		const resolved = path.resolve(candidate);
		if (seen.has(resolved)) continue;
		seen.add(resolved);
		try {
			const raw = await fs.readFile(resolved, 'utf8');
			return { raw, resolvedPath: resolved };
		} catch (err) {
			lastErr = err;
		}
	}
	throw lastErr ?? new Error('No scanner config file could be resolved');
}

/**
 * Loads configuration from `configPath` (absolute, or relative to the working
 * directory or this module), falling back to the bundled defaults.
 */
export async function loadConfig(configPath?: string): Promise<{ config: ScannerConfig; resolvedPath: string }> {
	const { raw, resolvedPath } = await resolveConfigPath(configPath);
	return { config: parseConfig(raw, resolvedPath), resolvedPath };
}
