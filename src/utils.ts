// Small shared utilities

const IS_TEST = typeof process !== 'undefined' && (
	typeof process.env.VITEST_WORKER_ID === 'string' || process.env.NODE_ENV === 'test'
);

/**
 * Compile-time exhaustiveness helper. Under tests (Vitest or NODE_ENV=test) it
 * throws; otherwise it is a no-op. The return type is `never` so that missing
 * cases fail to compile.
 */
export function AssertNever(x: never, message?: string): never {
	if (IS_TEST) {
		throw new Error(message ?? `Unexpected value in AssertNever: ${String(x)}`);
	}
	return undefined as never;
}

export function setsEqual<T>(a: ReadonlySet<T>, b: ReadonlySet<T>): boolean {
	if (a.size !== b.size) return false;
	for (const v of a) if (!b.has(v)) return false;
	return true;
}

// FNV-1a 32-bit over UTF-16 code units.
export function textHash(text: string): number {
	let h = 2166136261 >>> 0;
	for (let i = 0; i < text.length; i++) {
		h ^= text.charCodeAt(i);
		h = Math.imul(h, 16777619);
	}
	return h >>> 0;
}
