/**
 * Retrieval quality metrics
 */

/**
 * Fraction of expected documents found in the first k retrieved.
 * An empty expectation counts as fully recalled.
 */
export function recallAtK(retrieved: readonly string[], expected: readonly string[], k: number): number {
	if (expected.length === 0) return 1;

	const topK = new Set(retrieved.slice(0, Math.max(0, k)));
	const found = expected.filter((id) => topK.has(id)).length;
	return found / expected.length;
}

/** 1 / rank of the first relevant document, 0 when none was retrieved */
export function reciprocalRank(retrieved: readonly string[], expected: readonly string[]): number {
	const relevant = new Set(expected);
	const index = retrieved.findIndex((id) => relevant.has(id));
	return index === -1 ? 0 : 1 / (index + 1);
}

export function mean(values: readonly number[]): number {
	if (values.length === 0) return 0;
	return values.reduce((sum, value) => sum + value, 0) / values.length;
}
