/**
 * Error taxonomy for hybrid-search
 *
 * Degraded fallbacks are not errors and never appear here: they are logged,
 * counted, and listed in the result metadata.
 */

export type HybridSearchErrorCode =
	| "INDEX_UNAVAILABLE"
	| "MALFORMED_PREDICATE"
	| "VECTOR_PORT_FAILURE"
	| "VECTOR_PORT_TIMEOUT"
	| "CORPUS_INVALID"
	| "CONFIG_INVALID";

export class HybridSearchError extends Error {
	readonly code: HybridSearchErrorCode;
	override readonly cause: unknown;

	constructor(message: string, code: HybridSearchErrorCode, cause?: unknown) {
		super(message);
		this.name = "HybridSearchError";
		this.code = code;
		this.cause = cause;
		Object.setPrototypeOf(this, new.target.prototype);
	}
}

/** Corpus index has not been built or published yet */
export class IndexUnavailableError extends HybridSearchError {
	constructor(message = "Corpus index is not available; build or publish an index before querying") {
		super(message, "INDEX_UNAVAILABLE");
		this.name = "IndexUnavailableError";
	}
}

/** A filter predicate references an unknown field/operator or has a bad operand */
export class MalformedPredicateError extends HybridSearchError {
	/** Location of the offending node, e.g. "$and[1].region" */
	readonly path: string;

	constructor(message: string, path: string) {
		super(path ? `${message} (at ${path})` : message, "MALFORMED_PREDICATE");
		this.name = "MalformedPredicateError";
		this.path = path;
	}
}

export class VectorPortFailureError extends HybridSearchError {
	/** true when the failure happened on the unfiltered retry */
	readonly filterDropped: boolean;

	constructor(message: string, cause: unknown, filterDropped: boolean) {
		super(message, "VECTOR_PORT_FAILURE", cause);
		this.name = "VectorPortFailureError";
		this.filterDropped = filterDropped;
	}
}

/** A single vector port call exceeded its time budget; treated as a port failure */
export class VectorPortTimeoutError extends HybridSearchError {
	readonly timeoutMs: number;

	constructor(timeoutMs: number) {
		super(`Vector search did not answer within ${timeoutMs}ms`, "VECTOR_PORT_TIMEOUT");
		this.name = "VectorPortTimeoutError";
		this.timeoutMs = timeoutMs;
	}
}

export class CorpusValidationError extends HybridSearchError {
	readonly issues: string[];

	constructor(issues: string[]) {
		super(`Invalid corpus:\n${issues.join("\n")}`, "CORPUS_INVALID");
		this.name = "CorpusValidationError";
		this.issues = issues;
	}
}

export class ConfigError extends HybridSearchError {
	constructor(message: string) {
		super(message, "CONFIG_INVALID");
		this.name = "ConfigError";
	}
}

/** Render an unknown thrown value for log context */
export function describeError(error: unknown): string {
	if (error instanceof Error) return `${error.name}: ${error.message}`;
	return String(error);
}
