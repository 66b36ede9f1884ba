/**
 * Core types for hybrid-search
 */

// ============================================================================
// Document Types
// ============================================================================

export const REGIONS = ["EU", "US", "APAC"] as const;
export const PRODUCT_VERSIONS = ["v1.0", "v2.0", "v3.0"] as const;
export const CATEGORIES = ["authentication", "billing", "deployment", "networking"] as const;

export type Region = (typeof REGIONS)[number];
export type ProductVersion = (typeof PRODUCT_VERSIONS)[number];
export type Category = (typeof CATEGORIES)[number];

export interface KbDocument {
	/** Unique, stable identifier: "KB-0042" */
	doc_id: string;
	title: string;
	body: string;
	region: Region;
	product_version: ProductVersion;
	category: Category;
	deprecated: boolean;
	/** ISO-8601 date, lexicographically comparable: "2024-03-18" */
	effective_date: string;
	/** Ordered set of codes matching E-#### */
	error_codes: readonly string[];
}

/**
 * Metadata record the filter evaluator sees. Error codes are collapsed into
 * one comma-joined string so every field compares as a scalar.
 */
export interface FlatMetadata {
	region: string;
	product_version: string;
	category: string;
	deprecated: boolean;
	effective_date: string;
	error_codes_str: string;
}

/** Display fields carried through ranking and fusion */
export interface DocumentDisplay {
	doc_id: string;
	title: string;
	body: string;
	region: string;
	product_version: string;
	category: string;
	deprecated: boolean;
}

// ============================================================================
// Ranking Types
// ============================================================================

/**
 * Output of exactly one retrieval branch. Within a branch's list, items are
 * sorted by descending score and ranks run 1..n without gaps.
 */
export interface RankedItem {
	doc_id: string;
	score: number;
	/** 1-based */
	rank: number;
}

/** A ranked item that also carries display fields */
export interface RankedDocument extends RankedItem {
	document: DocumentDisplay;
}

export interface FusedResult {
	doc_id: string;
	/** Reciprocal rank fusion score */
	score: number;
	rank: number;
	/** Copy from whichever input list first introduced the document */
	document: DocumentDisplay;
}

/** Display-ready result record */
export interface SearchResult extends DocumentDisplay {
	score: number;
	rank: number;
}

// ============================================================================
// Query Types
// ============================================================================

export type DegradationKind =
	| "dense-filter-dropped"
	| "sparse-filter-fallback"
	| "unfiltered-retry";

export interface Degradation {
	kind: DegradationKind;
	reason: string;
}

/**
 * Result of running one retrieval branch. "degraded" still carries usable
 * items but records which fallback produced them.
 */
export type BranchOutcome =
	| { status: "ok"; items: RankedDocument[] }
	| { status: "degraded"; items: RankedDocument[]; degradation: Degradation };

export interface HybridSearchMetadata {
	queryTime: number;
	denseHits: number;
	sparseHits: number;
	/** Whether the returned results honor the requested filter in both branches */
	filterApplied: boolean;
	degradations: Degradation[];
	/** Index snapshot version the query ran against */
	indexVersion: number;
}

export interface HybridSearchResult {
	results: SearchResult[];
	metadata: HybridSearchMetadata;
}

// ============================================================================
// Index Lifecycle
// ============================================================================

export interface CorpusStats {
	documentCount: number;
	vocabularySize: number;
	averageDocumentLength: number;
}
