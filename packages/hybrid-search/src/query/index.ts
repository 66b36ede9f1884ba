/**
 * Query module exports
 */

export {
	FILTER_FIELDS,
	FILTER_OPERATORS,
	and,
	condition,
	or,
	parseFilterPredicate,
	toWireFilter,
	type AndNode,
	type ConditionNode,
	type EqualityOperator,
	type FilterField,
	type FilterOperator,
	type FilterPredicate,
	type FilterScalar,
	type MembershipOperator,
	type OrNode,
	type OrderingOperator,
	type WireFilter,
} from "./filter-predicate";

export { compileFilter, evaluateFilter, type MetadataRecord } from "./filter-evaluator";

export {
	ExtractedFiltersSchema,
	errorCodeFromExtractedFilters,
	filterByErrorCode,
	parseExtractedFilters,
	predicateFromExtractedFilters,
	type ExtractedFilters,
} from "./extracted-filters";

export { DEFAULT_RRF_K, fuseWithRrf } from "./rrf-fusion";

export { queryWithTimeout, type VectorMatch, type VectorQuery, type VectorSearchPort } from "./vector-port";

export { runSparseBranch, type SparseBranchDeps, type SparseBranchRequest } from "./sparse-branch";

export {
	hydrateMatches,
	runDenseBranch,
	type DenseBranchDeps,
	type DenseBranchRequest,
	type DenseOutcome,
} from "./dense-branch";

export {
	createHybridRetriever,
	type HybridRetriever,
	type HybridRetrieverDeps,
	type HybridSearchOptions,
} from "./hybrid-search";

export { applyRelevanceScores, type AsyncReranker, type RelevanceScore } from "./reranker";

export {
	createVoyageReranker,
	isVoyageRerankerAvailable,
	type VoyageRerankerOptions,
} from "./voyage-reranker";
