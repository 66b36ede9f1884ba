/**
 * hybrid-search-evals
 *
 * Recall@k and MRR over a labelled eval set.
 */

export { mean, recallAtK, reciprocalRank } from "./metrics";

export {
	EvalEntrySchema,
	EvalSetError,
	EvalSetSchema,
	loadEvalSet,
	parseEvalSet,
	type EvalEntry,
} from "./eval-set";

export {
	OVERALL_CATEGORY,
	formatSummary,
	runEvalQuery,
	runEvals,
	summarizeByCategory,
	type CategorySummary,
	type EvalQueryResult,
	type RunEvalsOptions,
} from "./run-evals";
