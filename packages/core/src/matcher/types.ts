// ============================================================================
// Column Matching Types
// ============================================================================

import type { ColumnCandidate, MappingRule } from "../types";

/**
 * Where a proposal came from, strongest first.
 * - 'historical-rule': a persisted rule for this header (pre-empts scoring)
 * - 'exact': normalized header equals the field name
 * - 'normalized': header equals an alias, or the field after abbreviation expansion
 * - 'fuzzy': string similarity above the floor (always needs a human decision)
 * - 'none': synthetic "leave unmatched" proposal, always ranked last
 */
export type ProposalSource = "historical-rule" | "exact" | "normalized" | "fuzzy" | "none";

/**
 * One ranked suggestion for a candidate column.
 */
export interface MatchProposal {
	columnIndex: number;
	/** Proposed schema field (null for the 'none' proposal) */
	targetField: string | null;
	/** 0-1; 1 only for exact and historical-rule proposals */
	confidence: number;
	source: ProposalSource;
	/** Field name or alias that produced the match */
	matchedVia?: string;
}

/**
 * Ranked proposals for one candidate, highest confidence first.
 */
export interface ColumnProposals {
	candidate: ColumnCandidate;
	proposals: MatchProposal[];
}

/**
 * Result of matching all candidates of a table against a schema.
 */
export interface MatchResult {
	/** One entry per candidate, in candidate order */
	columns: ColumnProposals[];
	/** Rules that matched a header but point at a field the schema no longer has */
	staleRules: MappingRule[];
	/** Candidates whose top proposal resolves without a human (rule, exact, normalized) */
	autoResolvable: number;
	/** Candidates whose best proposal is fuzzy */
	needsReview: number;
	/** Candidates with nothing above the similarity floor */
	unmatched: number;
}

/**
 * Options for the matching process.
 */
export interface MatchOptions {
	/** Minimum similarity for a fuzzy proposal. Default: 0.5 */
	fuzzyThreshold?: number;
	/** Maximum fuzzy proposals kept per candidate. Default: 5 */
	maxFuzzyProposals?: number;
}

export interface ResolvedMatchOptions {
	fuzzyThreshold: number;
	maxFuzzyProposals: number;
}
