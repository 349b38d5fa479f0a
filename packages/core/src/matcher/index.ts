// Column Matcher - ranks schema fields for every detected column

// Main functions
export { matchColumns, assignInitialMappings, resolveMatchOptions, SOURCE_PRIORITY } from "./matcher";

// Similarity functions (for advanced usage)
export {
	normalizeHeader,
	expandAbbreviations,
	levenshtein,
	levenshteinSimilarity,
	tokenize,
	tokenSimilarity,
	containsMatch,
	commonPrefixLength,
	headerSimilarity,
	bestFieldSimilarity,
} from "./similarity";

// Types
export type {
	ProposalSource,
	MatchProposal,
	ColumnProposals,
	MatchResult,
	MatchOptions,
	ResolvedMatchOptions,
} from "./types";
