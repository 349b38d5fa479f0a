// ============================================================================
// Column Matching Engine
// ============================================================================

import type {
	CanonicalSchema,
	ColumnCandidate,
	ColumnMapping,
	MappingOrigin,
	MappingRule,
	RuleSnapshot,
} from "../types";
import { bestFieldSimilarity, expandAbbreviations, normalizeHeader } from "./similarity";
import type {
	ColumnProposals,
	MatchOptions,
	MatchProposal,
	MatchResult,
	ProposalSource,
	ResolvedMatchOptions,
} from "./types";

// Default thresholds
const DEFAULT_FUZZY_THRESHOLD = 0.5;
const DEFAULT_MAX_FUZZY_PROPOSALS = 5;

// Confidence bands for normalized matches
const ALIAS_CONFIDENCE = 0.95;
const EXPANDED_NAME_CONFIDENCE = 0.9;
const EXPANDED_ALIAS_CONFIDENCE = 0.85;
const MAX_FUZZY_CONFIDENCE = 0.99;

/** Tie-break order when confidences are equal. */
export const SOURCE_PRIORITY: Record<ProposalSource, number> = {
	"historical-rule": 4,
	exact: 3,
	normalized: 2,
	fuzzy: 1,
	none: 0,
};

/** Sources that resolve a column without a human decision. */
const AUTO_SOURCES: ReadonlySet<ProposalSource> = new Set(["historical-rule", "exact", "normalized"]);

export function resolveMatchOptions(options?: MatchOptions): ResolvedMatchOptions {
	return {
		fuzzyThreshold: options?.fuzzyThreshold ?? DEFAULT_FUZZY_THRESHOLD,
		maxFuzzyProposals: options?.maxFuzzyProposals ?? DEFAULT_MAX_FUZZY_PROPOSALS,
	};
}

/**
 * Match candidate columns to schema fields, strongest evidence first:
 * 1. Historical rule for the normalized header (pre-empts everything else)
 * 2. Exact match with a field name
 * 3. Alias match, or field name/alias after abbreviation expansion
 * 4. Fuzzy similarity against fields no other column claimed in steps 1-3
 *
 * Pure: the same candidates, schema and rule snapshot always give the same result.
 *
 * @param candidates - Columns of the detected table
 * @param schema - Target schema
 * @param rules - Snapshot of this schema's rules, keyed by normalized header
 * @param options - Optional thresholds
 */
export function matchColumns(
	candidates: readonly ColumnCandidate[],
	schema: CanonicalSchema,
	rules: RuleSnapshot,
	options?: MatchOptions
): MatchResult {
	const { fuzzyThreshold, maxFuzzyProposals } = resolveMatchOptions(options);
	const fieldOrder = new Map(schema.fields.map((field, index) => [field.fieldName, index]));
	const staleRules = new Map<string, MappingRule>();

	// Pass 1: rules, exact and alias matches
	const strong = candidates.map((candidate): { historical: boolean; proposals: MatchProposal[] } => {
		if (candidate.normalizedHeader === "") {
			return { historical: false, proposals: [] };
		}

		const rule = rules.get(candidate.normalizedHeader);
		if (rule && rule.schemaId === schema.schemaId) {
			if (fieldOrder.has(rule.targetFieldName)) {
				const proposal: MatchProposal = {
					columnIndex: candidate.columnIndex,
					targetField: rule.targetFieldName,
					confidence: 1,
					source: "historical-rule",
					matchedVia: rule.normalizedHeaderText,
				};
				return { historical: true, proposals: [proposal] };
			}
			staleRules.set(rule.normalizedHeaderText, rule);
		}

		return { historical: false, proposals: directProposals(candidate, schema) };
	});

	// Fields claimed by a strong match, and by which columns
	const claimedBy = new Map<string, Set<number>>();
	for (const { proposals } of strong) {
		for (const proposal of proposals) {
			if (proposal.targetField === null) continue;
			const owners = claimedBy.get(proposal.targetField) ?? new Set<number>();
			owners.add(proposal.columnIndex);
			claimedBy.set(proposal.targetField, owners);
		}
	}

	// Pass 2: fuzzy scoring against unclaimed fields
	const columns: ColumnProposals[] = candidates.map((candidate, i) => {
		const { historical, proposals } = strong[i];
		const ranked = [...proposals];

		if (!historical && candidate.normalizedHeader !== "") {
			const ownFields = new Set(proposals.map((p) => p.targetField));
			const fuzzy: MatchProposal[] = [];

			for (const field of schema.fields) {
				if (ownFields.has(field.fieldName)) continue;
				const owners = claimedBy.get(field.fieldName);
				if (owners && [...owners].some((owner) => owner !== candidate.columnIndex)) continue;

				const { score, matchedVia } = bestFieldSimilarity(
					candidate.normalizedHeader,
					field.fieldName,
					field.aliases
				);
				if (score >= fuzzyThreshold) {
					fuzzy.push({
						columnIndex: candidate.columnIndex,
						targetField: field.fieldName,
						confidence: Math.min(score, MAX_FUZZY_CONFIDENCE),
						source: "fuzzy",
						matchedVia,
					});
				}
			}

			ranked.push(...sortProposals(fuzzy, fieldOrder).slice(0, maxFuzzyProposals));
		}

		return {
			candidate,
			proposals: [
				...sortProposals(ranked, fieldOrder),
				{ columnIndex: candidate.columnIndex, targetField: null, confidence: 0, source: "none" },
			],
		};
	});

	// Statistics from the top proposal of each column
	let autoResolvable = 0;
	let needsReview = 0;
	let unmatched = 0;
	for (const column of columns) {
		const top = column.proposals[0];
		if (AUTO_SOURCES.has(top.source)) {
			autoResolvable++;
		} else if (top.source === "fuzzy") {
			needsReview++;
		} else {
			unmatched++;
		}
	}

	return {
		columns,
		staleRules: Array.from(staleRules.values()),
		autoResolvable,
		needsReview,
		unmatched,
	};
}

/**
 * Exact and normalized proposals for one candidate.
 */
function directProposals(candidate: ColumnCandidate, schema: CanonicalSchema): MatchProposal[] {
	const header = candidate.normalizedHeader;
	const expanded = expandAbbreviations(header);
	const proposals: MatchProposal[] = [];

	for (const field of schema.fields) {
		const name = normalizeHeader(field.fieldName);
		const aliases = field.aliases ?? [];
		const base = { columnIndex: candidate.columnIndex, targetField: field.fieldName };

		if (header === name) {
			proposals.push({ ...base, confidence: 1, source: "exact", matchedVia: field.fieldName });
			continue;
		}

		const alias = aliases.find((a) => normalizeHeader(a) === header);
		if (alias !== undefined) {
			proposals.push({ ...base, confidence: ALIAS_CONFIDENCE, source: "normalized", matchedVia: alias });
			continue;
		}

		if (expanded === header) continue;

		if (expanded === name) {
			proposals.push({
				...base,
				confidence: EXPANDED_NAME_CONFIDENCE,
				source: "normalized",
				matchedVia: field.fieldName,
			});
			continue;
		}

		const expandedAlias = aliases.find((a) => normalizeHeader(a) === expanded);
		if (expandedAlias !== undefined) {
			proposals.push({
				...base,
				confidence: EXPANDED_ALIAS_CONFIDENCE,
				source: "normalized",
				matchedVia: expandedAlias,
			});
		}
	}

	return proposals;
}

/**
 * Sort by confidence, then source priority, then schema field order.
 */
function sortProposals(
	proposals: MatchProposal[],
	fieldOrder: ReadonlyMap<string, number>
): MatchProposal[] {
	return [...proposals].sort((a, b) => {
		if (b.confidence !== a.confidence) {
			return b.confidence - a.confidence;
		}
		if (SOURCE_PRIORITY[b.source] !== SOURCE_PRIORITY[a.source]) {
			return SOURCE_PRIORITY[b.source] - SOURCE_PRIORITY[a.source];
		}
		return fieldRank(fieldOrder, a.targetField) - fieldRank(fieldOrder, b.targetField);
	});
}

function fieldRank(fieldOrder: ReadonlyMap<string, number>, field: string | null): number {
	return field === null ? Number.MAX_SAFE_INTEGER : (fieldOrder.get(field) ?? Number.MAX_SAFE_INTEGER);
}

/**
 * Build the initial column mappings from ranked proposals.
 * Only rule, exact and normalized proposals are accepted automatically; they are
 * assigned greedily (highest confidence first, then earliest column) so that each
 * field is taken by one column unless it is multi-source. Everything else starts
 * 'Unmatched' and waits for a human.
 */
export function assignInitialMappings(
	columns: readonly ColumnProposals[],
	schema: CanonicalSchema
): ColumnMapping[] {
	const fieldOrder = new Map(schema.fields.map((field, index) => [field.fieldName, index]));
	const multiSource = new Set(
		schema.fields.filter((field) => field.multiSource).map((field) => field.fieldName)
	);

	const entries = columns.flatMap((column) =>
		column.proposals
			.filter((p) => AUTO_SOURCES.has(p.source) && p.targetField !== null)
			.map((proposal) => ({ candidate: column.candidate, proposal }))
	);

	entries.sort((a, b) => {
		if (b.proposal.confidence !== a.proposal.confidence) {
			return b.proposal.confidence - a.proposal.confidence;
		}
		const priority = SOURCE_PRIORITY[b.proposal.source] - SOURCE_PRIORITY[a.proposal.source];
		if (priority !== 0) {
			return priority;
		}
		if (a.candidate.columnIndex !== b.candidate.columnIndex) {
			return a.candidate.columnIndex - b.candidate.columnIndex;
		}
		return (
			fieldRank(fieldOrder, a.proposal.targetField) - fieldRank(fieldOrder, b.proposal.targetField)
		);
	});

	const mappings = columns.map(({ candidate }): ColumnMapping => ({
		columnIndex: candidate.columnIndex,
		rawHeaderText: candidate.rawHeaderText,
		normalizedHeader: candidate.normalizedHeader,
		targetField: null,
		status: "Unmatched",
		origin: null,
		confidence: 0,
		rejectedFields: [],
	}));
	const position = new Map(columns.map(({ candidate }, index) => [candidate.columnIndex, index]));

	// Greedy assignment: each column once, each field once unless multi-source
	const usedFields = new Set<string>();
	for (const { candidate, proposal } of entries) {
		const index = position.get(candidate.columnIndex);
		const field = proposal.targetField;
		if (index === undefined || field === null || mappings[index].status === "Matched") {
			continue;
		}
		if (usedFields.has(field) && !multiSource.has(field)) {
			continue;
		}

		mappings[index] = {
			...mappings[index],
			targetField: field,
			status: "Matched",
			origin: originOf(proposal.source),
			confidence: proposal.confidence,
		};
		usedFields.add(field);
	}

	return mappings;
}

function originOf(source: ProposalSource): MappingOrigin | null {
	switch (source) {
		case "historical-rule":
		case "exact":
		case "normalized":
			return source;
		default:
			return null;
	}
}
