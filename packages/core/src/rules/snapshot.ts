// ============================================================================
// Rule Snapshots
// ============================================================================

import { RuleStoreUnavailableError } from "../errors";
import type { MappingRule, RuleSnapshot } from "../types";
import type { RuleStore } from "./types";

export interface RuleSnapshotResult {
	snapshot: RuleSnapshot;
	/** Lookups that failed; their headers are treated as having no rule */
	failures: Array<{ normalizedHeader: string; error: RuleStoreUnavailableError }>;
}

/**
 * Look up the rules for a set of headers. A failed lookup degrades to a miss
 * for that header and is reported in `failures`; it never fabricates a rule.
 */
export async function loadRuleSnapshot(
	store: RuleStore,
	schemaId: string,
	normalizedHeaders: Iterable<string>
): Promise<RuleSnapshotResult> {
	const headers = Array.from(new Set(normalizedHeaders)).filter((h) => h.length > 0);
	const snapshot = new Map<string, MappingRule>();
	const failures: RuleSnapshotResult["failures"] = [];

	const results = await Promise.all(
		headers.map(
			async (
				normalizedHeader
			): Promise<
				| { normalizedHeader: string; rule: MappingRule | null }
				| { normalizedHeader: string; error: RuleStoreUnavailableError }
			> => {
			try {
				return { normalizedHeader, rule: await store.lookup(schemaId, normalizedHeader) };
			} catch (error) {
				const wrapped =
					error instanceof RuleStoreUnavailableError
						? error
						: new RuleStoreUnavailableError("lookup", error);
				return { normalizedHeader, error: wrapped };
			}
		})
	);

	for (const result of results) {
		if ("error" in result) {
			failures.push({ normalizedHeader: result.normalizedHeader, error: result.error });
		} else if (result.rule) {
			snapshot.set(result.normalizedHeader, result.rule);
		}
	}

	return { snapshot, failures };
}
