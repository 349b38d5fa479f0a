// ============================================================================
// Mapping Rule Store Types
// ============================================================================

import type { MappingRule } from "../types";

/**
 * A confirmed header → field decision to persist.
 */
export interface RuleWrite {
	schemaId: string;
	normalizedHeaderText: string;
	targetFieldName: string;
	/** Defaults to the store's clock */
	confirmedAt?: Date;
}

/**
 * Persistent history of confirmed mappings, shared by all sessions of a schema.
 *
 * Rules are keyed by (schemaId, normalizedHeaderText). Every write is atomic per key:
 * concurrent writers for the same key are serialized, and the last committed target wins.
 * Backend failures are reported as `RuleStoreUnavailableError`.
 */
export interface RuleStore {
	/** Rule for a header, or null when none was confirmed yet */
	lookup(schemaId: string, normalizedHeader: string): Promise<MappingRule | null>;

	/**
	 * Record a confirmation.
	 * - no rule yet: insert with confirmedCount 1
	 * - same target: increment confirmedCount
	 * - different target: overwrite the target and reset confirmedCount to 1
	 */
	upsert(write: RuleWrite): Promise<MappingRule>;

	/**
	 * Increment confirmedCount only while the rule still points at `expectedTarget`.
	 * Returns null (and changes nothing) when the rule is gone or was corrected meanwhile.
	 */
	reinforce(
		schemaId: string,
		normalizedHeader: string,
		expectedTarget: string,
		confirmedAt?: Date
	): Promise<MappingRule | null>;

	/** All rules of a schema, most confirmed first */
	list(schemaId: string): Promise<MappingRule[]>;
}
