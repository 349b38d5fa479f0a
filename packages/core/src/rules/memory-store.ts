// ============================================================================
// In-Memory Rule Store
// ============================================================================

import { normalizeHeader } from "../matcher/similarity";
import type { MappingRule } from "../types";
import type { RuleStore, RuleWrite } from "./types";

interface VersionedRule {
	rule: MappingRule;
	version: number;
}

export interface InMemoryRuleStoreOptions {
	/** Clock used when a write carries no timestamp */
	now?: () => Date;
	/** Rules to start with */
	rules?: Iterable<MappingRule>;
}

export function ruleKey(schemaId: string, normalizedHeader: string): string {
	return `${schemaId}\u0000${normalizeHeader(normalizedHeader)}`;
}

export function compareRules(a: MappingRule, b: MappingRule): number {
	if (b.confirmedCount !== a.confirmedCount) {
		return b.confirmedCount - a.confirmedCount;
	}
	return a.normalizedHeaderText.localeCompare(b.normalizedHeaderText);
}

/**
 * Rule store kept in process memory, for tests and single-process hosts.
 *
 * Each operation reads and writes a key without awaiting in between, so it runs to
 * completion within one turn of the event loop; writes still go through a version
 * compare-and-set so the record of a key only ever moves forward.
 */
export class InMemoryRuleStore implements RuleStore {
	private readonly records = new Map<string, VersionedRule>();
	private readonly now: () => Date;

	constructor(options?: InMemoryRuleStoreOptions) {
		this.now = options?.now ?? (() => new Date());
		for (const rule of options?.rules ?? []) {
			const normalized = normalizeHeader(rule.normalizedHeaderText);
			this.records.set(ruleKey(rule.schemaId, normalized), {
				rule: { ...rule, normalizedHeaderText: normalized },
				version: 1,
			});
		}
	}

	async lookup(schemaId: string, normalizedHeader: string): Promise<MappingRule | null> {
		const record = this.records.get(ruleKey(schemaId, normalizedHeader));
		return record ? { ...record.rule } : null;
	}

	async upsert(write: RuleWrite): Promise<MappingRule> {
		const normalizedHeaderText = normalizeHeader(write.normalizedHeaderText);
		const key = ruleKey(write.schemaId, normalizedHeaderText);
		const confirmedAt = write.confirmedAt ?? this.now();
		const current = this.records.get(key);

		const next: MappingRule =
			current && current.rule.targetFieldName === write.targetFieldName
				? {
						...current.rule,
						confirmedCount: current.rule.confirmedCount + 1,
						lastConfirmedAt: confirmedAt,
					}
				: {
						schemaId: write.schemaId,
						normalizedHeaderText,
						targetFieldName: write.targetFieldName,
						confirmedCount: 1,
						lastConfirmedAt: confirmedAt,
					};

		this.compareAndSet(key, current?.version ?? 0, next);
		return { ...next };
	}

	async reinforce(
		schemaId: string,
		normalizedHeader: string,
		expectedTarget: string,
		confirmedAt?: Date
	): Promise<MappingRule | null> {
		const key = ruleKey(schemaId, normalizedHeader);
		const current = this.records.get(key);
		if (!current || current.rule.targetFieldName !== expectedTarget) {
			return null;
		}

		const next: MappingRule = {
			...current.rule,
			confirmedCount: current.rule.confirmedCount + 1,
			lastConfirmedAt: confirmedAt ?? this.now(),
		};
		this.compareAndSet(key, current.version, next);
		return { ...next };
	}

	async list(schemaId: string): Promise<MappingRule[]> {
		return Array.from(this.records.values())
			.filter(({ rule }) => rule.schemaId === schemaId)
			.map(({ rule }) => ({ ...rule }))
			.sort(compareRules);
	}

	/** Number of stored rules across all schemas. */
	get size(): number {
		return this.records.size;
	}

	private compareAndSet(key: string, expectedVersion: number, rule: MappingRule): void {
		const currentVersion = this.records.get(key)?.version ?? 0;
		if (currentVersion !== expectedVersion) {
			throw new Error(`Concurrent write on rule ${key}: expected version ${expectedVersion}`);
		}
		this.records.set(key, { rule, version: expectedVersion + 1 });
	}
}
