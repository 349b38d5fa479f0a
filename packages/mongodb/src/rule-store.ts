// ============================================================================
// MongoDB Rule Store
// ============================================================================

import {
	type Logger,
	type MappingRule,
	type RuleStore,
	type RuleStoreOperation,
	type RuleWrite,
	RuleStoreUnavailableError,
	errorContext,
	normalizeHeader,
	silentLogger,
} from "@sheetrecon/core";
import type { MappingRuleDocument, RuleChange, RuleCollection, RuleKey } from "./collections";

const DEFAULT_MAX_CAS_ATTEMPTS = 8;

export interface MongoRuleStoreOptions {
	/** Compare-and-set rounds before a contended write gives up. Default: 8 */
	maxCasAttempts?: number;
	/** Clock used when a write carries no timestamp */
	now?: () => Date;
	logger?: Logger;
}

function toRule(document: MappingRuleDocument): MappingRule {
	return {
		schemaId: document.schemaId,
		normalizedHeaderText: document.normalizedHeaderText,
		targetFieldName: document.targetFieldName,
		confirmedCount: document.confirmedCount,
		lastConfirmedAt: document.lastConfirmedAt,
	};
}

/**
 * Rule store on a MongoDB collection with a unique (schemaId, normalizedHeaderText) index.
 *
 * Writes read the current document, then update it only if its `version` is unchanged,
 * retrying on a lost race. Concurrent first inserts collide on the unique index and the
 * loser retries as an update. Driver errors surface as `RuleStoreUnavailableError`.
 */
export class MongoRuleStore implements RuleStore {
	private readonly maxCasAttempts: number;
	private readonly now: () => Date;
	private readonly logger: Logger;

	constructor(
		private readonly collection: RuleCollection,
		options?: MongoRuleStoreOptions
	) {
		this.maxCasAttempts = Math.max(1, options?.maxCasAttempts ?? DEFAULT_MAX_CAS_ATTEMPTS);
		this.now = options?.now ?? (() => new Date());
		this.logger = options?.logger ?? silentLogger;
	}

	/** Create the unique key index. Call once at startup. */
	async ensureIndexes(): Promise<void> {
		await this.collection.ensureIndexes();
	}

	async lookup(schemaId: string, normalizedHeader: string): Promise<MappingRule | null> {
		return this.guard("lookup", async () => {
			const document = await this.collection.findOne(this.key(schemaId, normalizedHeader));
			return document ? toRule(document) : null;
		});
	}

	async upsert(write: RuleWrite): Promise<MappingRule> {
		const key = this.key(write.schemaId, write.normalizedHeaderText);
		const confirmedAt = write.confirmedAt ?? this.now();

		return this.guard("upsert", async () => {
			for (let attempt = 1; attempt <= this.maxCasAttempts; attempt++) {
				const current = await this.collection.findOne(key);

				if (!current) {
					const document: MappingRuleDocument = {
						...key,
						targetFieldName: write.targetFieldName,
						confirmedCount: 1,
						lastConfirmedAt: confirmedAt,
						version: 1,
					};
					if (await this.collection.insertOne(document)) {
						return toRule(document);
					}
					this.logger.debug("rule inserted concurrently; retrying as update", { ...key, attempt });
					continue;
				}

				const change: RuleChange =
					current.targetFieldName === write.targetFieldName
						? {
								targetFieldName: current.targetFieldName,
								confirmedCount: current.confirmedCount + 1,
								lastConfirmedAt: confirmedAt,
								version: current.version + 1,
							}
						: {
								targetFieldName: write.targetFieldName,
								confirmedCount: 1,
								lastConfirmedAt: confirmedAt,
								version: current.version + 1,
							};

				if (await this.collection.updateIfVersion(key, current.version, change)) {
					return toRule({ ...key, ...change });
				}
				this.logger.debug("rule changed concurrently; retrying", { ...key, attempt });
			}

			throw new RuleStoreUnavailableError(
				"upsert",
				new Error(`write contention on "${key.normalizedHeaderText}" after ${this.maxCasAttempts} attempts`)
			);
		});
	}

	async reinforce(
		schemaId: string,
		normalizedHeader: string,
		expectedTarget: string,
		confirmedAt?: Date
	): Promise<MappingRule | null> {
		const key = this.key(schemaId, normalizedHeader);
		const at = confirmedAt ?? this.now();

		return this.guard("reinforce", async () => {
			for (let attempt = 1; attempt <= this.maxCasAttempts; attempt++) {
				const current = await this.collection.findOne(key);
				if (!current || current.targetFieldName !== expectedTarget) {
					return null;
				}

				const change: RuleChange = {
					targetFieldName: current.targetFieldName,
					confirmedCount: current.confirmedCount + 1,
					lastConfirmedAt: at,
					version: current.version + 1,
				};
				if (await this.collection.updateIfVersion(key, current.version, change)) {
					return toRule({ ...key, ...change });
				}
				this.logger.debug("rule changed concurrently; retrying", { ...key, attempt });
			}

			throw new RuleStoreUnavailableError(
				"reinforce",
				new Error(`write contention on "${key.normalizedHeaderText}" after ${this.maxCasAttempts} attempts`)
			);
		});
	}

	async list(schemaId: string): Promise<MappingRule[]> {
		return this.guard("list", async () => {
			const documents = await this.collection.findBySchema(schemaId);
			return documents.map(toRule);
		});
	}

	private key(schemaId: string, normalizedHeader: string): RuleKey {
		return { schemaId, normalizedHeaderText: normalizeHeader(normalizedHeader) };
	}

	private async guard<T>(operation: RuleStoreOperation, run: () => Promise<T>): Promise<T> {
		try {
			return await run();
		} catch (error) {
			if (error instanceof RuleStoreUnavailableError) {
				throw error;
			}
			this.logger.error(`rule store ${operation} failed`, errorContext(error));
			throw new RuleStoreUnavailableError(operation, error);
		}
	}
}
