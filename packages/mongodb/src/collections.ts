// ============================================================================
// Collection Access
// ============================================================================

import type { Collection } from "mongodb";
import { MongoServerError } from "mongodb";

const DUPLICATE_KEY = 11000;

// ============================================================================
// Documents
// ============================================================================

/** Stored mapping rule. `version` guards compare-and-set updates. */
export interface MappingRuleDocument {
	schemaId: string;
	normalizedHeaderText: string;
	targetFieldName: string;
	confirmedCount: number;
	lastConfirmedAt: Date;
	version: number;
}

export interface RuleKey {
	schemaId: string;
	normalizedHeaderText: string;
}

export type RuleChange = Pick<
	MappingRuleDocument,
	"targetFieldName" | "confirmedCount" | "lastConfirmedAt" | "version"
>;

/** Stored session. The snapshot is kept as JSON text: its encoded dates use `$`-prefixed keys. */
export interface SessionDocument {
	_id: string;
	schemaId: string;
	status: string;
	snapshot: string;
	updatedAt: Date;
}

// ============================================================================
// Narrow Collection Views
// ============================================================================

/**
 * Operations the rule store needs. `ruleCollection` binds them to a driver collection;
 * tests bind them to an in-memory fake.
 */
export interface RuleCollection {
	findOne(key: RuleKey): Promise<MappingRuleDocument | null>;
	/** False when a document with the same key already exists */
	insertOne(document: MappingRuleDocument): Promise<boolean>;
	/** Applies the change only while the stored version equals `expectedVersion` */
	updateIfVersion(key: RuleKey, expectedVersion: number, change: RuleChange): Promise<boolean>;
	findBySchema(schemaId: string): Promise<MappingRuleDocument[]>;
	ensureIndexes(): Promise<void>;
}

export interface SessionCollection {
	save(document: SessionDocument): Promise<void>;
	findById(sessionId: string): Promise<SessionDocument | null>;
	deleteById(sessionId: string): Promise<void>;
}

/** Raw schema documents; they are validated by the registry on read. */
export interface SchemaCollection {
	findBySchemaId(schemaId: string): Promise<unknown | null>;
	findAll(): Promise<unknown[]>;
}

// ============================================================================
// Driver Bindings
// ============================================================================

export function isDuplicateKeyError(error: unknown): boolean {
	return error instanceof MongoServerError && error.code === DUPLICATE_KEY;
}

export function ruleCollection(collection: Collection<MappingRuleDocument>): RuleCollection {
	return {
		async findOne(key) {
			return collection.findOne(
				{ schemaId: key.schemaId, normalizedHeaderText: key.normalizedHeaderText },
				{ projection: { _id: 0 } }
			);
		},

		async insertOne(document) {
			try {
				// The driver adds _id to the inserted object
				await collection.insertOne({ ...document });
				return true;
			} catch (error) {
				if (isDuplicateKeyError(error)) {
					return false;
				}
				throw error;
			}
		},

		async updateIfVersion(key, expectedVersion, change) {
			const result = await collection.updateOne(
				{
					schemaId: key.schemaId,
					normalizedHeaderText: key.normalizedHeaderText,
					version: expectedVersion,
				},
				{ $set: change }
			);
			return result.matchedCount === 1;
		},

		async findBySchema(schemaId) {
			return collection
				.find({ schemaId }, { projection: { _id: 0 } })
				.sort({ confirmedCount: -1, normalizedHeaderText: 1 })
				.toArray();
		},

		async ensureIndexes() {
			await collection.createIndex({ schemaId: 1, normalizedHeaderText: 1 }, { unique: true });
		},
	};
}

export function sessionCollection(collection: Collection<SessionDocument>): SessionCollection {
	return {
		async save(document) {
			await collection.replaceOne({ _id: document._id }, document, { upsert: true });
		},

		async findById(sessionId) {
			return collection.findOne({ _id: sessionId });
		},

		async deleteById(sessionId) {
			await collection.deleteOne({ _id: sessionId });
		},
	};
}

export function schemaCollection(collection: Collection): SchemaCollection {
	return {
		async findBySchemaId(schemaId) {
			return collection.findOne({ schemaId }, { projection: { _id: 0 } });
		},

		async findAll() {
			return collection.find({}, { projection: { _id: 0 } }).sort({ schemaId: 1 }).toArray();
		},
	};
}
