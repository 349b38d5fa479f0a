// ============================================================================
// Connection
// ============================================================================

import { type Logger, silentLogger } from "@sheetrecon/core";
import { MongoClient } from "mongodb";
import {
	type MappingRuleDocument,
	type SessionDocument,
	ruleCollection,
	schemaCollection,
	sessionCollection,
} from "./collections";
import type { MongoConfig } from "./config";
import { MongoRuleStore } from "./rule-store";
import { MongoSchemaRegistry } from "./schema-registry";
import { MongoSessionRepository } from "./session-repository";

export interface MongoStores {
	client: MongoClient;
	rules: MongoRuleStore;
	sessions: MongoSessionRepository;
	schemas: MongoSchemaRegistry;
	close(): Promise<void>;
}

/**
 * Connect, ensure indexes and build the stores on one client.
 */
export async function connectMongo(config: MongoConfig, logger: Logger = silentLogger): Promise<MongoStores> {
	const client = new MongoClient(config.uri);
	await client.connect();
	const db = client.db(config.dbName);

	const rules = new MongoRuleStore(
		ruleCollection(db.collection<MappingRuleDocument>(config.collections.rules)),
		{ logger }
	);
	await rules.ensureIndexes();

	logger.info("connected to MongoDB", { dbName: config.dbName });

	return {
		client,
		rules,
		sessions: new MongoSessionRepository(
			sessionCollection(db.collection<SessionDocument>(config.collections.sessions))
		),
		schemas: new MongoSchemaRegistry(schemaCollection(db.collection(config.collections.schemas)), logger),
		close: () => client.close(),
	};
}
