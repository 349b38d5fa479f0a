// ============================================================================
// MongoDB Configuration
// ============================================================================

import { formatIssues } from "@sheetrecon/core";
import { z } from "zod";

const mongoEnv = z.object({
	MONGODB_URI: z
		.string({ required_error: "is required" })
		.trim()
		.regex(/^mongodb(\+srv)?:\/\//, "must start with mongodb:// or mongodb+srv://"),
	SHEETRECON_DB_NAME: z.string().trim().min(1).default("sheetrecon"),
	SHEETRECON_RULES_COLLECTION: z.string().trim().min(1).default("mapping_rules"),
	SHEETRECON_SESSIONS_COLLECTION: z.string().trim().min(1).default("reconciliation_sessions"),
	SHEETRECON_SCHEMAS_COLLECTION: z.string().trim().min(1).default("canonical_schemas"),
});

export interface MongoConfig {
	uri: string;
	dbName: string;
	collections: {
		rules: string;
		sessions: string;
		schemas: string;
	};
}

export class MongoConfigError extends Error {
	readonly issues: string[];

	constructor(issues: string[]) {
		super(`Invalid MongoDB configuration: ${issues.join("; ")}`);
		this.name = "MongoConfigError";
		this.issues = issues;
	}
}

/**
 * Read the MongoDB settings from environment variables.
 * - `MONGODB_URI` (required)
 * - `SHEETRECON_DB_NAME` (default `sheetrecon`)
 * - `SHEETRECON_RULES_COLLECTION`, `SHEETRECON_SESSIONS_COLLECTION`, `SHEETRECON_SCHEMAS_COLLECTION`
 *
 * @throws MongoConfigError
 */
export function loadMongoConfig(env: Record<string, string | undefined> = process.env): MongoConfig {
	const parsed = mongoEnv.safeParse(env);
	if (!parsed.success) {
		throw new MongoConfigError(formatIssues(parsed.error));
	}

	return {
		uri: parsed.data.MONGODB_URI,
		dbName: parsed.data.SHEETRECON_DB_NAME,
		collections: {
			rules: parsed.data.SHEETRECON_RULES_COLLECTION,
			sessions: parsed.data.SHEETRECON_SESSIONS_COLLECTION,
			schemas: parsed.data.SHEETRECON_SCHEMAS_COLLECTION,
		},
	};
}
