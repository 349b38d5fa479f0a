// ============================================================================
// MongoDB Schema Registry
// ============================================================================

import {
	type CanonicalSchema,
	type Logger,
	type SchemaRegistry,
	InvalidSchemaError,
	defineSchema,
	silentLogger,
} from "@sheetrecon/core";
import type { SchemaCollection } from "./collections";

/**
 * Read-only registry over a collection of schema definitions.
 * Documents are validated on every read; `list` leaves out invalid ones and logs them.
 */
export class MongoSchemaRegistry implements SchemaRegistry {
	constructor(
		private readonly collection: SchemaCollection,
		private readonly logger: Logger = silentLogger
	) {}

	/**
	 * @throws InvalidSchemaError when the stored definition is malformed
	 */
	async get(schemaId: string): Promise<CanonicalSchema | null> {
		const document = await this.collection.findBySchemaId(schemaId);
		return document === null ? null : defineSchema(document);
	}

	async list(): Promise<CanonicalSchema[]> {
		const documents = await this.collection.findAll();
		const schemas: CanonicalSchema[] = [];

		for (const document of documents) {
			try {
				schemas.push(defineSchema(document));
			} catch (error) {
				if (!(error instanceof InvalidSchemaError)) {
					throw error;
				}
				this.logger.warn("skipping invalid schema document", { issues: error.issues });
			}
		}

		return schemas;
	}
}
