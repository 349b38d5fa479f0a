// ============================================================================
// Canonical Schema Registry
// ============================================================================

import { z } from "zod";
import { InvalidSchemaError } from "../errors";
import { normalizeHeader } from "../matcher/similarity";
import type { CanonicalSchema, SchemaField } from "../types";

const fieldDefinition = z.object({
	fieldName: z.string().trim().min(1),
	dataType: z.enum(["string", "number", "integer", "date", "boolean"]),
	required: z.boolean().default(false),
	aliases: z.array(z.string().trim().min(1)).optional(),
	multiSource: z.boolean().optional(),
});

export const schemaDefinition = z
	.object({
		schemaId: z.string().trim().min(1),
		fields: z.array(fieldDefinition).min(1, "a schema needs at least one field"),
		targetTableName: z.string().trim().min(1).optional(),
	})
	.superRefine((schema, ctx) => {
		const seen = new Map<string, string>();
		schema.fields.forEach((field, index) => {
			const key = normalizeHeader(field.fieldName);
			const previous = seen.get(key);
			if (previous !== undefined) {
				ctx.addIssue({
					code: z.ZodIssueCode.custom,
					path: ["fields", index, "fieldName"],
					message: `"${field.fieldName}" collides with "${previous}"`,
				});
			}
			seen.set(key, field.fieldName);
		});
	});

/** Schema definition as accepted from configuration or storage (`required` may be omitted). */
export type SchemaDefinition = z.input<typeof schemaDefinition>;

/** Formats zod issues as `path: message` strings. */
export function formatIssues(error: z.ZodError): string[] {
	return error.issues.map((issue) =>
		issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
	);
}

/**
 * Validate a schema definition and return an immutable canonical schema.
 *
 * @throws InvalidSchemaError when fields are missing, malformed or collide after normalization
 */
export function defineSchema(definition: unknown): CanonicalSchema {
	const parsed = schemaDefinition.safeParse(definition);
	if (!parsed.success) {
		throw new InvalidSchemaError(formatIssues(parsed.error));
	}

	const fields: SchemaField[] = parsed.data.fields.map((field) =>
		Object.freeze({
			...field,
			aliases: field.aliases ? Object.freeze([...field.aliases]) : undefined,
		})
	);

	return Object.freeze({
		schemaId: parsed.data.schemaId,
		fields: Object.freeze(fields),
		targetTableName: parsed.data.targetTableName,
	});
}

/**
 * Field names and aliases of a schema, used as header hints by the detector.
 */
export function knownHeaders(schema: CanonicalSchema): string[] {
	return schema.fields.flatMap((field) => [field.fieldName, ...(field.aliases ?? [])]);
}

/**
 * Required fields of a schema, in schema order.
 */
export function requiredFields(schema: CanonicalSchema): string[] {
	return schema.fields.filter((field) => field.required).map((field) => field.fieldName);
}

// ============================================================================
// Registry Contract
// ============================================================================

/**
 * Read access to registered target schemas.
 */
export interface SchemaRegistry {
	get(schemaId: string): Promise<CanonicalSchema | null>;
	list(): Promise<CanonicalSchema[]>;
}

/**
 * Registry held in memory, filled from configuration at startup.
 */
export class InMemorySchemaRegistry implements SchemaRegistry {
	private readonly schemas = new Map<string, CanonicalSchema>();

	constructor(definitions: Iterable<unknown> = []) {
		for (const definition of definitions) {
			this.register(definition);
		}
	}

	register(definition: unknown): CanonicalSchema {
		const schema = defineSchema(definition);
		this.schemas.set(schema.schemaId, schema);
		return schema;
	}

	async get(schemaId: string): Promise<CanonicalSchema | null> {
		return this.schemas.get(schemaId) ?? null;
	}

	async list(): Promise<CanonicalSchema[]> {
		return Array.from(this.schemas.values());
	}
}
