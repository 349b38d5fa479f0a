// Canonical Schema Registry - validated target schemas

export {
	defineSchema,
	knownHeaders,
	requiredFields,
	formatIssues,
	schemaDefinition,
	InMemorySchemaRegistry,
} from "./registry";
export type { SchemaDefinition, SchemaRegistry } from "./registry";
