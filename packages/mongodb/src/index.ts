// @sheetrecon/mongodb - MongoDB persistence for rules, sessions and schemas

export { MongoRuleStore } from "./rule-store";
export { MongoSessionRepository } from "./session-repository";
export { MongoSchemaRegistry } from "./schema-registry";
export { loadMongoConfig, MongoConfigError } from "./config";
export { connectMongo } from "./connect";
export {
	ruleCollection,
	sessionCollection,
	schemaCollection,
	isDuplicateKeyError,
} from "./collections";

export type { MongoRuleStoreOptions } from "./rule-store";
export type { MongoConfig } from "./config";
export type { MongoStores } from "./connect";
export type {
	MappingRuleDocument,
	SessionDocument,
	RuleKey,
	RuleChange,
	RuleCollection,
	SessionCollection,
	SchemaCollection,
} from "./collections";
