// Mapping Rule Store - persisted header → field decisions

export { InMemoryRuleStore, ruleKey, compareRules } from "./memory-store";
export { loadRuleSnapshot } from "./snapshot";

export type { RuleStore, RuleWrite } from "./types";
export type { InMemoryRuleStoreOptions } from "./memory-store";
export type { RuleSnapshotResult } from "./snapshot";
