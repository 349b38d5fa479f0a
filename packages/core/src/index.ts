// @sheetrecon/core - table detection, column matching and reconciliation sessions

// Detector exports
export {
	detectTable,
	extractCandidates,
	tableRows,
	profileRow,
	gridWidth,
	resolveDetectOptions,
	classifyCell,
	isEmptyCell,
	cellText,
	parseNumberText,
	parseDateText,
} from "./detector";
export type { DetectOptions, DetectResult, ResolvedDetectOptions, RowProfile } from "./detector";

// Matcher exports
export {
	matchColumns,
	assignInitialMappings,
	resolveMatchOptions,
	SOURCE_PRIORITY,
	normalizeHeader,
	expandAbbreviations,
	levenshtein,
	levenshteinSimilarity,
	tokenize,
	tokenSimilarity,
	containsMatch,
	commonPrefixLength,
	headerSimilarity,
	bestFieldSimilarity,
} from "./matcher";
export type {
	ProposalSource,
	MatchProposal,
	ColumnProposals,
	MatchResult,
	MatchOptions,
	ResolvedMatchOptions,
} from "./matcher";

// Registry exports
export {
	defineSchema,
	knownHeaders,
	requiredFields,
	formatIssues,
	schemaDefinition,
	InMemorySchemaRegistry,
} from "./registry";
export type { SchemaDefinition, SchemaRegistry } from "./registry";

// Rule store exports
export { InMemoryRuleStore, ruleKey, compareRules, loadRuleSnapshot } from "./rules";
export type { RuleStore, RuleWrite, InMemoryRuleStoreOptions, RuleSnapshotResult } from "./rules";

// Session exports
export {
	ReconciliationSession,
	sessionReducer,
	createInitialState,
	isTerminal,
	isFinalizing,
	isValidTransition,
	missingRequiredFields,
	pendingRuleWrites,
	suggestionsFor,
	buildLoadRequest,
	convertValue,
	describeIssues,
	sanitizeTableName,
	resolveTargetTableName,
	loadValue,
	toSnapshot,
	parseSnapshot,
	encodeCell,
	decodeCell,
	sessionSnapshotSchema,
	InMemorySessionRepository,
} from "./session";
export type {
	SessionStatus,
	SessionState,
	SessionView,
	SessionAction,
	SessionActionType,
	TransitionResult,
	LoadRequest,
	LoadIssue,
	DataLoader,
	SessionRepository,
	SessionSnapshot,
	EncodedCell,
	EncodedCandidate,
	SessionDependencies,
	SessionOptions,
	PendingRuleWrite,
	HandoffInput,
	Conversion,
} from "./session";

// Errors
export {
	ERROR_CODES,
	ReconciliationError,
	NoTableFoundError,
	InsufficientDataError,
	MappingConflictError,
	IncompleteMappingError,
	RuleStoreUnavailableError,
	LoaderFailedError,
	UnknownColumnError,
	UnknownTargetFieldError,
	InvalidTransitionError,
	InvalidSnapshotError,
	InvalidSchemaError,
	isReconciliationError,
} from "./errors";
export type { ErrorCode, ErrorInfo, RuleStoreOperation } from "./errors";

// Logging
export { createConsoleLogger, silentLogger, errorContext } from "./logger";
export type { Logger, LogContext } from "./logger";

// Core types
export type {
	CellValue,
	RawGrid,
	CellKind,
	RowRange,
	DetectedTable,
	ColumnCandidate,
	FieldDataType,
	SchemaField,
	CanonicalSchema,
	MappingRule,
	RuleSnapshot,
	MappingStatus,
	MappingOrigin,
	ColumnMapping,
} from "./types";
