// Reconciliation Session - state machine, finalization and handoff

export { ReconciliationSession } from "./session";
export {
	sessionReducer,
	createInitialState,
	isTerminal,
	isFinalizing,
	isValidTransition,
	missingRequiredFields,
	pendingRuleWrites,
	suggestionsFor,
} from "./state-machine";
export {
	buildLoadRequest,
	convertValue,
	describeIssues,
	sanitizeTableName,
	resolveTargetTableName,
	loadValue,
} from "./handoff";
export { toSnapshot, parseSnapshot, encodeCell, decodeCell, sessionSnapshotSchema } from "./snapshot";
export { InMemorySessionRepository } from "./repository";

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
} from "./types";
export type { PendingRuleWrite } from "./state-machine";
export type { Conversion, HandoffInput } from "./handoff";
