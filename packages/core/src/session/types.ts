// ============================================================================
// Reconciliation Session Types
// ============================================================================

import type { DetectOptions } from "../detector";
import type { ErrorInfo, ReconciliationError } from "../errors";
import type { Logger } from "../logger";
import type { ColumnProposals, MatchOptions } from "../matcher";
import type { RuleStore } from "../rules";
import type { CellValue, ColumnCandidate, ColumnMapping, DetectedTable, FieldDataType, RawGrid } from "../types";

// ============================================================================
// Session Status (State Machine States)
// ============================================================================

/**
 * Lifecycle of a reconciliation session.
 * - 'Created': waiting for a grid
 * - 'Detecting': grid received, locating the table
 * - 'Matching': table found, proposing field matches
 * - 'AwaitingResolution': waiting for human decisions on the mappings
 * - 'Finalized': rules persisted and data handed off (terminal)
 * - 'Abandoned': cancelled or no usable table (terminal)
 */
export type SessionStatus =
	| "Created"
	| "Detecting"
	| "Matching"
	| "AwaitingResolution"
	| "Finalized"
	| "Abandoned";

// ============================================================================
// Session State
// ============================================================================

/**
 * Complete state of a reconciliation session.
 */
export interface SessionState {
	sessionId: string;
	schemaId: string;
	/** Current step in the session lifecycle */
	status: SessionStatus;
	createdAt: Date;

	// Input (set when the grid is received)
	/** File or sheet name the grid came from, used to name the target table */
	sourceName: string | null;
	grid: RawGrid | null;

	// Detection results
	table: DetectedTable | null;
	candidates: ColumnCandidate[];

	// Matching results
	/** Ranked proposals per candidate, in candidate order */
	proposals: ColumnProposals[];
	/** One mapping per candidate column */
	mappings: ColumnMapping[];

	// Finalization progress
	/** Data reached the loader; a retried finalize does not load again */
	handoffCompleted: boolean;
	/** Normalized headers whose rule write already went through */
	appliedRuleWrites: string[];

	/** Degraded operations that did not stop the session (failed rule lookups) */
	warnings: string[];

	// Termination
	/** Why detection failed, for sessions abandoned on a bad grid */
	error: ErrorInfo | null;
	abandonReason: string | null;
}

/**
 * Read-only view of a session's state, as exposed by the session object.
 */
export type SessionView = {
	readonly [K in keyof SessionState]: SessionState[K] extends ReadonlyArray<infer T>
		? ReadonlyArray<Readonly<T>>
		: SessionState[K];
};

// ============================================================================
// Session Actions
// ============================================================================

export type SessionAction =
	// Input
	| { type: "RECEIVE_GRID"; grid: RawGrid; sourceName: string | null }

	// Detection results
	| { type: "DETECTION_SUCCEEDED"; table: DetectedTable; candidates: ColumnCandidate[] }
	| { type: "DETECTION_FAILED"; error: ErrorInfo }

	// Matching results
	| {
			type: "MATCHING_COMPLETED";
			proposals: ColumnProposals[];
			mappings: ColumnMapping[];
			warnings: string[];
	  }

	// Human decisions
	| { type: "CONFIRM"; columnIndex: number; targetField: string }
	| { type: "REJECT"; columnIndex: number }
	| { type: "SKIP"; columnIndex: number }
	| { type: "UNASSIGN"; columnIndex: number }

	// Finalization
	| { type: "HANDOFF_COMPLETED"; warnings: string[] }
	| { type: "RULE_WRITE_APPLIED"; normalizedHeader: string }
	| { type: "FINALIZE" }

	// Cancellation
	| { type: "ABANDON"; reason: string };

export type SessionActionType = SessionAction["type"];

export type TransitionResult =
	| { ok: true; state: SessionState }
	| { ok: false; error: ReconciliationError };

// ============================================================================
// Handoff
// ============================================================================

/**
 * Reconciled table handed to the loader after finalization.
 */
export interface LoadRequest {
	schemaId: string;
	targetTableName: string;
	/** Mapped target fields, in schema order */
	columns: string[];
	/** One record per data row, keyed by target field */
	rows: Array<Record<string, CellValue>>;
	/** Cells that did not convert to their field's data type (loaded as null) */
	issues: LoadIssue[];
}

/**
 * A cell that did not convert to its field's data type.
 */
export interface LoadIssue {
	/** Grid row index */
	row: number;
	field: string;
	/** Cell value as read (multi-source values joined) */
	value: CellValue;
	expected: FieldDataType;
}

/**
 * Consumer of reconciled data (a database loader, an export writer).
 */
export interface DataLoader {
	load(request: LoadRequest): Promise<void>;
}

// ============================================================================
// Persistence
// ============================================================================

/**
 * Storage for session snapshots. `load` returns the stored value as-is;
 * sessions validate it when restoring.
 */
export interface SessionRepository {
	save(snapshot: SessionSnapshot): Promise<void>;
	load(sessionId: string): Promise<unknown | null>;
	delete(sessionId: string): Promise<void>;
}

/** JSON-safe cell: dates are encoded as `{ $date: iso }`. */
export type EncodedCell = string | number | boolean | null | { $date: string };

export interface EncodedCandidate {
	rawHeaderText: string;
	normalizedHeader: string;
	columnIndex: number;
	sampleValues: EncodedCell[];
}

/**
 * JSON-safe form of a session, from `toSnapshot()`.
 */
export interface SessionSnapshot {
	version: 1;
	sessionId: string;
	schemaId: string;
	status: SessionStatus;
	createdAt: string;
	sourceName: string | null;
	grid: EncodedCell[][] | null;
	table: DetectedTable | null;
	candidates: EncodedCandidate[];
	/** Proposal lists aligned with `candidates` */
	proposals: ColumnProposals["proposals"][];
	mappings: ColumnMapping[];
	handoffCompleted: boolean;
	appliedRuleWrites: string[];
	warnings: string[];
	error: ErrorInfo | null;
	abandonReason: string | null;
}

// ============================================================================
// Options
// ============================================================================

export interface SessionDependencies {
	rules: RuleStore;
	/** Receives the reconciled data on finalize */
	loader?: DataLoader;
	/** Saves a snapshot after every successful transition */
	repository?: SessionRepository;
	logger?: Logger;
}

export interface SessionOptions {
	/** Default: a random UUID */
	sessionId?: string;
	detect?: DetectOptions;
	match?: MatchOptions;
	/** Sample values kept per candidate. Default: 5 */
	sampleSize?: number;
	/** Attempts per rule write before finalize fails. Default: 3 */
	ruleWriteAttempts?: number;
	/** Clock for timestamps. Default: `() => new Date()` */
	now?: () => Date;
}
