// ============================================================================
// Reconciliation Session State Machine
// ============================================================================

import {
	IncompleteMappingError,
	InvalidTransitionError,
	MappingConflictError,
	UnknownColumnError,
	UnknownTargetFieldError,
} from "../errors";
import type { MatchProposal } from "../matcher";
import type { CanonicalSchema, ColumnMapping } from "../types";
import type {
	SessionAction,
	SessionActionType,
	SessionState,
	SessionStatus,
	TransitionResult,
} from "./types";

// ============================================================================
// Initial State
// ============================================================================

/**
 * Creates the state of a new session for a schema.
 */
export function createInitialState(sessionId: string, schemaId: string, createdAt: Date): SessionState {
	return {
		sessionId,
		schemaId,
		status: "Created",
		createdAt,

		// Input
		sourceName: null,
		grid: null,

		// Detection
		table: null,
		candidates: [],

		// Matching
		proposals: [],
		mappings: [],

		// Finalization
		handoffCompleted: false,
		appliedRuleWrites: [],

		warnings: [],
		error: null,
		abandonReason: null,
	};
}

/** Status each action is accepted in. ABANDON is accepted in every non-terminal status. */
const ACCEPTED_IN: Record<Exclude<SessionActionType, "ABANDON">, SessionStatus> = {
	RECEIVE_GRID: "Created",
	DETECTION_SUCCEEDED: "Detecting",
	DETECTION_FAILED: "Detecting",
	MATCHING_COMPLETED: "Matching",
	CONFIRM: "AwaitingResolution",
	REJECT: "AwaitingResolution",
	SKIP: "AwaitingResolution",
	UNASSIGN: "AwaitingResolution",
	HANDOFF_COMPLETED: "AwaitingResolution",
	RULE_WRITE_APPLIED: "AwaitingResolution",
	FINALIZE: "AwaitingResolution",
};

const ACTION_VERBS: Record<SessionActionType, string> = {
	RECEIVE_GRID: "receive a grid",
	DETECTION_SUCCEEDED: "complete detection",
	DETECTION_FAILED: "fail detection",
	MATCHING_COMPLETED: "complete matching",
	CONFIRM: "confirm a mapping",
	REJECT: "reject a mapping",
	SKIP: "skip a column",
	UNASSIGN: "unassign a column",
	HANDOFF_COMPLETED: "record the data handoff",
	RULE_WRITE_APPLIED: "record a rule write",
	FINALIZE: "finalize",
	ABANDON: "abandon",
};

/** Actions refused once finalization has started to take effect. */
const LOCKED_ACTIONS = new Set<SessionActionType>(["CONFIRM", "REJECT", "SKIP", "UNASSIGN", "ABANDON"]);

// ============================================================================
// State Machine Reducer
// ============================================================================

/**
 * Pure reducer for the session state machine.
 * Rejected actions return an error and leave the state untouched.
 * Once the data handoff or any rule write has gone through, the session only accepts
 * finalization: edits and abandon are refused.
 * Side-effects (detection, rule persistence, loading) are handled by `ReconciliationSession`.
 */
export function sessionReducer(
	state: SessionState,
	action: SessionAction,
	schema: CanonicalSchema
): TransitionResult {
	const result = reduce(state, action, schema);
	if (result.ok && !isValidTransition(state.status, result.state.status)) {
		return invalid(state, action.type);
	}
	return result;
}

function reduce(state: SessionState, action: SessionAction, schema: CanonicalSchema): TransitionResult {
	if (isFinalizing(state) && LOCKED_ACTIONS.has(action.type)) {
		return { ok: false, error: new InvalidTransitionError("finalizing", ACTION_VERBS[action.type]) };
	}

	if (action.type === "ABANDON") {
		if (isTerminal(state.status)) {
			return invalid(state, action.type);
		}
		return ok({ ...state, status: "Abandoned", abandonReason: action.reason });
	}

	if (state.status !== ACCEPTED_IN[action.type]) {
		return invalid(state, action.type);
	}

	switch (action.type) {
		// ============================================================
		// Input & Detection
		// ============================================================

		case "RECEIVE_GRID": {
			return ok({
				...state,
				status: "Detecting",
				grid: action.grid,
				sourceName: action.sourceName,
			});
		}

		case "DETECTION_SUCCEEDED": {
			return ok({
				...state,
				status: "Matching",
				table: action.table,
				candidates: action.candidates,
			});
		}

		case "DETECTION_FAILED": {
			return ok({
				...state,
				status: "Abandoned",
				error: action.error,
				abandonReason: action.error.message,
			});
		}

		// ============================================================
		// Matching
		// ============================================================

		case "MATCHING_COMPLETED": {
			return ok({
				...state,
				status: "AwaitingResolution",
				proposals: action.proposals,
				mappings: action.mappings,
				warnings: [...state.warnings, ...action.warnings],
			});
		}

		// ============================================================
		// Human Decisions
		// ============================================================

		case "CONFIRM": {
			const mapping = findMapping(state, action.columnIndex);
			if (!mapping) {
				return { ok: false, error: new UnknownColumnError(action.columnIndex) };
			}
			const field = schema.fields.find((f) => f.fieldName === action.targetField);
			if (!field) {
				return { ok: false, error: new UnknownTargetFieldError(action.targetField, schema.schemaId) };
			}
			if (!field.multiSource) {
				const holder = state.mappings.find(
					(m) =>
						m.columnIndex !== action.columnIndex &&
						m.status === "Matched" &&
						m.targetField === action.targetField
				);
				if (holder) {
					return {
						ok: false,
						error: new MappingConflictError(action.targetField, action.columnIndex, holder.columnIndex),
					};
				}
			}
			return ok(
				updateMapping(state, {
					...mapping,
					targetField: action.targetField,
					status: "Matched",
					origin: "confirmed",
					confidence: 1,
					rejectedFields: mapping.rejectedFields.filter((f) => f !== action.targetField),
				})
			);
		}

		case "REJECT": {
			const mapping = findMapping(state, action.columnIndex);
			if (!mapping) {
				return { ok: false, error: new UnknownColumnError(action.columnIndex) };
			}
			const rejected = mapping.targetField;
			return ok(
				updateMapping(state, {
					...clearMapping(mapping, "Unmatched"),
					rejectedFields:
						rejected !== null && !mapping.rejectedFields.includes(rejected)
							? [...mapping.rejectedFields, rejected]
							: mapping.rejectedFields,
				})
			);
		}

		case "SKIP": {
			const mapping = findMapping(state, action.columnIndex);
			if (!mapping) {
				return { ok: false, error: new UnknownColumnError(action.columnIndex) };
			}
			return ok(updateMapping(state, clearMapping(mapping, "Skipped")));
		}

		case "UNASSIGN": {
			const mapping = findMapping(state, action.columnIndex);
			if (!mapping) {
				return { ok: false, error: new UnknownColumnError(action.columnIndex) };
			}
			return ok(updateMapping(state, clearMapping(mapping, "Unmatched")));
		}

		// ============================================================
		// Finalization
		// ============================================================

		case "HANDOFF_COMPLETED": {
			return ok({ ...state, handoffCompleted: true, warnings: [...state.warnings, ...action.warnings] });
		}

		case "RULE_WRITE_APPLIED": {
			if (state.appliedRuleWrites.includes(action.normalizedHeader)) {
				return ok(state);
			}
			return ok({ ...state, appliedRuleWrites: [...state.appliedRuleWrites, action.normalizedHeader] });
		}

		case "FINALIZE": {
			const missing = missingRequiredFields(state.mappings, schema);
			if (missing.length > 0) {
				return { ok: false, error: new IncompleteMappingError(missing) };
			}
			return ok({
				...state,
				status: "Finalized",
				mappings: state.mappings.map((m) => (m.status === "Unmatched" ? clearMapping(m, "Skipped") : m)),
			});
		}
	}
}

// ============================================================================
// Helper Functions
// ============================================================================

function ok(state: SessionState): TransitionResult {
	return { ok: true, state };
}

function invalid(state: SessionState, type: SessionActionType): TransitionResult {
	return { ok: false, error: new InvalidTransitionError(state.status, ACTION_VERBS[type]) };
}

function findMapping(state: SessionState, columnIndex: number): ColumnMapping | undefined {
	return state.mappings.find((m) => m.columnIndex === columnIndex);
}

function updateMapping(state: SessionState, mapping: ColumnMapping): SessionState {
	return {
		...state,
		mappings: state.mappings.map((m) => (m.columnIndex === mapping.columnIndex ? mapping : m)),
	};
}

function clearMapping(mapping: ColumnMapping, status: "Unmatched" | "Skipped"): ColumnMapping {
	return { ...mapping, targetField: null, status, origin: null, confidence: 0 };
}

/**
 * Checks if a status accepts no further actions.
 */
export function isTerminal(status: SessionStatus): boolean {
	return status === "Finalized" || status === "Abandoned";
}

/**
 * Checks if a session has started finalizing: data handed off or a rule written.
 */
export function isFinalizing(
	state: Pick<SessionState, "status" | "handoffCompleted" | "appliedRuleWrites">
): boolean {
	return state.status === "AwaitingResolution" && (state.handoffCompleted || state.appliedRuleWrites.length > 0);
}

/**
 * Checks if a status transition is valid.
 */
export function isValidTransition(from: SessionStatus, to: SessionStatus): boolean {
	const validTransitions: Record<SessionStatus, SessionStatus[]> = {
		Created: ["Detecting", "Abandoned"],
		Detecting: ["Matching", "Abandoned"],
		Matching: ["AwaitingResolution", "Abandoned"],
		AwaitingResolution: ["AwaitingResolution", "Finalized", "Abandoned"],
		Finalized: [],
		Abandoned: [],
	};

	return validTransitions[from].includes(to);
}

/**
 * Required fields without a matched column. A field that is not multi-source
 * needs exactly one.
 */
export function missingRequiredFields(
	mappings: readonly ColumnMapping[],
	schema: CanonicalSchema
): string[] {
	const counts = new Map<string, number>();
	for (const mapping of mappings) {
		if (mapping.status === "Matched" && mapping.targetField !== null) {
			counts.set(mapping.targetField, (counts.get(mapping.targetField) ?? 0) + 1);
		}
	}

	return schema.fields
		.filter((field) => field.required)
		.filter((field) => {
			const count = counts.get(field.fieldName) ?? 0;
			return field.multiSource ? count === 0 : count !== 1;
		})
		.map((field) => field.fieldName);
}

/**
 * Proposals still worth showing for a column: rejected fields are dropped.
 */
export function suggestionsFor(state: SessionState, columnIndex: number): MatchProposal[] {
	const mapping = findMapping(state, columnIndex);
	const column = state.proposals.find((c) => c.candidate.columnIndex === columnIndex);
	if (!mapping || !column) {
		return [];
	}
	return column.proposals.filter(
		(p) => p.targetField === null || !mapping.rejectedFields.includes(p.targetField)
	);
}

// ============================================================================
// Rule Writes
// ============================================================================

/**
 * A rule write owed by a finalizing session.
 * - 'upsert': exact, normalized and confirmed matches
 * - 'reinforce': historical matches, which never rewrite the stored target
 */
export interface PendingRuleWrite {
	kind: "upsert" | "reinforce";
	normalizedHeader: string;
	targetField: string;
}

/**
 * Rule writes the session still owes, in column order, skipping those already applied.
 * Columns with a blank header produce no rule; a header seen twice is written once.
 */
export function pendingRuleWrites(state: SessionState): PendingRuleWrite[] {
	const applied = new Set(state.appliedRuleWrites);
	const seen = new Set<string>();
	const writes: PendingRuleWrite[] = [];

	const matched = [...state.mappings]
		.filter((m) => m.status === "Matched")
		.sort((a, b) => a.columnIndex - b.columnIndex);

	for (const mapping of matched) {
		const header = mapping.normalizedHeader;
		if (mapping.targetField === null || mapping.origin === null || header === "") continue;
		if (applied.has(header) || seen.has(header)) continue;
		seen.add(header);
		writes.push({
			kind: mapping.origin === "historical-rule" ? "reinforce" : "upsert",
			normalizedHeader: header,
			targetField: mapping.targetField,
		});
	}

	return writes;
}
