// ============================================================================
// Error Codes
// ============================================================================

export const ERROR_CODES = {
	NO_TABLE_FOUND: "NoTableFound",
	INSUFFICIENT_DATA: "InsufficientData",
	MAPPING_CONFLICT: "MappingConflict",
	INCOMPLETE_MAPPING: "IncompleteMapping",
	RULE_STORE_UNAVAILABLE: "RuleStoreUnavailable",
	LOADER_FAILED: "LoaderFailed",
	UNKNOWN_COLUMN: "UnknownColumn",
	UNKNOWN_TARGET_FIELD: "UnknownTargetField",
	INVALID_TRANSITION: "InvalidTransition",
	INVALID_SNAPSHOT: "InvalidSnapshot",
	INVALID_SCHEMA: "InvalidSchema",
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/** Serializable form of an error, kept in snapshots of abandoned sessions. */
export interface ErrorInfo {
	code: ErrorCode;
	message: string;
}

// ============================================================================
// Error Classes
// ============================================================================

export class ReconciliationError extends Error {
	readonly code: ErrorCode;

	constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "ReconciliationError";
		this.code = code;
	}

	toInfo(): ErrorInfo {
		return { code: this.code, message: this.message };
	}
}

/** No header row followed by consistent data rows exists anywhere in the grid. */
export class NoTableFoundError extends ReconciliationError {
	constructor(message = "No tabular region found in the sheet") {
		super(ERROR_CODES.NO_TABLE_FOUND, message);
		this.name = "NoTableFoundError";
	}
}

/** A header row was found but fewer than the minimum number of data rows follow it. */
export class InsufficientDataError extends ReconciliationError {
	readonly headerRowIndex: number;
	readonly dataRowCount: number;

	constructor(headerRowIndex: number, dataRowCount: number, minDataRows: number) {
		super(
			ERROR_CODES.INSUFFICIENT_DATA,
			`Header at row ${headerRowIndex + 1} is followed by ${dataRowCount} data row(s); at least ${minDataRows} required`
		);
		this.name = "InsufficientDataError";
		this.headerRowIndex = headerRowIndex;
		this.dataRowCount = dataRowCount;
	}
}

export class MappingConflictError extends ReconciliationError {
	readonly targetField: string;
	readonly columnIndex: number;
	readonly conflictingColumnIndex: number;

	constructor(targetField: string, columnIndex: number, conflictingColumnIndex: number) {
		super(
			ERROR_CODES.MAPPING_CONFLICT,
			`Field "${targetField}" is already matched by column ${conflictingColumnIndex}; unassign it before confirming column ${columnIndex}`
		);
		this.name = "MappingConflictError";
		this.targetField = targetField;
		this.columnIndex = columnIndex;
		this.conflictingColumnIndex = conflictingColumnIndex;
	}
}

export class IncompleteMappingError extends ReconciliationError {
	readonly missingFields: string[];

	constructor(missingFields: string[]) {
		super(
			ERROR_CODES.INCOMPLETE_MAPPING,
			`Required fields without exactly one matched column: ${missingFields.join(", ")}`
		);
		this.name = "IncompleteMappingError";
		this.missingFields = missingFields;
	}
}

export type RuleStoreOperation = "lookup" | "upsert" | "reinforce" | "list";

export class RuleStoreUnavailableError extends ReconciliationError {
	readonly operation: RuleStoreOperation;

	constructor(operation: RuleStoreOperation, cause?: unknown) {
		const detail = cause instanceof Error ? `: ${cause.message}` : "";
		super(ERROR_CODES.RULE_STORE_UNAVAILABLE, `Rule store ${operation} failed${detail}`, { cause });
		this.name = "RuleStoreUnavailableError";
		this.operation = operation;
	}
}

export class LoaderFailedError extends ReconciliationError {
	constructor(cause: unknown) {
		const detail = cause instanceof Error ? `: ${cause.message}` : "";
		super(ERROR_CODES.LOADER_FAILED, `Data loader failed${detail}`, { cause });
		this.name = "LoaderFailedError";
	}
}

export class UnknownColumnError extends ReconciliationError {
	readonly columnIndex: number;

	constructor(columnIndex: number) {
		super(ERROR_CODES.UNKNOWN_COLUMN, `No column with index ${columnIndex} in this session`);
		this.name = "UnknownColumnError";
		this.columnIndex = columnIndex;
	}
}

export class UnknownTargetFieldError extends ReconciliationError {
	readonly targetField: string;

	constructor(targetField: string, schemaId: string) {
		super(ERROR_CODES.UNKNOWN_TARGET_FIELD, `Schema "${schemaId}" has no field "${targetField}"`);
		this.name = "UnknownTargetFieldError";
		this.targetField = targetField;
	}
}

export class InvalidTransitionError extends ReconciliationError {
	readonly from: string;
	readonly action: string;

	constructor(from: string, action: string) {
		super(ERROR_CODES.INVALID_TRANSITION, `Cannot ${action} while session is ${from}`);
		this.name = "InvalidTransitionError";
		this.from = from;
		this.action = action;
	}
}

export class InvalidSnapshotError extends ReconciliationError {
	readonly issues: string[];

	constructor(issues: string[]) {
		super(ERROR_CODES.INVALID_SNAPSHOT, `Invalid session snapshot: ${issues.join("; ")}`);
		this.name = "InvalidSnapshotError";
		this.issues = issues;
	}
}

export class InvalidSchemaError extends ReconciliationError {
	readonly issues: string[];

	constructor(issues: string[]) {
		super(ERROR_CODES.INVALID_SCHEMA, `Invalid canonical schema: ${issues.join("; ")}`);
		this.name = "InvalidSchemaError";
		this.issues = issues;
	}
}

/** Narrows an unknown thrown value to a reconciliation error. */
export function isReconciliationError(value: unknown): value is ReconciliationError {
	return value instanceof ReconciliationError;
}
