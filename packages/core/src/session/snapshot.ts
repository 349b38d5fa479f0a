// ============================================================================
// Session Snapshots
// ============================================================================

import { z } from "zod";
import { ERROR_CODES, InvalidSnapshotError } from "../errors";
import type { ColumnProposals } from "../matcher";
import { formatIssues } from "../registry";
import type { CellValue, ColumnCandidate, RawGrid } from "../types";
import type { EncodedCell, SessionSnapshot, SessionState } from "./types";

// ============================================================================
// Cell Encoding
// ============================================================================

export function encodeCell(value: CellValue | undefined): EncodedCell {
	if (value === undefined) return null;
	if (value instanceof Date) {
		return Number.isNaN(value.getTime()) ? null : { $date: value.toISOString() };
	}
	if (typeof value === "number" && !Number.isFinite(value)) return null;
	return value;
}

export function decodeCell(value: EncodedCell): CellValue {
	if (value !== null && typeof value === "object") return new Date(value.$date);
	return value;
}

// ============================================================================
// Validation
// ============================================================================

const encodedCell = z.union([
	z.string(),
	z.number(),
	z.boolean(),
	z.null(),
	z.object({ $date: z.string().datetime() }),
]);

const rowRange = z.object({ start: z.number().int().min(0), end: z.number().int().min(0) });

const detectedTable = z.object({
	headerRowIndex: z.number().int().min(0),
	dataRowRange: rowRange,
	columnCount: z.number().int().min(0),
});

const candidate = z.object({
	rawHeaderText: z.string(),
	normalizedHeader: z.string(),
	columnIndex: z.number().int().min(0),
	sampleValues: z.array(encodedCell),
});

const proposal = z.object({
	columnIndex: z.number().int().min(0),
	targetField: z.string().nullable(),
	confidence: z.number().min(0).max(1),
	source: z.enum(["historical-rule", "exact", "normalized", "fuzzy", "none"]),
	matchedVia: z.string().optional(),
});

const mapping = z.object({
	columnIndex: z.number().int().min(0),
	rawHeaderText: z.string(),
	normalizedHeader: z.string(),
	targetField: z.string().nullable(),
	status: z.enum(["Matched", "Unmatched", "Skipped"]),
	origin: z.enum(["historical-rule", "exact", "normalized", "confirmed"]).nullable(),
	confidence: z.number().min(0).max(1),
	rejectedFields: z.array(z.string()),
});

const errorInfo = z.object({
	code: z.nativeEnum(ERROR_CODES),
	message: z.string(),
});

const statuses = z.enum([
	"Created",
	"Detecting",
	"Matching",
	"AwaitingResolution",
	"Finalized",
	"Abandoned",
]);

export const sessionSnapshotSchema = z
	.object({
		version: z.literal(1),
		sessionId: z.string().min(1),
		schemaId: z.string().min(1),
		status: statuses,
		createdAt: z.string().datetime(),
		sourceName: z.string().nullable(),
		grid: z.array(z.array(encodedCell)).nullable(),
		table: detectedTable.nullable(),
		candidates: z.array(candidate),
		proposals: z.array(z.array(proposal)),
		mappings: z.array(mapping),
		handoffCompleted: z.boolean().default(false),
		appliedRuleWrites: z.array(z.string()),
		warnings: z.array(z.string()),
		error: errorInfo.nullable(),
		abandonReason: z.string().nullable(),
	})
	.superRefine((snapshot, ctx) => {
		if (snapshot.proposals.length > 0 && snapshot.proposals.length !== snapshot.candidates.length) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ["proposals"],
				message: "must have one entry per candidate",
			});
		}
		const needsTable = snapshot.status === "Matching" || snapshot.status === "AwaitingResolution";
		if (needsTable && (snapshot.grid === null || snapshot.table === null)) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ["table"],
				message: `is required in status ${snapshot.status}`,
			});
		}
		if (snapshot.status === "Detecting" && snapshot.grid === null) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ["grid"],
				message: "is required in status Detecting",
			});
		}
	});

// ============================================================================
// Conversion
// ============================================================================

export function toSnapshot(state: SessionState): SessionSnapshot {
	return {
		version: 1,
		sessionId: state.sessionId,
		schemaId: state.schemaId,
		status: state.status,
		createdAt: state.createdAt.toISOString(),
		sourceName: state.sourceName,
		grid: state.grid ? state.grid.map((row) => Array.from(row, encodeCell)) : null,
		table: state.table,
		candidates: state.candidates.map((c) => ({ ...c, sampleValues: c.sampleValues.map(encodeCell) })),
		proposals: state.proposals.map((column) => column.proposals),
		mappings: state.mappings,
		handoffCompleted: state.handoffCompleted,
		appliedRuleWrites: state.appliedRuleWrites,
		warnings: state.warnings,
		error: state.error,
		abandonReason: state.abandonReason,
	};
}

/**
 * Validate an untrusted snapshot (from storage or the wire) and rebuild the session state.
 *
 * @throws InvalidSnapshotError
 */
export function parseSnapshot(input: unknown): SessionState {
	const result = sessionSnapshotSchema.safeParse(input);
	if (!result.success) {
		throw new InvalidSnapshotError(formatIssues(result.error));
	}
	const snapshot = result.data;

	const grid: RawGrid | null = snapshot.grid
		? snapshot.grid.map((row) => row.map(decodeCell))
		: null;
	const candidates: ColumnCandidate[] = snapshot.candidates.map((c) => ({
		...c,
		sampleValues: c.sampleValues.map(decodeCell),
	}));
	const proposals: ColumnProposals[] = snapshot.proposals.map((list, i) => ({
		candidate: candidates[i],
		proposals: list,
	}));

	return {
		sessionId: snapshot.sessionId,
		schemaId: snapshot.schemaId,
		status: snapshot.status,
		createdAt: new Date(snapshot.createdAt),
		sourceName: snapshot.sourceName,
		grid,
		table: snapshot.table,
		candidates,
		proposals,
		mappings: snapshot.mappings,
		handoffCompleted: snapshot.handoffCompleted,
		appliedRuleWrites: snapshot.appliedRuleWrites,
		warnings: snapshot.warnings,
		error: snapshot.error,
		abandonReason: snapshot.abandonReason,
	};
}
