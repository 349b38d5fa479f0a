// ============================================================================
// Raw Grid
// ============================================================================

/**
 * A single spreadsheet cell as handed over by the parser.
 * Dates arrive as `Date` from workbook parsers and as text from CSV sources.
 */
export type CellValue = string | number | boolean | Date | null;

/** A rectangular (possibly ragged) grid of cells, rows first. Never mutated. */
export type RawGrid = ReadonlyArray<ReadonlyArray<CellValue | undefined>>;

/** Coarse type of a cell used for layout detection. */
export type CellKind = "empty" | "text" | "number" | "date" | "boolean";

// ============================================================================
// Detected Table
// ============================================================================

/** Half-open range of row indexes: `start` inclusive, `end` exclusive. */
export interface RowRange {
	start: number;
	end: number;
}

/**
 * Location of the real data table inside a raw grid.
 * `headerRowIndex` always precedes `dataRowRange.start`.
 */
export interface DetectedTable {
	/** Row index of the header row in the raw grid */
	headerRowIndex: number;
	/** Rows holding data, directly below the header */
	dataRowRange: RowRange;
	/** Number of columns covered by the header (furthest non-empty header cell + 1) */
	columnCount: number;
}

/**
 * One column of a detected table, as seen by the matcher.
 */
export interface ColumnCandidate {
	/** Header text as it appears in the sheet (trimmed) */
	rawHeaderText: string;
	/** Header after normalization (see `normalizeHeader`) */
	normalizedHeader: string;
	/** Column index in the raw grid (0-based) */
	columnIndex: number;
	/** A few non-empty values from the data rows, for display */
	sampleValues: CellValue[];
}

// ============================================================================
// Canonical Schema
// ============================================================================

export type FieldDataType = "string" | "number" | "integer" | "date" | "boolean";

export interface SchemaField {
	fieldName: string;
	dataType: FieldDataType;
	required: boolean;
	/** Alternative header spellings that identify this field */
	aliases?: readonly string[];
	/** Allows several sheet columns to feed this field (values are joined on load) */
	multiSource?: boolean;
}

/**
 * A registered target schema. Immutable for the lifetime of a session.
 */
export interface CanonicalSchema {
	schemaId: string;
	fields: readonly SchemaField[];
	/** Table the loader writes into. Derived from the upload name when absent. */
	targetTableName?: string;
}

// ============================================================================
// Mapping Rules
// ============================================================================

/**
 * A persisted, human- or exact-match-confirmed header → field decision.
 * Keyed uniquely by (schemaId, normalizedHeaderText).
 */
export interface MappingRule {
	schemaId: string;
	normalizedHeaderText: string;
	targetFieldName: string;
	confirmedCount: number;
	lastConfirmedAt: Date;
}

/** Read view over the rules of one schema, keyed by normalized header. */
export type RuleSnapshot = ReadonlyMap<string, MappingRule>;

// ============================================================================
// Column Mappings
// ============================================================================

/**
 * Resolution state of one sheet column.
 * - 'Matched': mapped to a schema field
 * - 'Unmatched': not mapped yet, needs a human decision
 * - 'Skipped': deliberately excluded from the load
 */
export type MappingStatus = "Matched" | "Unmatched" | "Skipped";

/**
 * How a matched mapping came to be. Decides what finalize writes back to the rule store.
 */
export type MappingOrigin = "historical-rule" | "exact" | "normalized" | "confirmed";

/**
 * Current decision for one column of the detected table.
 */
export interface ColumnMapping {
	/** Column index in the raw grid */
	columnIndex: number;
	rawHeaderText: string;
	normalizedHeader: string;
	/** Target schema field, set only when status is 'Matched' */
	targetField: string | null;
	status: MappingStatus;
	origin: MappingOrigin | null;
	/** Confidence of the decision (1 for human confirmations) */
	confidence: number;
	/** Fields the user rejected for this column; never suggested again in this session */
	rejectedFields: string[];
}
