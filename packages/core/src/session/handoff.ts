// ============================================================================
// Loader Handoff
// ============================================================================

import { cellText, isEmptyCell, parseDateText, parseNumberText, tableRows } from "../detector";
import type {
	CanonicalSchema,
	CellValue,
	ColumnMapping,
	DetectedTable,
	FieldDataType,
	RawGrid,
} from "../types";
import type { LoadIssue, LoadRequest } from "./types";

const TRUE_TEXT: ReadonlySet<string> = new Set(["true", "yes", "y", "1"]);
const FALSE_TEXT: ReadonlySet<string> = new Set(["false", "no", "n", "0"]);

/**
 * Derive a SQL-safe table name from a file or sheet name.
 * - Extension dropped
 * - Characters outside `[a-zA-Z0-9_]` become `_`
 * - `report_` prefix when the name does not start with a letter
 * - Lowercase
 *
 * `"Q1 Sales-2024.xlsx"` → `"q1_sales_2024"`, `"2024 data.csv"` → `"report_2024_data"`
 */
export function sanitizeTableName(name: string): string {
	const withoutExtension = name.replace(/\.[^./\\]+$/, "");
	let sanitized = withoutExtension.replace(/[^a-zA-Z0-9_]/g, "_");
	if (!/^[a-zA-Z]/.test(sanitized)) {
		sanitized = `report_${sanitized}`;
	}
	return sanitized.toLowerCase();
}

/**
 * Cell as handed to the loader: strings trimmed, blanks null.
 */
export function loadValue(value: CellValue): CellValue {
	if (isEmptyCell(value)) return null;
	if (typeof value === "string") return value.trim();
	return value;
}

export type Conversion = { ok: true; value: CellValue } | { ok: false };

/**
 * Convert a cell to a field's data type. Blank cells convert to null.
 * - string: display text (dates as ISO)
 * - number / integer: numbers, or numeric text with currency, thousands separators or a percent sign
 * - date: dates, or date text in the formats the detector recognises
 * - boolean: booleans, 1/0, and true/false/yes/no/y/n text
 */
export function convertValue(value: CellValue, dataType: FieldDataType): Conversion {
	const cell = loadValue(value);
	if (cell === null) {
		return { ok: true, value: null };
	}

	switch (dataType) {
		case "string":
			return { ok: true, value: cellText(cell) };

		case "number":
		case "integer": {
			const number = typeof cell === "number" ? cell : typeof cell === "string" ? parseNumberText(cell) : null;
			if (number === null || (dataType === "integer" && !Number.isInteger(number))) {
				return { ok: false };
			}
			return { ok: true, value: number };
		}

		case "date": {
			const date = cell instanceof Date ? cell : typeof cell === "string" ? parseDateText(cell) : null;
			return date === null ? { ok: false } : { ok: true, value: date };
		}

		case "boolean": {
			if (typeof cell === "boolean") return { ok: true, value: cell };
			const text = cellText(cell).toLowerCase();
			if (TRUE_TEXT.has(text)) return { ok: true, value: true };
			if (FALSE_TEXT.has(text)) return { ok: true, value: false };
			return { ok: false };
		}
	}
}

/**
 * One warning line per field with unconvertible cells.
 */
export function describeIssues(issues: readonly LoadIssue[]): string[] {
	const counts = new Map<string, { expected: FieldDataType; count: number }>();
	for (const issue of issues) {
		const entry = counts.get(issue.field) ?? { expected: issue.expected, count: 0 };
		entry.count++;
		counts.set(issue.field, entry);
	}
	return Array.from(counts, ([field, { expected, count }]) =>
		count === 1
			? `Field "${field}": 1 value is not a valid ${expected} and was loaded as null`
			: `Field "${field}": ${count} values are not a valid ${expected} and were loaded as null`
	);
}

export function resolveTargetTableName(schema: CanonicalSchema, sourceName: string | null): string {
	if (schema.targetTableName) {
		return schema.targetTableName;
	}
	if (sourceName !== null && sourceName.trim() !== "") {
		return sanitizeTableName(sourceName.trim());
	}
	return sanitizeTableName(schema.schemaId);
}

export interface HandoffInput {
	schema: CanonicalSchema;
	grid: RawGrid;
	table: DetectedTable;
	mappings: readonly ColumnMapping[];
	sourceName: string | null;
}

/**
 * Project the detected table onto the schema using the matched mappings.
 * Fields are emitted in schema order; a multi-source field joins its non-empty
 * values (in column order) with a space before conversion. Cells that do not
 * convert to their field's data type are loaded as null and listed in `issues`
 * with their grid row index.
 */
export function buildLoadRequest(input: HandoffInput): LoadRequest {
	const { schema, grid, table, mappings, sourceName } = input;

	const sources = new Map<string, number[]>();
	for (const mapping of mappings) {
		if (mapping.status !== "Matched" || mapping.targetField === null) continue;
		const columns = sources.get(mapping.targetField) ?? [];
		columns.push(mapping.columnIndex);
		sources.set(mapping.targetField, columns);
	}
	for (const columns of sources.values()) {
		columns.sort((a, b) => a - b);
	}

	const fields = schema.fields.filter((f) => sources.has(f.fieldName));
	const issues: LoadIssue[] = [];

	const rows = tableRows(grid, table).map((row, offset) => {
		const record: Record<string, CellValue> = {};
		for (const field of fields) {
			const values = (sources.get(field.fieldName) ?? [])
				.map((col) => loadValue(row[col] ?? null))
				.filter((value) => value !== null);
			const raw = values.length > 1 ? values.map((value) => cellText(value)).join(" ") : (values[0] ?? null);

			const converted = convertValue(raw, field.dataType);
			if (converted.ok) {
				record[field.fieldName] = converted.value;
			} else {
				record[field.fieldName] = null;
				issues.push({
					row: table.dataRowRange.start + offset,
					field: field.fieldName,
					value: raw,
					expected: field.dataType,
				});
			}
		}
		return record;
	});

	return {
		schemaId: schema.schemaId,
		targetTableName: resolveTargetTableName(schema, sourceName),
		columns: fields.map((f) => f.fieldName),
		rows,
		issues,
	};
}
