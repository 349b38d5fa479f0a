// ============================================================================
// Cell Conversion
// ============================================================================

import type { CellValue } from "@sheetrecon/core";

/**
 * Convert a value produced by a sheet parser into a grid cell.
 * Invalid dates and non-finite numbers become null; anything else unknown becomes text.
 */
export function toCellValue(value: unknown): CellValue {
	if (value === null || value === undefined) return null;
	if (typeof value === "string" || typeof value === "boolean") return value;
	if (typeof value === "number") return Number.isFinite(value) ? value : null;
	if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value;
	return String(value);
}

/**
 * Convert parser rows into a grid. Non-array rows become empty rows.
 */
export function toGrid(rows: unknown): CellValue[][] {
	if (!Array.isArray(rows)) {
		return [];
	}
	return rows.map((row: unknown) => (Array.isArray(row) ? row.map(toCellValue) : []));
}
