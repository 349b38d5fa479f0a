// ============================================================================
// CSV Adapter
// ============================================================================

import type { CellValue } from "@sheetrecon/core";
import { parse } from "csv-parse/sync";
import { toGrid } from "./cells";

export interface CsvOptions {
	/** Field delimiter. Default: "," */
	delimiter?: string;
}

/**
 * Parse CSV text into a raw grid of strings. Blank lines stay in place and
 * ragged rows are kept as they are; blank cells become null.
 */
export function gridFromCsv(text: string, options?: CsvOptions): CellValue[][] {
	const records: unknown = parse(text, {
		delimiter: options?.delimiter ?? ",",
		bom: true,
		relax_column_count: true,
		relax_quotes: true,
		skip_empty_lines: false,
	});

	return toGrid(records).map((row) => row.map((cell) => (cell === "" ? null : cell)));
}
