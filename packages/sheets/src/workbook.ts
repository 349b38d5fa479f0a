// ============================================================================
// Workbook Adapter
// ============================================================================

import type { CellValue } from "@sheetrecon/core";
import * as XLSX from "xlsx";
import { toGrid } from "./cells";

export interface WorkbookOptions {
	/** Sheet to read. Default: the first sheet */
	sheetName?: string;
}

export class SheetNotFoundError extends Error {
	readonly sheetName: string;
	readonly available: string[];

	constructor(sheetName: string, available: string[]) {
		super(
			available.length === 0
				? "The workbook has no sheets"
				: `Sheet "${sheetName}" not found (available: ${available.join(", ")})`
		);
		this.name = "SheetNotFoundError";
		this.sheetName = sheetName;
		this.available = available;
	}
}

function readWorkbook(buffer: Buffer): XLSX.WorkBook {
	return XLSX.read(buffer, { type: "buffer", cellDates: true });
}

/** Sheet names of a workbook, in workbook order. */
export function sheetNames(buffer: Buffer): string[] {
	return [...readWorkbook(buffer).SheetNames];
}

/**
 * Read one sheet of an xlsx/xls/ods workbook as a raw grid.
 * Rows keep their position (blank rows included) so the detector sees the layout as uploaded.
 * Date cells arrive as `Date`.
 *
 * @throws SheetNotFoundError when the requested sheet (or any sheet) is missing
 */
export function gridFromWorkbook(buffer: Buffer, options?: WorkbookOptions): CellValue[][] {
	const workbook = readWorkbook(buffer);
	const name = options?.sheetName ?? workbook.SheetNames[0];
	const sheet = name === undefined ? undefined : workbook.Sheets[name];

	if (name === undefined || sheet === undefined) {
		throw new SheetNotFoundError(name ?? "", [...workbook.SheetNames]);
	}

	const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
		header: 1,
		raw: true,
		defval: null,
		blankrows: true,
	});

	return toGrid(rows);
}
