// ============================================================================
// Tabular Region Detector
// ============================================================================

import { InsufficientDataError, NoTableFoundError } from "../errors";
import { normalizeHeader } from "../matcher/similarity";
import type { CellValue, ColumnCandidate, DetectedTable, RawGrid } from "../types";
import { cellText, classifyCell, isEmptyCell } from "./cells";
import type { DetectOptions, DetectResult, ResolvedDetectOptions, RowProfile } from "./types";

const DEFAULT_MIN_HEADER_DENSITY = 0.5;
const DEFAULT_MIN_HEADER_TEXT_FRACTION = 0.8;
const DEFAULT_DATA_DENSITY_FLOOR = 0.5;
const DEFAULT_MIN_DATA_ROWS = 2;
const DEFAULT_MIN_DATA_TYPED_FRACTION = 0.2;
const DEFAULT_MIN_KNOWN_HEADER_HITS = 1;
const DEFAULT_SAMPLE_SIZE = 5;

export function resolveDetectOptions(options?: DetectOptions): ResolvedDetectOptions {
	return {
		minHeaderDensity: options?.minHeaderDensity ?? DEFAULT_MIN_HEADER_DENSITY,
		minHeaderTextFraction: options?.minHeaderTextFraction ?? DEFAULT_MIN_HEADER_TEXT_FRACTION,
		dataDensityFloor: options?.dataDensityFloor ?? DEFAULT_DATA_DENSITY_FLOOR,
		minDataRows: options?.minDataRows ?? DEFAULT_MIN_DATA_ROWS,
		minDataTypedFraction: options?.minDataTypedFraction ?? DEFAULT_MIN_DATA_TYPED_FRACTION,
		knownHeaders: options?.knownHeaders ?? [],
		minKnownHeaderHits: options?.minKnownHeaderHits ?? DEFAULT_MIN_KNOWN_HEADER_HITS,
	};
}

/**
 * Count empty, text and typed cells of a row in `[0, width)`.
 */
export function profileRow(row: ReadonlyArray<CellValue | undefined>, width: number): RowProfile {
	const profile: RowProfile = { nonEmpty: 0, text: 0, typed: 0, lastColumn: -1 };
	const end = Math.min(row.length, width);

	for (let col = 0; col < end; col++) {
		const kind = classifyCell(row[col]);
		if (kind === "empty") continue;
		profile.nonEmpty++;
		profile.lastColumn = col;
		if (kind === "text") {
			profile.text++;
		} else {
			profile.typed++;
		}
	}

	return profile;
}

/**
 * Furthest non-empty column + 1 over the whole grid.
 */
export function gridWidth(grid: RawGrid): number {
	let width = 0;
	for (const row of grid) {
		for (let col = row.length - 1; col >= width; col--) {
			if (!isEmptyCell(row[col])) {
				width = col + 1;
				break;
			}
		}
	}
	return width;
}

/**
 * Locate the header row and data rows of the table inside a raw grid.
 *
 * Rows are scanned top to bottom. A row qualifies as the header when it is dense
 * and mostly text, and is followed by at least `minDataRows` rows of consistent
 * density, each of which reads as data on its own (or the row contains known
 * headers). The first qualifying row wins. The data range runs down to the first
 * row below the density floor: a blank separator, a trailing note or the grid end.
 *
 * @param grid - Raw cells from the spreadsheet parser
 * @param options - Optional thresholds and known header texts
 * @returns The detected table, or `NoTableFound` / `InsufficientData`
 */
export function detectTable(grid: RawGrid, options?: DetectOptions): DetectResult {
	const opts = resolveDetectOptions(options);
	const width = gridWidth(grid);

	if (width === 0) {
		return { ok: false, error: new NoTableFoundError("The sheet is empty") };
	}

	const known = new Set(opts.knownHeaders.map(normalizeHeader).filter((h) => h.length > 0));
	let shortRun: { headerRowIndex: number; dataRowCount: number } | null = null;

	for (let rowIndex = 0; rowIndex < grid.length; rowIndex++) {
		const row = grid[rowIndex];
		const profile = profileRow(row, width);
		if (!isHeaderLike(profile, width, opts)) {
			continue;
		}

		const columnCount = profile.lastColumn + 1;
		const end = dataRunEnd(grid, rowIndex, columnCount, profile.nonEmpty, opts.dataDensityFloor);
		const dataRowCount = end - rowIndex - 1;

		if (dataRowCount < opts.minDataRows) {
			if (!shortRun) {
				shortRun = { headerRowIndex: rowIndex, dataRowCount };
			}
			continue;
		}

		const typedRows = leadingRowsAreTyped(grid, rowIndex + 1, columnCount, opts);
		const knownHits = known.size > 0 ? countKnownHeaders(row, columnCount, known) : 0;

		if (typedRows || knownHits >= opts.minKnownHeaderHits) {
			const table: DetectedTable = {
				headerRowIndex: rowIndex,
				dataRowRange: { start: rowIndex + 1, end },
				columnCount,
			};
			return { ok: true, table };
		}
	}

	if (shortRun) {
		return {
			ok: false,
			error: new InsufficientDataError(shortRun.headerRowIndex, shortRun.dataRowCount, opts.minDataRows),
		};
	}

	return { ok: false, error: new NoTableFoundError() };
}

function isHeaderLike(profile: RowProfile, width: number, opts: ResolvedDetectOptions): boolean {
	if (profile.nonEmpty === 0) {
		return false;
	}
	return (
		profile.nonEmpty / width >= opts.minHeaderDensity &&
		profile.text / profile.nonEmpty >= opts.minHeaderTextFraction
	);
}

/**
 * Exclusive end of the run of rows below `headerRowIndex` that stay above the density floor.
 */
function dataRunEnd(
	grid: RawGrid,
	headerRowIndex: number,
	columnCount: number,
	headerNonEmpty: number,
	floor: number
): number {
	let end = headerRowIndex + 1;
	while (end < grid.length) {
		const { nonEmpty } = profileRow(grid[end], columnCount);
		if (nonEmpty / headerNonEmpty < floor) {
			break;
		}
		end++;
	}
	return end;
}

/**
 * True when each of the first `minDataRows` rows below the header reads as data on its own:
 * not header-like, and at least `minDataTypedFraction` of its cells are numbers, dates or booleans.
 */
function leadingRowsAreTyped(
	grid: RawGrid,
	start: number,
	columnCount: number,
	opts: ResolvedDetectOptions
): boolean {
	for (let rowIndex = start; rowIndex < start + opts.minDataRows; rowIndex++) {
		const profile = profileRow(grid[rowIndex] ?? [], columnCount);
		if (isHeaderLike(profile, columnCount, opts)) {
			return false;
		}
		if (profile.nonEmpty === 0 || profile.typed / profile.nonEmpty < opts.minDataTypedFraction) {
			return false;
		}
	}
	return true;
}

function countKnownHeaders(
	row: ReadonlyArray<CellValue | undefined>,
	columnCount: number,
	known: ReadonlySet<string>
): number {
	let hits = 0;
	for (let col = 0; col < columnCount; col++) {
		if (known.has(normalizeHeader(cellText(row[col])))) {
			hits++;
		}
	}
	return hits;
}

// ============================================================================
// Table Views
// ============================================================================

/**
 * One candidate per column of the detected table, with a few sample values.
 */
export function extractCandidates(
	grid: RawGrid,
	table: DetectedTable,
	sampleSize = DEFAULT_SAMPLE_SIZE
): ColumnCandidate[] {
	const header = grid[table.headerRowIndex] ?? [];
	const candidates: ColumnCandidate[] = [];

	for (let col = 0; col < table.columnCount; col++) {
		const rawHeaderText = cellText(header[col]);
		const sampleValues: CellValue[] = [];

		for (
			let rowIndex = table.dataRowRange.start;
			rowIndex < table.dataRowRange.end && sampleValues.length < sampleSize;
			rowIndex++
		) {
			const value = grid[rowIndex]?.[col];
			if (value !== undefined && !isEmptyCell(value)) {
				sampleValues.push(value);
			}
		}

		candidates.push({
			rawHeaderText,
			normalizedHeader: normalizeHeader(rawHeaderText),
			columnIndex: col,
			sampleValues,
		});
	}

	return candidates;
}

/**
 * Data rows of the detected table, padded or cut to the table's column count.
 * Missing and empty cells become null.
 */
export function tableRows(grid: RawGrid, table: DetectedTable): CellValue[][] {
	const rows: CellValue[][] = [];
	for (let rowIndex = table.dataRowRange.start; rowIndex < table.dataRowRange.end; rowIndex++) {
		const source = grid[rowIndex] ?? [];
		const row = new Array<CellValue>(table.columnCount).fill(null);
		for (let col = 0; col < table.columnCount; col++) {
			const value = source[col];
			if (value !== undefined && !isEmptyCell(value)) {
				row[col] = value;
			}
		}
		rows.push(row);
	}
	return rows;
}
