// ============================================================================
// Tabular Region Detection Types
// ============================================================================

import type { InsufficientDataError, NoTableFoundError } from "../errors";
import type { DetectedTable } from "../types";

/**
 * Options for locating the table inside a raw grid.
 */
export interface DetectOptions {
	/** Minimum share of non-empty cells (over the grid width) for a header row. Default: 0.5 */
	minHeaderDensity?: number;
	/** Minimum share of text among a header row's non-empty cells. Default: 0.8 */
	minHeaderTextFraction?: number;
	/**
	 * Minimum non-empty cells of a data row, relative to the header's non-empty cells.
	 * The data range ends at the first row below this floor. Default: 0.5
	 */
	dataDensityFloor?: number;
	/** Data rows required below a header. Default: 2 */
	minDataRows?: number;
	/** Minimum share of numbers/dates/booleans in each of the first `minDataRows` data rows. Default: 0.2 */
	minDataTypedFraction?: number;
	/** Header texts known to belong to the target (field names, aliases) */
	knownHeaders?: readonly string[];
	/** Known headers a row must contain to qualify without a typed data profile. Default: 1 */
	minKnownHeaderHits?: number;
}

export interface ResolvedDetectOptions {
	minHeaderDensity: number;
	minHeaderTextFraction: number;
	dataDensityFloor: number;
	minDataRows: number;
	minDataTypedFraction: number;
	knownHeaders: readonly string[];
	minKnownHeaderHits: number;
}

/**
 * Cell counts of one row within a column window.
 */
export interface RowProfile {
	nonEmpty: number;
	text: number;
	/** Numbers, dates and booleans */
	typed: number;
	/** Index of the last non-empty cell, -1 for a blank row */
	lastColumn: number;
}

export type DetectResult =
	| { ok: true; table: DetectedTable }
	| { ok: false; error: NoTableFoundError | InsufficientDataError };
