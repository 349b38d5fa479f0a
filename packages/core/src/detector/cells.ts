// ============================================================================
// Cell Classification
// ============================================================================

import type { CellKind, CellValue } from "../types";

// 1234 | 1,234.50 | -12.5 | $12 | 45% | 1,25 (comma decimal)
const NUMBER_PATTERN = /^[-+]?[$€£¥]?\s?(?:\d{1,3}(?:,\d{3})+|\d+)(?:\.\d+)?%?$/;
const COMMA_DECIMAL_PATTERN = /^[-+]?\d+,\d+$/;

// 2024-01-31 | 2024-01-31T10:00 | 31/01/2024 | 1.31.24 | 31-Jan-2024
const ISO_DATE_PATTERN = /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[T ](\d{1,2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?Z?)?$/;
const NUMERIC_DATE_PATTERN = /^(\d{1,2})[./-](\d{1,2})[./-](\d{2,4})$/;
const NAMED_MONTH_DATE_PATTERN = /^(\d{1,2})[- ]([A-Za-z]{3,9})[- ](\d{2,4})$/;
const DATE_PATTERNS = [ISO_DATE_PATTERN, NUMERIC_DATE_PATTERN, NAMED_MONTH_DATE_PATTERN];

const MONTHS: Record<string, number> = {
	jan: 1,
	feb: 2,
	mar: 3,
	apr: 4,
	may: 5,
	jun: 6,
	jul: 7,
	aug: 8,
	sep: 9,
	oct: 10,
	nov: 11,
	dec: 12,
};

/**
 * True for null, undefined, NaN, invalid dates and blank strings.
 */
export function isEmptyCell(value: CellValue | undefined): boolean {
	if (value === null || value === undefined) return true;
	if (typeof value === "number") return Number.isNaN(value);
	if (typeof value === "string") return value.trim() === "";
	if (value instanceof Date) return Number.isNaN(value.getTime());
	return false;
}

/**
 * Classify a cell for layout detection. Text that reads as a number or a date
 * counts as typed, since CSV sources only carry strings.
 */
export function classifyCell(value: CellValue | undefined): CellKind {
	if (isEmptyCell(value)) return "empty";
	if (value instanceof Date) return "date";
	if (typeof value === "boolean") return "boolean";
	if (typeof value === "number") return "number";
	if (typeof value !== "string") return "empty";

	const trimmed = value.trim();
	if (NUMBER_PATTERN.test(trimmed) || COMMA_DECIMAL_PATTERN.test(trimmed)) return "number";
	if (DATE_PATTERNS.some((pattern) => pattern.test(trimmed))) return "date";
	return "text";
}

/**
 * Display text of a cell: trimmed strings, ISO dates, plain numbers.
 */
export function cellText(value: CellValue | undefined): string {
	if (value === null || value === undefined || isEmptyCell(value)) return "";
	if (value instanceof Date) return value.toISOString();
	if (typeof value === "string") return value.trim();
	return String(value);
}

// ============================================================================
// Text Conversion
// ============================================================================

/**
 * Number written as text, or null when the text is not one.
 * `"1,234.50"` → 1234.5, `"-$12"` → -12, `"45%"` → 0.45, `"1,25"` → 1.25
 */
export function parseNumberText(text: string): number | null {
	const trimmed = text.trim();
	if (NUMBER_PATTERN.test(trimmed)) {
		const value = Number(trimmed.replace(/[$€£¥,%\s]/g, ""));
		return trimmed.endsWith("%") ? value / 100 : value;
	}
	if (COMMA_DECIMAL_PATTERN.test(trimmed)) {
		return Number(trimmed.replace(",", "."));
	}
	return null;
}

/**
 * Date written as text (UTC), or null when the text is not a valid date.
 * Slash and dot dates are read day first unless the second part cannot be a month
 * (`"31/01/2024"` and `"1.31.24"` are both January 31st). Two-digit years are 20xx.
 */
export function parseDateText(text: string): Date | null {
	const trimmed = text.trim();

	const iso = ISO_DATE_PATTERN.exec(trimmed);
	if (iso) {
		const [, year, month, day, hours, minutes, seconds] = iso;
		return utcDate(
			Number(year),
			Number(month),
			Number(day),
			Number(hours ?? 0),
			Number(minutes ?? 0),
			Number(seconds ?? 0)
		);
	}

	const numeric = NUMERIC_DATE_PATTERN.exec(trimmed);
	if (numeric) {
		const [, first, second, year] = numeric.map(Number);
		return second > 12
			? utcDate(fullYear(year), first, second)
			: utcDate(fullYear(year), second, first);
	}

	const named = NAMED_MONTH_DATE_PATTERN.exec(trimmed);
	if (named) {
		const [, day, monthName, year] = named;
		const month = MONTHS[monthName.slice(0, 3).toLowerCase()];
		return month === undefined ? null : utcDate(fullYear(Number(year)), month, Number(day));
	}

	return null;
}

function fullYear(year: number): number {
	return year < 100 ? 2000 + year : year;
}

function utcDate(year: number, month: number, day: number, hours = 0, minutes = 0, seconds = 0): Date | null {
	if (hours > 23 || minutes > 59 || seconds > 59) {
		return null;
	}
	const date = new Date(Date.UTC(year, month - 1, day, hours, minutes, seconds));
	// Date.UTC rolls 2024-02-30 over into March
	if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
		return null;
	}
	return date;
}
