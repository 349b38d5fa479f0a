import { describe, expect, test } from "vitest";
import type { CanonicalSchema, ColumnMapping, RawGrid } from "../types";
import {
	buildLoadRequest,
	convertValue,
	describeIssues,
	loadValue,
	resolveTargetTableName,
	sanitizeTableName,
} from "./handoff";

// ============================================================================
// Table Name Tests
// ============================================================================

describe("sanitizeTableName", () => {
	test("drops the extension and replaces unsafe characters", () => {
		expect(sanitizeTableName("Q1 Sales-2024.xlsx")).toBe("q1_sales_2024");
	});

	test("prefixes names that do not start with a letter", () => {
		expect(sanitizeTableName("2024 data.csv")).toBe("report_2024_data");
		expect(sanitizeTableName("_tmp")).toBe("report__tmp");
	});

	test("keeps names without an extension", () => {
		expect(sanitizeTableName("Orders")).toBe("orders");
	});
});

describe("resolveTargetTableName", () => {
	const schema: CanonicalSchema = {
		schemaId: "sales-v2",
		fields: [{ fieldName: "amount", dataType: "number", required: true }],
	};

	test("schema table name wins", () => {
		expect(resolveTargetTableName({ ...schema, targetTableName: "fact_sales" }, "march.csv")).toBe("fact_sales");
	});

	test("falls back to the source name, then the schema id", () => {
		expect(resolveTargetTableName(schema, "march.csv")).toBe("march");
		expect(resolveTargetTableName(schema, null)).toBe("sales_v2");
		expect(resolveTargetTableName(schema, "  ")).toBe("sales_v2");
	});
});

describe("loadValue", () => {
	test("trims strings and nulls blanks", () => {
		expect(loadValue("  Alice ")).toBe("Alice");
		expect(loadValue("   ")).toBeNull();
		expect(loadValue(0)).toBe(0);
		expect(loadValue(false)).toBe(false);
	});
});

// ============================================================================
// Load Request Tests
// ============================================================================

function matched(columnIndex: number, targetField: string): ColumnMapping {
	return {
		columnIndex,
		rawHeaderText: targetField,
		normalizedHeader: targetField,
		targetField,
		status: "Matched",
		origin: "confirmed",
		confidence: 1,
		rejectedFields: [],
	};
}

function skipped(columnIndex: number): ColumnMapping {
	return { ...matched(columnIndex, "x"), targetField: null, status: "Skipped", origin: null, confidence: 0 };
}

describe("buildLoadRequest", () => {
	const schema: CanonicalSchema = {
		schemaId: "people",
		fields: [
			{ fieldName: "full_name", dataType: "string", required: true, multiSource: true },
			{ fieldName: "city", dataType: "string", required: false },
			{ fieldName: "age", dataType: "integer", required: false },
		],
	};

	const grid: RawGrid = [
		["Last", "First", "Age", "Internal"],
		["Lovelace", "Ada", 36, "x"],
		["", "Grace", "", "y"],
		["Turing", null, 41, "z"],
	];
	const table = { headerRowIndex: 0, dataRowRange: { start: 1, end: 4 }, columnCount: 4 };

	test("projects matched columns in schema order", () => {
		const request = buildLoadRequest({
			schema,
			grid,
			table,
			mappings: [matched(1, "full_name"), matched(0, "full_name"), matched(2, "age"), skipped(3)],
			sourceName: "staff.xlsx",
		});

		expect(request).toEqual({
			schemaId: "people",
			targetTableName: "staff",
			columns: ["full_name", "age"],
			rows: [
				{ full_name: "Lovelace Ada", age: 36 },
				{ full_name: "Grace", age: null },
				{ full_name: "Turing", age: 41 },
			],
			issues: [],
		});
	});

	test("converts cells to field types and lists the ones that do not fit", () => {
		const orders: CanonicalSchema = {
			schemaId: "orders",
			fields: [
				{ fieldName: "sku", dataType: "string", required: true },
				{ fieldName: "qty", dataType: "integer", required: true },
				{ fieldName: "shipped", dataType: "date", required: false },
				{ fieldName: "paid", dataType: "boolean", required: false },
			],
		};
		const request = buildLoadRequest({
			schema: orders,
			grid: [
				["SKU", "Qty", "Shipped", "Paid"],
				["A-1", "1,200", "2024-03-05", "yes"],
				["B-2", "lots", "05/03/2024", "N"],
				["C-3", 7, "soon", "maybe"],
			],
			table: { headerRowIndex: 0, dataRowRange: { start: 1, end: 4 }, columnCount: 4 },
			mappings: [matched(0, "sku"), matched(1, "qty"), matched(2, "shipped"), matched(3, "paid")],
			sourceName: null,
		});

		expect(request.rows).toEqual([
			{ sku: "A-1", qty: 1200, shipped: new Date("2024-03-05T00:00:00Z"), paid: true },
			{ sku: "B-2", qty: null, shipped: new Date("2024-03-05T00:00:00Z"), paid: false },
			{ sku: "C-3", qty: 7, shipped: null, paid: null },
		]);
		expect(request.issues).toEqual([
			{ row: 2, field: "qty", value: "lots", expected: "integer" },
			{ row: 3, field: "shipped", value: "soon", expected: "date" },
			{ row: 3, field: "paid", value: "maybe", expected: "boolean" },
		]);
	});
});

// ============================================================================
// Conversion Tests
// ============================================================================

describe("convertValue", () => {
	test("numbers accept separators, currency and percent", () => {
		expect(convertValue("1,234.50", "number")).toEqual({ ok: true, value: 1234.5 });
		expect(convertValue("$1,200", "integer")).toEqual({ ok: true, value: 1200 });
		expect(convertValue("45%", "number")).toEqual({ ok: true, value: 0.45 });
		expect(convertValue("1,25", "number")).toEqual({ ok: true, value: 1.25 });
	});

	test("integers reject fractions", () => {
		expect(convertValue("12.5", "integer")).toEqual({ ok: false });
		expect(convertValue(12.5, "integer")).toEqual({ ok: false });
	});

	test("dates parse day first and reject impossible days", () => {
		expect(convertValue("31/01/2024", "date")).toEqual({ ok: true, value: new Date("2024-01-31T00:00:00Z") });
		expect(convertValue("2024-02-30", "date")).toEqual({ ok: false });
		expect(convertValue(7, "date")).toEqual({ ok: false });
	});

	test("booleans accept words and digits", () => {
		expect(convertValue("Yes", "boolean")).toEqual({ ok: true, value: true });
		expect(convertValue(0, "boolean")).toEqual({ ok: true, value: false });
		expect(convertValue("maybe", "boolean")).toEqual({ ok: false });
	});

	test("strings take the display text and blanks stay null", () => {
		expect(convertValue(new Date("2024-01-31T00:00:00Z"), "string")).toEqual({
			ok: true,
			value: "2024-01-31T00:00:00.000Z",
		});
		expect(convertValue(12, "string")).toEqual({ ok: true, value: "12" });
		expect(convertValue("  ", "number")).toEqual({ ok: true, value: null });
		expect(convertValue("n/a", "number")).toEqual({ ok: false });
	});
});

describe("describeIssues", () => {
	test("one line per field", () => {
		expect(
			describeIssues([
				{ row: 1, field: "amount", value: "x", expected: "number" },
				{ row: 2, field: "paid", value: "maybe", expected: "boolean" },
				{ row: 4, field: "amount", value: "y", expected: "number" },
			])
		).toEqual([
			'Field "amount": 2 values are not a valid number and were loaded as null',
			'Field "paid": 1 value is not a valid boolean and was loaded as null',
		]);
	});
});
