import { describe, expect, test } from "vitest";
import type { CanonicalSchema, ColumnCandidate, MappingRule, RuleSnapshot } from "../types";
import { assignInitialMappings, matchColumns } from "./matcher";
import { normalizeHeader } from "./similarity";

// ============================================================================
// Test Helpers
// ============================================================================

const salesSchema: CanonicalSchema = {
	schemaId: "sales",
	fields: [
		{ fieldName: "customer_name", dataType: "string", required: true },
		{ fieldName: "amount", dataType: "number", required: true },
		{ fieldName: "transaction_date", dataType: "date", required: true },
	],
};

function candidates(headers: string[]): ColumnCandidate[] {
	return headers.map((rawHeaderText, columnIndex) => ({
		rawHeaderText,
		normalizedHeader: normalizeHeader(rawHeaderText),
		columnIndex,
		sampleValues: [],
	}));
}

function rule(normalizedHeaderText: string, targetFieldName: string, schemaId = "sales"): MappingRule {
	return {
		schemaId,
		normalizedHeaderText,
		targetFieldName,
		confirmedCount: 1,
		lastConfirmedAt: new Date("2024-01-01T00:00:00Z"),
	};
}

function snapshot(...rules: MappingRule[]): RuleSnapshot {
	return new Map(rules.map((r) => [r.normalizedHeaderText, r]));
}

const noRules: RuleSnapshot = new Map();

// ============================================================================
// matchColumns Tests
// ============================================================================

describe("matchColumns", () => {
	test("abbreviated headers with a historical rule", () => {
		const result = matchColumns(
			candidates(["Cust Name", "Amt", "Dt"]),
			salesSchema,
			snapshot(rule("amt", "amount"))
		);

		const [custName, amt, dt] = result.columns.map((c) => c.proposals[0]);
		expect(custName).toEqual({
			columnIndex: 0,
			targetField: "customer_name",
			confidence: 0.9,
			source: "normalized",
			matchedVia: "customer_name",
		});
		expect(amt).toEqual({
			columnIndex: 1,
			targetField: "amount",
			confidence: 1,
			source: "historical-rule",
			matchedVia: "amt",
		});
		expect(dt.source).toBe("fuzzy");
		expect(dt.targetField).toBe("transaction_date");
		expect(dt.confidence).toBeCloseTo(0.7955, 3);

		expect(result.autoResolvable).toBe(2);
		expect(result.needsReview).toBe(1);
		expect(result.unmatched).toBe(0);
	});

	test("historical rule pre-empts every other proposal", () => {
		const result = matchColumns(candidates(["Amt"]), salesSchema, snapshot(rule("amt", "amount")));
		expect(result.columns[0].proposals.map((p) => p.source)).toEqual(["historical-rule", "none"]);
	});

	test("exact match on the normalized field name", () => {
		const result = matchColumns(candidates(["Transaction Date"]), salesSchema, noRules);
		expect(result.columns[0].proposals[0]).toEqual({
			columnIndex: 0,
			targetField: "transaction_date",
			confidence: 1,
			source: "exact",
			matchedVia: "transaction_date",
		});
	});

	test("alias and expanded alias confidences", () => {
		const schema: CanonicalSchema = {
			schemaId: "sales",
			fields: [
				{ fieldName: "customer_name", dataType: "string", required: true, aliases: ["client", "customer"] },
			],
		};
		const result = matchColumns(candidates(["Client", "Cust"]), schema, noRules);

		expect(result.columns[0].proposals[0]).toMatchObject({ confidence: 0.95, matchedVia: "client" });
		expect(result.columns[1].proposals[0]).toMatchObject({ confidence: 0.85, matchedVia: "customer" });
	});

	test("rule for a field the schema no longer has is reported and ignored", () => {
		const stale = rule("amt", "total");
		const result = matchColumns(candidates(["Amt"]), salesSchema, snapshot(stale));

		expect(result.staleRules).toEqual([stale]);
		expect(result.columns[0].proposals[0]).toMatchObject({
			targetField: "amount",
			source: "normalized",
			confidence: 0.9,
		});
	});

	test("rules of another schema are not used", () => {
		const result = matchColumns(
			candidates(["Amt"]),
			salesSchema,
			snapshot(rule("amt", "transaction_date", "invoices"))
		);
		expect(result.columns[0].proposals[0].targetField).toBe("amount");
		expect(result.staleRules).toEqual([]);
	});

	test("blank header only gets the none proposal", () => {
		const result = matchColumns(candidates(["", "Amount"]), salesSchema, noRules);
		expect(result.columns[0].proposals).toEqual([
			{ columnIndex: 0, targetField: null, confidence: 0, source: "none" },
		]);
		expect(result.unmatched).toBe(1);
	});

	test("none proposal is always last", () => {
		const result = matchColumns(candidates(["Cust Name", "Amt", "Dt", "Notes"]), salesSchema, noRules);
		for (const column of result.columns) {
			const last = column.proposals[column.proposals.length - 1];
			expect(last.source).toBe("none");
			expect(column.proposals.filter((p) => p.source === "none")).toHaveLength(1);
		}
	});

	test("proposals are ranked by confidence", () => {
		const result = matchColumns(candidates(["Cust Name", "Dt", "Notes"]), salesSchema, noRules);
		for (const column of result.columns) {
			const confidences = column.proposals.map((p) => p.confidence);
			expect(confidences).toEqual([...confidences].sort((a, b) => b - a));
		}
	});

	test("fuzzy scoring skips fields claimed by another column", () => {
		const result = matchColumns(candidates(["Amount", "Amount Due"]), salesSchema, noRules);
		const targets = result.columns[1].proposals.map((p) => p.targetField);
		expect(targets).not.toContain("amount");
	});

	test("fuzzy confidence is below 1", () => {
		const result = matchColumns(candidates(["Transaction Dates"]), salesSchema, noRules);
		const top = result.columns[0].proposals[0];
		expect(top.source).toBe("fuzzy");
		expect(top.confidence).toBeLessThan(1);
	});

	test("maxFuzzyProposals limits suggestions", () => {
		const result = matchColumns(candidates(["Name Amount Date"]), salesSchema, noRules, {
			fuzzyThreshold: 0,
			maxFuzzyProposals: 1,
		});
		expect(result.columns[0].proposals.filter((p) => p.source === "fuzzy")).toHaveLength(1);
	});

	test("deterministic", () => {
		const input = candidates(["Cust Name", "Amt", "Dt", "Region"]);
		const rules = snapshot(rule("amt", "amount"));
		expect(matchColumns(input, salesSchema, rules)).toEqual(matchColumns(input, salesSchema, rules));
	});
});

// ============================================================================
// assignInitialMappings Tests
// ============================================================================

describe("assignInitialMappings", () => {
	test("auto-matches rule, exact and normalized proposals only", () => {
		const { columns } = matchColumns(
			candidates(["Cust Name", "Amt", "Dt"]),
			salesSchema,
			snapshot(rule("amt", "amount"))
		);
		const mappings = assignInitialMappings(columns, salesSchema);

		expect(mappings.map((m) => [m.targetField, m.status, m.origin])).toEqual([
			["customer_name", "Matched", "normalized"],
			["amount", "Matched", "historical-rule"],
			[null, "Unmatched", null],
		]);
		expect(mappings[2]).toEqual({
			columnIndex: 2,
			rawHeaderText: "Dt",
			normalizedHeader: "dt",
			targetField: null,
			status: "Unmatched",
			origin: null,
			confidence: 0,
			rejectedFields: [],
		});
	});

	test("a field goes to the earliest of equally strong columns", () => {
		const { columns } = matchColumns(candidates(["Amount", "amount"]), salesSchema, noRules);
		const mappings = assignInitialMappings(columns, salesSchema);

		expect(mappings[0]).toMatchObject({ targetField: "amount", status: "Matched", origin: "exact" });
		expect(mappings[1]).toMatchObject({ targetField: null, status: "Unmatched" });
	});

	test("stronger evidence wins over column order", () => {
		const { columns } = matchColumns(candidates(["Amt", "Amount"]), salesSchema, noRules);
		const mappings = assignInitialMappings(columns, salesSchema);

		expect(mappings[0].status).toBe("Unmatched");
		expect(mappings[1]).toMatchObject({ targetField: "amount", confidence: 1 });
	});

	test("multi-source fields take several columns", () => {
		const schema: CanonicalSchema = {
			schemaId: "people",
			fields: [
				{ fieldName: "name", dataType: "string", required: true, multiSource: true, aliases: ["first name", "last name"] },
			],
		};
		const { columns } = matchColumns(candidates(["First Name", "Last Name"]), schema, noRules);
		const mappings = assignInitialMappings(columns, schema);

		expect(mappings.map((m) => m.targetField)).toEqual(["name", "name"]);
		expect(mappings.every((m) => m.status === "Matched")).toBe(true);
	});
});
