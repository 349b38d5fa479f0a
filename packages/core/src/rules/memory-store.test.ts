import { describe, expect, test } from "vitest";
import { RuleStoreUnavailableError } from "../errors";
import type { MappingRule } from "../types";
import { InMemoryRuleStore } from "./memory-store";
import { loadRuleSnapshot } from "./snapshot";
import type { RuleStore, RuleWrite } from "./types";

const JAN_1 = new Date("2024-01-01T00:00:00Z");
const FEB_1 = new Date("2024-02-01T00:00:00Z");

function write(normalizedHeaderText: string, targetFieldName: string, confirmedAt = JAN_1): RuleWrite {
	return { schemaId: "sales", normalizedHeaderText, targetFieldName, confirmedAt };
}

// ============================================================================
// upsert Tests
// ============================================================================

describe("InMemoryRuleStore.upsert", () => {
	test("inserts a new rule with count 1", async () => {
		const store = new InMemoryRuleStore();
		expect(await store.upsert(write("amt", "amount"))).toEqual({
			schemaId: "sales",
			normalizedHeaderText: "amt",
			targetFieldName: "amount",
			confirmedCount: 1,
			lastConfirmedAt: JAN_1,
		});
	});

	test("same target increments the count", async () => {
		const store = new InMemoryRuleStore();
		await store.upsert(write("amt", "amount"));
		const rule = await store.upsert(write("amt", "amount", FEB_1));

		expect(rule.confirmedCount).toBe(2);
		expect(rule.lastConfirmedAt).toEqual(FEB_1);
	});

	test("different target overwrites and resets the count", async () => {
		const store = new InMemoryRuleStore();
		await store.upsert(write("amt", "amount"));
		await store.upsert(write("amt", "amount"));
		await store.upsert(write("amt", "total"));

		expect(await store.lookup("sales", "amt")).toMatchObject({ targetFieldName: "total", confirmedCount: 1 });
	});

	test("headers are keyed by their normalized form", async () => {
		const store = new InMemoryRuleStore();
		await store.upsert(write("Cust_Name", "customer_name"));

		expect(await store.lookup("sales", "cust name")).toMatchObject({ normalizedHeaderText: "cust name" });
		expect(store.size).toBe(1);
	});

	test("uses the clock when the write has no timestamp", async () => {
		const store = new InMemoryRuleStore({ now: () => FEB_1 });
		const rule = await store.upsert({ schemaId: "sales", normalizedHeaderText: "amt", targetFieldName: "amount" });
		expect(rule.lastConfirmedAt).toEqual(FEB_1);
	});

	test("returned rules are copies", async () => {
		const store = new InMemoryRuleStore();
		const rule = await store.upsert(write("amt", "amount"));
		rule.confirmedCount = 99;
		expect((await store.lookup("sales", "amt"))?.confirmedCount).toBe(1);
	});

	test("concurrent confirmations of the same pair are all counted", async () => {
		const store = new InMemoryRuleStore();
		await Promise.all(Array.from({ length: 10 }, () => store.upsert(write("amt", "amount"))));
		expect((await store.lookup("sales", "amt"))?.confirmedCount).toBe(10);
	});
});

// ============================================================================
// lookup / reinforce / list Tests
// ============================================================================

describe("InMemoryRuleStore", () => {
	test("lookup misses return null", async () => {
		expect(await new InMemoryRuleStore().lookup("sales", "amt")).toBeNull();
	});

	test("rules are scoped by schema", async () => {
		const store = new InMemoryRuleStore();
		await store.upsert(write("amt", "amount"));
		expect(await store.lookup("invoices", "amt")).toBeNull();
	});

	test("reinforce increments while the target is unchanged", async () => {
		const store = new InMemoryRuleStore();
		await store.upsert(write("amt", "amount"));
		const rule = await store.reinforce("sales", "amt", "amount", FEB_1);

		expect(rule).toMatchObject({ confirmedCount: 2, lastConfirmedAt: FEB_1 });
	});

	test("reinforce never rewrites a corrected rule", async () => {
		const store = new InMemoryRuleStore();
		await store.upsert(write("amt", "total"));

		expect(await store.reinforce("sales", "amt", "amount")).toBeNull();
		expect(await store.lookup("sales", "amt")).toMatchObject({ targetFieldName: "total", confirmedCount: 1 });
	});

	test("reinforce of a missing rule is null", async () => {
		expect(await new InMemoryRuleStore().reinforce("sales", "amt", "amount")).toBeNull();
	});

	test("list orders by confirmation count", async () => {
		const seed: MappingRule[] = [
			{ schemaId: "sales", normalizedHeaderText: "dt", targetFieldName: "transaction_date", confirmedCount: 1, lastConfirmedAt: JAN_1 },
			{ schemaId: "sales", normalizedHeaderText: "amt", targetFieldName: "amount", confirmedCount: 4, lastConfirmedAt: JAN_1 },
			{ schemaId: "other", normalizedHeaderText: "amt", targetFieldName: "amount", confirmedCount: 9, lastConfirmedAt: JAN_1 },
		];
		const store = new InMemoryRuleStore({ rules: seed });

		expect((await store.list("sales")).map((r) => r.normalizedHeaderText)).toEqual(["amt", "dt"]);
	});
});

// ============================================================================
// loadRuleSnapshot Tests
// ============================================================================

class FailingLookupStore implements RuleStore {
	constructor(
		private readonly inner: RuleStore,
		private readonly failing: ReadonlySet<string>
	) {}

	async lookup(schemaId: string, normalizedHeader: string): Promise<MappingRule | null> {
		if (this.failing.has(normalizedHeader)) {
			throw new Error("connection reset");
		}
		return this.inner.lookup(schemaId, normalizedHeader);
	}

	upsert(ruleWrite: RuleWrite): Promise<MappingRule> {
		return this.inner.upsert(ruleWrite);
	}

	reinforce(schemaId: string, header: string, target: string, at?: Date): Promise<MappingRule | null> {
		return this.inner.reinforce(schemaId, header, target, at);
	}

	list(schemaId: string): Promise<MappingRule[]> {
		return this.inner.list(schemaId);
	}
}

describe("loadRuleSnapshot", () => {
	test("collects hits keyed by header", async () => {
		const store = new InMemoryRuleStore();
		await store.upsert(write("amt", "amount"));

		const { snapshot, failures } = await loadRuleSnapshot(store, "sales", ["amt", "dt", "", "amt"]);
		expect([...snapshot.keys()]).toEqual(["amt"]);
		expect(failures).toEqual([]);
	});

	test("failed lookups degrade to misses", async () => {
		const inner = new InMemoryRuleStore();
		await inner.upsert(write("amt", "amount"));
		await inner.upsert(write("dt", "transaction_date"));
		const store = new FailingLookupStore(inner, new Set(["dt"]));

		const { snapshot, failures } = await loadRuleSnapshot(store, "sales", ["amt", "dt"]);
		expect([...snapshot.keys()]).toEqual(["amt"]);
		expect(failures).toHaveLength(1);
		expect(failures[0].normalizedHeader).toBe("dt");
		expect(failures[0].error).toBeInstanceOf(RuleStoreUnavailableError);
		expect(failures[0].error.message).toBe("Rule store lookup failed: connection reset");
	});
});
