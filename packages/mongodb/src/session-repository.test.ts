import { createInitialState, parseSnapshot, toSnapshot } from "@sheetrecon/core";
import { describe, expect, test } from "vitest";
import type { SessionCollection, SessionDocument } from "./collections";
import { MongoSessionRepository } from "./session-repository";

const SAVED_AT = new Date("2024-03-01T12:00:00Z");

class FakeSessionCollection implements SessionCollection {
	readonly documents = new Map<string, SessionDocument>();

	async save(document: SessionDocument): Promise<void> {
		this.documents.set(document._id, { ...document });
	}

	async findById(sessionId: string): Promise<SessionDocument | null> {
		return this.documents.get(sessionId) ?? null;
	}

	async deleteById(sessionId: string): Promise<void> {
		this.documents.delete(sessionId);
	}
}

describe("MongoSessionRepository", () => {
	const snapshot = toSnapshot(createInitialState("s-1", "sales", new Date("2024-03-01T09:00:00Z")));

	test("stores the snapshot as JSON with queryable fields", async () => {
		const collection = new FakeSessionCollection();
		const repository = new MongoSessionRepository(collection, () => SAVED_AT);

		await repository.save(snapshot);

		expect(collection.documents.get("s-1")).toEqual({
			_id: "s-1",
			schemaId: "sales",
			status: "Created",
			snapshot: JSON.stringify(snapshot),
			updatedAt: SAVED_AT,
		});
	});

	test("load returns a snapshot that restores the session state", async () => {
		const repository = new MongoSessionRepository(new FakeSessionCollection());
		await repository.save(snapshot);

		const loaded = await repository.load("s-1");

		expect(loaded).toEqual(JSON.parse(JSON.stringify(snapshot)));
		expect(parseSnapshot(loaded)).toMatchObject({ sessionId: "s-1", status: "Created" });
	});

	test("load returns null for unknown ids and after delete", async () => {
		const repository = new MongoSessionRepository(new FakeSessionCollection());
		await repository.save(snapshot);
		await repository.delete("s-1");

		expect(await repository.load("s-1")).toBeNull();
		expect(await repository.load("s-2")).toBeNull();
	});
});
