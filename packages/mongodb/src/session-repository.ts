// ============================================================================
// MongoDB Session Repository
// ============================================================================

import type { SessionRepository, SessionSnapshot } from "@sheetrecon/core";
import type { SessionCollection } from "./collections";

/**
 * Stores one document per session, replaced on every save.
 */
export class MongoSessionRepository implements SessionRepository {
	constructor(
		private readonly collection: SessionCollection,
		private readonly now: () => Date = () => new Date()
	) {}

	async save(snapshot: SessionSnapshot): Promise<void> {
		await this.collection.save({
			_id: snapshot.sessionId,
			schemaId: snapshot.schemaId,
			status: snapshot.status,
			snapshot: JSON.stringify(snapshot),
			updatedAt: this.now(),
		});
	}

	async load(sessionId: string): Promise<unknown | null> {
		const document = await this.collection.findById(sessionId);
		if (!document) {
			return null;
		}
		const snapshot: unknown = JSON.parse(document.snapshot);
		return snapshot;
	}

	async delete(sessionId: string): Promise<void> {
		await this.collection.deleteById(sessionId);
	}
}
