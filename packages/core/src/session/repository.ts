// ============================================================================
// In-Memory Session Repository
// ============================================================================

import type { SessionRepository, SessionSnapshot } from "./types";

/**
 * Keeps snapshots as JSON text, the way a remote store would see them.
 */
export class InMemorySessionRepository implements SessionRepository {
	private readonly snapshots = new Map<string, string>();

	async save(snapshot: SessionSnapshot): Promise<void> {
		this.snapshots.set(snapshot.sessionId, JSON.stringify(snapshot));
	}

	async load(sessionId: string): Promise<unknown | null> {
		const text = this.snapshots.get(sessionId);
		if (text === undefined) {
			return null;
		}
		const parsed: unknown = JSON.parse(text);
		return parsed;
	}

	async delete(sessionId: string): Promise<void> {
		this.snapshots.delete(sessionId);
	}

	/** Ids of the stored sessions, in save order. */
	ids(): string[] {
		return Array.from(this.snapshots.keys());
	}
}
