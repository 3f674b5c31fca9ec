/**
 * In-Memory Escrow Store
 *
 * Keeps snapshots in a Map; data is lost when the process exits. Useful
 * for tests and for running the engine without a database.
 */

import { EscrowSnapshot } from "../escrow/types.js";
import { EscrowQuery, EscrowStore } from "./types.js";

function copy(snapshot: EscrowSnapshot): EscrowSnapshot {
	return JSON.parse(JSON.stringify(snapshot));
}

export class MemoryEscrowStore implements EscrowStore {
	private readonly snapshots = new Map<string, EscrowSnapshot>();
	private readonly cleaned = new Map<string, number>();

	async load(id: string): Promise<EscrowSnapshot | null> {
		const snapshot = this.snapshots.get(id);
		return snapshot ? copy(snapshot) : null;
	}

	async save(snapshot: EscrowSnapshot): Promise<void> {
		// copies keep callers from mutating stored state
		this.snapshots.set(snapshot.id, copy(snapshot));
	}

	async delete(id: string, cleanedAt: number): Promise<void> {
		this.snapshots.delete(id);
		this.cleaned.set(id, cleanedAt);
	}

	async isCleanedUp(id: string): Promise<boolean> {
		return this.cleaned.has(id);
	}

	async list(query: EscrowQuery = {}): Promise<EscrowSnapshot[]> {
		const lifecycles =
			query.lifecycle === undefined
				? undefined
				: Array.isArray(query.lifecycle)
					? query.lifecycle
					: [query.lifecycle];

		const matches = Array.from(this.snapshots.values())
			.filter((s) => !lifecycles || lifecycles.includes(s.lifecycle))
			.filter((s) => query.maker === undefined || s.maker === query.maker)
			.sort((a, b) => b.createdAt - a.createdAt || a.id.localeCompare(b.id));

		const offset = query.offset ?? 0;
		const limit = query.limit ?? matches.length;
		return matches.slice(offset, offset + limit).map(copy);
	}

	size(): number {
		return this.snapshots.size;
	}
}
