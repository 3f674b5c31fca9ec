/**
 * Escrow Store Types
 *
 * Pluggable persistence for escrow instances. Hosts bring their own
 * backend by implementing `EscrowStore`.
 */

import { EscrowSnapshot } from "../escrow/types.js";
import { LifecycleState } from "../lifecycle/lifecycle-controller.js";

export interface EscrowQuery {
	lifecycle?: LifecycleState | LifecycleState[];
	maker?: string;
	limit?: number;
	offset?: number;
}

export interface EscrowStore {
	/**
	 * @returns the snapshot, or null when unknown or cleaned up
	 */
	load(id: string): Promise<EscrowSnapshot | null>;

	/**
	 * Create or replace the snapshot with the same id.
	 */
	save(snapshot: EscrowSnapshot): Promise<void>;

	/**
	 * Remove a cleaned-up instance and remember that it existed.
	 */
	delete(id: string, cleanedAt: number): Promise<void>;

	isCleanedUp(id: string): Promise<boolean>;

	list(query?: EscrowQuery): Promise<EscrowSnapshot[]>;
}

/**
 * Error thrown by store implementations.
 */
export class StorageError extends Error {
	constructor(
		message: string,
		public readonly code?: string,
		public readonly details?: unknown,
	) {
		super(message);
		this.name = "StorageError";
	}
}
