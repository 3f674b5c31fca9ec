/**
 * Storage module - pluggable persistence for escrow instances
 */

export type { EscrowQuery, EscrowStore } from "./types.js";
export { StorageError } from "./types.js";
export { MemoryEscrowStore } from "./memory-escrow-store.js";
