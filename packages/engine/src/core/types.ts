/**
 * Core types for the settlement engine
 *
 * Identities, asset ids and amounts shared by every layer of the engine.
 */

/**
 * Identity of a party (maker, taker, fee collector, receiver).
 *
 * Opaque to the engine: derivation and authentication belong to the host.
 */
export type AccountId = string;

/**
 * Identifier of an asset on an external ledger (e.g. "nep141:usdc.near").
 */
export type AssetId = string;

/**
 * Amount in the asset's native base unit.
 */
export type Amount = bigint;

/**
 * Absolute instant as Unix epoch milliseconds.
 */
export type Deadline = number;

/**
 * Largest amount an external ledger can represent (u128).
 */
export const MAX_AMOUNT: Amount = (1n << 128n) - 1n;

/**
 * Override for where and how an outbound transfer is sent.
 *
 * Every field is optional; absent fields fall back to the defaults of
 * the leg being sent (maker for payouts and refunds, sender for taker payouts).
 */
export interface SendOverride {
	/** Receiver of the transfer instead of the default party */
	receiver?: AccountId;
	/** Free-form memo forwarded to the asset ledger */
	memo?: string;
	/**
	 * Message forwarded to the receiver with the transfer.
	 * A transfer carrying a message may be partially returned by the receiver.
	 */
	message?: string;
	/** Minimum execution budget reserved for this transfer */
	minBudget?: number;
}

/**
 * Source of the current time. Injected so deadlines are testable.
 */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

/**
 * Logger shape accepted by the engine.
 *
 * Matches the method names of the NestJS `Logger`, so hosts can pass theirs in.
 */
export interface EngineLogger {
	log(message: string): void;
	warn(message: string): void;
	error(message: string, stack?: string): void;
	debug?(message: string): void;
}

export const silentLogger: EngineLogger = {
	log: () => {},
	warn: () => {},
	error: () => {},
};
