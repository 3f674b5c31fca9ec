/**
 * Engine errors
 *
 * Every rejection surfaced to a caller is an `EscrowError` with a stable
 * code. Downstream transfer failures are never thrown: they degrade into
 * the lost-and-found ledger instead.
 */

export const ESCROW_ERROR_CATEGORY = {
	MISMATCHED_PARAMS: "rejected-input",
	INVALID_PARAMS: "rejected-input",
	SAME_ASSETS: "rejected-input",
	WRONG_ASSET: "rejected-input",
	WRONG_SENDER: "rejected-input",
	PRICE_TOO_LOW: "rejected-input",
	EXCESSIVE_FEES: "rejected-input",
	EXCESSIVE_TRANSFER_BUDGET: "rejected-input",
	DEADLINE_EXPIRED: "rejected-input",

	UNAUTHORIZED: "policy",
	CLOSED: "policy",
	PARTIAL_FILLS_NOT_ALLOWED: "policy",
	ALREADY_INITIALIZED: "policy",
	NOT_FOUND: "policy",
	CLEANED_UP: "policy",

	INTEGER_OVERFLOW: "arithmetic",
	INSUFFICIENT_AMOUNT: "arithmetic",
	INSUFFICIENT_INVENTORY: "arithmetic",

	UNKNOWN_TRANSFER: "callback",
	TRANSFER_MISMATCH: "callback",
} as const;

export type EscrowErrorCode = keyof typeof ESCROW_ERROR_CATEGORY;
export type EscrowErrorCategory =
	(typeof ESCROW_ERROR_CATEGORY)[EscrowErrorCode];

/**
 * Error thrown by engine entry points.
 *
 * Thrown before anything is committed, so the instance is left untouched.
 */
export class EscrowError extends Error {
	readonly category: EscrowErrorCategory;

	constructor(
		public readonly code: EscrowErrorCode,
		message?: string,
		public readonly details?: unknown,
	) {
		super(message ?? code);
		this.name = "EscrowError";
		this.category = ESCROW_ERROR_CATEGORY[code];
	}
}

export function isEscrowError(err: unknown): err is EscrowError {
	return err instanceof EscrowError;
}

export function toError(err: unknown): Error {
	return err instanceof Error
		? err
		: new Error("Invalid error type", { cause: err });
}
