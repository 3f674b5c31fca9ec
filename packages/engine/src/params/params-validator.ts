/**
 * Params validation
 *
 * Run once at init. Later calls only compare fingerprints, so anything
 * accepted here is trusted for the lifetime of the escrow.
 */

import { EscrowError } from "../core/errors.js";
import { MAX_TOTAL_FEE, Pips, isValidPips } from "../core/pips.js";
import { SendOverride } from "../core/types.js";
import { EscrowParams, ValidationOptions } from "./types.js";

/** Budget consumed by the fill itself, before any transfer. */
export const FILL_BUDGET = 10;
export const PLAIN_TRANSFER_BUDGET_MIN = 15;
export const PLAIN_TRANSFER_BUDGET_DEFAULT = 15;
export const MESSAGE_TRANSFER_BUDGET_MIN = 30;
export const MESSAGE_TRANSFER_BUDGET_DEFAULT = 50;
export const DEFAULT_TRANSFER_BUDGET_CEILING = 260;

const SALT = /^[0-9a-f]{64}$/;

/**
 * Budget a transfer needs, given its override. A message-carrying transfer
 * invokes the receiver and so costs more.
 */
export function transferBudget(override?: SendOverride): number {
	const hasMessage = override?.message !== undefined;
	const min = hasMessage
		? MESSAGE_TRANSFER_BUDGET_MIN
		: PLAIN_TRANSFER_BUDGET_MIN;
	const fallback = hasMessage
		? MESSAGE_TRANSFER_BUDGET_DEFAULT
		: PLAIN_TRANSFER_BUDGET_DEFAULT;
	return Math.max(override?.minBudget ?? fallback, min);
}

export function feeRecipientCount(params: EscrowParams): number {
	const integrators = Object.values(params.integratorFees).filter(
		(fee) => fee > 0,
	).length;
	const protocol =
		params.protocolFees &&
		params.protocolFees.fee + params.protocolFees.surplus > 0
			? 1
			: 0;
	return integrators + protocol;
}

/**
 * Worst-case budget of one fill: payout, refund and every fee leg.
 */
export function requiredFillBudget(params: EscrowParams): number {
	return (
		FILL_BUDGET +
		transferBudget(params.receiveDstTo) +
		transferBudget(params.refundSrcTo) +
		PLAIN_TRANSFER_BUDGET_DEFAULT * feeRecipientCount(params)
	);
}

export function totalFee(params: EscrowParams): Pips {
	const integrators = Object.values(params.integratorFees).reduce(
		(sum, fee) => sum + fee,
		0,
	);
	return (
		integrators +
		(params.protocolFees?.fee ?? 0) +
		(params.protocolFees?.surplus ?? 0)
	);
}

function requireId(value: string, field: string): void {
	if (typeof value !== "string" || value.trim().length === 0) {
		throw new EscrowError("INVALID_PARAMS", `${field} must not be empty`);
	}
}

function validateOverride(override: SendOverride | undefined, field: string) {
	if (!override) return;
	if (override.receiver !== undefined) {
		requireId(override.receiver, `${field}.receiver`);
	}
	if (
		override.minBudget !== undefined &&
		(!Number.isInteger(override.minBudget) || override.minBudget < 0)
	) {
		throw new EscrowError(
			"INVALID_PARAMS",
			`${field}.minBudget must be a non-negative integer`,
		);
	}
}

const RESERVED_KEYS: ReadonlySet<string> = new Set([
	"__proto__",
	"constructor",
	"prototype",
]);

function validateFees(params: EscrowParams): void {
	for (const [integrator, fee] of Object.entries(params.integratorFees)) {
		requireId(integrator, "integrator id");
		if (RESERVED_KEYS.has(integrator)) {
			throw new EscrowError(
				"INVALID_PARAMS",
				`"${integrator}" is not a valid integrator id`,
			);
		}
		if (!isValidPips(fee)) {
			throw new EscrowError(
				"INVALID_PARAMS",
				`integrator fee for ${integrator} is not a valid pip rate`,
			);
		}
	}
	if (params.protocolFees) {
		const { fee, surplus, collector } = params.protocolFees;
		requireId(collector, "protocolFees.collector");
		if (!isValidPips(fee) || !isValidPips(surplus)) {
			throw new EscrowError(
				"INVALID_PARAMS",
				"protocol fee rates must be valid pip rates",
			);
		}
	}
	const total = totalFee(params);
	if (total > MAX_TOTAL_FEE) {
		throw new EscrowError(
			"EXCESSIVE_FEES",
			`total fee ${total} pips exceeds ${MAX_TOTAL_FEE}`,
		);
	}
}

/**
 * Check a send override supplied at fill time against the same ceiling.
 */
export function validateSendOverride(
	override: SendOverride | undefined,
	field: string,
	ceiling = DEFAULT_TRANSFER_BUDGET_CEILING,
): void {
	validateOverride(override, field);
	if (transferBudget(override) > ceiling) {
		throw new EscrowError(
			"EXCESSIVE_TRANSFER_BUDGET",
			`${field} requires more budget than ${ceiling}`,
		);
	}
}

/**
 * Validate params for init.
 *
 * @throws EscrowError with the first violated rule
 */
export function validateParams(
	params: EscrowParams,
	options: ValidationOptions = {},
): void {
	requireId(params.maker, "maker");
	requireId(params.srcAsset, "srcAsset");
	requireId(params.dstAsset, "dstAsset");
	if (params.srcAsset === params.dstAsset) {
		throw new EscrowError(
			"SAME_ASSETS",
			"srcAsset and dstAsset must differ",
		);
	}
	if (params.price.isZero()) {
		throw new EscrowError("PRICE_TOO_LOW", "price must be positive");
	}
	if (!Number.isFinite(params.deadline)) {
		throw new EscrowError("INVALID_PARAMS", "deadline must be finite");
	}
	if (options.now !== undefined && options.now >= params.deadline) {
		throw new EscrowError(
			"DEADLINE_EXPIRED",
			`deadline ${new Date(params.deadline).toISOString()} has passed`,
		);
	}
	if (!SALT.test(params.salt)) {
		throw new EscrowError("INVALID_PARAMS", "salt must be 32 bytes of hex");
	}
	for (const taker of params.takerWhitelist) {
		requireId(taker, "takerWhitelist entry");
	}
	validateOverride(params.refundSrcTo, "refundSrcTo");
	validateOverride(params.receiveDstTo, "receiveDstTo");
	validateFees(params);

	const ceiling =
		options.transferBudgetCeiling ?? DEFAULT_TRANSFER_BUDGET_CEILING;
	const required = requiredFillBudget(params);
	if (required > ceiling) {
		throw new EscrowError(
			"EXCESSIVE_TRANSFER_BUDGET",
			`a fill would require ${required} budget units, ceiling is ${ceiling}`,
		);
	}
}
