/**
 * Fee rates in pips (1 pip = 1e-6 of notional).
 */

import { mulDivFloor } from "./amount.js";
import { Amount } from "./types.js";

export type Pips = number;

export const ONE_PERCENT: Pips = 10_000;
export const MAX_PIPS: Pips = 1_000_000;

/** Aggregate cap on protocol, surplus and integrator fees (25%). */
export const MAX_TOTAL_FEE: Pips = 25 * ONE_PERCENT;

export function isValidPips(value: unknown): value is Pips {
	return (
		typeof value === "number" &&
		Number.isInteger(value) &&
		value >= 0 &&
		value <= MAX_PIPS
	);
}

/**
 * floor(amount * pips / 1_000_000)
 */
export function pipsFee(amount: Amount, pips: Pips): Amount {
	if (pips === 0 || amount === 0n) {
		return 0n;
	}
	return mulDivFloor(amount, BigInt(pips), BigInt(MAX_PIPS));
}
