/**
 * Checked arithmetic on base-unit amounts.
 *
 * All amounts stay within `0 ..= MAX_AMOUNT`; bigint gives the widened
 * intermediate type, and results are range-checked before they are stored.
 */

import { EscrowError } from "./errors.js";
import { Amount, MAX_AMOUNT } from "./types.js";

const DECIMAL_AMOUNT = /^(0|[1-9][0-9]*)$/;

export function assertAmount(value: bigint, what = "amount"): Amount {
	if (value < 0n || value > MAX_AMOUNT) {
		throw new EscrowError(
			"INTEGER_OVERFLOW",
			`${what} ${value} is outside 0..=${MAX_AMOUNT}`,
		);
	}
	return value;
}

export function checkedAdd(a: Amount, b: Amount, what = "sum"): Amount {
	return assertAmount(a + b, what);
}

export function checkedSub(a: Amount, b: Amount, what = "difference"): Amount {
	return assertAmount(a - b, what);
}

/**
 * floor(value * mul / div)
 */
export function mulDivFloor(value: Amount, mul: bigint, div: bigint): Amount {
	if (div <= 0n) {
		throw new EscrowError("INTEGER_OVERFLOW", "division by zero");
	}
	return assertAmount((value * mul) / div);
}

/**
 * ceil(value * mul / div)
 */
export function mulDivCeil(value: Amount, mul: bigint, div: bigint): Amount {
	if (div <= 0n) {
		throw new EscrowError("INTEGER_OVERFLOW", "division by zero");
	}
	const product = value * mul;
	const quotient = product / div;
	return assertAmount(product % div === 0n ? quotient : quotient + 1n);
}

export function minAmount(a: Amount, b: Amount): Amount {
	return a < b ? a : b;
}

/**
 * Parse a decimal string in base units ("1000", never "1e3" or "-1").
 */
export function parseAmount(raw: string, what = "amount"): Amount {
	if (!DECIMAL_AMOUNT.test(raw)) {
		throw new EscrowError(
			"INVALID_PARAMS",
			`${what} must be a non-negative integer string, got "${raw}"`,
		);
	}
	return assertAmount(BigInt(raw), what);
}

export function formatAmount(amount: Amount): string {
	return amount.toString(10);
}
