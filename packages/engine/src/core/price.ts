/**
 * Exact exchange rate: destination units per one source unit.
 *
 * Stored as a reduced `numerator / denominator` pair of bigints, so no
 * binary floating point ever touches a price.
 */

import { mulDivCeil, mulDivFloor } from "./amount.js";
import { EscrowError } from "./errors.js";
import { Amount } from "./types.js";

const DECIMAL_PRICE = /^(0|[1-9][0-9]*)(\.[0-9]+)?$/;

function gcd(a: bigint, b: bigint): bigint {
	let x = a < 0n ? -a : a;
	let y = b < 0n ? -b : b;
	while (y !== 0n) {
		[x, y] = [y, x % y];
	}
	return x;
}

export interface PriceJson {
	numerator: string;
	denominator: string;
}

export class Price {
	readonly numerator: bigint;
	readonly denominator: bigint;

	private constructor(numerator: bigint, denominator: bigint) {
		const divisor = gcd(numerator, denominator) || 1n;
		this.numerator = numerator / divisor;
		this.denominator = denominator / divisor;
	}

	static ratio(numerator: bigint, denominator: bigint): Price {
		if (numerator < 0n || denominator <= 0n) {
			throw new EscrowError(
				"INVALID_PARAMS",
				`invalid price ${numerator}/${denominator}`,
			);
		}
		return new Price(numerator, denominator);
	}

	/**
	 * Parse "2", "0.5" or "1.000025". Exponents and signs are rejected.
	 */
	static fromDecimal(raw: string): Price {
		const match = DECIMAL_PRICE.exec(raw);
		if (!match) {
			throw new EscrowError("INVALID_PARAMS", `invalid price "${raw}"`);
		}
		const fraction = match[2]?.slice(1) ?? "";
		const digits = BigInt(`${match[1]}${fraction}`);
		return Price.ratio(digits, 10n ** BigInt(fraction.length));
	}

	static fromJson(json: PriceJson | string): Price {
		if (typeof json === "string") {
			return Price.fromDecimal(json);
		}
		if (!/^[0-9]+$/.test(json.numerator) || !/^[0-9]+$/.test(json.denominator)) {
			throw new EscrowError(
				"INVALID_PARAMS",
				`invalid price ${json.numerator}/${json.denominator}`,
			);
		}
		return Price.ratio(BigInt(json.numerator), BigInt(json.denominator));
	}

	isZero(): boolean {
		return this.numerator === 0n;
	}

	compare(other: Price): -1 | 0 | 1 {
		const lhs = this.numerator * other.denominator;
		const rhs = other.numerator * this.denominator;
		return lhs < rhs ? -1 : lhs > rhs ? 1 : 0;
	}

	lessThan(other: Price): boolean {
		return this.compare(other) < 0;
	}

	equals(other: Price): boolean {
		return this.compare(other) === 0;
	}

	/**
	 * Source units bought by `dst` destination units, rounded down.
	 */
	srcFloor(dst: Amount): Amount {
		if (this.isZero()) {
			throw new EscrowError("PRICE_TOO_LOW", "price is zero");
		}
		return mulDivFloor(dst, this.denominator, this.numerator);
	}

	/**
	 * Destination units owed for `src` source units, rounded up (maker side).
	 */
	dstCeil(src: Amount): Amount {
		return mulDivCeil(src, this.numerator, this.denominator);
	}

	toJSON(): PriceJson {
		return {
			numerator: this.numerator.toString(10),
			denominator: this.denominator.toString(10),
		};
	}

	toString(): string {
		return this.denominator === 1n
			? this.numerator.toString(10)
			: `${this.numerator}/${this.denominator}`;
	}
}
