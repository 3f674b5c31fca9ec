import {
	checkedAdd,
	checkedSub,
	formatAmount,
	mulDivCeil,
	mulDivFloor,
	parseAmount,
} from "./amount.js";
import { EscrowError } from "./errors.js";
import { MAX_TOTAL_FEE, isValidPips, pipsFee } from "./pips.js";
import { MAX_AMOUNT } from "./types.js";

describe("amount arithmetic", () => {
	it("keeps sums inside the u128 range", () => {
		expect(checkedAdd(MAX_AMOUNT - 1n, 1n)).toBe(MAX_AMOUNT);
		expect(() => checkedAdd(MAX_AMOUNT, 1n)).toThrow(
			expect.objectContaining({ code: "INTEGER_OVERFLOW" }),
		);
	});

	it("never goes negative", () => {
		expect(() => checkedSub(1n, 2n)).toThrow(EscrowError);
	});

	it("rounds mulDiv both ways", () => {
		expect(mulDivFloor(10n, 1n, 3n)).toBe(3n);
		expect(mulDivCeil(10n, 1n, 3n)).toBe(4n);
		expect(mulDivCeil(9n, 1n, 3n)).toBe(3n);
	});

	it("widens intermediate products", () => {
		expect(mulDivFloor(MAX_AMOUNT, 3n, 3n)).toBe(MAX_AMOUNT);
	});

	describe("parseAmount", () => {
		it("round-trips decimal strings", () => {
			expect(formatAmount(parseAmount("340282366920938463463374607431768211455"))).toBe(
				"340282366920938463463374607431768211455",
			);
		});

		it.each(["-1", "1e3", "01", "1.5", ""])("rejects %p", (raw) => {
			expect(() => parseAmount(raw)).toThrow(
				expect.objectContaining({ code: "INVALID_PARAMS" }),
			);
		});

		it("rejects amounts above u128", () => {
			expect(() => parseAmount("340282366920938463463374607431768211456")).toThrow(
				expect.objectContaining({ code: "INTEGER_OVERFLOW" }),
			);
		});
	});
});

describe("pips", () => {
	it("floors fees", () => {
		expect(pipsFee(2000n, 5000)).toBe(10n);
		expect(pipsFee(199n, 5000)).toBe(0n);
		expect(pipsFee(1_000_000n, 1)).toBe(1n);
	});

	it("caps the aggregate at 25%", () => {
		expect(MAX_TOTAL_FEE).toBe(250_000);
	});

	it("validates rates", () => {
		expect(isValidPips(0)).toBe(true);
		expect(isValidPips(1_000_000)).toBe(true);
		expect(isValidPips(1_000_001)).toBe(false);
		expect(isValidPips(1.5)).toBe(false);
		expect(isValidPips(-1)).toBe(false);
	});
});
