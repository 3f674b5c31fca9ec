import { Price } from "../core/price.js";
import {
	COLLECTOR,
	DST,
	MAKER,
	NOW,
	SRC,
	TAKER,
	makeParams,
	seededRandom,
} from "../../test/fixtures.js";
import { assertCanFill, computeFill, planFillLegs } from "./fill-engine.js";
import { FillQuote } from "./types.js";

const TWO = Price.ratio(2n, 1n);

describe("computeFill", () => {
	it("fills the whole inventory and returns the excess (scenario A)", () => {
		const quote = computeFill(makeParams(), 1000n, 2100n, TWO);
		expect(quote).toEqual({
			srcFillable: 1000n,
			dstIn: 2100n,
			dstRequired: 2000n,
			dstUnused: 100n,
			dstWanted: 2000n,
			surplus: 0n,
			protocolFee: 0n,
			integratorFees: {},
			makerPayout: 2000n,
		});
	});

	it("takes the protocol fee from the maker payout (scenario B)", () => {
		const params = makeParams({
			protocolFees: { fee: 5000, surplus: 0, collector: COLLECTOR },
		});
		const quote = computeFill(params, 1000n, 2100n, TWO);
		expect(quote.protocolFee).toBe(10n);
		expect(quote.makerPayout).toBe(1990n);
	});

	it("rejects a partial fill when partial fills are off (scenario C)", () => {
		const params = makeParams({ partialFillsAllowed: false });
		expect(() => computeFill(params, 1000n, 500n, TWO)).toThrow(
			expect.objectContaining({ code: "PARTIAL_FILLS_NOT_ALLOWED" }),
		);
	});

	it("allows the same fill when partial fills are on", () => {
		const quote = computeFill(makeParams(), 1000n, 501n, TWO);
		expect(quote.srcFillable).toBe(250n);
		expect(quote.dstRequired).toBe(500n);
		expect(quote.dstUnused).toBe(1n);
	});

	it("charges surplus and integrator fees on price improvement", () => {
		const params = makeParams({
			protocolFees: { fee: 1_000, surplus: 100_000, collector: COLLECTOR },
			integratorFees: { "integrator.test": 2_000 },
		});
		const quote = computeFill(params, 1000n, 2500n, Price.ratio(5n, 2n));
		expect(quote.dstRequired).toBe(2500n);
		expect(quote.dstWanted).toBe(2000n);
		expect(quote.surplus).toBe(500n);
		expect(quote.protocolFee).toBe(52n);
		expect(quote.integratorFees).toEqual({ "integrator.test": 5n });
		expect(quote.makerPayout).toBe(2443n);
	});

	it("rejects a delivery too small to buy anything", () => {
		expect(() => computeFill(makeParams(), 1000n, 1n, TWO)).toThrow(
			expect.objectContaining({ code: "INSUFFICIENT_AMOUNT" }),
		);
	});

	it("rejects a fill with no inventory", () => {
		expect(() => computeFill(makeParams(), 0n, 2000n, TWO)).toThrow(
			expect.objectContaining({ code: "INSUFFICIENT_AMOUNT" }),
		);
	});

	it("rejects fees that would leave the maker nothing", () => {
		const params = makeParams({ integratorFees: { "integrator.test": 1_000_000 } });
		expect(() => computeFill(params, 1000n, 2000n, TWO)).toThrow(
			expect.objectContaining({ code: "INSUFFICIENT_AMOUNT" }),
		);
	});

	it("rejects fees above the amount consumed", () => {
		const params = makeParams({
			integratorFees: { "a.test": 1_000_000, "b.test": 1_000_000 },
		});
		expect(() => computeFill(params, 1000n, 2000n, TWO)).toThrow(
			expect.objectContaining({ code: "EXCESSIVE_FEES" }),
		);
	});

	it("accounts for every integrator key, __proto__ included", () => {
		const params = makeParams({
			integratorFees: Object.fromEntries([["__proto__", 200_000]]),
		});
		const quote = computeFill(params, 1000n, 2000n, TWO);
		expect(quote.makerPayout).toBe(1600n);
		expect(Object.entries(quote.integratorFees)).toEqual([["__proto__", 400n]]);

		const legs = planFillLegs(params, quote, TAKER, { takerPrice: TWO });
		const dstTotal = legs
			.filter((leg) => leg.asset === DST)
			.reduce((sum, leg) => sum + leg.amount, 0n);
		expect(dstTotal).toBe(2000n);
	});

	it("always rejects a taker price below the maker price", () => {
		const random = seededRandom(7);
		for (let i = 0; i < 200; i++) {
			const denominator = BigInt(1 + Math.floor(random() * 1000));
			const makerNumerator = BigInt(1 + Math.floor(random() * 1000));
			const params = makeParams({
				price: Price.ratio(makerNumerator, denominator),
			});
			const takerPrice = Price.ratio(
				BigInt(Math.floor(random() * Number(makerNumerator))),
				denominator,
			);
			const dstIn = BigInt(1 + Math.floor(random() * 1e9));
			expect(() => computeFill(params, 10n ** 12n, dstIn, takerPrice)).toThrow(
				expect.objectContaining({ code: "PRICE_TOO_LOW" }),
			);
		}
	});

	it("never creates value", () => {
		const random = seededRandom(42);
		let fills = 0;
		for (let i = 0; i < 300; i++) {
			const fee = Math.floor(random() * 100_000);
			const surplus = Math.floor(random() * 100_000);
			const integrator = Math.floor(random() * 50_000);
			const params = makeParams({
				price: Price.ratio(BigInt(1 + Math.floor(random() * 500)), 100n),
				protocolFees: { fee, surplus, collector: COLLECTOR },
				integratorFees: { "integrator.test": integrator },
			});
			const takerPrice = Price.ratio(
				params.price.numerator * 100n + BigInt(Math.floor(random() * 300)),
				params.price.denominator * 100n,
			);
			const srcRemaining = BigInt(1 + Math.floor(random() * 1e6));
			const dstIn = BigInt(1 + Math.floor(random() * 1e7));
			let quote: FillQuote;
			try {
				quote = computeFill(params, srcRemaining, dstIn, takerPrice);
			} catch {
				continue;
			}
			fills++;
			const integratorTotal = Object.values(quote.integratorFees).reduce(
				(sum, amount) => sum + amount,
				0n,
			);
			expect(quote.makerPayout + quote.protocolFee + integratorTotal).toBe(
				quote.dstRequired,
			);
			expect(quote.dstRequired + quote.dstUnused).toBe(dstIn);
			expect(quote.srcFillable).toBeLessThanOrEqual(srcRemaining);
		}
		expect(fills).toBeGreaterThan(0);
	});
});

describe("planFillLegs", () => {
	it("pays maker, taker and fee collectors, skipping zero legs", () => {
		const params = makeParams({
			protocolFees: { fee: 5000, surplus: 0, collector: COLLECTOR },
			integratorFees: { "integrator.test": 0 },
		});
		const request = { takerPrice: TWO, receiveSrcTo: { receiver: "alt.test" } };
		const quote = computeFill(params, 1000n, 2100n, TWO);
		expect(planFillLegs(params, quote, TAKER, request)).toEqual([
			{
				kind: "maker-payout",
				asset: DST,
				amount: 1990n,
				receiver: MAKER,
				memo: undefined,
				message: undefined,
				minBudget: undefined,
				makerSide: "dst",
				retry: false,
			},
			{
				kind: "taker-payout",
				asset: SRC,
				amount: 1000n,
				receiver: "alt.test",
				memo: undefined,
				message: undefined,
				minBudget: undefined,
				retry: false,
			},
			{
				kind: "protocol-fee",
				asset: DST,
				amount: 10n,
				receiver: COLLECTOR,
				memo: "fee",
				retry: false,
			},
		]);
	});

	it("routes the maker payout through its override", () => {
		const params = makeParams({
			receiveDstTo: { receiver: "vault.test", memo: "payout" },
		});
		const quote = computeFill(params, 1000n, 2000n, TWO);
		const [payout] = planFillLegs(params, quote, TAKER, { takerPrice: TWO });
		expect(payout?.receiver).toBe("vault.test");
		expect(payout?.memo).toBe("payout");
	});
});

describe("assertCanFill", () => {
	const params = makeParams({ takerWhitelist: [TAKER] });
	const request = { takerPrice: TWO };

	it("admits a whitelisted taker before the deadline", () => {
		expect(() => assertCanFill(params, false, TAKER, request, NOW)).not.toThrow();
	});

	it("rejects fills once closed or expired", () => {
		expect(() => assertCanFill(params, true, TAKER, request, NOW)).toThrow(
			expect.objectContaining({ code: "CLOSED" }),
		);
		expect(() =>
			assertCanFill(params, false, TAKER, request, params.deadline),
		).toThrow(expect.objectContaining({ code: "CLOSED" }));
	});

	it("rejects an expired fill request", () => {
		expect(() =>
			assertCanFill(params, false, TAKER, { ...request, deadline: NOW }, NOW),
		).toThrow(expect.objectContaining({ code: "DEADLINE_EXPIRED" }));
	});

	it("rejects takers outside the whitelist", () => {
		expect(() => assertCanFill(params, false, "stranger.test", request, NOW)).toThrow(
			expect.objectContaining({ code: "UNAUTHORIZED" }),
		);
	});
});
