import { Price } from "../core/price.js";
import { makeParams } from "../../test/fixtures.js";
import {
	canonicalize,
	deriveEscrowId,
	fingerprint,
	verifyFingerprint,
} from "./fingerprint.js";
import { paramsFromJson } from "./params-codec.js";

describe("fingerprint", () => {
	it("sorts keys and drops undefined values", () => {
		expect(canonicalize({ b: 1, a: { d: undefined, c: [{ y: 1, x: 2 }] } })).toBe(
			'{"a":{"c":[{"x":2,"y":1}]},"b":1}',
		);
	});

	it("is a hex SHA-256 digest", () => {
		expect(fingerprint(makeParams())).toMatch(/^[0-9a-f]{64}$/);
	});

	it("ignores whitelist order, duplicates and unreduced prices", () => {
		const a = makeParams({
			takerWhitelist: ["b.test", "a.test", "a.test"],
			price: Price.ratio(4n, 2n),
		});
		const b = makeParams({ takerWhitelist: ["a.test", "b.test"] });
		expect(fingerprint(a)).toBe(fingerprint(b));
	});

	it("changes when any term changes", () => {
		const base = fingerprint(makeParams());
		expect(fingerprint(makeParams({ deadline: makeParams().deadline + 1 }))).not.toBe(base);
		expect(fingerprint(makeParams({ partialFillsAllowed: false }))).not.toBe(base);
		expect(fingerprint(makeParams({ receiveDstTo: { memo: "x" } }))).not.toBe(base);
	});

	it("keeps a __proto__ key in the canonical form", () => {
		const fees = Object.fromEntries([["__proto__", 200_000]]);
		expect(canonicalize({ integratorFees: fees })).toBe(
			'{"integratorFees":{"__proto__":200000}}',
		);
	});

	it("distinguishes a __proto__ integrator fee from no fees", () => {
		const base = {
			maker: "maker.test",
			srcAsset: "asset:src",
			dstAsset: "asset:dst",
			price: "2",
			deadline: makeParams().deadline,
			partialFillsAllowed: true,
			salt: "ab".repeat(32),
		};
		const honest = fingerprint(paramsFromJson(base));
		const substituted = paramsFromJson({
			...base,
			integratorFees: Object.fromEntries([["__proto__", 200_000]]),
		});
		expect(fingerprint(substituted)).not.toBe(honest);
		expect(() => verifyFingerprint(substituted, honest)).toThrow(
			expect.objectContaining({ code: "MISMATCHED_PARAMS" }),
		);
	});

	it("derives a stable instance id", () => {
		const fp = fingerprint(makeParams());
		expect(deriveEscrowId(fp)).toMatch(/^esc_[0-9a-f]{40}$/);
		expect(deriveEscrowId(fp)).toBe(deriveEscrowId(fp));
	});

	it("rejects substituted params", () => {
		const fp = fingerprint(makeParams());
		expect(() => verifyFingerprint(makeParams(), fp)).not.toThrow();
		expect(() =>
			verifyFingerprint(makeParams({ price: Price.ratio(1n, 1n) }), fp),
		).toThrow(expect.objectContaining({ code: "MISMATCHED_PARAMS" }));
	});
});

describe("paramsFromJson", () => {
	it("parses the wire form", () => {
		const params = paramsFromJson({
			maker: "maker.test",
			srcAsset: "asset:src",
			dstAsset: "asset:dst",
			price: "0.5",
			deadline: "2026-01-01T01:00:00.000Z",
			salt: "AB".repeat(32),
			takerWhitelist: ["t2", "t1", "t2"],
		});
		expect(params.price.toJSON()).toEqual({ numerator: "1", denominator: "2" });
		expect(params.deadline).toBe(Date.UTC(2026, 0, 1, 1));
		expect(params.salt).toBe("ab".repeat(32));
		expect(params.partialFillsAllowed).toBe(false);
		expect(params.takerWhitelist).toEqual(["t1", "t2"]);
		expect(params.integratorFees).toEqual({});
	});

	it("hashes the same as the typed params it describes", () => {
		const json = {
			maker: "maker.test",
			srcAsset: "asset:src",
			dstAsset: "asset:dst",
			price: "2",
			deadline: makeParams().deadline,
			partialFillsAllowed: true,
			salt: "ab".repeat(32),
		};
		expect(fingerprint(paramsFromJson(json))).toBe(fingerprint(makeParams()));
	});
});
