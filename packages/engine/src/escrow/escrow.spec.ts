import { Price } from "../core/price.js";
import { EscrowParams } from "../params/types.js";
import {
	COLLECTOR,
	DST,
	MAKER,
	NOW,
	OTHER,
	SRC,
	TAKER,
	makeContext,
	makeParams,
	outcomeFor,
} from "../../test/fixtures.js";
import { Escrow, receiveMessageFromJson } from "./escrow.js";

const TWO = Price.ratio(2n, 1n);

function funded(params: EscrowParams, amount = 1000n): Escrow {
	const escrow = Escrow.init(params, makeContext());
	escrow.onDeposit(MAKER, SRC, amount, params);
	escrow.takeOutbox();
	return escrow;
}

describe("Escrow", () => {
	describe("init", () => {
		it("derives the id from the params and emits Created", () => {
			const params = makeParams();
			const escrow = Escrow.init(params, makeContext());
			const { events, transfers } = escrow.takeOutbox();
			expect(escrow.id).toMatch(/^esc_[0-9a-f]{40}$/);
			expect(transfers).toEqual([]);
			expect(events).toEqual([
				{
					type: "created",
					escrowId: escrow.id,
					fingerprint: escrow.viewState().fingerprint,
					maker: MAKER,
					srcAsset: SRC,
					dstAsset: DST,
					price: { numerator: "2", denominator: "1" },
					deadline: NOW + 3_600_000,
				},
			]);
			expect(escrow.lifecycle).toBe("open");
		});

		it("rejects an expired deadline", () => {
			expect(() => Escrow.init(makeParams({ deadline: NOW - 1 }), makeContext())).toThrow(
				expect.objectContaining({ code: "DEADLINE_EXPIRED" }),
			);
		});
	});

	describe("onDeposit", () => {
		const params = makeParams();
		let escrow: Escrow;

		beforeEach(() => {
			escrow = Escrow.init(params, makeContext());
			escrow.takeOutbox();
		});

		it("credits the maker inventory", () => {
			expect(escrow.onDeposit(MAKER, SRC, 1000n, params)).toEqual({
				accepted: 1000n,
				refund: 0n,
			});
			expect(escrow.viewState().srcRemaining).toBe(1000n);
			expect(escrow.takeOutbox().events).toEqual([
				{
					type: "funded",
					escrowId: escrow.id,
					maker: MAKER,
					srcAdded: "1000",
					srcRemaining: "1000",
				},
			]);
		});

		it("accepts only the maker", () => {
			expect(() => escrow.onDeposit(TAKER, SRC, 1n, params)).toThrow(
				expect.objectContaining({ code: "WRONG_SENDER" }),
			);
		});

		it("accepts only the source asset", () => {
			expect(() => escrow.onDeposit(MAKER, DST, 1n, params)).toThrow(
				expect.objectContaining({ code: "WRONG_ASSET" }),
			);
		});

		it("rejects substituted params", () => {
			const other = makeParams({ price: Price.ratio(1n, 1n) });
			expect(() => escrow.onDeposit(MAKER, SRC, 1n, other)).toThrow(
				expect.objectContaining({ code: "MISMATCHED_PARAMS" }),
			);
		});

		it("rejects deposits after the deadline", () => {
			const late = Escrow.restore(escrow.snapshot(), makeContext(params.deadline));
			expect(() => late.onDeposit(MAKER, SRC, 1n, params)).toThrow(
				expect.objectContaining({ code: "CLOSED" }),
			);
		});
	});

	describe("onIncomingAsset", () => {
		it("settles scenario A and returns the unused amount", () => {
			const params = makeParams();
			const escrow = funded(params);
			const result = escrow.onIncomingAsset(TAKER, DST, 2100n, params, {
				takerPrice: TWO,
			});
			expect(result.unused).toBe(100n);
			expect(result.quote.dstRequired).toBe(2000n);

			const view = escrow.viewState();
			expect(view.srcRemaining).toBe(0n);
			expect(view.inFlight).toBe(2);

			const { transfers, events } = escrow.takeOutbox();
			expect(transfers.map((t) => [t.receiver, t.asset, t.amount])).toEqual([
				[MAKER, DST, 2000n],
				[TAKER, SRC, 1000n],
			]);
			expect(events).toEqual([
				expect.objectContaining({
					type: "filled",
					taker: TAKER,
					dstIn: "2100",
					dstUsed: "2000",
					srcOut: "1000",
					makerDstOut: "2000",
					srcRemaining: "0",
					integratorFees: {},
				}),
			]);
		});

		it("leaves state untouched when rejecting scenario C", () => {
			const params = makeParams({ partialFillsAllowed: false });
			const escrow = funded(params);
			expect(() =>
				escrow.onIncomingAsset(TAKER, DST, 500n, params, { takerPrice: TWO }),
			).toThrow(expect.objectContaining({ code: "PARTIAL_FILLS_NOT_ALLOWED" }));
			expect(escrow.viewState().srcRemaining).toBe(1000n);
			expect(escrow.viewState().inFlight).toBe(0);
			expect(escrow.takeOutbox()).toEqual({ transfers: [], events: [] });
		});

		it("rejects a price below the maker's", () => {
			const params = makeParams();
			const escrow = funded(params);
			expect(() =>
				escrow.onIncomingAsset(TAKER, DST, 1_000_000n, params, {
					takerPrice: Price.ratio(19n, 10n),
				}),
			).toThrow(expect.objectContaining({ code: "PRICE_TOO_LOW" }));
		});

		it("rejects a payment in the source asset", () => {
			const params = makeParams();
			const escrow = funded(params);
			expect(() =>
				escrow.onIncomingAsset(TAKER, SRC, 2000n, params, { takerPrice: TWO }),
			).toThrow(expect.objectContaining({ code: "WRONG_ASSET" }));
		});

		it("rejects fills after close", () => {
			const params = makeParams({ takerWhitelist: [TAKER] });
			const escrow = funded(params);
			escrow.close(TAKER, params);
			expect(() =>
				escrow.onIncomingAsset(TAKER, DST, 2000n, params, { takerPrice: TWO }),
			).toThrow(expect.objectContaining({ code: "CLOSED" }));
		});
	});

	describe("lost and found (scenario D)", () => {
		const params = makeParams({
			protocolFees: { fee: 5000, surplus: 0, collector: COLLECTOR },
		});

		it("recovers a failed maker payout through sweep and cleans up", () => {
			const escrow = funded(params);
			escrow.onIncomingAsset(TAKER, DST, 2000n, params, { takerPrice: TWO });
			const fill = escrow.takeOutbox().transfers;
			expect(fill.map((t) => t.amount)).toEqual([1990n, 1000n, 10n]);

			const [payout, taker, fee] = fill;
			if (!payout || !taker || !fee) throw new Error("expected three legs");
			expect(
				escrow.resolveTransfers([
					outcomeFor(payout, "failure"),
					outcomeFor(taker, "success"),
					outcomeFor(fee, "success"),
				]),
			).toBe(false);
			expect(escrow.viewState().dstLost).toBe(1990n);
			expect(escrow.takeOutbox().events).toEqual([
				{ type: "maker_lost", escrowId: escrow.id, dst: "1990" },
			]);

			expect(escrow.close(MAKER, params)).toBe(false);
			const closing = escrow.takeOutbox();
			expect(closing.events).toEqual([
				{ type: "closed", escrowId: escrow.id, reason: "by_maker" },
				{ type: "maker_refunded", escrowId: escrow.id, dst: "1990" },
			]);
			expect(closing.transfers).toHaveLength(1);

			expect(escrow.sweep(params)).toBe(false);
			expect(escrow.takeOutbox()).toEqual({ transfers: [], events: [] });

			const [retry] = closing.transfers;
			if (!retry) throw new Error("expected a retry leg");
			expect(retry).toEqual(
				expect.objectContaining({ receiver: MAKER, asset: DST, amount: 1990n }),
			);
			expect(escrow.resolveTransfers([outcomeFor(retry, "success")])).toBe(true);
			expect(escrow.cleanedUp).toBe(true);
			expect(escrow.takeOutbox().events).toEqual([
				{ type: "cleanup", escrowId: escrow.id },
			]);
		});

		it("keeps the instance alive while a retry is in flight", () => {
			const escrow = funded(params);
			escrow.onIncomingAsset(TAKER, DST, 2000n, params, { takerPrice: TWO });
			const [payout, ...rest] = escrow.takeOutbox().transfers;
			if (!payout) throw new Error("expected a payout leg");
			escrow.resolveTransfers([
				outcomeFor(payout, "unknown"),
				...rest.map((leg) => outcomeFor(leg, "success")),
			]);
			escrow.close(MAKER, params);
			const [retry] = escrow.takeOutbox().transfers;
			if (!retry) throw new Error("expected a retry leg");

			expect(escrow.resolveTransfers([outcomeFor(retry, "failure")])).toBe(false);
			expect(escrow.viewState().dstLost).toBe(1990n);
			expect(escrow.viewState().inFlight).toBe(0);
			expect(escrow.lifecycle).toBe("closed");
		});
	});

	describe("close", () => {
		it("lets the maker close an empty escrow and cleans up at once", () => {
			const params = makeParams();
			const escrow = Escrow.init(params, makeContext());
			escrow.takeOutbox();
			expect(escrow.close(MAKER, params)).toBe(true);
			expect(escrow.takeOutbox().events).toEqual([
				{ type: "closed", escrowId: escrow.id, reason: "by_maker" },
				{ type: "cleanup", escrowId: escrow.id },
			]);
		});

		it("refuses the maker while inventory remains", () => {
			const params = makeParams();
			const escrow = funded(params);
			expect(() => escrow.close(MAKER, params)).toThrow(
				expect.objectContaining({ code: "UNAUTHORIZED" }),
			);
			expect(escrow.viewState().closed).toBe(false);
		});

		it("refuses anyone else before the deadline", () => {
			const params = makeParams({ takerWhitelist: [TAKER, OTHER] });
			const escrow = funded(params);
			expect(() => escrow.close(TAKER, params)).toThrow(
				expect.objectContaining({ code: "UNAUTHORIZED" }),
			);
		});

		it("lets a single whitelisted taker close and refunds the maker", () => {
			const params = makeParams({
				takerWhitelist: [TAKER],
				refundSrcTo: { receiver: "refunds.test" },
			});
			const escrow = funded(params);
			expect(escrow.close(TAKER, params)).toBe(false);
			const { transfers, events } = escrow.takeOutbox();
			expect(events).toEqual([
				{ type: "closed", escrowId: escrow.id, reason: "by_single_taker" },
				{ type: "maker_refunded", escrowId: escrow.id, src: "1000" },
			]);
			expect(transfers).toEqual([
				expect.objectContaining({ receiver: "refunds.test", asset: SRC, amount: 1000n }),
			]);
			expect(escrow.viewState().srcRemaining).toBe(0n);
		});

		it("lets anyone close after the deadline, deadline taking precedence", () => {
			const params = makeParams();
			const escrow = Escrow.restore(
				Escrow.init(params, makeContext()).snapshot(),
				makeContext(params.deadline),
			);
			escrow.close(MAKER, params);
			expect(escrow.takeOutbox().events[0]).toEqual({
				type: "closed",
				escrowId: escrow.id,
				reason: "deadline_expired",
			});
		});

		it("skips authorization once closed", () => {
			const params = makeParams({ takerWhitelist: [TAKER] });
			const escrow = funded(params);
			escrow.close(TAKER, params);
			escrow.takeOutbox();
			expect(() => escrow.close(OTHER, params)).not.toThrow();
			expect(escrow.takeOutbox()).toEqual({ transfers: [], events: [] });
		});

		it("records a failed refund as lost source and retries it", () => {
			const params = makeParams({ takerWhitelist: [TAKER] });
			const escrow = funded(params);
			escrow.close(TAKER, params);
			const [refund] = escrow.takeOutbox().transfers;
			if (!refund) throw new Error("expected a refund leg");

			escrow.resolveTransfers([outcomeFor(refund, "failure")]);
			expect(escrow.viewState().srcLost).toBe(1000n);
			expect(escrow.takeOutbox().events).toEqual([
				{ type: "maker_lost", escrowId: escrow.id, src: "1000" },
			]);

			escrow.sweep(params);
			const [retry] = escrow.takeOutbox().transfers;
			if (!retry) throw new Error("expected a retry leg");
			expect(escrow.resolveTransfers([outcomeFor(retry, "success")])).toBe(true);
		});
	});

	describe("onReceive", () => {
		const params = makeParams();

		it("dispatches fund and fill actions", () => {
			const escrow = Escrow.init(params, makeContext());
			expect(
				escrow.onReceive(MAKER, SRC, 1000n, { params, action: { type: "fund" } }),
			).toEqual({ type: "fund", accepted: 1000n, refund: 0n });

			const fill = escrow.onReceive(TAKER, DST, 2100n, {
				params,
				action: { type: "fill", takerPrice: TWO },
			});
			expect(fill.type).toBe("fill");
			if (fill.type === "fill") expect(fill.unused).toBe(100n);
		});

		it("rejects zero amounts and mismatched assets", () => {
			const escrow = Escrow.init(params, makeContext());
			expect(() =>
				escrow.onReceive(MAKER, SRC, 0n, { params, action: { type: "fund" } }),
			).toThrow(expect.objectContaining({ code: "INSUFFICIENT_AMOUNT" }));
			expect(() =>
				escrow.onReceive(MAKER, DST, 10n, { params, action: { type: "fund" } }),
			).toThrow(expect.objectContaining({ code: "WRONG_ASSET" }));
		});

		it("parses the wire message", () => {
			const message = receiveMessageFromJson({
				params: {
					maker: MAKER,
					srcAsset: SRC,
					dstAsset: DST,
					price: "2",
					deadline: params.deadline,
					partialFillsAllowed: true,
					salt: params.salt,
				},
				action: { type: "fill", takerPrice: "2.5", receiveSrcTo: { receiver: OTHER } },
			});
			expect(message.action).toEqual({
				type: "fill",
				takerPrice: Price.ratio(5n, 2n),
				receiveSrcTo: { receiver: OTHER },
			});
		});
	});

	it("survives a snapshot round trip", () => {
		const params = makeParams();
		const escrow = funded(params);
		escrow.onIncomingAsset(TAKER, DST, 1000n, params, { takerPrice: TWO });
		const restored = Escrow.restore(
			JSON.parse(JSON.stringify(escrow.snapshot())),
			makeContext(),
		);
		expect(restored.viewState()).toEqual(escrow.viewState());
		expect(restored.pendingLegs()).toEqual(escrow.pendingLegs());
	});
});
