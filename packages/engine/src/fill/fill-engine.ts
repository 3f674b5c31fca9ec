/**
 * Fill Engine
 *
 * Price and fee arithmetic for a taker fill. Rounding always favors the
 * maker: source out is floored, destination required is ceiled and fees
 * are floored.
 */

import { checkedAdd, checkedSub, minAmount } from "../core/amount.js";
import { EscrowError } from "../core/errors.js";
import { pipsFee } from "../core/pips.js";
import { Price } from "../core/price.js";
import { AccountId, Amount, Deadline } from "../core/types.js";
import { EscrowParams } from "../params/types.js";
import { TransferLegPlan } from "../transfers/types.js";
import { FillQuote, FillRequest } from "./types.js";

export const FEE_MEMO = "fee";

/**
 * Admission checks for a fill: open, within both deadlines and by an
 * allowed taker.
 */
export function assertCanFill(
	params: EscrowParams,
	closed: boolean,
	taker: AccountId,
	request: FillRequest,
	now: Deadline,
): void {
	if (closed || now >= params.deadline) {
		throw new EscrowError("CLOSED", "escrow no longer accepts fills");
	}
	if (request.deadline !== undefined && now >= request.deadline) {
		throw new EscrowError("DEADLINE_EXPIRED", "fill request has expired");
	}
	if (
		params.takerWhitelist.length > 0 &&
		!params.takerWhitelist.includes(taker)
	) {
		throw new EscrowError(
			"UNAUTHORIZED",
			`${taker} is not whitelisted to fill this escrow`,
		);
	}
}

/**
 * Compute how much of the remaining inventory a taker delivery of `dstIn`
 * at `takerPrice` buys, and how the destination amount is split.
 *
 * Pure: the caller debits the ledger and issues legs.
 */
export function computeFill(
	params: EscrowParams,
	srcRemaining: Amount,
	dstIn: Amount,
	takerPrice: Price,
): FillQuote {
	if (takerPrice.lessThan(params.price)) {
		throw new EscrowError(
			"PRICE_TOO_LOW",
			`taker price ${takerPrice} is below ${params.price}`,
		);
	}

	const srcFillable = minAmount(srcRemaining, takerPrice.srcFloor(dstIn));
	if (srcFillable === 0n) {
		throw new EscrowError(
			"INSUFFICIENT_AMOUNT",
			`${dstIn} buys no source at ${takerPrice}`,
		);
	}
	if (!params.partialFillsAllowed && srcFillable < srcRemaining) {
		throw new EscrowError(
			"PARTIAL_FILLS_NOT_ALLOWED",
			`fill of ${srcFillable} would leave ${srcRemaining - srcFillable} unfilled`,
		);
	}

	const dstRequired = takerPrice.dstCeil(srcFillable);
	const dstUnused = checkedSub(dstIn, dstRequired, "dstUnused");
	const dstWanted = params.price.dstCeil(srcFillable);
	const surplus = dstRequired > dstWanted ? dstRequired - dstWanted : 0n;

	const protocolFee = params.protocolFees
		? checkedAdd(
				pipsFee(dstRequired, params.protocolFees.fee),
				pipsFee(surplus, params.protocolFees.surplus),
				"protocolFee",
			)
		: 0n;

	const feeEntries: Array<[AccountId, Amount]> = Object.entries(
		params.integratorFees,
	)
		.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
		.map(([integrator, rate]): [AccountId, Amount] => [
			integrator,
			pipsFee(dstRequired, rate),
		]);
	let fees = protocolFee;
	for (const [, fee] of feeEntries) {
		fees = checkedAdd(fees, fee, "fees");
	}
	const integratorFees: Record<AccountId, Amount> =
		Object.fromEntries(feeEntries);
	if (fees > dstRequired) {
		throw new EscrowError(
			"EXCESSIVE_FEES",
			`fees ${fees} exceed the ${dstRequired} consumed`,
		);
	}

	const makerPayout = dstRequired - fees;
	if (makerPayout === 0n) {
		throw new EscrowError(
			"INSUFFICIENT_AMOUNT",
			"fees consume the whole maker payout",
		);
	}

	return {
		srcFillable,
		dstIn,
		dstRequired,
		dstUnused,
		dstWanted,
		surplus,
		protocolFee,
		integratorFees,
		makerPayout,
	};
}

/**
 * Outbound legs of a fill, zero amounts skipped. Only the maker payout is
 * tracked for lost-and-found.
 */
export function planFillLegs(
	params: EscrowParams,
	quote: FillQuote,
	taker: AccountId,
	request: FillRequest,
): TransferLegPlan[] {
	const legs: TransferLegPlan[] = [
		{
			kind: "maker-payout",
			asset: params.dstAsset,
			amount: quote.makerPayout,
			receiver: params.receiveDstTo?.receiver ?? params.maker,
			memo: params.receiveDstTo?.memo,
			message: params.receiveDstTo?.message,
			minBudget: params.receiveDstTo?.minBudget,
			makerSide: "dst",
			retry: false,
		},
		{
			kind: "taker-payout",
			asset: params.srcAsset,
			amount: quote.srcFillable,
			receiver: request.receiveSrcTo?.receiver ?? taker,
			memo: request.receiveSrcTo?.memo,
			message: request.receiveSrcTo?.message,
			minBudget: request.receiveSrcTo?.minBudget,
			retry: false,
		},
	];

	if (params.protocolFees) {
		legs.push({
			kind: "protocol-fee",
			asset: params.dstAsset,
			amount: quote.protocolFee,
			receiver: params.protocolFees.collector,
			memo: FEE_MEMO,
			retry: false,
		});
	}
	for (const [integrator, amount] of Object.entries(quote.integratorFees)) {
		legs.push({
			kind: "integrator-fee",
			asset: params.dstAsset,
			amount,
			receiver: integrator,
			memo: FEE_MEMO,
			retry: false,
		});
	}

	return legs.filter((leg) => leg.amount > 0n);
}
