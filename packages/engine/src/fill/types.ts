import { Price, PriceJson } from "../core/price.js";
import { AccountId, Amount, Deadline, SendOverride } from "../core/types.js";

/**
 * Taker instructions that travel with an incoming destination transfer.
 */
export interface FillRequest {
	/** Price the taker is willing to pay, never below the maker's */
	takerPrice: Price;
	/** Optional taker-side expiry of this request */
	deadline?: Deadline;
	/** Where the taker's source payout goes (default: sender) */
	receiveSrcTo?: SendOverride;
}

export interface FillRequestJson {
	takerPrice: string | PriceJson;
	deadline?: number | string;
	receiveSrcTo?: SendOverride;
}

/**
 * Amounts of a single fill. `makerPayout + protocolFee + sum(integratorFees)`
 * always equals `dstRequired`.
 */
export interface FillQuote {
	srcFillable: Amount;
	dstIn: Amount;
	dstRequired: Amount;
	dstUnused: Amount;
	dstWanted: Amount;
	surplus: Amount;
	protocolFee: Amount;
	integratorFees: Record<AccountId, Amount>;
	makerPayout: Amount;
}
