/**
 * Settlement terms
 *
 * Immutable once an escrow is initialized. The engine keeps only their
 * fingerprint and every mutating call re-submits the full terms.
 */

import { AccountId, AssetId, Deadline, SendOverride } from "../core/types.js";
import { Pips } from "../core/pips.js";
import { Price, PriceJson } from "../core/price.js";

/**
 * Protocol fee configuration.
 */
export interface ProtocolFees {
	/** Rate applied to the destination amount consumed by a fill */
	fee: Pips;
	/** Rate applied to the price-improvement surplus of a fill */
	surplus: Pips;
	/** Receiver of the protocol fee leg */
	collector: AccountId;
}

export interface EscrowParams {
	/** Sole depositor and default beneficiary */
	maker: AccountId;
	srcAsset: AssetId;
	dstAsset: AssetId;
	/** Minimum destination-per-source rate the maker accepts */
	price: Price;
	deadline: Deadline;
	partialFillsAllowed: boolean;
	/** Where unfilled source inventory is refunded (default: maker) */
	refundSrcTo?: SendOverride;
	/** Where the maker's destination payout goes (default: maker) */
	receiveDstTo?: SendOverride;
	/**
	 * Takers allowed to fill. Empty means permissionless; a single member
	 * may also force-close the escrow.
	 */
	takerWhitelist: AccountId[];
	protocolFees?: ProtocolFees;
	integratorFees: Record<AccountId, Pips>;
	/** 32 bytes of hex entropy used for instance derivation */
	salt: string;
}

/**
 * Wire form of `EscrowParams`: plain JSON, price as a decimal string
 * or explicit parts.
 */
export interface EscrowParamsJson {
	maker: string;
	srcAsset: string;
	dstAsset: string;
	price: string | PriceJson;
	deadline: number | string;
	partialFillsAllowed?: boolean;
	refundSrcTo?: SendOverride;
	receiveDstTo?: SendOverride;
	takerWhitelist?: string[];
	protocolFees?: ProtocolFees;
	integratorFees?: Record<string, Pips>;
	salt: string;
}

export interface ValidationOptions {
	/** Current time, for the deadline check on init */
	now?: number;
	/** Ceiling on the execution budget a single fill may require */
	transferBudgetCeiling?: number;
}
