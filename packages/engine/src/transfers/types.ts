/**
 * Transfer Types
 *
 * Outbound transfers ("legs") issued by an escrow and the outcomes the
 * asset ledgers report back for them.
 */

import { AccountId, Amount, AssetId } from "../core/types.js";
import { AssetSide } from "../ledger/ledger.js";

export type LegKind =
	| "maker-payout"
	| "taker-payout"
	| "protocol-fee"
	| "integrator-fee"
	| "maker-refund"
	| "lost-retry";

/**
 * A leg the escrow wants sent, before it gets a correlation id.
 */
export interface TransferLegPlan {
	kind: LegKind;
	asset: AssetId;
	amount: Amount;
	receiver: AccountId;
	memo?: string;
	message?: string;
	minBudget?: number;
	/**
	 * Set for maker-side legs. Their failures feed the lost-and-found
	 * ledger on this side; other legs are lost for good when they fail.
	 */
	makerSide?: AssetSide;
	/** Re-issue of an amount already recorded as lost */
	retry: boolean;
}

/**
 * A leg that has been issued and is waiting for its outcome.
 */
export interface TransferLeg extends TransferLegPlan {
	legId: string;
	escrowId: string;
	issuedAt: number;
}

export interface TransferLegJson {
	legId: string;
	escrowId: string;
	kind: LegKind;
	asset: AssetId;
	amount: string;
	receiver: AccountId;
	memo?: string;
	message?: string;
	minBudget?: number;
	makerSide?: AssetSide;
	retry: boolean;
	issuedAt: number;
}

/**
 * What the runtime hands to the transfer gateway.
 */
export interface TransferRequest {
	legId: string;
	escrowId: string;
	asset: AssetId;
	amount: Amount;
	receiver: AccountId;
	memo?: string;
	message?: string;
	minBudget?: number;
}

export type TransferResult = "success" | "failure" | "unknown";

export interface TransferOutcome {
	legId: string;
	asset: AssetId;
	amount: Amount;
	result: TransferResult;
	/**
	 * Part of a successful message-carrying transfer that the receiver
	 * handed back.
	 */
	refunded?: Amount;
}

/**
 * Asset-transfer capability consumed by the engine.
 *
 * The returned promise settles once the asset ledger has decided the
 * transfer; it may settle in any order relative to other legs.
 */
export interface TransferGateway {
	requestTransfer(request: TransferRequest): Promise<TransferOutcome>;
}
