import { Amount, AccountId, AssetId, EngineLogger } from "../core/types.js";
import { FillQuote, FillRequest, FillRequestJson } from "../fill/types.js";
import { LifecycleState } from "../lifecycle/lifecycle-controller.js";
import { LedgerStateJson } from "../ledger/ledger.js";
import { EscrowParams, EscrowParamsJson } from "../params/types.js";
import { TransferLegJson } from "../transfers/types.js";

/**
 * Per-invocation environment of an escrow entry point.
 */
export interface EscrowContext {
	now: number;
	newLegId: () => string;
	logger: EngineLogger;
	transferBudgetCeiling?: number;
}

/**
 * Persisted form of an escrow instance. Plain JSON.
 */
export interface EscrowSnapshot {
	id: string;
	lifecycle: LifecycleState;
	ledger: LedgerStateJson;
	pending: TransferLegJson[];
	maker: AccountId;
	srcAsset: AssetId;
	dstAsset: AssetId;
	deadline: number;
	createdAt: number;
	updatedAt: number;
}

/**
 * Read-only view returned by `viewState`.
 */
export interface EscrowView {
	escrowId: string;
	fingerprint: string;
	lifecycle: LifecycleState;
	maker: AccountId;
	srcAsset: AssetId;
	dstAsset: AssetId;
	deadline: number;
	srcRemaining: Amount;
	dstLost: Amount;
	srcLost: Amount;
	closed: boolean;
	inFlight: number;
}

export interface DepositResult {
	accepted: Amount;
	/** Returned to the sender by the host */
	refund: Amount;
}

export interface FillResult {
	/** Destination amount the host returns to the taker */
	unused: Amount;
	quote: FillQuote;
}

export type ReceiveAction = { type: "fund" } | ({ type: "fill" } & FillRequest);

/**
 * Instructions attached to an incoming transfer.
 */
export interface ReceiveMessage {
	params: EscrowParams;
	action: ReceiveAction;
}

export type ReceiveActionJson =
	| { type: "fund" }
	| ({ type: "fill" } & FillRequestJson);

export interface ReceiveMessageJson {
	params: EscrowParamsJson;
	action: ReceiveActionJson;
}

export type ReceiveResult =
	| ({ type: "fund" } & DepositResult)
	| ({ type: "fill" } & FillResult);
