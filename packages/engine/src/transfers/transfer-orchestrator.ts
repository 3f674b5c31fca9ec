/**
 * Transfer Orchestrator
 *
 * Issues outbound legs and reconciles their outcomes against the ledger.
 * Each leg is Pending until its outcome arrives, then Succeeded, Failed or
 * Ambiguous; outcomes may arrive in any order.
 */

import { checkedAdd, formatAmount, parseAmount } from "../core/amount.js";
import { EscrowError } from "../core/errors.js";
import { Amount, EngineLogger } from "../core/types.js";
import { EscrowEvent, MakerAmounts } from "../events/types.js";
import { AssetSide, Ledger } from "../ledger/ledger.js";
import {
	TransferLeg,
	TransferLegJson,
	TransferLegPlan,
	TransferOutcome,
	TransferRequest,
} from "./types.js";

/**
 * Side effects produced by one entry point, released only after commit.
 */
export interface Outbox {
	transfers: TransferRequest[];
	events: EscrowEvent[];
}

export interface OrchestratorContext {
	escrowId: string;
	ledger: Ledger;
	/** Pending legs keyed by correlation id */
	pending: Map<string, TransferLeg>;
	outbox: Outbox;
	newLegId: () => string;
	now: number;
	logger: EngineLogger;
}

export type LegState = "succeeded" | "failed" | "ambiguous";

export interface Reconciliation {
	leg: TransferLeg;
	state: LegState;
	delivered: Amount;
	undelivered: Amount;
}

export class TransferOrchestrator {
	constructor(private readonly ctx: OrchestratorContext) {}

	issue(plan: TransferLegPlan): TransferLeg {
		const leg: TransferLeg = {
			...plan,
			legId: this.ctx.newLegId(),
			escrowId: this.ctx.escrowId,
			issuedAt: this.ctx.now,
		};
		this.ctx.ledger.beginTransfer();
		this.ctx.pending.set(leg.legId, leg);
		this.ctx.outbox.transfers.push(toRequest(leg));
		return leg;
	}

	issueAll(plans: TransferLegPlan[]): TransferLeg[] {
		return plans.map((plan) => this.issue(plan));
	}

	/**
	 * Lost amount on `side` whose retry is currently in flight.
	 */
	retrying(side: AssetSide): Amount {
		let total = 0n;
		for (const leg of this.ctx.pending.values()) {
			if (leg.retry && leg.makerSide === side) {
				total = checkedAdd(total, leg.amount, "retrying");
			}
		}
		return total;
	}

	onOutcome(outcome: TransferOutcome): Reconciliation {
		const leg = this.ctx.pending.get(outcome.legId);
		if (!leg) {
			throw new EscrowError(
				"UNKNOWN_TRANSFER",
				`no pending transfer ${outcome.legId}`,
			);
		}
		if (outcome.asset !== leg.asset || outcome.amount !== leg.amount) {
			throw new EscrowError(
				"TRANSFER_MISMATCH",
				`outcome for ${leg.legId} does not match the issued transfer`,
				{
					expected: { asset: leg.asset, amount: formatAmount(leg.amount) },
					actual: { asset: outcome.asset, amount: formatAmount(outcome.amount) },
				},
			);
		}

		const undelivered =
			outcome.result === "success" ? (outcome.refunded ?? 0n) : leg.amount;
		if (undelivered < 0n || undelivered > leg.amount) {
			throw new EscrowError(
				"TRANSFER_MISMATCH",
				`refunded amount ${undelivered} exceeds transfer ${leg.amount}`,
			);
		}
		const delivered = leg.amount - undelivered;

		this.ctx.pending.delete(leg.legId);
		this.ctx.ledger.endTransfer();

		if (leg.makerSide) {
			this.reconcileMakerLeg(leg, leg.makerSide, delivered, undelivered);
		} else if (undelivered > 0n) {
			this.ctx.logger.warn(
				`${leg.kind} ${leg.legId} of ${this.ctx.escrowId} undelivered: ${undelivered} ${leg.asset} to ${leg.receiver}`,
			);
		}

		return { leg, state: legState(outcome), delivered, undelivered };
	}

	private reconcileMakerLeg(
		leg: TransferLeg,
		side: AssetSide,
		delivered: Amount,
		undelivered: Amount,
	): void {
		// a retried amount is already recorded as lost
		if (leg.retry) {
			this.ctx.ledger.clearLost(side, delivered);
		} else if (undelivered > 0n) {
			this.ctx.ledger.markLost(side, undelivered);
		}
		if (undelivered > 0n) {
			this.ctx.outbox.events.push({
				type: "maker_lost",
				escrowId: this.ctx.escrowId,
				...makerAmounts(side, undelivered),
			});
		}
	}
}

export function makerAmounts(side: AssetSide, amount: Amount): MakerAmounts {
	return side === "src"
		? { src: formatAmount(amount) }
		: { dst: formatAmount(amount) };
}

function legState(outcome: TransferOutcome): LegState {
	switch (outcome.result) {
		case "success":
			return "succeeded";
		case "failure":
			return "failed";
		case "unknown":
			return "ambiguous";
	}
}

export function toRequest(leg: TransferLeg): TransferRequest {
	return {
		legId: leg.legId,
		escrowId: leg.escrowId,
		asset: leg.asset,
		amount: leg.amount,
		receiver: leg.receiver,
		memo: leg.memo,
		message: leg.message,
		minBudget: leg.minBudget,
	};
}

export function legToJson(leg: TransferLeg): TransferLegJson {
	return { ...leg, amount: formatAmount(leg.amount) };
}

export function legFromJson(json: TransferLegJson): TransferLeg {
	return { ...json, amount: parseAmount(json.amount, "leg amount") };
}
