/**
 * Lifecycle Controller
 *
 * Open -> Closed -> Cleaned. Decides who may close, re-issues refunds and
 * lost-and-found amounts on sweep, and tears the instance down once every
 * obligation is settled.
 */

import { EscrowErrorCode, EscrowError } from "../core/errors.js";
import { formatAmount } from "../core/amount.js";
import { AccountId, Amount, Deadline } from "../core/types.js";
import { CloseReason, MakerAmounts } from "../events/types.js";
import { Ledger } from "../ledger/ledger.js";
import { EscrowParams } from "../params/types.js";
import { Outbox, TransferOrchestrator } from "../transfers/transfer-orchestrator.js";
import { StateMachine, StateMachineConfig } from "./state-machine.js";

export const LIFECYCLE_STATES = ["open", "closed", "cleaned"] as const;
export type LifecycleState = (typeof LIFECYCLE_STATES)[number];

export type LifecycleAction =
	| "fund"
	| "fill"
	| "close"
	| "sweep"
	| "resolve"
	| "cleanup";

export function isLifecycleState(value: string): value is LifecycleState {
	return LIFECYCLE_STATES.some((state) => state === value);
}

function rejectWith(
	state: LifecycleState,
	action: LifecycleAction,
): EscrowErrorCode {
	if (state === "cleaned") return "CLEANED_UP";
	if (action === "cleanup") return "UNAUTHORIZED";
	return "CLOSED";
}

export const ESCROW_LIFECYCLE: StateMachineConfig<
	LifecycleState,
	LifecycleAction,
	Ledger
> = {
	initialState: "open",
	states: [
		{
			name: "open",
			allowedActions: ["fund", "fill", "close", "sweep", "resolve"],
			isFinal: false,
			description: "Accepting deposits and fills",
		},
		{
			name: "closed",
			allowedActions: ["close", "sweep", "resolve", "cleanup"],
			isFinal: false,
			description: "Settling remaining obligations",
		},
		{
			name: "cleaned",
			allowedActions: [],
			isFinal: true,
			description: "Torn down",
		},
	],
	transitions: [
		{ from: "open", action: "fund", to: "open" },
		{ from: "open", action: "fill", to: "open" },
		{ from: ["open", "closed"], action: "close", to: "closed" },
		{ from: "open", action: "sweep", to: "open" },
		{ from: "closed", action: "sweep", to: "closed" },
		{ from: "open", action: "resolve", to: "open" },
		{ from: "closed", action: "resolve", to: "closed" },
		{
			from: "closed",
			action: "cleanup",
			to: "cleaned",
			guard: (ledger) => ledger.canCleanup(),
		},
	],
	rejectWith,
};

/**
 * Reason `caller` may close an open escrow, checked in precedence order.
 *
 * @throws EscrowError `UNAUTHORIZED` when no rule applies
 */
export function closeReason(
	params: EscrowParams,
	ledger: Ledger,
	caller: AccountId,
	now: Deadline,
): CloseReason {
	if (now >= params.deadline) return "deadline_expired";
	if (caller === params.maker && ledger.srcRemaining === 0n) return "by_maker";
	if (
		params.takerWhitelist.length === 1 &&
		params.takerWhitelist[0] === caller
	) {
		return "by_single_taker";
	}
	throw new EscrowError(
		"UNAUTHORIZED",
		`${caller} may not close this escrow before its deadline`,
	);
}

export interface LifecycleContext {
	escrowId: string;
	ledger: Ledger;
	machine: StateMachine<LifecycleState, LifecycleAction, Ledger>;
	orchestrator: TransferOrchestrator;
	outbox: Outbox;
	now: Deadline;
}

export class LifecycleController {
	constructor(private readonly ctx: LifecycleContext) {}

	/**
	 * Close (skipping authorization when already closed), then sweep.
	 *
	 * @returns whether the instance was torn down
	 */
	close(caller: AccountId, params: EscrowParams): boolean {
		const { ledger, machine, outbox } = this.ctx;
		if (!ledger.closed) {
			const reason = closeReason(params, ledger, caller, this.ctx.now);
			machine.perform("close", ledger);
			ledger.tryClose();
			outbox.events.push({
				type: "closed",
				escrowId: this.ctx.escrowId,
				reason,
			});
		} else {
			machine.perform("close", ledger);
		}
		return this.sweep(params);
	}

	/**
	 * Refund unfilled inventory after close and retry lost amounts not
	 * already being retried.
	 *
	 * @returns whether the instance was torn down
	 */
	sweep(params: EscrowParams): boolean {
		const { ledger, machine, orchestrator } = this.ctx;
		machine.perform("sweep", ledger);

		const sent: MakerAmounts = {};
		let srcSent: Amount = 0n;

		if (ledger.closed && ledger.srcRemaining > 0n) {
			const amount = ledger.srcRemaining;
			ledger.debitSrc(amount);
			orchestrator.issue({
				kind: "maker-refund",
				asset: params.srcAsset,
				amount,
				...refundTarget(params),
				makerSide: "src",
				retry: false,
			});
			srcSent += amount;
		}

		const srcRetry = ledger.srcLost - orchestrator.retrying("src");
		if (srcRetry > 0n) {
			orchestrator.issue({
				kind: "lost-retry",
				asset: params.srcAsset,
				amount: srcRetry,
				...refundTarget(params),
				makerSide: "src",
				retry: true,
			});
			srcSent += srcRetry;
		}

		const dstRetry = ledger.dstLost - orchestrator.retrying("dst");
		if (dstRetry > 0n) {
			orchestrator.issue({
				kind: "lost-retry",
				asset: params.dstAsset,
				amount: dstRetry,
				receiver: params.receiveDstTo?.receiver ?? params.maker,
				memo: params.receiveDstTo?.memo,
				message: params.receiveDstTo?.message,
				minBudget: params.receiveDstTo?.minBudget,
				makerSide: "dst",
				retry: true,
			});
			sent.dst = formatAmount(dstRetry);
		}

		if (srcSent > 0n) sent.src = formatAmount(srcSent);
		if (sent.src !== undefined || sent.dst !== undefined) {
			this.ctx.outbox.events.push({
				type: "maker_refunded",
				escrowId: this.ctx.escrowId,
				...sent,
			});
		}

		return this.tryCleanup();
	}

	/**
	 * @returns whether the instance was torn down
	 */
	tryCleanup(): boolean {
		const { ledger, machine } = this.ctx;
		if (machine.getState() !== "closed" || !ledger.canCleanup()) {
			return false;
		}
		machine.perform("cleanup", ledger);
		this.ctx.outbox.events.push({
			type: "cleanup",
			escrowId: this.ctx.escrowId,
		});
		return true;
	}
}

function refundTarget(params: EscrowParams) {
	const refund = params.refundSrcTo;
	return {
		receiver: refund?.receiver ?? params.maker,
		memo: refund?.memo,
		message: refund?.message,
		minBudget: refund?.minBudget,
	};
}
