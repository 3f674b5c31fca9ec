/**
 * Escrow aggregate
 *
 * One escrow instance from init to cleanup. Every entry point mutates this
 * object only; effects (transfers to issue, events to publish) collect in
 * the outbox and are released by the caller after the new state has been
 * persisted. A thrown `EscrowError` means the caller must discard the
 * object, so no partial mutation ever escapes.
 */

import { formatAmount } from "../core/amount.js";
import { EscrowError } from "../core/errors.js";
import { AccountId, Amount, AssetId } from "../core/types.js";
import { FilledEvent } from "../events/types.js";
import { assertCanFill, computeFill, planFillLegs } from "../fill/fill-engine.js";
import { fillRequestFromJson } from "../fill/fill-request-codec.js";
import { FillQuote, FillRequest } from "../fill/types.js";
import { Ledger } from "../ledger/ledger.js";
import {
	ESCROW_LIFECYCLE,
	LifecycleAction,
	LifecycleController,
	LifecycleState,
} from "../lifecycle/lifecycle-controller.js";
import { StateMachine } from "../lifecycle/state-machine.js";
import { paramsFromJson } from "../params/params-codec.js";
import {
	deriveEscrowId,
	fingerprint,
	verifyFingerprint,
} from "../params/fingerprint.js";
import {
	validateParams,
	validateSendOverride,
} from "../params/params-validator.js";
import { EscrowParams } from "../params/types.js";
import {
	Outbox,
	TransferOrchestrator,
	legFromJson,
	legToJson,
} from "../transfers/transfer-orchestrator.js";
import { TransferLeg, TransferOutcome } from "../transfers/types.js";
import {
	DepositResult,
	EscrowContext,
	EscrowSnapshot,
	EscrowView,
	FillResult,
	ReceiveMessage,
	ReceiveMessageJson,
	ReceiveResult,
} from "./types.js";

interface EscrowTerms {
	maker: AccountId;
	srcAsset: AssetId;
	dstAsset: AssetId;
	deadline: number;
}

export class Escrow {
	private outbox: Outbox = { transfers: [], events: [] };

	private constructor(
		readonly id: string,
		private readonly terms: EscrowTerms,
		private readonly ledger: Ledger,
		private readonly machine: StateMachine<LifecycleState, LifecycleAction, Ledger>,
		private readonly pending: Map<string, TransferLeg>,
		private readonly createdAt: number,
		private updatedAt: number,
		private readonly ctx: EscrowContext,
	) {}

	/**
	 * Create a new instance from validated params.
	 */
	static init(params: EscrowParams, ctx: EscrowContext): Escrow {
		validateParams(params, {
			now: ctx.now,
			transferBudgetCeiling: ctx.transferBudgetCeiling,
		});
		const paramsFingerprint = fingerprint(params);
		const escrow = new Escrow(
			deriveEscrowId(paramsFingerprint),
			{
				maker: params.maker,
				srcAsset: params.srcAsset,
				dstAsset: params.dstAsset,
				deadline: params.deadline,
			},
			Ledger.create(paramsFingerprint),
			new StateMachine(ESCROW_LIFECYCLE),
			new Map(),
			ctx.now,
			ctx.now,
			ctx,
		);
		escrow.outbox.events.push({
			type: "created",
			escrowId: escrow.id,
			fingerprint: paramsFingerprint,
			maker: params.maker,
			srcAsset: params.srcAsset,
			dstAsset: params.dstAsset,
			price: params.price.toJSON(),
			deadline: params.deadline,
		});
		return escrow;
	}

	static restore(snapshot: EscrowSnapshot, ctx: EscrowContext): Escrow {
		const pending = new Map<string, TransferLeg>();
		for (const leg of snapshot.pending) {
			pending.set(leg.legId, legFromJson(leg));
		}
		return new Escrow(
			snapshot.id,
			{
				maker: snapshot.maker,
				srcAsset: snapshot.srcAsset,
				dstAsset: snapshot.dstAsset,
				deadline: snapshot.deadline,
			},
			Ledger.fromJson(snapshot.ledger),
			new StateMachine(ESCROW_LIFECYCLE, snapshot.lifecycle),
			pending,
			snapshot.createdAt,
			snapshot.updatedAt,
			ctx,
		);
	}

	get lifecycle(): LifecycleState {
		return this.machine.getState();
	}

	get cleanedUp(): boolean {
		return this.machine.isFinal();
	}

	/**
	 * Accept a maker deposit of the source asset.
	 */
	onDeposit(
		sender: AccountId,
		asset: AssetId,
		amount: Amount,
		params: EscrowParams,
	): DepositResult {
		this.verify(params);
		if (asset !== params.srcAsset) {
			throw new EscrowError(
				"WRONG_ASSET",
				`deposits must be ${params.srcAsset}, got ${asset}`,
			);
		}
		if (sender !== params.maker) {
			throw new EscrowError("WRONG_SENDER", "only the maker may deposit");
		}
		if (amount === 0n) {
			throw new EscrowError("INSUFFICIENT_AMOUNT", "deposit amount is zero");
		}
		if (this.ledger.closed || this.ctx.now >= params.deadline) {
			throw new EscrowError("CLOSED", "escrow no longer accepts deposits");
		}

		this.machine.perform("fund", this.ledger);
		this.ledger.creditSrc(amount);
		this.touch();
		this.outbox.events.push({
			type: "funded",
			escrowId: this.id,
			maker: params.maker,
			srcAdded: formatAmount(amount),
			srcRemaining: formatAmount(this.ledger.srcRemaining),
		});
		return { accepted: amount, refund: 0n };
	}

	/**
	 * Fill against an incoming transfer of the destination asset.
	 */
	onIncomingAsset(
		sender: AccountId,
		asset: AssetId,
		amount: Amount,
		params: EscrowParams,
		request: FillRequest,
	): FillResult {
		this.verify(params);
		if (asset !== params.dstAsset) {
			throw new EscrowError(
				"WRONG_ASSET",
				`fills must pay ${params.dstAsset}, got ${asset}`,
			);
		}
		if (amount === 0n) {
			throw new EscrowError("INSUFFICIENT_AMOUNT", "fill amount is zero");
		}
		validateSendOverride(
			request.receiveSrcTo,
			"receiveSrcTo",
			this.ctx.transferBudgetCeiling,
		);
		assertCanFill(
			params,
			this.machine.getState() !== "open",
			sender,
			request,
			this.ctx.now,
		);

		this.machine.perform("fill", this.ledger);
		const quote = computeFill(
			params,
			this.ledger.srcRemaining,
			amount,
			request.takerPrice,
		);
		this.ledger.debitSrc(quote.srcFillable);
		this.orchestrator().issueAll(planFillLegs(params, quote, sender, request));
		this.touch();
		this.outbox.events.push(
			this.filledEvent(params, sender, request, quote),
		);
		return { unused: quote.dstUnused, quote };
	}

	/**
	 * Dispatch an incoming transfer by the action in its message.
	 */
	onReceive(
		sender: AccountId,
		asset: AssetId,
		amount: Amount,
		message: ReceiveMessage,
	): ReceiveResult {
		if (amount === 0n) {
			throw new EscrowError("INSUFFICIENT_AMOUNT", "transfer amount is zero");
		}
		const { action, params } = message;
		switch (action.type) {
			case "fund":
				return {
					type: "fund",
					...this.onDeposit(sender, asset, amount, params),
				};
			case "fill": {
				const request: FillRequest = {
					takerPrice: action.takerPrice,
					deadline: action.deadline,
					receiveSrcTo: action.receiveSrcTo,
				};
				return {
					type: "fill",
					...this.onIncomingAsset(sender, asset, amount, params, request),
				};
			}
		}
	}

	viewState(params?: EscrowParams): EscrowView {
		if (params) this.verify(params);
		return {
			escrowId: this.id,
			fingerprint: this.ledger.paramsFingerprint,
			lifecycle: this.machine.getState(),
			...this.terms,
			srcRemaining: this.ledger.srcRemaining,
			dstLost: this.ledger.dstLost,
			srcLost: this.ledger.srcLost,
			closed: this.ledger.closed,
			inFlight: this.ledger.inFlight,
		};
	}

	/**
	 * @returns whether the instance was torn down
	 */
	close(caller: AccountId, params: EscrowParams): boolean {
		this.verify(params);
		const cleaned = this.controller().close(caller, params);
		this.touch();
		return cleaned;
	}

	/**
	 * @returns whether the instance was torn down
	 */
	sweep(params: EscrowParams): boolean {
		this.verify(params);
		const cleaned = this.controller().sweep(params);
		this.touch();
		return cleaned;
	}

	/**
	 * Reconcile outcomes of previously issued legs. Reached only through the
	 * host's transfer gateway callback.
	 *
	 * @returns whether the instance was torn down
	 */
	resolveTransfers(outcomes: TransferOutcome[]): boolean {
		this.machine.perform("resolve", this.ledger);
		const orchestrator = this.orchestrator();
		for (const outcome of outcomes) {
			orchestrator.onOutcome(outcome);
		}
		this.touch();
		return this.controller().tryCleanup();
	}

	pendingLegs(): TransferLeg[] {
		return Array.from(this.pending.values());
	}

	snapshot(): EscrowSnapshot {
		return {
			id: this.id,
			lifecycle: this.machine.getState(),
			ledger: this.ledger.toJSON(),
			pending: this.pendingLegs().map(legToJson),
			...this.terms,
			createdAt: this.createdAt,
			updatedAt: this.updatedAt,
		};
	}

	/**
	 * Hand over collected effects and start a fresh outbox.
	 */
	takeOutbox(): Outbox {
		const outbox = this.outbox;
		this.outbox = { transfers: [], events: [] };
		return outbox;
	}

	private verify(params: EscrowParams): void {
		verifyFingerprint(params, this.ledger.paramsFingerprint);
	}

	private touch(): void {
		this.updatedAt = this.ctx.now;
	}

	private orchestrator(): TransferOrchestrator {
		return new TransferOrchestrator({
			escrowId: this.id,
			ledger: this.ledger,
			pending: this.pending,
			outbox: this.outbox,
			newLegId: this.ctx.newLegId,
			now: this.ctx.now,
			logger: this.ctx.logger,
		});
	}

	private controller(): LifecycleController {
		return new LifecycleController({
			escrowId: this.id,
			ledger: this.ledger,
			machine: this.machine,
			orchestrator: this.orchestrator(),
			outbox: this.outbox,
			now: this.ctx.now,
		});
	}

	private filledEvent(
		params: EscrowParams,
		taker: AccountId,
		request: FillRequest,
		quote: FillQuote,
	): FilledEvent {
		const integratorFees: Record<AccountId, string> = Object.fromEntries(
			Object.entries(quote.integratorFees).map(([integrator, fee]): [AccountId, string] => [
				integrator,
				formatAmount(fee),
			]),
		);
		return {
			type: "filled",
			escrowId: this.id,
			taker,
			maker: params.maker,
			srcAsset: params.srcAsset,
			dstAsset: params.dstAsset,
			takerPrice: request.takerPrice.toJSON(),
			makerPrice: params.price.toJSON(),
			dstIn: formatAmount(quote.dstIn),
			dstUsed: formatAmount(quote.dstRequired),
			srcOut: formatAmount(quote.srcFillable),
			makerDstOut: formatAmount(quote.makerPayout),
			srcRemaining: formatAmount(this.ledger.srcRemaining),
			protocolFee: params.protocolFees
				? {
						amount: formatAmount(quote.protocolFee),
						collector: params.protocolFees.collector,
					}
				: undefined,
			integratorFees,
			makerReceiveDstTo: params.receiveDstTo?.receiver,
			takerReceiveSrcTo: request.receiveSrcTo?.receiver,
		};
	}
}

export function receiveMessageFromJson(json: ReceiveMessageJson): ReceiveMessage {
	const params = paramsFromJson(json.params);
	if (json.action.type === "fund") {
		return { params, action: { type: "fund" } };
	}
	return {
		params,
		action: { type: "fill", ...fillRequestFromJson(json.action) },
	};
}
