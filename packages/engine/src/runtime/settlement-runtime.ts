/**
 * Settlement Runtime
 *
 * In-process host for escrow instances. Every entry point and every
 * transfer outcome for the same escrow runs under one lock, against a
 * fresh copy loaded from the store. A call commits in three steps: persist
 * the new state (or delete it on cleanup), dispatch outbound transfers,
 * publish events. A rejected call commits nothing.
 *
 * An outcome that cannot be reconciled because the store failed is retried
 * with exponential backoff. Once the attempts run out it is held and
 * applied before the next call on that escrow.
 */

import { nanoid } from "nanoid";
import { EscrowError, isEscrowError, toError } from "../core/errors.js";
import {
	AccountId,
	Amount,
	AssetId,
	Clock,
	EngineLogger,
	silentLogger,
	systemClock,
} from "../core/types.js";
import { Escrow } from "../escrow/escrow.js";
import {
	DepositResult,
	EscrowContext,
	EscrowView,
	FillResult,
	ReceiveMessage,
	ReceiveResult,
} from "../escrow/types.js";
import { EventSink } from "../events/types.js";
import { FillRequest } from "../fill/types.js";
import { EscrowParams } from "../params/types.js";
import { EscrowQuery, EscrowStore } from "../storage/types.js";
import {
	TransferGateway,
	TransferOutcome,
	TransferRequest,
} from "../transfers/types.js";
import { KeyedLock } from "./keyed-lock.js";

export interface SettlementRuntimeOptions {
	store: EscrowStore;
	gateway: TransferGateway;
	events: EventSink;
	clock?: Clock;
	logger?: EngineLogger;
	transferBudgetCeiling?: number;
	newLegId?: () => string;
	/** Reconcile attempts per outcome before it is held. Defaults to 5. */
	reconcileAttempts?: number;
	/** First retry delay, doubled per attempt. Defaults to 100ms. */
	reconcileBackoffMs?: number;
}

function delay(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface InitResult {
	escrowId: string;
	fingerprint: string;
	state: EscrowView;
}

export class SettlementRuntime {
	private readonly lock = new KeyedLock();
	private readonly settling = new Set<Promise<void>>();
	private readonly held = new Map<string, TransferOutcome[]>();
	private readonly clock: Clock;
	private readonly logger: EngineLogger;
	private readonly newLegId: () => string;

	constructor(private readonly options: SettlementRuntimeOptions) {
		this.clock = options.clock ?? systemClock;
		this.logger = options.logger ?? silentLogger;
		this.newLegId = options.newLegId ?? (() => `leg_${nanoid(16)}`);
	}

	async init(params: EscrowParams): Promise<InitResult> {
		const escrow = Escrow.init(params, this.context());
		return this.lock.run(escrow.id, async () => {
			const { store } = this.options;
			if ((await store.load(escrow.id)) || (await store.isCleanedUp(escrow.id))) {
				throw new EscrowError(
					"ALREADY_INITIALIZED",
					`escrow ${escrow.id} already exists`,
				);
			}
			const state = escrow.viewState();
			await this.commit(escrow);
			this.logger.log(`Escrow ${escrow.id} initialized by ${params.maker}`);
			return { escrowId: escrow.id, fingerprint: state.fingerprint, state };
		});
	}

	onDeposit(
		escrowId: string,
		sender: AccountId,
		asset: AssetId,
		amount: Amount,
		params: EscrowParams,
	): Promise<DepositResult> {
		return this.execute(escrowId, (escrow) =>
			escrow.onDeposit(sender, asset, amount, params),
		);
	}

	onIncomingAsset(
		escrowId: string,
		sender: AccountId,
		asset: AssetId,
		amount: Amount,
		params: EscrowParams,
		request: FillRequest,
	): Promise<FillResult> {
		return this.execute(escrowId, (escrow) =>
			escrow.onIncomingAsset(sender, asset, amount, params, request),
		);
	}

	onReceive(
		escrowId: string,
		sender: AccountId,
		asset: AssetId,
		amount: Amount,
		message: ReceiveMessage,
	): Promise<ReceiveResult> {
		return this.execute(escrowId, (escrow) =>
			escrow.onReceive(sender, asset, amount, message),
		);
	}

	viewState(escrowId: string, params?: EscrowParams): Promise<EscrowView> {
		return this.lock.run(escrowId, async () => {
			await this.applyHeld(escrowId);
			return (await this.load(escrowId)).viewState(params);
		});
	}

	close(
		escrowId: string,
		caller: AccountId,
		params: EscrowParams,
	): Promise<boolean> {
		return this.execute(escrowId, (escrow) => escrow.close(caller, params));
	}

	sweep(escrowId: string, params: EscrowParams): Promise<boolean> {
		return this.execute(escrowId, (escrow) => escrow.sweep(params));
	}

	/**
	 * Outcome callback. The runtime calls this for every transfer it
	 * dispatched; hosts with their own delivery path may call it directly.
	 */
	resolveTransfers(
		escrowId: string,
		outcomes: TransferOutcome[],
	): Promise<boolean> {
		return this.execute(escrowId, (escrow) =>
			escrow.resolveTransfers(outcomes),
		);
	}

	async list(query?: EscrowQuery): Promise<EscrowView[]> {
		const snapshots = await this.options.store.list(query);
		const ctx = this.context();
		return snapshots.map((snapshot) => Escrow.restore(snapshot, ctx).viewState());
	}

	/**
	 * Wait until every dispatched transfer has been reconciled, including
	 * transfers issued while waiting.
	 */
	async drain(): Promise<void> {
		while (this.settling.size > 0) {
			await Promise.all(Array.from(this.settling));
		}
	}

	get pendingOutcomes(): number {
		return this.settling.size;
	}

	/** Outcomes waiting for the next call on their escrow. */
	get heldOutcomes(): number {
		let count = 0;
		for (const outcomes of this.held.values()) count += outcomes.length;
		return count;
	}

	private async execute<T>(
		escrowId: string,
		fn: (escrow: Escrow) => T,
	): Promise<T> {
		return this.lock.run(escrowId, async () => {
			await this.applyHeld(escrowId);
			const escrow = await this.load(escrowId);
			const result = fn(escrow);
			await this.commit(escrow);
			return result;
		});
	}

	private async load(escrowId: string): Promise<Escrow> {
		const snapshot = await this.options.store.load(escrowId);
		if (!snapshot) {
			if (await this.options.store.isCleanedUp(escrowId)) {
				throw new EscrowError(
					"CLEANED_UP",
					`escrow ${escrowId} has been cleaned up`,
				);
			}
			throw new EscrowError("NOT_FOUND", `escrow ${escrowId} not found`);
		}
		return Escrow.restore(snapshot, this.context());
	}

	private async commit(escrow: Escrow): Promise<void> {
		const outbox = escrow.takeOutbox();
		if (escrow.cleanedUp) {
			await this.options.store.delete(escrow.id, this.clock());
			this.logger.log(`Escrow ${escrow.id} cleaned up`);
		} else {
			await this.options.store.save(escrow.snapshot());
		}
		for (const request of outbox.transfers) {
			this.dispatch(request);
		}
		for (const event of outbox.events) {
			try {
				await this.options.events.publish(event);
			} catch (err) {
				const error = toError(err);
				this.logger.error(
					`Failed to publish ${event.type} for ${event.escrowId}: ${error.message}`,
					error.stack,
				);
			}
		}
	}

	private dispatch(request: TransferRequest): void {
		const settled: Promise<void> = Promise.resolve()
			.then(() => this.options.gateway.requestTransfer(request))
			.catch((err): TransferOutcome => {
				const error = toError(err);
				this.logger.warn(
					`Transfer ${request.legId} of ${request.escrowId} has no outcome: ${error.message}`,
				);
				return {
					legId: request.legId,
					asset: request.asset,
					amount: request.amount,
					result: "unknown",
				};
			})
			.then((outcome) => this.reconcile(request.escrowId, outcome))
			.finally(() => {
				this.settling.delete(settled);
			});
		this.settling.add(settled);
	}

	private async reconcile(
		escrowId: string,
		outcome: TransferOutcome,
	): Promise<void> {
		const attempts = this.options.reconcileAttempts ?? 5;
		const backoffMs = this.options.reconcileBackoffMs ?? 100;
		for (let attempt = 1; ; attempt++) {
			try {
				await this.resolveTransfers(escrowId, [outcome]);
				return;
			} catch (err) {
				const error = toError(err);
				if (isEscrowError(err)) {
					this.logger.error(
						`Dropped outcome of transfer ${outcome.legId} of ${escrowId}: ${error.message}`,
						error.stack,
					);
					return;
				}
				if (attempt >= attempts) {
					this.hold(escrowId, outcome);
					this.logger.error(
						`Failed to reconcile transfer ${outcome.legId} of ${escrowId} after ${attempt} attempts, holding it: ${error.message}`,
						error.stack,
					);
					return;
				}
				this.logger.warn(
					`Reconcile of transfer ${outcome.legId} of ${escrowId} failed, retrying: ${error.message}`,
				);
				await delay(backoffMs * 2 ** (attempt - 1));
			}
		}
	}

	private hold(escrowId: string, outcome: TransferOutcome): void {
		const outcomes = this.held.get(escrowId) ?? [];
		outcomes.push(outcome);
		this.held.set(escrowId, outcomes);
	}

	/**
	 * Applies held outcomes in their own commit. Runs under the escrow lock;
	 * a store failure leaves them held and fails the call.
	 */
	private async applyHeld(escrowId: string): Promise<void> {
		const outcomes = this.held.get(escrowId);
		if (!outcomes) return;
		const escrow = await this.load(escrowId);
		for (const outcome of outcomes) {
			try {
				escrow.resolveTransfers([outcome]);
			} catch (err) {
				if (!isEscrowError(err)) throw err;
				this.logger.error(
					`Dropped held outcome of transfer ${outcome.legId} of ${escrowId}: ${err.message}`,
					err.stack,
				);
			}
		}
		await this.commit(escrow);
		this.held.delete(escrowId);
		this.logger.log(`Applied ${outcomes.length} held outcomes of ${escrowId}`);
	}

	private context(): EscrowContext {
		return {
			now: this.clock(),
			newLegId: this.newLegId,
			logger: this.logger,
			transferBudgetCeiling: this.options.transferBudgetCeiling,
		};
	}
}
