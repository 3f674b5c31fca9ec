/**
 * Escrow Events
 *
 * Append-only notifications of state transitions. Amounts are decimal
 * strings so every payload is plain JSON.
 */

import { PriceJson } from "../core/price.js";
import { AccountId, AssetId } from "../core/types.js";

export type CloseReason = "deadline_expired" | "by_maker" | "by_single_taker";

export interface CreatedEvent {
	type: "created";
	escrowId: string;
	fingerprint: string;
	maker: AccountId;
	srcAsset: AssetId;
	dstAsset: AssetId;
	price: PriceJson;
	deadline: number;
}

export interface FundedEvent {
	type: "funded";
	escrowId: string;
	maker: AccountId;
	srcAdded: string;
	srcRemaining: string;
}

export interface FilledEvent {
	type: "filled";
	escrowId: string;
	taker: AccountId;
	maker: AccountId;
	srcAsset: AssetId;
	dstAsset: AssetId;
	takerPrice: PriceJson;
	makerPrice: PriceJson;
	dstIn: string;
	dstUsed: string;
	srcOut: string;
	makerDstOut: string;
	srcRemaining: string;
	protocolFee?: { amount: string; collector: AccountId };
	integratorFees: Record<AccountId, string>;
	makerReceiveDstTo?: AccountId;
	takerReceiveSrcTo?: AccountId;
}

/** Amounts per side, present only when non-zero. */
export interface MakerAmounts {
	src?: string;
	dst?: string;
}

export interface MakerLostEvent extends MakerAmounts {
	type: "maker_lost";
	escrowId: string;
}

export interface MakerRefundedEvent extends MakerAmounts {
	type: "maker_refunded";
	escrowId: string;
}

export interface ClosedEvent {
	type: "closed";
	escrowId: string;
	reason: CloseReason;
}

export interface CleanupEvent {
	type: "cleanup";
	escrowId: string;
}

export type EscrowEvent =
	| CreatedEvent
	| FundedEvent
	| FilledEvent
	| MakerLostEvent
	| MakerRefundedEvent
	| ClosedEvent
	| CleanupEvent;

export type EscrowEventType = EscrowEvent["type"];

/**
 * Receiver of engine events. Hosts forward them to their own bus.
 */
export interface EventSink {
	publish(event: EscrowEvent): void | Promise<void>;
}

/**
 * Collects events in memory, in publish order.
 */
export class MemoryEventSink implements EventSink {
	readonly events: EscrowEvent[] = [];

	publish(event: EscrowEvent): void {
		this.events.push(event);
	}

	ofType<T extends EscrowEventType>(
		type: T,
	): Extract<EscrowEvent, { type: T }>[] {
		return this.events.filter(
			(event): event is Extract<EscrowEvent, { type: T }> =>
				event.type === type,
		);
	}

	clear(): void {
		this.events.length = 0;
	}
}
