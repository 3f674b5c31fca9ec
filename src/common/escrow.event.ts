import type { EscrowEvent, EscrowEventType } from "@escrow-settlement/engine";

export const ESCROW_CREATED_ID = "escrow.created";
export const ESCROW_FUNDED_ID = "escrow.funded";
export const ESCROW_FILLED_ID = "escrow.filled";
export const ESCROW_MAKER_LOST_ID = "escrow.maker_lost";
export const ESCROW_MAKER_REFUNDED_ID = "escrow.maker_refunded";
export const ESCROW_CLOSED_ID = "escrow.closed";
export const ESCROW_CLEANUP_ID = "escrow.cleanup";

export const ESCROW_EVENT_IDS: Record<EscrowEventType, string> = {
	created: ESCROW_CREATED_ID,
	funded: ESCROW_FUNDED_ID,
	filled: ESCROW_FILLED_ID,
	maker_lost: ESCROW_MAKER_LOST_ID,
	maker_refunded: ESCROW_MAKER_REFUNDED_ID,
	closed: ESCROW_CLOSED_ID,
	cleanup: ESCROW_CLEANUP_ID,
};

/**
 * Emitter name of an engine event, e.g. `escrow.filled`.
 */
export function escrowEventId(event: EscrowEvent): string {
	return ESCROW_EVENT_IDS[event.type];
}
