export type {
	CloseReason,
	CreatedEvent,
	FundedEvent,
	FilledEvent,
	MakerAmounts,
	MakerLostEvent,
	MakerRefundedEvent,
	ClosedEvent,
	CleanupEvent,
	EscrowEvent,
	EscrowEventType,
	EventSink,
} from "./types.js";
export { MemoryEventSink } from "./types.js";
