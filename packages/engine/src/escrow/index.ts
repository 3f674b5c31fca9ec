export type {
	EscrowContext,
	EscrowSnapshot,
	EscrowView,
	DepositResult,
	FillResult,
	ReceiveAction,
	ReceiveMessage,
	ReceiveActionJson,
	ReceiveMessageJson,
	ReceiveResult,
} from "./types.js";
export { Escrow, receiveMessageFromJson } from "./escrow.js";
