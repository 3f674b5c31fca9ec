/**
 * Transfers module - outbound legs and outcome reconciliation
 */

export type {
	LegKind,
	TransferLegPlan,
	TransferLeg,
	TransferLegJson,
	TransferRequest,
	TransferResult,
	TransferOutcome,
	TransferGateway,
} from "./types.js";

export type {
	Outbox,
	OrchestratorContext,
	LegState,
	Reconciliation,
} from "./transfer-orchestrator.js";
export {
	TransferOrchestrator,
	makerAmounts,
	toRequest,
	legToJson,
	legFromJson,
} from "./transfer-orchestrator.js";
