/**
 * Escrow Settlement Engine
 *
 * Deterministic settlement of a single-maker escrow: price and fee
 * arithmetic, partial fills, outbound transfer reconciliation with a
 * lost-and-found ledger, and safe self-termination.
 *
 * @example
 * ```typescript
 * import {
 *   SettlementRuntime,
 *   MemoryEscrowStore,
 *   MemoryEventSink,
 *   paramsFromJson,
 * } from "@escrow-settlement/engine";
 *
 * const runtime = new SettlementRuntime({
 *   store: new MemoryEscrowStore(),
 *   gateway: myAssetLedger,
 *   events: new MemoryEventSink(),
 * });
 *
 * const params = paramsFromJson({
 *   maker: "maker.example",
 *   srcAsset: "asset:wbtc",
 *   dstAsset: "asset:usdc",
 *   price: "2",
 *   deadline: Date.now() + 3_600_000,
 *   salt: "00".repeat(32),
 * });
 * const { escrowId } = await runtime.init(params);
 * await runtime.onDeposit(escrowId, "maker.example", "asset:wbtc", 1000n, params);
 * ```
 */

// Core - Amounts, prices, fee rates and errors
export {
	type AccountId,
	type AssetId,
	type Amount,
	type Deadline,
	type SendOverride,
	type Clock,
	type EngineLogger,
	type EscrowErrorCode,
	type EscrowErrorCategory,
	type PriceJson,
	type Pips,
	MAX_AMOUNT,
	systemClock,
	silentLogger,
	ESCROW_ERROR_CATEGORY,
	EscrowError,
	isEscrowError,
	toError,
	assertAmount,
	checkedAdd,
	checkedSub,
	mulDivFloor,
	mulDivCeil,
	minAmount,
	parseAmount,
	formatAmount,
	Price,
	ONE_PERCENT,
	MAX_PIPS,
	MAX_TOTAL_FEE,
	isValidPips,
	pipsFee,
} from "./core/index.js";

// Params - Settlement terms, validation and fingerprinting
export {
	type ProtocolFees,
	type EscrowParams,
	type EscrowParamsJson,
	type ValidationOptions,
	paramsFromJson,
	paramsToJson,
	FILL_BUDGET,
	PLAIN_TRANSFER_BUDGET_MIN,
	PLAIN_TRANSFER_BUDGET_DEFAULT,
	MESSAGE_TRANSFER_BUDGET_MIN,
	MESSAGE_TRANSFER_BUDGET_DEFAULT,
	DEFAULT_TRANSFER_BUDGET_CEILING,
	transferBudget,
	feeRecipientCount,
	requiredFillBudget,
	totalFee,
	validateSendOverride,
	validateParams,
	canonicalize,
	fingerprint,
	deriveEscrowId,
	verifyFingerprint,
} from "./params/index.js";

// Ledger - Mutable accounting state
export {
	type AssetSide,
	type LedgerState,
	type LedgerStateJson,
	Ledger,
} from "./ledger/index.js";

// Fill - Price and fee arithmetic
export {
	type FillRequest,
	type FillRequestJson,
	type FillQuote,
	FEE_MEMO,
	assertCanFill,
	computeFill,
	planFillLegs,
	fillRequestFromJson,
} from "./fill/index.js";

// Transfers - Outbound legs and outcome reconciliation
export {
	type LegKind,
	type TransferLegPlan,
	type TransferLeg,
	type TransferLegJson,
	type TransferRequest,
	type TransferResult,
	type TransferOutcome,
	type TransferGateway,
	type Outbox,
	type OrchestratorContext,
	type LegState,
	type Reconciliation,
	TransferOrchestrator,
	makerAmounts,
	toRequest,
	legToJson,
	legFromJson,
} from "./transfers/index.js";

// Lifecycle - Close authorization, sweep and cleanup
export {
	type StateDefinition,
	type StateTransition,
	type StateMachineConfig,
	type LifecycleState,
	type LifecycleAction,
	type LifecycleContext,
	StateMachine,
	LIFECYCLE_STATES,
	ESCROW_LIFECYCLE,
	isLifecycleState,
	closeReason,
	LifecycleController,
} from "./lifecycle/index.js";

// Events - Notifications of state transitions
export {
	type CloseReason,
	type CreatedEvent,
	type FundedEvent,
	type FilledEvent,
	type MakerAmounts,
	type MakerLostEvent,
	type MakerRefundedEvent,
	type ClosedEvent,
	type CleanupEvent,
	type EscrowEvent,
	type EscrowEventType,
	type EventSink,
	MemoryEventSink,
} from "./events/index.js";

// Escrow - The aggregate and its entry points
export {
	type EscrowContext,
	type EscrowSnapshot,
	type EscrowView,
	type DepositResult,
	type FillResult,
	type ReceiveAction,
	type ReceiveMessage,
	type ReceiveActionJson,
	type ReceiveMessageJson,
	type ReceiveResult,
	Escrow,
	receiveMessageFromJson,
} from "./escrow/index.js";

// Storage - Pluggable persistence
export {
	type EscrowQuery,
	type EscrowStore,
	StorageError,
	MemoryEscrowStore,
} from "./storage/index.js";

// Runtime - In-process host serializing calls per escrow
export {
	type SettlementRuntimeOptions,
	type InitResult,
	KeyedLock,
	SettlementRuntime,
} from "./runtime/index.js";
