/**
 * Core module - amounts, prices, fees and errors shared by every layer
 */

export type {
	AccountId,
	AssetId,
	Amount,
	Deadline,
	SendOverride,
	Clock,
	EngineLogger,
} from "./types.js";
export { MAX_AMOUNT, systemClock, silentLogger } from "./types.js";

export {
	type EscrowErrorCode,
	type EscrowErrorCategory,
	ESCROW_ERROR_CATEGORY,
	EscrowError,
	isEscrowError,
	toError,
} from "./errors.js";

export {
	assertAmount,
	checkedAdd,
	checkedSub,
	mulDivFloor,
	mulDivCeil,
	minAmount,
	parseAmount,
	formatAmount,
} from "./amount.js";

export { type PriceJson, Price } from "./price.js";

export {
	type Pips,
	ONE_PERCENT,
	MAX_PIPS,
	MAX_TOTAL_FEE,
	isValidPips,
	pipsFee,
} from "./pips.js";
