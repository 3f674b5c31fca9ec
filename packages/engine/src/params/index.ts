/**
 * Params module - settlement terms, validation and fingerprinting
 */

export type {
	ProtocolFees,
	EscrowParams,
	EscrowParamsJson,
	ValidationOptions,
} from "./types.js";

export { paramsFromJson, paramsToJson } from "./params-codec.js";

export {
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
} from "./params-validator.js";

export {
	canonicalize,
	fingerprint,
	deriveEscrowId,
	verifyFingerprint,
} from "./fingerprint.js";
