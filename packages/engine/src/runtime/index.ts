export { KeyedLock } from "./keyed-lock.js";
export type {
	SettlementRuntimeOptions,
	InitResult,
} from "./settlement-runtime.js";
export { SettlementRuntime } from "./settlement-runtime.js";
