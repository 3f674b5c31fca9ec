export type { FillRequest, FillRequestJson, FillQuote } from "./types.js";
export {
	FEE_MEMO,
	assertCanFill,
	computeFill,
	planFillLegs,
} from "./fill-engine.js";
export { fillRequestFromJson } from "./fill-request-codec.js";
