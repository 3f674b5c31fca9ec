export type { AssetSide, LedgerState, LedgerStateJson } from "./ledger.js";
export { Ledger } from "./ledger.js";
