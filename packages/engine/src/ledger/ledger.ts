/**
 * Escrow ledger
 *
 * The mutable accounting state of one escrow instance. All mutators keep
 * amounts inside the representable range and never let an inventory or
 * lost-and-found balance go negative.
 */

import { checkedAdd, checkedSub, formatAmount, parseAmount } from "../core/amount.js";
import { EscrowError } from "../core/errors.js";
import { Amount } from "../core/types.js";

/** Which asset of the escrow a maker-side amount belongs to. */
export type AssetSide = "src" | "dst";

export interface LedgerState {
	paramsFingerprint: string;
	srcRemaining: Amount;
	dstLost: Amount;
	srcLost: Amount;
	closed: boolean;
	inFlight: number;
}

/**
 * Wire form of `LedgerState`, amounts as decimal strings.
 */
export interface LedgerStateJson {
	paramsFingerprint: string;
	srcRemaining: string;
	dstLost: string;
	srcLost: string;
	closed: boolean;
	inFlight: number;
}

export class Ledger {
	private constructor(private readonly state: LedgerState) {}

	static create(paramsFingerprint: string): Ledger {
		return new Ledger({
			paramsFingerprint,
			srcRemaining: 0n,
			dstLost: 0n,
			srcLost: 0n,
			closed: false,
			inFlight: 0,
		});
	}

	static fromJson(json: LedgerStateJson): Ledger {
		if (!Number.isInteger(json.inFlight) || json.inFlight < 0) {
			throw new EscrowError(
				"INVALID_PARAMS",
				`stored inFlight ${json.inFlight} is not a non-negative integer`,
			);
		}
		return new Ledger({
			paramsFingerprint: json.paramsFingerprint,
			srcRemaining: parseAmount(json.srcRemaining, "srcRemaining"),
			dstLost: parseAmount(json.dstLost, "dstLost"),
			srcLost: parseAmount(json.srcLost, "srcLost"),
			closed: json.closed,
			inFlight: json.inFlight,
		});
	}

	get paramsFingerprint(): string {
		return this.state.paramsFingerprint;
	}

	get srcRemaining(): Amount {
		return this.state.srcRemaining;
	}

	get dstLost(): Amount {
		return this.state.dstLost;
	}

	get srcLost(): Amount {
		return this.state.srcLost;
	}

	get closed(): boolean {
		return this.state.closed;
	}

	get inFlight(): number {
		return this.state.inFlight;
	}

	lost(side: AssetSide): Amount {
		return side === "src" ? this.state.srcLost : this.state.dstLost;
	}

	snapshot(): LedgerState {
		return { ...this.state };
	}

	toJSON(): LedgerStateJson {
		return {
			paramsFingerprint: this.state.paramsFingerprint,
			srcRemaining: formatAmount(this.state.srcRemaining),
			dstLost: formatAmount(this.state.dstLost),
			srcLost: formatAmount(this.state.srcLost),
			closed: this.state.closed,
			inFlight: this.state.inFlight,
		};
	}

	creditSrc(amount: Amount): void {
		this.state.srcRemaining = checkedAdd(
			this.state.srcRemaining,
			amount,
			"srcRemaining",
		);
	}

	debitSrc(amount: Amount): void {
		if (amount > this.state.srcRemaining) {
			throw new EscrowError(
				"INSUFFICIENT_INVENTORY",
				`cannot debit ${amount}, only ${this.state.srcRemaining} remaining`,
			);
		}
		this.state.srcRemaining -= amount;
	}

	markLost(side: AssetSide, amount: Amount): void {
		if (side === "src") {
			this.state.srcLost = checkedAdd(this.state.srcLost, amount, "srcLost");
		} else {
			this.state.dstLost = checkedAdd(this.state.dstLost, amount, "dstLost");
		}
	}

	clearLost(side: AssetSide, amount: Amount): void {
		if (side === "src") {
			this.state.srcLost = checkedSub(this.state.srcLost, amount, "srcLost");
		} else {
			this.state.dstLost = checkedSub(this.state.dstLost, amount, "dstLost");
		}
	}

	/**
	 * @returns true when this call closed the ledger
	 */
	tryClose(): boolean {
		if (this.state.closed) return false;
		this.state.closed = true;
		return true;
	}

	beginTransfer(): void {
		this.state.inFlight += 1;
	}

	endTransfer(): void {
		if (this.state.inFlight === 0) {
			throw new EscrowError(
				"UNKNOWN_TRANSFER",
				"no transfer is in flight for this escrow",
			);
		}
		this.state.inFlight -= 1;
	}

	/**
	 * Every obligation is settled and nothing is pending.
	 */
	canCleanup(): boolean {
		return (
			this.state.closed &&
			this.state.srcRemaining === 0n &&
			this.state.dstLost === 0n &&
			this.state.srcLost === 0n &&
			this.state.inFlight === 0
		);
	}
}
