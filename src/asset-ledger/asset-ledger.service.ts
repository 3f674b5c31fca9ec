import { Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import {
	type Amount,
	type TransferGateway,
	type TransferOutcome,
	type TransferRequest,
	checkedAdd,
	formatAmount,
} from "@escrow-settlement/engine";

export type SettledTransfer = {
	legId: string;
	escrowId: string;
	asset: string;
	amount: string;
	receiver: string;
	memo?: string;
	result: TransferOutcome["result"];
	settledAt: number;
};

/**
 * In-process asset ledger. Settles escrow payouts asynchronously: a transfer
 * succeeds and credits the receiver unless the receiver is blocked, or
 * unregistered while registration is required. Keeps the most recent
 * settled transfers, up to `ASSET_LEDGER_HISTORY_LIMIT`.
 */
@Injectable()
export class AssetLedgerService implements TransferGateway {
	private readonly logger = new Logger(AssetLedgerService.name);
	private readonly balances = new Map<string, Map<string, Amount>>();
	private readonly registered = new Set<string>();
	private readonly blocked = new Set<string>();
	private readonly settled: SettledTransfer[] = [];
	private readonly requireRegistration: boolean;
	private readonly settleDelayMs: number;
	private readonly historyLimit: number;

	constructor(config: ConfigService) {
		this.requireRegistration =
			config.get<string>("ASSET_LEDGER_REQUIRE_REGISTRATION", "false") ===
			"true";
		this.settleDelayMs = Number(
			config.get<string>("ASSET_LEDGER_SETTLE_DELAY_MS", "0"),
		);
		if (!Number.isFinite(this.settleDelayMs) || this.settleDelayMs < 0) {
			throw new Error(
				`ASSET_LEDGER_SETTLE_DELAY_MS must be a non-negative number`,
			);
		}
		this.historyLimit = Number(
			config.get<string>("ASSET_LEDGER_HISTORY_LIMIT", "1000"),
		);
		if (!Number.isInteger(this.historyLimit) || this.historyLimit <= 0) {
			throw new Error("ASSET_LEDGER_HISTORY_LIMIT must be a positive integer");
		}
	}

	async requestTransfer(request: TransferRequest): Promise<TransferOutcome> {
		await new Promise<void>((resolve) => setTimeout(resolve, this.settleDelayMs));

		const rejection = this.rejectionReason(request.receiver);
		const result = rejection ? "failure" : "success";
		if (rejection) {
			this.logger.warn(
				`Transfer ${request.legId} of ${formatAmount(request.amount)} ${request.asset} to ${request.receiver} failed: ${rejection}`,
			);
		} else {
			this.credit(request.receiver, request.asset, request.amount);
			this.logger.log(
				`Transfer ${request.legId} of ${formatAmount(request.amount)} ${request.asset} to ${request.receiver} settled`,
			);
		}
		this.settled.push({
			legId: request.legId,
			escrowId: request.escrowId,
			asset: request.asset,
			amount: formatAmount(request.amount),
			receiver: request.receiver,
			memo: request.memo,
			result,
			settledAt: Date.now(),
		});
		if (this.settled.length > this.historyLimit) {
			this.settled.splice(0, this.settled.length - this.historyLimit);
		}

		return {
			legId: request.legId,
			asset: request.asset,
			amount: request.amount,
			result,
		};
	}

	register(account: string): void {
		this.registered.add(account);
	}

	block(account: string): void {
		this.blocked.add(account);
	}

	unblock(account: string): void {
		this.blocked.delete(account);
	}

	balanceOf(account: string, asset: string): Amount {
		return this.balances.get(account)?.get(asset) ?? 0n;
	}

	balancesOf(account: string): Record<string, string> {
		const out: Record<string, string> = {};
		for (const [asset, amount] of this.balances.get(account) ?? []) {
			out[asset] = formatAmount(amount);
		}
		return out;
	}

	transfers(filter: { escrowId?: string; account?: string } = {}): SettledTransfer[] {
		return this.settled.filter(
			(t) =>
				(filter.escrowId === undefined || t.escrowId === filter.escrowId) &&
				(filter.account === undefined || t.receiver === filter.account),
		);
	}

	private rejectionReason(receiver: string): string | undefined {
		if (this.blocked.has(receiver)) return "receiver is blocked";
		if (this.requireRegistration && !this.registered.has(receiver)) {
			return "receiver is not registered";
		}
		return undefined;
	}

	private credit(account: string, asset: string, amount: Amount): void {
		let assets = this.balances.get(account);
		if (!assets) {
			assets = new Map();
			this.balances.set(account, assets);
		}
		assets.set(asset, checkedAdd(assets.get(asset) ?? 0n, amount));
	}
}
