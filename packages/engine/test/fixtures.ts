import { Price } from "../src/core/price.js";
import { silentLogger } from "../src/core/types.js";
import { EscrowContext } from "../src/escrow/types.js";
import { EscrowParams } from "../src/params/types.js";
import {
	TransferGateway,
	TransferOutcome,
	TransferRequest,
	TransferResult,
} from "../src/transfers/types.js";

export const MAKER = "maker.test";
export const TAKER = "taker.test";
export const OTHER = "other.test";
export const COLLECTOR = "collector.test";
export const SRC = "asset:src";
export const DST = "asset:dst";
export const NOW = Date.UTC(2026, 0, 1);
export const HOUR = 3_600_000;
export const SALT = "ab".repeat(32);

export function makeParams(overrides: Partial<EscrowParams> = {}): EscrowParams {
	return {
		maker: MAKER,
		srcAsset: SRC,
		dstAsset: DST,
		price: Price.ratio(2n, 1n),
		deadline: NOW + HOUR,
		partialFillsAllowed: true,
		takerWhitelist: [],
		integratorFees: {},
		salt: SALT,
		...overrides,
	};
}

export function legIds(prefix = "leg"): () => string {
	let next = 0;
	return () => `${prefix}-${++next}`;
}

export function makeContext(
	now = NOW,
	newLegId: () => string = legIds(),
): EscrowContext {
	return { now, newLegId, logger: silentLogger };
}

export function outcomeFor(
	request: Pick<TransferRequest, "legId" | "asset" | "amount">,
	result: TransferResult,
	refunded?: bigint,
): TransferOutcome {
	return {
		legId: request.legId,
		asset: request.asset,
		amount: request.amount,
		result,
		...(refunded === undefined ? {} : { refunded }),
	};
}

/**
 * Gateway whose transfers stay pending until the test settles them.
 */
export class ManualGateway implements TransferGateway {
	readonly requests: TransferRequest[] = [];
	private readonly resolvers = new Map<string, (outcome: TransferOutcome) => void>();

	requestTransfer(request: TransferRequest): Promise<TransferOutcome> {
		this.requests.push(request);
		return new Promise((resolve) => {
			this.resolvers.set(request.legId, resolve);
		});
	}

	settle(legId: string, result: TransferResult, refunded?: bigint): void {
		const request = this.requests.find((r) => r.legId === legId);
		const resolve = this.resolvers.get(legId);
		if (!request || !resolve) {
			throw new Error(`no pending request ${legId}`);
		}
		this.resolvers.delete(legId);
		resolve(outcomeFor(request, result, refunded));
	}

	settleAll(result: TransferResult): void {
		for (const legId of Array.from(this.resolvers.keys())) {
			this.settle(legId, result);
		}
	}

	get pending(): string[] {
		return Array.from(this.resolvers.keys());
	}
}

/**
 * Small deterministic PRNG (mulberry32) for seeded property tests.
 */
export function seededRandom(seed: number): () => number {
	let state = seed >>> 0;
	return () => {
		state = (state + 0x6d2b79f5) >>> 0;
		let t = state;
		t = Math.imul(t ^ (t >>> 15), t | 1);
		t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
		return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
	};
}
