/**
 * Conversion between the wire form of escrow params and the typed form.
 */

import { EscrowError } from "../core/errors.js";
import { Price } from "../core/price.js";
import { SendOverride } from "../core/types.js";
import { EscrowParams, EscrowParamsJson } from "./types.js";

function parseDeadline(raw: number | string): number {
	const value = typeof raw === "number" ? raw : Date.parse(raw);
	if (!Number.isFinite(value)) {
		throw new EscrowError("INVALID_PARAMS", `invalid deadline "${raw}"`);
	}
	return value;
}

function cleanOverride(
	override: SendOverride | undefined,
): SendOverride | undefined {
	if (!override) return undefined;
	const cleaned: SendOverride = {};
	if (override.receiver !== undefined) cleaned.receiver = override.receiver;
	if (override.memo !== undefined) cleaned.memo = override.memo;
	if (override.message !== undefined) cleaned.message = override.message;
	if (override.minBudget !== undefined) cleaned.minBudget = override.minBudget;
	return Object.keys(cleaned).length > 0 ? cleaned : undefined;
}

export function paramsFromJson(json: EscrowParamsJson): EscrowParams {
	return {
		maker: json.maker,
		srcAsset: json.srcAsset,
		dstAsset: json.dstAsset,
		price: Price.fromJson(json.price),
		deadline: parseDeadline(json.deadline),
		partialFillsAllowed: json.partialFillsAllowed ?? false,
		refundSrcTo: cleanOverride(json.refundSrcTo),
		receiveDstTo: cleanOverride(json.receiveDstTo),
		takerWhitelist: Array.from(new Set(json.takerWhitelist ?? [])).sort(),
		protocolFees: json.protocolFees
			? {
					fee: json.protocolFees.fee,
					surplus: json.protocolFees.surplus,
					collector: json.protocolFees.collector,
				}
			: undefined,
		integratorFees: { ...(json.integratorFees ?? {}) },
		salt: json.salt.toLowerCase(),
	};
}

export function paramsToJson(params: EscrowParams): EscrowParamsJson {
	const json: EscrowParamsJson = {
		maker: params.maker,
		srcAsset: params.srcAsset,
		dstAsset: params.dstAsset,
		price: params.price.toJSON(),
		deadline: params.deadline,
		partialFillsAllowed: params.partialFillsAllowed,
		takerWhitelist: Array.from(new Set(params.takerWhitelist)).sort(),
		integratorFees: { ...params.integratorFees },
		salt: params.salt.toLowerCase(),
	};
	const refundSrcTo = cleanOverride(params.refundSrcTo);
	if (refundSrcTo) json.refundSrcTo = refundSrcTo;
	const receiveDstTo = cleanOverride(params.receiveDstTo);
	if (receiveDstTo) json.receiveDstTo = receiveDstTo;
	if (params.protocolFees) json.protocolFees = { ...params.protocolFees };
	return json;
}
