/**
 * Params fingerprinting
 *
 * The canonical form sorts object keys, writes prices reduced and
 * amounts as strings, and omits absent optionals, so two param sets
 * hash equal exactly when they describe the same terms.
 */

import { sha256 } from "@noble/hashes/sha2.js";
import { hex } from "@scure/base";
import { EscrowError } from "../core/errors.js";
import { paramsToJson } from "./params-codec.js";
import { EscrowParams } from "./types.js";

function isPlainObject(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function sortKeys(value: unknown): unknown {
	if (Array.isArray(value)) {
		return value.map(sortKeys);
	}
	if (isPlainObject(value)) {
		// fromEntries defines own keys, so "__proto__" survives
		return Object.fromEntries(
			Object.keys(value)
				.sort()
				.filter((key) => value[key] !== undefined)
				.map((key): [string, unknown] => [key, sortKeys(value[key])]),
		);
	}
	return value;
}

export function canonicalize(value: unknown): string {
	return JSON.stringify(sortKeys(value));
}

function sha256Hex(input: string): string {
	return hex.encode(sha256(new TextEncoder().encode(input)));
}

export function fingerprint(params: EscrowParams): string {
	return sha256Hex(canonicalize(paramsToJson(params)));
}

/**
 * Deterministic instance id for a set of params.
 */
export function deriveEscrowId(paramsFingerprint: string): string {
	return `esc_${sha256Hex(`escrow-instance:${paramsFingerprint}`).slice(0, 40)}`;
}

/**
 * Fails with `MISMATCHED_PARAMS` unless `params` hash to `expected`.
 */
export function verifyFingerprint(params: EscrowParams, expected: string): void {
	const actual = fingerprint(params);
	if (actual !== expected) {
		throw new EscrowError(
			"MISMATCHED_PARAMS",
			"params do not match the escrow fingerprint",
			{ expected, actual },
		);
	}
}
