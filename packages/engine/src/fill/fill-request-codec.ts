import { EscrowError } from "../core/errors.js";
import { Price } from "../core/price.js";
import { FillRequest, FillRequestJson } from "./types.js";

export function fillRequestFromJson(json: FillRequestJson): FillRequest {
	const request: FillRequest = { takerPrice: Price.fromJson(json.takerPrice) };
	if (json.deadline !== undefined) {
		const deadline =
			typeof json.deadline === "number"
				? json.deadline
				: Date.parse(json.deadline);
		if (!Number.isFinite(deadline)) {
			throw new EscrowError(
				"INVALID_PARAMS",
				`invalid fill deadline "${json.deadline}"`,
			);
		}
		request.deadline = deadline;
	}
	if (json.receiveSrcTo) request.receiveSrcTo = { ...json.receiveSrcTo };
	return request;
}
