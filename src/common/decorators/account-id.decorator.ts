import {
	type ExecutionContext,
	UnauthorizedException,
	createParamDecorator,
} from "@nestjs/common";
import type { Request } from "express";

export const ACCOUNT_ID_HEADER = "x-account-id";

/**
 * Caller account taken from the `X-Account-Id` header. Proving control of
 * that account is left to the signature layer in front of this API.
 */
export const AccountId = createParamDecorator(
	(_data: unknown, ctx: ExecutionContext): string => {
		const req = ctx.switchToHttp().getRequest<Request>();
		const value = req.header(ACCOUNT_ID_HEADER)?.trim();
		if (!value) {
			throw new UnauthorizedException("Missing X-Account-Id header");
		}
		return value;
	},
);
