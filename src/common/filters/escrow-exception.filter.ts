import {
	type ArgumentsHost,
	Catch,
	type ExceptionFilter,
	HttpStatus,
	Logger,
} from "@nestjs/common";
import type { Response } from "express";
import { EscrowError, type EscrowErrorCode } from "@escrow-settlement/engine";

const POLICY_STATUS: Partial<Record<EscrowErrorCode, HttpStatus>> = {
	UNAUTHORIZED: HttpStatus.FORBIDDEN,
	NOT_FOUND: HttpStatus.NOT_FOUND,
	CLEANED_UP: HttpStatus.GONE,
};

export function httpStatusFor(error: EscrowError): HttpStatus {
	switch (error.category) {
		case "rejected-input":
			return HttpStatus.BAD_REQUEST;
		case "policy":
			return POLICY_STATUS[error.code] ?? HttpStatus.CONFLICT;
		case "arithmetic":
			return HttpStatus.UNPROCESSABLE_ENTITY;
		case "callback":
			return HttpStatus.CONFLICT;
	}
}

/**
 * Maps engine rejections onto HTTP responses:
 * `{ statusCode, code, message }`.
 */
@Catch(EscrowError)
export class EscrowExceptionFilter implements ExceptionFilter {
	private readonly logger = new Logger(EscrowExceptionFilter.name);

	catch(exception: EscrowError, host: ArgumentsHost) {
		const response = host.switchToHttp().getResponse<Response>();
		const statusCode = httpStatusFor(exception);
		this.logger.debug(`${exception.code}: ${exception.message}`);
		response.status(statusCode).json({
			statusCode,
			code: exception.code,
			message: exception.message,
		});
	}
}
