import { ApiProperty, ApiPropertyOptional } from "@nestjs/swagger";
import { Type } from "class-transformer";
import {
	IsIn,
	IsInt,
	IsNotEmpty,
	IsOptional,
	IsString,
	Matches,
	ValidateIf,
	ValidateNested,
} from "class-validator";
import {
	AMOUNT_PATTERN,
	EscrowParamsDto,
	PRICE_PATTERN,
	SendOverrideDto,
} from "./escrow-params.dto";

export class EscrowParamsInDto {
	@ApiProperty({ type: () => EscrowParamsDto })
	@ValidateNested()
	@Type(() => EscrowParamsDto)
	params!: EscrowParamsDto;
}

export class IncomingTransferInDto extends EscrowParamsInDto {
	@ApiProperty({ example: "asset:wbtc" })
	@IsString()
	@IsNotEmpty()
	asset!: string;

	@ApiProperty({
		description: "Amount in base units, decimal string",
		example: "1000",
	})
	@Matches(AMOUNT_PATTERN, { message: "amount must be a decimal integer" })
	amount!: string;
}

export class DepositEscrowInDto extends IncomingTransferInDto {}

export class FillEscrowInDto extends IncomingTransferInDto {
	@ApiProperty({
		description: "Rate the taker pays, destination per source unit",
		example: "2",
	})
	@Matches(PRICE_PATTERN, { message: "takerPrice must be a decimal number" })
	takerPrice!: string;

	@ApiPropertyOptional({
		description: "Unix epoch in milliseconds after which the fill is void",
	})
	@IsOptional()
	@IsInt()
	deadline?: number;

	@ApiPropertyOptional({ type: () => SendOverrideDto })
	@IsOptional()
	@ValidateNested()
	@Type(() => SendOverrideDto)
	receiveSrcTo?: SendOverrideDto;
}

export const RECEIVE_ACTIONS = ["fund", "fill"] as const;
export type ReceiveActionType = (typeof RECEIVE_ACTIONS)[number];

export class ReceiveActionDto {
	@ApiProperty({ enum: RECEIVE_ACTIONS })
	@IsIn(RECEIVE_ACTIONS)
	type!: ReceiveActionType;

	@ApiPropertyOptional({ description: "Required for fill", example: "2" })
	@ValidateIf((action: ReceiveActionDto) => action.type === "fill")
	@Matches(PRICE_PATTERN, { message: "takerPrice must be a decimal number" })
	takerPrice?: string;

	@ApiPropertyOptional()
	@IsOptional()
	@IsInt()
	deadline?: number;

	@ApiPropertyOptional({ type: () => SendOverrideDto })
	@IsOptional()
	@ValidateNested()
	@Type(() => SendOverrideDto)
	receiveSrcTo?: SendOverrideDto;
}

export class ReceiveMessageDto extends EscrowParamsInDto {
	@ApiProperty({ type: () => ReceiveActionDto })
	@ValidateNested()
	@Type(() => ReceiveActionDto)
	action!: ReceiveActionDto;
}

/**
 * A transfer delivered to the escrow with its message attached.
 */
export class ReceiveEscrowInDto {
	@ApiProperty({ example: "asset:usdc" })
	@IsString()
	@IsNotEmpty()
	asset!: string;

	@ApiProperty({ example: "2000" })
	@Matches(AMOUNT_PATTERN, { message: "amount must be a decimal integer" })
	amount!: string;

	@ApiProperty({ type: () => ReceiveMessageDto })
	@ValidateNested()
	@Type(() => ReceiveMessageDto)
	message!: ReceiveMessageDto;
}
