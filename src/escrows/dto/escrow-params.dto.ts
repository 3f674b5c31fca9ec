import { ApiProperty, ApiPropertyOptional } from "@nestjs/swagger";
import { Type } from "class-transformer";
import {
	IsArray,
	IsBoolean,
	IsInt,
	IsNotEmpty,
	IsObject,
	IsOptional,
	IsString,
	Matches,
	Max,
	Min,
	ValidateNested,
} from "class-validator";

export const AMOUNT_PATTERN = /^(0|[1-9][0-9]*)$/;
export const PRICE_PATTERN = /^[0-9]+(\.[0-9]+)?$/;

export class SendOverrideDto {
	@ApiPropertyOptional({ example: "vault.example" })
	@IsOptional()
	@IsString()
	@IsNotEmpty()
	receiver?: string;

	@ApiPropertyOptional({ example: "payout" })
	@IsOptional()
	@IsString()
	memo?: string;

	@ApiPropertyOptional({
		description: "Message delivered with the transfer to the receiver",
	})
	@IsOptional()
	@IsString()
	message?: string;

	@ApiPropertyOptional({
		description: "Minimum execution budget reserved for the transfer",
		example: 20,
	})
	@IsOptional()
	@IsInt()
	@Min(0)
	minBudget?: number;
}

export class ProtocolFeesDto {
	@ApiProperty({
		description: "Fee on the destination amount consumed, in pips (1e-6)",
		example: 5000,
	})
	@IsInt()
	@Min(0)
	@Max(1_000_000)
	fee!: number;

	@ApiProperty({
		description: "Fee on the price-improvement surplus, in pips (1e-6)",
		example: 0,
	})
	@IsInt()
	@Min(0)
	@Max(1_000_000)
	surplus!: number;

	@ApiProperty({ example: "protocol.example" })
	@IsString()
	@IsNotEmpty()
	collector!: string;
}

/**
 * Settlement terms. Resubmitted in full with every mutating call and
 * checked against the fingerprint taken at init.
 */
export class EscrowParamsDto {
	@ApiProperty({ example: "maker.example" })
	@IsString()
	@IsNotEmpty()
	maker!: string;

	@ApiProperty({ example: "asset:wbtc" })
	@IsString()
	@IsNotEmpty()
	srcAsset!: string;

	@ApiProperty({ example: "asset:usdc" })
	@IsString()
	@IsNotEmpty()
	dstAsset!: string;

	@ApiProperty({
		description: "Minimum destination units per source unit, decimal",
		example: "2",
	})
	@Matches(PRICE_PATTERN, { message: "price must be a decimal number" })
	price!: string;

	@ApiProperty({
		description: "Unix epoch in milliseconds",
		example: 1732690234123,
	})
	@IsInt()
	deadline!: number;

	@ApiPropertyOptional({ default: false })
	@IsOptional()
	@IsBoolean()
	partialFillsAllowed?: boolean;

	@ApiPropertyOptional({ type: () => SendOverrideDto })
	@IsOptional()
	@ValidateNested()
	@Type(() => SendOverrideDto)
	refundSrcTo?: SendOverrideDto;

	@ApiPropertyOptional({ type: () => SendOverrideDto })
	@IsOptional()
	@ValidateNested()
	@Type(() => SendOverrideDto)
	receiveDstTo?: SendOverrideDto;

	@ApiPropertyOptional({
		type: [String],
		description: "Takers allowed to fill; empty means anyone",
	})
	@IsOptional()
	@IsArray()
	@IsString({ each: true })
	takerWhitelist?: string[];

	@ApiPropertyOptional({ type: () => ProtocolFeesDto })
	@IsOptional()
	@ValidateNested()
	@Type(() => ProtocolFeesDto)
	protocolFees?: ProtocolFeesDto;

	@ApiPropertyOptional({
		description: "Integrator fee rates in pips, keyed by integrator account",
		example: { "integrator.example": 1000 },
		type: "object",
		additionalProperties: { type: "integer" },
	})
	@IsOptional()
	@IsObject()
	integratorFees?: Record<string, number>;

	@ApiProperty({
		description: "32 bytes of hex entropy",
		example: "ab".repeat(32),
	})
	@Matches(/^[0-9a-fA-F]{64}$/, { message: "salt must be 32 bytes of hex" })
	salt!: string;
}
