import { ApiProperty, ApiPropertyOptional } from "@nestjs/swagger";
import { Type } from "class-transformer";
import {
	IsIn,
	IsInt,
	IsNotEmpty,
	IsOptional,
	IsString,
	Max,
	Min,
} from "class-validator";
import {
	LIFECYCLE_STATES,
	type EscrowEventType,
	type LifecycleState,
} from "@escrow-settlement/engine";

export class EscrowStateOutDto {
	@ApiProperty({ example: "esc_3f1c0f8d9b2a4e6c7d8e9f0a1b2c3d4e5f6a7b8c" })
	escrowId!: string;

	@ApiProperty({ description: "SHA-256 of the canonical params, hex" })
	fingerprint!: string;

	@ApiProperty({ enum: LIFECYCLE_STATES })
	lifecycle!: LifecycleState;

	@ApiProperty({ example: "maker.example" })
	maker!: string;

	@ApiProperty({ example: "asset:wbtc" })
	srcAsset!: string;

	@ApiProperty({ example: "asset:usdc" })
	dstAsset!: string;

	@ApiProperty({
		description: "Unix epoch in milliseconds",
		example: 1732690234123,
	})
	deadline!: number;

	@ApiProperty({ description: "Unfilled source inventory", example: "1000" })
	srcRemaining!: string;

	@ApiProperty({ description: "Destination owed to the maker", example: "0" })
	dstLost!: string;

	@ApiProperty({ description: "Source owed to the maker", example: "0" })
	srcLost!: string;

	@ApiProperty()
	closed!: boolean;

	@ApiProperty({ description: "Outbound transfers awaiting an outcome" })
	inFlight!: number;
}

export class InitEscrowOutDto {
	@ApiProperty({ example: "esc_3f1c0f8d9b2a4e6c7d8e9f0a1b2c3d4e5f6a7b8c" })
	escrowId!: string;

	@ApiProperty()
	fingerprint!: string;

	@ApiProperty({ type: () => EscrowStateOutDto })
	state!: EscrowStateOutDto;
}

export class DepositOutDto {
	@ApiProperty({ example: "1000" })
	accepted!: string;

	@ApiProperty({ example: "0" })
	refund!: string;
}

export class FillQuoteOutDto {
	@ApiProperty({ description: "Source sold to the taker", example: "1000" })
	srcOut!: string;

	@ApiProperty({ example: "2100" })
	dstIn!: string;

	@ApiProperty({ description: "Destination consumed", example: "2000" })
	dstUsed!: string;

	@ApiProperty({ description: "Destination at the maker's price", example: "2000" })
	dstWanted!: string;

	@ApiProperty({ example: "0" })
	surplus!: string;

	@ApiProperty({ example: "10" })
	protocolFee!: string;

	@ApiProperty({
		type: "object",
		additionalProperties: { type: "string" },
		example: {},
	})
	integratorFees!: Record<string, string>;

	@ApiProperty({ example: "1990" })
	makerPayout!: string;
}

export class FillOutDto {
	@ApiProperty({
		description: "Destination not consumed, returned to the taker",
		example: "100",
	})
	unused!: string;

	@ApiProperty({ type: () => FillQuoteOutDto })
	fill!: FillQuoteOutDto;
}

export class ReceiveOutDto {
	@ApiProperty({ enum: ["fund", "fill"] })
	type!: "fund" | "fill";

	@ApiPropertyOptional({ type: () => DepositOutDto })
	deposit?: DepositOutDto;

	@ApiPropertyOptional({ type: () => FillOutDto })
	fill?: FillOutDto;
}

export class SettleOutDto {
	@ApiProperty({ description: "Whether the instance was torn down" })
	cleanedUp!: boolean;
}

export class EscrowEventOutDto {
	@ApiProperty({ example: 42 })
	sequence!: number;

	@ApiProperty({
		enum: [
			"created",
			"funded",
			"filled",
			"maker_lost",
			"maker_refunded",
			"closed",
			"cleanup",
		],
	})
	name!: EscrowEventType;

	@ApiProperty({ description: "Event body as emitted by the engine" })
	payload!: object;

	@ApiProperty({
		description: "Unix epoch in milliseconds",
		example: 1732690234123,
	})
	recordedAt!: number;
}

export class ListEscrowsQueryDto {
	@ApiPropertyOptional({ enum: LIFECYCLE_STATES })
	@IsOptional()
	@IsIn(LIFECYCLE_STATES)
	lifecycle?: LifecycleState;

	@ApiPropertyOptional({ example: "maker.example" })
	@IsOptional()
	@IsString()
	@IsNotEmpty()
	maker?: string;

	@ApiPropertyOptional({ minimum: 1, maximum: 100, default: 20 })
	@IsOptional()
	@Type(() => Number)
	@IsInt()
	@Min(1)
	@Max(100)
	limit?: number;

	@ApiPropertyOptional({ minimum: 0, default: 0 })
	@IsOptional()
	@Type(() => Number)
	@IsInt()
	@Min(0)
	offset?: number;
}

export class ListEventsQueryDto {
	@ApiPropertyOptional({
		description: "Only events with a greater sequence",
		default: 0,
	})
	@IsOptional()
	@Type(() => Number)
	@IsInt()
	@Min(0)
	after?: number;
}
