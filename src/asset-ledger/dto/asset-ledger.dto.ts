import { ApiProperty, ApiPropertyOptional } from "@nestjs/swagger";

export class AccountBalancesOutDto {
	@ApiProperty({ example: "maker.example" })
	account!: string;

	@ApiProperty({
		description: "Balance per asset, in base units as decimal strings",
		example: { "asset:usdc": "1990" },
		type: "object",
		additionalProperties: { type: "string" },
	})
	balances!: Record<string, string>;
}

export class SettledTransferOutDto {
	@ApiProperty({ example: "leg_V1StGXR8_Z5jdHi6" })
	legId!: string;

	@ApiProperty({ example: "esc_3f1c0f8d9b2a4e6c7d8e9f0a1b2c3d4e5f6a7b8c" })
	escrowId!: string;

	@ApiProperty({ example: "asset:usdc" })
	asset!: string;

	@ApiProperty({ example: "1990" })
	amount!: string;

	@ApiProperty({ example: "maker.example" })
	receiver!: string;

	@ApiPropertyOptional({ example: "fee" })
	memo?: string;

	@ApiProperty({ enum: ["success", "failure", "unknown"] })
	result!: "success" | "failure" | "unknown";

	@ApiProperty({
		description: "Unix epoch in milliseconds",
		example: 1732690234123,
	})
	settledAt!: number;
}
