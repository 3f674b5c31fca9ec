import { Column, Entity, Index, PrimaryGeneratedColumn, Unique } from "typeorm";
import type { AssetSide, LegKind } from "@escrow-settlement/engine";

export const LEG_KINDS = [
	"maker-payout",
	"taker-payout",
	"protocol-fee",
	"integrator-fee",
	"maker-refund",
	"lost-retry",
] as const satisfies readonly LegKind[];

/**
 * Outbound transfer awaiting its outcome. Rows are removed once the
 * outcome is reconciled.
 */
@Entity("escrow_transfer_legs")
@Unique("uq_escrow_transfer_legs_leg_id", ["legId"])
export class EscrowTransferLeg {
	@PrimaryGeneratedColumn()
	id!: number;

	@Index({ unique: true })
	@Column({ type: "text" })
	legId!: string;

	@Index()
	@Column({ type: "text" })
	escrowId!: string;

	@Column({ type: "text", enum: LEG_KINDS })
	kind!: LegKind;

	@Column({ type: "text" })
	asset!: string;

	@Column({ type: "text" })
	amount!: string;

	@Column({ type: "text" })
	receiver!: string;

	@Column({ type: "text", nullable: true })
	memo!: string | null;

	@Column({ type: "text", nullable: true })
	message!: string | null;

	@Column({ type: "integer", nullable: true })
	minBudget!: number | null;

	@Column({ type: "text", nullable: true })
	makerSide!: AssetSide | null;

	@Column({ type: "boolean", default: false })
	retry!: boolean;

	@Column({ type: "integer" })
	issuedAt!: number;
}
