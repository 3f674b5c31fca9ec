import { Column, Entity, PrimaryColumn } from "typeorm";

/**
 * Tombstone of a torn-down instance.
 */
@Entity("escrow_cleanups")
export class EscrowCleanup {
	@PrimaryColumn({ type: "text" })
	escrowId!: string;

	@Column({ type: "integer" })
	cleanedAt!: number;
}
