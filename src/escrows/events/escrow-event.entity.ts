import {
	Column,
	CreateDateColumn,
	Entity,
	Index,
	PrimaryGeneratedColumn,
} from "typeorm";
import type { EscrowEvent, EscrowEventType } from "@escrow-settlement/engine";

/**
 * Append-only log of engine events. `sequence` orders events across all
 * instances and outlives cleanup.
 */
@Entity("escrow_events")
export class EscrowEventRecord {
	@PrimaryGeneratedColumn()
	sequence!: number;

	@Index()
	@Column({ type: "text" })
	escrowId!: string;

	@Column({ type: "text" })
	name!: EscrowEventType;

	@Column({ type: "simple-json" })
	payload!: EscrowEvent;

	@CreateDateColumn()
	recordedAt!: Date;
}
