import { Column, Entity, Index, PrimaryGeneratedColumn, Unique } from "typeorm";
import { LIFECYCLE_STATES, type LifecycleState } from "@escrow-settlement/engine";

/**
 * Persisted state of one live escrow instance. Amounts are decimal strings;
 * timestamps are epoch milliseconds from the engine clock.
 */
@Entity("escrow_instances")
@Unique("uq_escrow_instances_external_id", ["externalId"])
export class EscrowInstance {
	@PrimaryGeneratedColumn()
	id!: number;

	@Index({ unique: true })
	@Column({ type: "text" })
	externalId!: string;

	@Column({ type: "text" })
	fingerprint!: string;

	@Index()
	@Column({ type: "text", enum: LIFECYCLE_STATES, default: "open" })
	lifecycle!: LifecycleState;

	@Index()
	@Column({ type: "text" })
	maker!: string;

	@Column({ type: "text" })
	srcAsset!: string;

	@Column({ type: "text" })
	dstAsset!: string;

	@Column({ type: "integer" })
	deadline!: number;

	@Column({ type: "text", default: "0" })
	srcRemaining!: string;

	@Column({ type: "text", default: "0" })
	dstLost!: string;

	@Column({ type: "text", default: "0" })
	srcLost!: string;

	@Column({ type: "boolean", default: false })
	closed!: boolean;

	@Column({ type: "integer", default: 0 })
	inFlight!: number;

	@Index()
	@Column({ type: "integer" })
	createdAt!: number;

	@Column({ type: "integer" })
	updatedAt!: number;
}
