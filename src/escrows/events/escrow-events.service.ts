import { Injectable, Logger } from "@nestjs/common";
import { OnEvent } from "@nestjs/event-emitter";
import { InjectRepository } from "@nestjs/typeorm";
import { MoreThan, type Repository } from "typeorm";
import type { EscrowEvent } from "@escrow-settlement/engine";
import { EscrowEventRecord } from "./escrow-event.entity";

export type EscrowEventLogEntry = {
	sequence: number;
	name: EscrowEvent["type"];
	payload: EscrowEvent;
	recordedAt: number;
};

/**
 * Appends every engine event to `escrow_events` and serves the log.
 */
@Injectable()
export class EscrowEventsService {
	private readonly logger = new Logger(EscrowEventsService.name);

	constructor(
		@InjectRepository(EscrowEventRecord)
		private readonly repo: Repository<EscrowEventRecord>,
	) {}

	@OnEvent("escrow.*", { suppressErrors: false })
	async append(event: EscrowEvent): Promise<void> {
		await this.repo.save(
			this.repo.create({
				escrowId: event.escrowId,
				name: event.type,
				payload: event,
			}),
		);
		this.logger.debug(`Recorded ${event.type} for ${event.escrowId}`);
	}

	async findByEscrow(
		escrowId: string,
		afterSequence = 0,
		limit = 100,
	): Promise<EscrowEventLogEntry[]> {
		const rows = await this.repo.find({
			where: { escrowId, sequence: MoreThan(afterSequence) },
			order: { sequence: "ASC" },
			take: Math.min(limit, 500),
		});
		return rows.map((row) => ({
			sequence: row.sequence,
			name: row.name,
			payload: row.payload,
			recordedAt: row.recordedAt.getTime(),
		}));
	}
}
