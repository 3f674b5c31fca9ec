/**
 * TypeORM Escrow Store
 *
 * Implements the engine's `EscrowStore` on the escrow tables. An instance
 * and its pending legs are written in one transaction; cleanup swaps both
 * for a tombstone.
 */

import { Injectable } from "@nestjs/common";
import { DataSource, In, type EntityManager } from "typeorm";
import {
	type EscrowQuery,
	type EscrowSnapshot,
	type EscrowStore,
	type TransferLegJson,
	StorageError,
} from "@escrow-settlement/engine";
import { EscrowInstance } from "./escrow-instance.entity";
import { EscrowTransferLeg } from "./escrow-transfer-leg.entity";
import { EscrowCleanup } from "./escrow-cleanup.entity";

function toLegJson(row: EscrowTransferLeg): TransferLegJson {
	return {
		legId: row.legId,
		escrowId: row.escrowId,
		kind: row.kind,
		asset: row.asset,
		amount: row.amount,
		receiver: row.receiver,
		memo: row.memo ?? undefined,
		message: row.message ?? undefined,
		minBudget: row.minBudget ?? undefined,
		makerSide: row.makerSide ?? undefined,
		retry: row.retry,
		issuedAt: row.issuedAt,
	};
}

function toSnapshot(
	row: EscrowInstance,
	legs: EscrowTransferLeg[],
): EscrowSnapshot {
	return {
		id: row.externalId,
		lifecycle: row.lifecycle,
		ledger: {
			paramsFingerprint: row.fingerprint,
			srcRemaining: row.srcRemaining,
			dstLost: row.dstLost,
			srcLost: row.srcLost,
			closed: row.closed,
			inFlight: row.inFlight,
		},
		pending: legs
			.filter((leg) => leg.escrowId === row.externalId)
			.sort((a, b) => a.id - b.id)
			.map(toLegJson),
		maker: row.maker,
		srcAsset: row.srcAsset,
		dstAsset: row.dstAsset,
		deadline: row.deadline,
		createdAt: row.createdAt,
		updatedAt: row.updatedAt,
	};
}

@Injectable()
export class TypeOrmEscrowStore implements EscrowStore {
	constructor(private readonly dataSource: DataSource) {}

	async load(id: string): Promise<EscrowSnapshot | null> {
		try {
			const row = await this.dataSource
				.getRepository(EscrowInstance)
				.findOne({ where: { externalId: id } });
			if (!row) return null;
			const legs = await this.dataSource
				.getRepository(EscrowTransferLeg)
				.find({ where: { escrowId: id } });
			return toSnapshot(row, legs);
		} catch (error) {
			throw new StorageError(`Failed to load escrow ${id}`, "LOAD_ERROR", {
				error,
			});
		}
	}

	async save(snapshot: EscrowSnapshot): Promise<void> {
		try {
			await this.dataSource.transaction(async (manager) => {
				await this.writeInstance(manager, snapshot);
				await this.writeLegs(manager, snapshot);
			});
		} catch (error) {
			throw new StorageError(
				`Failed to save escrow ${snapshot.id}`,
				"SAVE_ERROR",
				{ error },
			);
		}
	}

	async delete(id: string, cleanedAt: number): Promise<void> {
		try {
			await this.dataSource.transaction(async (manager) => {
				await manager.delete(EscrowTransferLeg, { escrowId: id });
				await manager.delete(EscrowInstance, { externalId: id });
				await manager.save(
					manager.create(EscrowCleanup, { escrowId: id, cleanedAt }),
				);
			});
		} catch (error) {
			throw new StorageError(`Failed to delete escrow ${id}`, "DELETE_ERROR", {
				error,
			});
		}
	}

	async isCleanedUp(id: string): Promise<boolean> {
		const count = await this.dataSource
			.getRepository(EscrowCleanup)
			.count({ where: { escrowId: id } });
		return count > 0;
	}

	async list(query: EscrowQuery = {}): Promise<EscrowSnapshot[]> {
		try {
			const qb = this.dataSource
				.getRepository(EscrowInstance)
				.createQueryBuilder("e");

			if (query.lifecycle !== undefined) {
				const lifecycles = Array.isArray(query.lifecycle)
					? query.lifecycle
					: [query.lifecycle];
				qb.andWhere("e.lifecycle IN (:...lifecycles)", { lifecycles });
			}
			if (query.maker !== undefined) {
				qb.andWhere("e.maker = :maker", { maker: query.maker });
			}

			qb.orderBy("e.createdAt", "DESC").addOrderBy("e.externalId", "ASC");
			if (query.offset !== undefined) qb.skip(query.offset);
			if (query.limit !== undefined) qb.take(query.limit);

			const rows = await qb.getMany();
			if (rows.length === 0) return [];
			const legs = await this.dataSource.getRepository(EscrowTransferLeg).find({
				where: { escrowId: In(rows.map((row) => row.externalId)) },
			});
			return rows.map((row) => toSnapshot(row, legs));
		} catch (error) {
			throw new StorageError("Failed to list escrows", "QUERY_ERROR", {
				error,
				query,
			});
		}
	}

	private async writeInstance(
		manager: EntityManager,
		snapshot: EscrowSnapshot,
	): Promise<void> {
		const fields = {
			fingerprint: snapshot.ledger.paramsFingerprint,
			lifecycle: snapshot.lifecycle,
			maker: snapshot.maker,
			srcAsset: snapshot.srcAsset,
			dstAsset: snapshot.dstAsset,
			deadline: snapshot.deadline,
			srcRemaining: snapshot.ledger.srcRemaining,
			dstLost: snapshot.ledger.dstLost,
			srcLost: snapshot.ledger.srcLost,
			closed: snapshot.ledger.closed,
			inFlight: snapshot.ledger.inFlight,
			createdAt: snapshot.createdAt,
			updatedAt: snapshot.updatedAt,
		};
		const existing = await manager.findOne(EscrowInstance, {
			where: { externalId: snapshot.id },
		});
		if (existing) {
			await manager.update(EscrowInstance, { externalId: snapshot.id }, fields);
		} else {
			await manager.save(
				manager.create(EscrowInstance, { ...fields, externalId: snapshot.id }),
			);
		}
	}

	/**
	 * Make the stored legs match the snapshot's pending table: reconciled
	 * legs are removed, newly issued ones inserted.
	 */
	private async writeLegs(
		manager: EntityManager,
		snapshot: EscrowSnapshot,
	): Promise<void> {
		const stored = await manager.find(EscrowTransferLeg, {
			where: { escrowId: snapshot.id },
		});
		const pendingIds = new Set(snapshot.pending.map((leg) => leg.legId));
		const storedIds = new Set(stored.map((leg) => leg.legId));

		const settled = stored
			.filter((leg) => !pendingIds.has(leg.legId))
			.map((leg) => leg.legId);
		if (settled.length > 0) {
			await manager.delete(EscrowTransferLeg, { legId: In(settled) });
		}

		const issued = snapshot.pending.filter((leg) => !storedIds.has(leg.legId));
		if (issued.length > 0) {
			await manager.save(
				issued.map((leg) =>
					manager.create(EscrowTransferLeg, {
						legId: leg.legId,
						escrowId: leg.escrowId,
						kind: leg.kind,
						asset: leg.asset,
						amount: leg.amount,
						receiver: leg.receiver,
						memo: leg.memo ?? null,
						message: leg.message ?? null,
						minBudget: leg.minBudget ?? null,
						makerSide: leg.makerSide ?? null,
						retry: leg.retry,
						issuedAt: leg.issuedAt,
					}),
				),
			);
		}
	}
}
