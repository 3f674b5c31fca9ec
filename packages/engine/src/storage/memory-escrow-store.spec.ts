import { Escrow } from "../escrow/escrow.js";
import { EscrowSnapshot } from "../escrow/types.js";
import { MAKER, NOW, makeContext, makeParams } from "../../test/fixtures.js";
import { MemoryEscrowStore } from "./memory-escrow-store.js";

function snapshotAt(createdAt: number, salt: string, maker = MAKER): EscrowSnapshot {
	return Escrow.init(makeParams({ salt, maker }), makeContext(createdAt)).snapshot();
}

describe("MemoryEscrowStore", () => {
	let store: MemoryEscrowStore;

	beforeEach(() => {
		store = new MemoryEscrowStore();
	});

	it("returns copies of what it stores", async () => {
		const snapshot = snapshotAt(NOW, "01".repeat(32));
		await store.save(snapshot);
		snapshot.ledger.srcRemaining = "999";

		const loaded = await store.load(snapshot.id);
		expect(loaded?.ledger.srcRemaining).toBe("0");
		if (loaded) loaded.maker = "changed.test";
		expect((await store.load(snapshot.id))?.maker).toBe(MAKER);
	});

	it("returns null for unknown ids", async () => {
		expect(await store.load("esc_missing")).toBeNull();
		expect(await store.isCleanedUp("esc_missing")).toBe(false);
	});

	it("remembers deleted instances", async () => {
		const snapshot = snapshotAt(NOW, "01".repeat(32));
		await store.save(snapshot);
		await store.delete(snapshot.id, NOW + 5);
		expect(await store.load(snapshot.id)).toBeNull();
		expect(await store.isCleanedUp(snapshot.id)).toBe(true);
		expect(store.size()).toBe(0);
	});

	it("lists newest first with filters and paging", async () => {
		const older = snapshotAt(NOW, "01".repeat(32));
		const newer = snapshotAt(NOW + 1, "02".repeat(32));
		const otherMaker = snapshotAt(NOW + 2, "03".repeat(32), "someone.test");
		const closed = { ...snapshotAt(NOW + 3, "04".repeat(32)), lifecycle: "closed" as const };
		for (const snapshot of [older, newer, otherMaker, closed]) {
			await store.save(snapshot);
		}

		const ids = (list: EscrowSnapshot[]) => list.map((s) => s.id);
		expect(ids(await store.list())).toEqual([closed.id, otherMaker.id, newer.id, older.id]);
		expect(ids(await store.list({ maker: MAKER, lifecycle: "open" }))).toEqual([
			newer.id,
			older.id,
		]);
		expect(ids(await store.list({ lifecycle: ["closed", "cleaned"] }))).toEqual([closed.id]);
		expect(ids(await store.list({ offset: 1, limit: 2 }))).toEqual([otherMaker.id, newer.id]);
	});
});
