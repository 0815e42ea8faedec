import { LoanRecordBase } from "../core/loan.js";
import {
	MemoryExtensionProposalStore,
	MemoryLoanStore,
} from "./memory-adapter.js";

function record(id: number, overrides: Partial<LoanRecordBase> = {}): LoanRecordBase {
	return {
		id,
		status: "running",
		creditAddress: "usd",
		borrower: "alice",
		originalLender: "bob",
		startTimestamp: 0,
		lastUpdateTimestamp: 0,
		defaultTimestamp: 1_000,
		fixedInterestAmount: 0n,
		principalAmount: 100n,
		collateral: { category: "unique", assetAddress: "nft", id: BigInt(id), amount: 1n },
		...overrides,
	};
}

describe("MemoryLoanStore", () => {
	let store: MemoryLoanStore<LoanRecordBase>;

	beforeEach(() => {
		store = new MemoryLoanStore();
	});

	it("saves and loads copies", async () => {
		const loan = record(1);
		await store.save(loan);
		loan.principalAmount = 1n;
		loan.collateral.amount = 0n;

		const loaded = await store.load(1);
		expect(loaded?.principalAmount).toBe(100n);
		expect(loaded?.collateral.amount).toBe(1n);
		expect(await store.load(2)).toBeNull();
	});

	it("deletes records and tolerates missing ids", async () => {
		await store.save(record(1));
		await store.delete(1);
		await store.delete(42);

		expect(await store.load(1)).toBeNull();
		expect(store.size()).toBe(0);
	});

	it("queries by status and borrower with pagination", async () => {
		await store.save(record(3));
		await store.save(record(1, { status: "repaid" }));
		await store.save(record(2, { borrower: "carol" }));
		await store.save(record(4));

		const running = await store.query({ status: "running", borrower: "alice" });
		expect(running.items.map((l) => l.id)).toEqual([3, 4]);
		expect(running.total).toBe(2);

		const page = await store.query({ limit: 2, offset: 1 });
		expect(page.items.map((l) => l.id)).toEqual([2, 3]);
		expect(page.total).toBe(4);
		expect(page.hasMore).toBe(true);
	});

	it("restores a checkpoint", async () => {
		await store.save(record(1));
		const rollback = store.checkpoint();
		await store.save(record(2));
		await store.delete(1);

		rollback();

		expect(await store.load(1)).toEqual(record(1));
		expect(await store.load(2)).toBeNull();
	});
});

describe("MemoryExtensionProposalStore", () => {
	it("records made proposals by hash", async () => {
		const store = new MemoryExtensionProposalStore();
		const rollback = store.checkpoint();
		await store.markMade("0xabc");

		expect(await store.isMade("0xabc")).toBe(true);
		expect(await store.isMade("0xdef")).toBe(false);

		rollback();
		expect(await store.isMade("0xabc")).toBe(false);
	});
});
