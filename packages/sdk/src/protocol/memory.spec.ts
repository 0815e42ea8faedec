import {
	MemoryAtomicScope,
	MemoryCapabilityRegistry,
	MemoryNonceRevocation,
	MemoryPositionToken,
	StaticFeeSource,
} from "./memory.js";

describe("MemoryPositionToken", () => {
	it("mints increasing ids and never reuses burned ones", async () => {
		const token = new MemoryPositionToken();

		expect(await token.mint("alice")).toBe(1);
		expect(await token.mint("bob")).toBe(2);
		await token.burn(2);
		expect(await token.mint("carol")).toBe(3);
		expect(await token.ownerOf(2)).toBeNull();
		expect(await token.ownerOf(3)).toBe("carol");
	});

	it("transfers only from the current owner", async () => {
		const token = new MemoryPositionToken();
		const id = await token.mint("alice");

		await expect(token.transfer(id, "bob", "carol")).rejects.toMatchObject({
			code: "UNAUTHORIZED",
		});
		await token.transfer(id, "alice", "carol");
		expect(await token.ownerOf(id)).toBe("carol");
	});

	it("refuses to burn a missing token", async () => {
		await expect(new MemoryPositionToken().burn(5)).rejects.toMatchObject({
			code: "NOT_FOUND",
		});
	});
});

describe("MemoryNonceRevocation", () => {
	it("tracks revoked nonces per space", async () => {
		const nonces = new MemoryNonceRevocation();

		expect(await nonces.isNonceUsable("alice", 0n, 1n)).toBe(true);
		await nonces.revokeNonce("alice", 0n, 1n);
		expect(await nonces.isNonceUsable("alice", 0n, 1n)).toBe(false);
		expect(await nonces.isNonceUsable("alice", 0n, 2n)).toBe(true);
		expect(await nonces.isNonceUsable("bob", 0n, 1n)).toBe(true);
		await expect(nonces.revokeNonce("alice", 0n, 1n)).rejects.toMatchObject({
			code: "NONCE_NOT_USABLE",
		});
	});

	it("invalidates a whole space at once", async () => {
		const nonces = new MemoryNonceRevocation();

		expect(await nonces.revokeNonceSpace("alice")).toBe(1n);
		expect(await nonces.isNonceUsable("alice", 0n, 7n)).toBe(false);
		expect(await nonces.isNonceUsable("alice", 1n, 7n)).toBe(true);
	});
});

describe("StaticFeeSource", () => {
	it("reads the current fee on every call", async () => {
		const fees = new StaticFeeSource(25n, "treasury");
		expect(await fees.fee()).toBe(25n);

		fees.setFee(50n);
		expect(await fees.fee()).toBe(50n);
		expect(await fees.feeCollector()).toBe("treasury");
	});
});

describe("MemoryCapabilityRegistry", () => {
	it("grants and revokes tags", async () => {
		const registry = new MemoryCapabilityRegistry();
		registry.grant("proposals", "LOAN_PROPOSAL");

		expect(await registry.hasTag("proposals", "LOAN_PROPOSAL")).toBe(true);
		expect(await registry.hasTag("someone", "LOAN_PROPOSAL")).toBe(false);

		registry.revoke("proposals", "LOAN_PROPOSAL");
		expect(await registry.hasTag("proposals", "LOAN_PROPOSAL")).toBe(false);
	});
});

describe("MemoryAtomicScope", () => {
	it("rolls every participant back when the operation fails", async () => {
		const token = new MemoryPositionToken();
		const nonces = new MemoryNonceRevocation();
		const scope = new MemoryAtomicScope([token, nonces]);
		await token.mint("alice");

		await expect(
			scope.run(async () => {
				await token.mint("bob");
				await nonces.revokeNonce("alice", 0n, 1n);
				throw new Error("boom");
			}),
		).rejects.toThrow("boom");

		expect(await token.ownerOf(2)).toBeNull();
		expect(await nonces.isNonceUsable("alice", 0n, 1n)).toBe(true);
		expect(await token.mint("carol")).toBe(2);
	});

	it("keeps the effects of a successful operation", async () => {
		const token = new MemoryPositionToken();
		const scope = new MemoryAtomicScope([token]);

		const id = await scope.run(() => token.mint("alice"));

		expect(await token.ownerOf(id)).toBe("alice");
	});

	it("serializes concurrent operations", async () => {
		const scope = new MemoryAtomicScope([]);
		const order: string[] = [];
		const slow = scope.run(async () => {
			order.push("slow:start");
			await new Promise((resolve) => setTimeout(resolve, 10));
			order.push("slow:end");
		});
		const fast = scope.run(async () => {
			order.push("fast");
		});

		await Promise.all([slow, fast]);

		expect(order).toEqual(["slow:start", "slow:end", "fast"]);
	});
});
