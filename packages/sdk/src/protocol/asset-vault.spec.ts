import { schnorr } from "@noble/curves/secp256k1";
import { fungible } from "../core/asset.js";
import { Asset, Permit } from "../core/types.js";
import { bytesToHex, hexToBytes } from "../utils/encoding.js";
import { MemoryAssetVault, permitHash } from "./asset-vault.js";
import { SchnorrSignatureVerifier } from "./schnorr-verifier.js";

const VAULT = "vault";
const usd = (amount: bigint) => fungible("usd", amount);
const usdKey = { category: "fungible" as const, assetAddress: "usd", id: 0n };
const nft: Asset = { category: "unique", assetAddress: "nft", id: 3n, amount: 1n };
const nftKey = { category: "unique" as const, assetAddress: "nft", id: 3n };

describe("MemoryAssetVault", () => {
	let now: number;
	let vault: MemoryAssetVault;

	beforeEach(async () => {
		now = 1_000;
		vault = new MemoryAssetVault(VAULT, { clock: () => now });
		await vault.deposit(usd(100n), "alice");
	});

	it("pulls with an allowance and consumes it", async () => {
		await vault.approve("usd", "alice", VAULT, 60n);

		await vault.pull(usd(40n), "alice");

		expect(await vault.balanceOf(usdKey, "alice")).toBe(60n);
		expect(await vault.balanceOf(usdKey, VAULT)).toBe(40n);
		await expect(vault.pull(usd(40n), "alice")).rejects.toMatchObject({
			code: "UNAUTHORIZED",
		});
	});

	it("pushes out of custody without approval", async () => {
		await vault.deposit(usd(10n), VAULT);

		await vault.push(usd(10n), "bob");

		expect(await vault.balanceOf(usdKey, "bob")).toBe(10n);
		expect(await vault.balanceOf(usdKey, VAULT)).toBe(0n);
	});

	it("moves directly between accounts with an approval for all", async () => {
		await vault.setApprovalForAll("usd", "alice", VAULT, true);

		await vault.pushFrom(usd(30n), "alice", "bob");

		expect(await vault.balanceOf(usdKey, "alice")).toBe(70n);
		expect(await vault.balanceOf(usdKey, "bob")).toBe(30n);
		expect(await vault.balanceOf(usdKey, VAULT)).toBe(0n);
	});

	it("rejects transfers above the balance", async () => {
		await vault.setApprovalForAll("usd", "alice", VAULT, true);

		await expect(vault.pushFrom(usd(101n), "alice", "bob")).rejects.toMatchObject({
			code: "INSUFFICIENT_FUNDS",
			details: { balance: "100", required: "101" },
		});
	});

	it("moves unique assets one unit at a time", async () => {
		await vault.deposit(nft, "alice");
		await vault.setApprovalForAll("nft", "alice", VAULT, true);

		await vault.pull({ ...nft, amount: 0n }, "alice");

		expect(await vault.balanceOf(nftKey, "alice")).toBe(0n);
		expect(await vault.balanceOf(nftKey, VAULT)).toBe(1n);
	});

	it("needs an approval for all to move unique assets", async () => {
		await vault.deposit(nft, "alice");
		await vault.approve("nft", "alice", VAULT, 1n);

		await expect(vault.pull(nft, "alice")).rejects.toMatchObject({
			code: "UNAUTHORIZED",
		});
	});

	it("lists non-zero holdings", async () => {
		await vault.deposit(nft, "alice");
		await vault.setApprovalForAll("usd", "alice", VAULT, true);
		await vault.pull(usd(100n), "alice");

		expect(await vault.holdingsOf("alice")).toEqual([{ ...nftKey, amount: 1n }]);
	});

	it("restores balances from a checkpoint", async () => {
		const rollback = vault.checkpoint();
		await vault.deposit(usd(5n), "bob");

		rollback();

		expect(await vault.balanceOf(usdKey, "bob")).toBe(0n);
		expect(await vault.balanceOf(usdKey, "alice")).toBe(100n);
	});

	describe("permits", () => {
		const permit: Permit = {
			assetAddress: "usd",
			owner: "alice",
			amount: 50n,
			deadline: 2_000,
		};

		it("authorizes a pull without a prior approval", async () => {
			await vault.pull(usd(50n), "alice", permit);

			expect(await vault.balanceOf(usdKey, VAULT)).toBe(50n);
		});

		it("rejects expired permits", async () => {
			now = 2_001;

			await expect(vault.pull(usd(50n), "alice", permit)).rejects.toMatchObject({
				code: "EXPIRED",
			});
		});

		it("rejects permits of another owner", async () => {
			await vault.deposit(usd(50n), "bob");

			await expect(vault.pull(usd(50n), "bob", permit)).rejects.toMatchObject({
				code: "UNAUTHORIZED",
			});
		});

		it("checks signatures when a verifier is configured", async () => {
			const privateKey = hexToBytes("11".repeat(32));
			const owner = bytesToHex(schnorr.getPublicKey(privateKey));
			const signed = new MemoryAssetVault(VAULT, {
				clock: () => now,
				permitVerifier: new SchnorrSignatureVerifier(),
			});
			await signed.deposit(usd(10n), owner);
			const unsigned: Permit = { ...permit, owner, amount: 10n };

			await expect(signed.pull(usd(10n), owner, unsigned)).rejects.toMatchObject({
				code: "UNAUTHORIZED",
			});

			const signature = bytesToHex(
				schnorr.sign(hexToBytes(permitHash(unsigned, VAULT)), privateKey),
			);
			await signed.pull(usd(10n), owner, { ...unsigned, signature });

			expect(await signed.balanceOf(usdKey, VAULT)).toBe(10n);
		});
	});
});
