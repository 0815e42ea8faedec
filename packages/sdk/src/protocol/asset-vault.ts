/**
 * Asset Vault
 *
 * Ledger-backed {@link AssetTransfer}. Balances are tracked per
 * (category, asset, id, owner); custody is an ordinary account that the
 * engine operates. Moving assets out of someone else's account needs an
 * allowance (fungible), an approval for all, or a permit.
 */

import { LoanError } from "../core/errors.js";
import { Address, Asset, AssetCategory, Clock, Permit, systemClock } from "../core/types.js";
import { assertValidAsset, transferUnits } from "../core/asset.js";
import { hashWords } from "../utils/encoding.js";
import { AssetTransfer, SignatureVerifier, Snapshottable } from "./types.js";

/**
 * Identifies a balance line (amount excluded).
 */
export interface HoldingKey {
	category: AssetCategory;
	assetAddress: Address;
	id: bigint;
}

/**
 * Storage behind the vault.
 */
export interface HoldingsBook {
	balanceOf(key: HoldingKey, owner: Address): Promise<bigint>;
	setBalance(key: HoldingKey, owner: Address, amount: bigint): Promise<void>;
	/** Balances held by `owner`, zero lines excluded */
	holdingsOf(owner: Address): Promise<Array<HoldingKey & { amount: bigint }>>;
	allowance(assetAddress: Address, owner: Address, spender: Address): Promise<bigint>;
	setAllowance(
		assetAddress: Address,
		owner: Address,
		spender: Address,
		amount: bigint,
	): Promise<void>;
	isApprovedForAll(
		assetAddress: Address,
		owner: Address,
		operator: Address,
	): Promise<boolean>;
	setApprovalForAll(
		assetAddress: Address,
		owner: Address,
		operator: Address,
		approved: boolean,
	): Promise<void>;
}

export interface AssetVaultOptions {
	clock?: Clock;
	/** When set, permits must carry a signature by their owner */
	permitVerifier?: SignatureVerifier;
}

/**
 * Hash a permit signs over, binding it to the spender.
 */
export function permitHash(permit: Permit, spender: Address): string {
	return hashWords([
		"Permit",
		permit.assetAddress,
		permit.owner,
		spender,
		permit.amount,
		permit.deadline,
	]);
}

export class AssetVault implements AssetTransfer {
	private readonly clock: Clock;

	constructor(
		protected readonly book: HoldingsBook,
		readonly custody: Address,
		private readonly options: AssetVaultOptions = {},
	) {
		this.clock = options.clock ?? systemClock;
	}

	async pull(asset: Asset, from: Address, permit?: Permit): Promise<void> {
		await this.move(asset, from, this.custody, permit);
	}

	async push(asset: Asset, to: Address): Promise<void> {
		await this.move(asset, this.custody, to);
	}

	async pushFrom(
		asset: Asset,
		from: Address,
		to: Address,
		permit?: Permit,
	): Promise<void> {
		await this.move(asset, from, to, permit);
	}

	/**
	 * Credit `owner` with newly issued units.
	 */
	async deposit(asset: Asset, owner: Address): Promise<void> {
		assertValidAsset(asset, "deposit");
		const key = holdingKey(asset);
		const balance = await this.book.balanceOf(key, owner);
		await this.book.setBalance(key, owner, balance + transferUnits(asset));
	}

	async approve(
		assetAddress: Address,
		owner: Address,
		spender: Address,
		amount: bigint,
	): Promise<void> {
		if (amount < 0n) {
			throw new LoanError("Allowance cannot be negative", "OUT_OF_BOUNDS", {
				amount: amount.toString(),
			});
		}
		await this.book.setAllowance(assetAddress, owner, spender, amount);
	}

	async setApprovalForAll(
		assetAddress: Address,
		owner: Address,
		operator: Address,
		approved: boolean,
	): Promise<void> {
		await this.book.setApprovalForAll(assetAddress, owner, operator, approved);
	}

	balanceOf(key: HoldingKey, owner: Address): Promise<bigint> {
		return this.book.balanceOf(key, owner);
	}

	holdingsOf(owner: Address): Promise<Array<HoldingKey & { amount: bigint }>> {
		return this.book.holdingsOf(owner);
	}

	private async move(
		asset: Asset,
		from: Address,
		to: Address,
		permit?: Permit,
	): Promise<void> {
		assertValidAsset(asset, "transfer");
		const units = transferUnits(asset);
		if (units === 0n) return;

		if (permit) await this.applyPermit(permit, from);
		if (from !== this.custody) await this.spend(asset, from, units);

		const key = holdingKey(asset);
		const fromBalance = await this.book.balanceOf(key, from);
		if (fromBalance < units) {
			throw new LoanError(
				`Insufficient ${asset.assetAddress} balance for ${from}`,
				"INSUFFICIENT_FUNDS",
				{
					assetAddress: asset.assetAddress,
					owner: from,
					balance: fromBalance.toString(),
					required: units.toString(),
				},
			);
		}
		await this.book.setBalance(key, from, fromBalance - units);
		const toBalance = await this.book.balanceOf(key, to);
		await this.book.setBalance(key, to, toBalance + units);
	}

	/**
	 * Check and consume the custody's right to move `from`'s assets.
	 */
	private async spend(asset: Asset, from: Address, units: bigint): Promise<void> {
		if (
			await this.book.isApprovedForAll(asset.assetAddress, from, this.custody)
		) {
			return;
		}
		if (asset.category === "fungible") {
			const allowance = await this.book.allowance(
				asset.assetAddress,
				from,
				this.custody,
			);
			if (allowance >= units) {
				await this.book.setAllowance(
					asset.assetAddress,
					from,
					this.custody,
					allowance - units,
				);
				return;
			}
		}
		throw new LoanError(
			`Vault is not approved to move ${asset.assetAddress} for ${from}`,
			"UNAUTHORIZED",
			{ assetAddress: asset.assetAddress, owner: from },
		);
	}

	private async applyPermit(permit: Permit, from: Address): Promise<void> {
		if (permit.owner !== from) {
			throw new LoanError("Permit owner does not match", "UNAUTHORIZED", {
				owner: permit.owner,
				from,
			});
		}
		if (this.clock() > permit.deadline) {
			throw new LoanError("Permit expired", "EXPIRED", {
				deadline: permit.deadline,
			});
		}
		const verifier = this.options.permitVerifier;
		if (verifier) {
			const valid =
				permit.signature !== undefined &&
				(await verifier.isValidSignature(
					permit.owner,
					permitHash(permit, this.custody),
					permit.signature,
				));
			if (!valid) {
				throw new LoanError("Invalid permit signature", "UNAUTHORIZED", {
					owner: permit.owner,
				});
			}
		}
		await this.book.setAllowance(
			permit.assetAddress,
			permit.owner,
			this.custody,
			permit.amount,
		);
	}
}

function holdingKey(asset: Asset): HoldingKey {
	return {
		category: asset.category,
		assetAddress: asset.assetAddress,
		id: asset.id,
	};
}

/**
 * {@link HoldingsBook} kept in process.
 */
export class MemoryHoldingsBook implements HoldingsBook, Snapshottable {
	private balances: Map<string, { key: HoldingKey; owner: Address; amount: bigint }> =
		new Map();
	private allowances: Map<string, bigint> = new Map();
	private operators: Set<string> = new Set();

	async balanceOf(key: HoldingKey, owner: Address): Promise<bigint> {
		return this.balances.get(balanceKey(key, owner))?.amount ?? 0n;
	}

	async setBalance(key: HoldingKey, owner: Address, amount: bigint): Promise<void> {
		this.balances.set(balanceKey(key, owner), { key: { ...key }, owner, amount });
	}

	async holdingsOf(owner: Address): Promise<Array<HoldingKey & { amount: bigint }>> {
		return Array.from(this.balances.values())
			.filter((line) => line.owner === owner && line.amount > 0n)
			.map((line) => ({ ...line.key, amount: line.amount }));
	}

	async allowance(
		assetAddress: Address,
		owner: Address,
		spender: Address,
	): Promise<bigint> {
		return this.allowances.get(`${assetAddress}:${owner}:${spender}`) ?? 0n;
	}

	async setAllowance(
		assetAddress: Address,
		owner: Address,
		spender: Address,
		amount: bigint,
	): Promise<void> {
		this.allowances.set(`${assetAddress}:${owner}:${spender}`, amount);
	}

	async isApprovedForAll(
		assetAddress: Address,
		owner: Address,
		operator: Address,
	): Promise<boolean> {
		return this.operators.has(`${assetAddress}:${owner}:${operator}`);
	}

	async setApprovalForAll(
		assetAddress: Address,
		owner: Address,
		operator: Address,
		approved: boolean,
	): Promise<void> {
		const key = `${assetAddress}:${owner}:${operator}`;
		if (approved) this.operators.add(key);
		else this.operators.delete(key);
	}

	checkpoint(): () => void {
		const balances = new Map(this.balances);
		const allowances = new Map(this.allowances);
		const operators = new Set(this.operators);
		return () => {
			this.balances = balances;
			this.allowances = allowances;
			this.operators = operators;
		};
	}
}

function balanceKey(key: HoldingKey, owner: Address): string {
	return `${key.category}:${key.assetAddress}:${key.id}:${owner}`;
}

/**
 * Asset vault over a {@link MemoryHoldingsBook}.
 */
export class MemoryAssetVault extends AssetVault implements Snapshottable {
	constructor(
		custody: Address,
		options: AssetVaultOptions = {},
		private readonly holdings: MemoryHoldingsBook = new MemoryHoldingsBook(),
	) {
		super(holdings, custody, options);
	}

	checkpoint(): () => void {
		return this.holdings.checkpoint();
	}
}
