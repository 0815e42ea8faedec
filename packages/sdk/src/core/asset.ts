/**
 * Asset helpers
 *
 * Constructors and validation for the asset descriptors moved by the
 * settlement engine.
 */

import { LoanError } from "./errors.js";
import { ASSET_CATEGORIES, Address, Asset } from "./types.js";

/**
 * Describe a fungible amount of `assetAddress`.
 */
export function fungible(assetAddress: Address, amount: bigint): Asset {
	return { category: "fungible", assetAddress, id: 0n, amount };
}

/**
 * Check the category-specific shape of an asset descriptor.
 */
export function isValidAsset(asset: Asset): boolean {
	if (!ASSET_CATEGORIES.includes(asset.category)) return false;
	if (asset.assetAddress.length === 0) return false;
	if (asset.id < 0n || asset.amount < 0n) return false;

	switch (asset.category) {
		case "fungible":
			return asset.id === 0n;
		case "unique":
			return asset.amount === 0n || asset.amount === 1n;
		case "semi-fungible":
			return asset.amount > 0n;
	}
}

/**
 * Throw `INVALID_ASSET` unless the descriptor is well-formed.
 */
export function assertValidAsset(asset: Asset, role: string): void {
	if (!isValidAsset(asset)) {
		throw new LoanError(`Invalid ${role} asset`, "INVALID_ASSET", {
			role,
			category: asset.category,
			assetAddress: asset.assetAddress,
		});
	}
}

export function assetsEqual(a: Asset, b: Asset): boolean {
	return (
		a.category === b.category &&
		a.assetAddress === b.assetAddress &&
		a.id === b.id &&
		a.amount === b.amount
	);
}

/**
 * Units actually moved for an asset (unique assets always move one).
 */
export function transferUnits(asset: Asset): bigint {
	return asset.category === "unique" ? 1n : asset.amount;
}
