/**
 * Core types for the Loanvault SDK
 *
 * These types form the foundation shared by the settlement engines,
 * the collaborator interfaces and the storage adapters.
 */

/**
 * Opaque account identifier.
 *
 * The SDK never interprets addresses beyond equality, so any stable
 * string works (hex accounts, x-only public keys, usernames in tests).
 */
export type Address = string;

/**
 * Unix timestamp in seconds.
 */
export type Timestamp = number;

/**
 * Source of the current time in seconds.
 */
export type Clock = () => Timestamp;

/**
 * Default clock reading the system time.
 */
export const systemClock: Clock = () => Math.floor(Date.now() / 1000);

/**
 * Token standards an asset transfer can move.
 *
 * - fungible: amount-based, `id` must be 0
 * - unique: id-based, `amount` must be 0 or 1
 * - semi-fungible: id + amount
 */
export type AssetCategory = "fungible" | "unique" | "semi-fungible";

export const ASSET_CATEGORIES: readonly AssetCategory[] = [
	"fungible",
	"unique",
	"semi-fungible",
];

/**
 * Asset descriptor moved by the settlement engine.
 */
export interface Asset {
	category: AssetCategory;
	/** Address of the token contract / asset registry */
	assetAddress: Address;
	/** Token id (0 for fungible assets) */
	id: bigint;
	/** Amount (0 or 1 for unique assets) */
	amount: bigint;
}

/**
 * Off-line approval authorizing a pull without a prior approval step.
 *
 * Signature checking belongs to the asset transfer implementation.
 */
export interface Permit {
	assetAddress: Address;
	owner: Address;
	amount: bigint;
	/** Last second the permit can be used */
	deadline: Timestamp;
	signature?: string;
}
