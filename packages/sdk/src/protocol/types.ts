/**
 * Collaborator Interfaces
 *
 * The engines treat everything outside loan bookkeeping as a collaborator:
 * position tokens, asset movement, fees, capability tags, nonces and
 * signatures. Hosts implement these against their own ledger; the SDK
 * ships in-memory implementations for tests and single-process use.
 */

import { Address, Asset, Permit } from "../core/types.js";

/**
 * Capability tag allowing an address to originate and refinance loans.
 */
export const LOAN_PROPOSAL_TAG = "LOAN_PROPOSAL";

/**
 * Transferable token representing the lender's claim on a loan.
 *
 * Ownership transfer is entirely the token's concern.
 */
export interface PositionToken {
	/**
	 * Mint a token to `owner`.
	 *
	 * @returns The new token id, which becomes the loan id
	 */
	mint(owner: Address): Promise<number>;

	burn(id: number): Promise<void>;

	/**
	 * @returns The current holder, or null if no such token exists
	 */
	ownerOf(id: number): Promise<Address | null>;
}

/**
 * Asset movement primitives over fungible, unique and semi-fungible assets.
 *
 * Custody is the account of whoever runs the engine.
 */
export interface AssetTransfer {
	/**
	 * Move `asset` from `from` into custody.
	 */
	pull(asset: Asset, from: Address, permit?: Permit): Promise<void>;

	/**
	 * Move `asset` out of custody to `to`.
	 */
	push(asset: Asset, to: Address): Promise<void>;

	/**
	 * Move `asset` from `from` to `to` without passing through custody.
	 */
	pushFrom(
		asset: Asset,
		from: Address,
		to: Address,
		permit?: Permit,
	): Promise<void>;
}

/**
 * Protocol fee configuration, read fresh on every operation.
 */
export interface FeeSource {
	/** Fee in basis points (10_000 = 100%) */
	fee(): Promise<bigint>;
	feeCollector(): Promise<Address>;
}

/**
 * Tag lookup gating which addresses may call privileged operations.
 */
export interface CapabilityRegistry {
	hasTag(address: Address, tag: string): Promise<boolean>;
}

/**
 * Replay and cancellation bookkeeping for off-line proposals.
 *
 * A nonce is usable while its space is the owner's current space and the
 * nonce itself has not been revoked.
 */
export interface NonceRevocation {
	isNonceUsable(owner: Address, nonceSpace: bigint, nonce: bigint): Promise<boolean>;
	revokeNonce(owner: Address, nonceSpace: bigint, nonce: bigint): Promise<void>;
	currentNonceSpace(owner: Address): Promise<bigint>;
	/**
	 * Invalidate every nonce in the current space.
	 *
	 * @returns The new current space
	 */
	revokeNonceSpace(owner: Address): Promise<bigint>;
}

/**
 * Verifies off-line signatures over proposal hashes.
 */
export interface SignatureVerifier {
	isValidSignature(
		signer: Address,
		hash: string,
		signature: string,
	): Promise<boolean>;
}

/**
 * All-or-nothing execution of an operation.
 *
 * If `fn` throws, every effect made through the scope's participants is
 * undone and the error is rethrown. Scopes are not reentrant.
 */
export interface AtomicScope {
	run<T>(fn: () => Promise<T>): Promise<T>;
}

/**
 * State that can be restored by an in-memory atomic scope.
 */
export interface Snapshottable {
	/**
	 * Capture the current state.
	 *
	 * @returns A function restoring the captured state
	 */
	checkpoint(): () => void;
}
