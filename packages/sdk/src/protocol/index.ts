/**
 * Protocol module - Collaborators the engines call
 *
 * This module defines the collaborator interfaces and provides
 * in-memory reference implementations.
 */

// Types
export type {
	PositionToken,
	AssetTransfer,
	FeeSource,
	CapabilityRegistry,
	NonceRevocation,
	SignatureVerifier,
	AtomicScope,
	Snapshottable,
} from "./types.js";

export { LOAN_PROPOSAL_TAG } from "./types.js";

// Reference implementations
export {
	MemoryPositionToken,
	StaticFeeSource,
	MemoryCapabilityRegistry,
	MemoryNonceRevocation,
	MemoryAtomicScope,
} from "./memory.js";

export {
	type HoldingKey,
	type HoldingsBook,
	type AssetVaultOptions,
	AssetVault,
	MemoryAssetVault,
	MemoryHoldingsBook,
	permitHash,
} from "./asset-vault.js";

export { SchnorrSignatureVerifier } from "./schnorr-verifier.js";
