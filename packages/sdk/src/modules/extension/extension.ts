/**
 * Extension Workflow
 *
 * Either party proposes to push a loan's deadline out for a price; the
 * other party accepts. A proposal is authorized when it was registered
 * on-ledger by its proposer or carries the proposer's signature.
 */

import { fungible } from "../../core/asset.js";
import { LoanError } from "../../core/errors.js";
import { Address, Asset, Timestamp } from "../../core/types.js";
import {
	NonceRevocation,
	SignatureVerifier,
} from "../../protocol/types.js";
import { ExtensionProposalStore } from "../../storage/types.js";
import { hashWords } from "../../utils/encoding.js";
import { SECONDS_IN_DAY } from "../default-policy/default-policy.js";

export const DEFAULT_MIN_EXTENSION_DURATION = SECONDS_IN_DAY;
export const DEFAULT_MAX_EXTENSION_DURATION = 90 * SECONDS_IN_DAY;

export interface ExtensionProposal {
	loanId: number;
	/** Fungible asset the compensation is paid in */
	compensationAddress: Address;
	/** Price paid by the borrower to the position holder */
	compensationAmount: bigint;
	/** Seconds added to the default timestamp */
	duration: number;
	/** Proposal is void from this second on */
	expiration: Timestamp;
	proposer: Address;
	nonceSpace: bigint;
	nonce: bigint;
}

/**
 * Context binding proposal hashes to one deployment.
 */
export interface ProposalDomain {
	name: string;
	version: string;
	chainId: bigint;
	verifyingContract: Address;
}

export type ExtensionAuthorization =
	| { kind: "registered" }
	| { kind: "signed"; signature: string };

export interface ExtensionBounds {
	minDuration: number;
	maxDuration: number;
}

/**
 * Parties of the loan being extended.
 */
export interface ExtensionParties {
	borrower: Address;
	holder: Address;
}

export interface ApprovedExtension {
	hash: string;
	/** Compensation owed by the borrower, null when free */
	compensation: Asset | null;
}

export function extensionProposalHash(
	proposal: ExtensionProposal,
	domain: ProposalDomain,
): string {
	return hashWords([
		domain.name,
		domain.version,
		domain.chainId,
		domain.verifyingContract,
		"ExtensionProposal",
		proposal.loanId,
		proposal.compensationAddress,
		proposal.compensationAmount,
		proposal.duration,
		proposal.expiration,
		proposal.proposer,
		proposal.nonceSpace,
		proposal.nonce,
	]);
}

export interface ExtensionWorkflowDeps {
	proposals: ExtensionProposalStore;
	nonces: NonceRevocation;
	signatures: SignatureVerifier;
	domain: ProposalDomain;
	bounds?: Partial<ExtensionBounds>;
}

export class ExtensionWorkflow {
	readonly bounds: ExtensionBounds;

	constructor(private readonly deps: ExtensionWorkflowDeps) {
		this.bounds = {
			minDuration: deps.bounds?.minDuration ?? DEFAULT_MIN_EXTENSION_DURATION,
			maxDuration: deps.bounds?.maxDuration ?? DEFAULT_MAX_EXTENSION_DURATION,
		};
		if (this.bounds.minDuration > this.bounds.maxDuration) {
			throw new RangeError("Minimum extension exceeds maximum extension");
		}
	}

	hash(proposal: ExtensionProposal): string {
		return extensionProposalHash(proposal, this.deps.domain);
	}

	isMade(proposal: ExtensionProposal): Promise<boolean> {
		return this.deps.proposals.isMade(this.hash(proposal));
	}

	/**
	 * Register a proposal on-ledger so the counterparty can accept it
	 * without a signature.
	 */
	async makeProposal(
		proposal: ExtensionProposal,
		caller: Address,
	): Promise<string> {
		if (caller !== proposal.proposer) {
			throw new LoanError(
				"Only the proposer can make an extension proposal",
				"UNAUTHORIZED",
				{ caller, proposer: proposal.proposer },
			);
		}
		const hash = this.hash(proposal);
		await this.deps.proposals.markMade(hash);
		return hash;
	}

	/**
	 * Check that `caller` may accept `proposal` at `now`.
	 *
	 * The loan status is checked by the engine before this runs.
	 */
	async approve(
		proposal: ExtensionProposal,
		caller: Address,
		parties: ExtensionParties,
		authorization: ExtensionAuthorization,
		now: Timestamp,
	): Promise<ApprovedExtension> {
		const { minDuration, maxDuration } = this.bounds;
		if (
			!Number.isInteger(proposal.duration) ||
			proposal.duration < minDuration ||
			proposal.duration > maxDuration
		) {
			throw new LoanError("Extension duration out of bounds", "OUT_OF_BOUNDS", {
				duration: proposal.duration,
				minDuration,
				maxDuration,
			});
		}

		const hash = this.hash(proposal);

		if (!(await this.isAuthorized(proposal, hash, authorization))) {
			throw new LoanError(
				"Extension proposal is not authorized by its proposer",
				"UNAUTHORIZED",
				{ hash, authorization: authorization.kind },
			);
		}

		if (now >= proposal.expiration) {
			throw new LoanError("Extension proposal expired", "EXPIRED", {
				hash,
				expiration: proposal.expiration,
			});
		}

		const usable = await this.deps.nonces.isNonceUsable(
			proposal.proposer,
			proposal.nonceSpace,
			proposal.nonce,
		);
		if (!usable) {
			throw new LoanError("Extension nonce is not usable", "NONCE_NOT_USABLE", {
				proposer: proposal.proposer,
				nonceSpace: proposal.nonceSpace.toString(),
				nonce: proposal.nonce.toString(),
			});
		}

		const counterparty =
			(proposal.proposer === parties.borrower && caller === parties.holder) ||
			(proposal.proposer === parties.holder && caller === parties.borrower);
		if (!counterparty) {
			throw new LoanError(
				"Caller is not the counterparty of the proposer",
				"UNAUTHORIZED",
				{ caller, proposer: proposal.proposer },
			);
		}

		if (proposal.compensationAmount < 0n) {
			throw new LoanError("Negative compensation", "OUT_OF_BOUNDS", {
				compensationAmount: proposal.compensationAmount.toString(),
			});
		}
		if (proposal.compensationAmount === 0n) {
			return { hash, compensation: null };
		}
		if (proposal.compensationAddress.length === 0) {
			throw new LoanError("Compensation asset missing", "INVALID_ASSET", {
				hash,
			});
		}
		return {
			hash,
			compensation: fungible(
				proposal.compensationAddress,
				proposal.compensationAmount,
			),
		};
	}

	/**
	 * Consume the proposal nonce.
	 */
	consume(proposal: ExtensionProposal): Promise<void> {
		return this.deps.nonces.revokeNonce(
			proposal.proposer,
			proposal.nonceSpace,
			proposal.nonce,
		);
	}

	private async isAuthorized(
		proposal: ExtensionProposal,
		hash: string,
		authorization: ExtensionAuthorization,
	): Promise<boolean> {
		switch (authorization.kind) {
			case "registered":
				return this.deps.proposals.isMade(hash);
			case "signed":
				return this.deps.signatures.isValidSignature(
					proposal.proposer,
					hash,
					authorization.signature,
				);
		}
	}
}
