/**
 * Types shared by the settlement engines.
 */

import { Address, Asset, Clock, Permit, Timestamp } from "../../core/types.js";
import { LoanRecordBase, LoanStatus } from "../../core/loan.js";
import {
	AssetTransfer,
	AtomicScope,
	CapabilityRegistry,
	FeeSource,
	NonceRevocation,
	PositionToken,
	SignatureVerifier,
} from "../../protocol/types.js";
import { ExtensionProposalStore, LoanStore } from "../../storage/types.js";
import { ExtensionBounds, ProposalDomain } from "../extension/extension.js";
import { TransferInstruction } from "../settlement/settlement-plan.js";

/** Shortest accepted loan duration in seconds */
export const MIN_LOAN_DURATION = 600;

/**
 * Negotiated terms handed over by a proposal-acceptance contract.
 */
export interface LoanTerms {
	lender: Address;
	borrower: Address;
	/** Seconds from origination to the default timestamp */
	duration: number;
	collateral: Asset;
	/** Fungible credit asset */
	creditAddress: Address;
	principalAmount: bigint;
	fixedInterestAmount: bigint;
	/** Two decimals, 10_000 = 100% */
	accruingInterestApr: bigint;
}

/**
 * Off-line approvals to use for this operation's transfers.
 */
export interface SettlementOptions {
	permits?: Permit[];
}

export interface RepayOptions extends SettlementOptions {
	/** Defaults to the full repayment amount */
	amount?: bigint;
}

export interface ExtendOptions extends SettlementOptions {
	/** Proposer's signature; without it the proposal must be registered */
	signature?: string;
}

export interface CreateLoanResult<TLoan> {
	loanId: number;
	loan: TLoan;
	feeAmount: bigint;
	transfers: readonly TransferInstruction[];
}

export interface RepayResult {
	loanId: number;
	paidAmount: bigint;
	remainingAmount: bigint;
	/** Status reached by the operation */
	status: Extract<LoanStatus, "running" | "repaid">;
	/** Whether the loan record was closed immediately */
	closed: boolean;
	transfers: readonly TransferInstruction[];
}

export interface ClaimResult {
	loanId: number;
	holder: Address;
	/** Which branch settled: a terminal claim or a partial withdrawal */
	kind: "repaid" | "defaulted" | "unclaimed";
	claimedAmount: bigint;
	closed: boolean;
	transfers: readonly TransferInstruction[];
}

export interface ExtendResult {
	loanId: number;
	proposalHash: string;
	defaultTimestamp: Timestamp;
	transfers: readonly TransferInstruction[];
}

/**
 * Collaborators an engine runs against.
 */
export interface LoanEngineDeps<TLoan extends LoanRecordBase> {
	store: LoanStore<TLoan>;
	positionToken: PositionToken;
	assets: AssetTransfer;
	fees: FeeSource;
	capabilities: CapabilityRegistry;
	nonces: NonceRevocation;
	signatures: SignatureVerifier;
	proposals: ExtensionProposalStore;
	scope: AtomicScope;
	domain: ProposalDomain;
	extensionBounds?: Partial<ExtensionBounds>;
	clock?: Clock;
}
