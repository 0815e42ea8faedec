export type LoanId = number;
export type LoanVariant = "simple" | "credit-line";

// Amounts are decimal strings so events stay JSON-serializable.

export const LOAN_CREATED_ID = "loan.created";
export type LoanCreated = {
	eventId: string;
	variant: LoanVariant;
	loanId: LoanId;
	lender: string;
	borrower: string;
	principalAmount: string;
	feeAmount: string;
	createdAt: string; // ISO timestamp
};

export const LOAN_REPAID_ID = "loan.repaid";
export type LoanRepaid = {
	eventId: string;
	variant: LoanVariant;
	loanId: LoanId;
	payer: string;
	paidAmount: string;
	remainingAmount: string;
	status: "running" | "repaid";
	repaidAt: string;
};

export const LOAN_REFINANCED_ID = "loan.refinanced";
export type LoanRefinanced = {
	eventId: string;
	variant: LoanVariant;
	loanId: LoanId;
	newLoanId: LoanId;
	owedAmount: string;
	refinancedAt: string;
};

export const LOAN_CLAIMED_ID = "loan.claimed";
export type LoanClaimed = {
	eventId: string;
	variant: LoanVariant;
	loanId: LoanId;
	holder: string;
	kind: "repaid" | "defaulted" | "unclaimed";
	claimedAmount: string;
	claimedAt: string;
};

export const LOAN_EXTENDED_ID = "loan.extended";
export type LoanExtended = {
	eventId: string;
	variant: LoanVariant;
	loanId: LoanId;
	proposalHash: string;
	defaultTimestamp: number;
	extendedAt: string;
};

export const EXTENSION_PROPOSAL_MADE_ID = "loan.extension-proposal-made";
export type ExtensionProposalMade = {
	eventId: string;
	variant: LoanVariant;
	loanId: LoanId;
	proposalHash: string;
	proposer: string;
	madeAt: string;
};
