/**
 * Loan record types
 *
 * Fields shared by every loan variant. Variant-specific records extend
 * `LoanRecordBase` (see the simple-loan and credit-line modules).
 */

import { Address, Asset, Timestamp } from "./types.js";

/**
 * Externally visible loan status.
 *
 * Lifecycle:
 * - none: no record exists for the id
 * - running: loan originated, repayment window open
 * - repaid: fully repaid, waiting for the position holder to claim
 * - defaulted: derived at read time from a running loan and its default policy
 */
export type LoanStatus = "none" | "running" | "repaid" | "defaulted";

export const LOAN_STATUSES: readonly LoanStatus[] = [
	"none",
	"running",
	"repaid",
	"defaulted",
];

/**
 * Status values a store may persist. "defaulted" is always derived and
 * "none" is the absence of a record.
 */
export type StoredLoanStatus = Extract<LoanStatus, "running" | "repaid">;

export type LoanStatusCode = 0 | 2 | 3 | 4;

/**
 * Numeric status codes used in fingerprints and wire formats.
 */
export const LOAN_STATUS_CODES: Record<LoanStatus, LoanStatusCode> = {
	none: 0,
	running: 2,
	repaid: 3,
	defaulted: 4,
};

export interface LoanRecordBase {
	/** Position token id, assigned at origination */
	id: number;
	status: StoredLoanStatus;
	/** Fungible asset lent */
	creditAddress: Address;
	borrower: Address;
	/** Party that funded origination (not necessarily the current holder) */
	originalLender: Address;
	startTimestamp: Timestamp;
	/** Anchor of the current accrual window */
	lastUpdateTimestamp: Timestamp;
	defaultTimestamp: Timestamp;
	/** Interest frozen at the last settlement point */
	fixedInterestAmount: bigint;
	/** Outstanding principal */
	principalAmount: bigint;
	collateral: Asset;
}

/**
 * Fields resolved at read time.
 */
export interface LoanViewFields {
	status: LoanStatus;
	statusCode: LoanStatusCode;
	/** Amount that would settle the loan right now */
	repaymentAmount: bigint;
	/** Current position holder, null for nonexistent loans */
	holder: Address | null;
}

/**
 * Read model returned by the engines.
 *
 * A nonexistent loan reads as a zeroed record with status "none".
 */
export type LoanView<TLoan extends LoanRecordBase> = Omit<TLoan, "status"> &
	LoanViewFields;
