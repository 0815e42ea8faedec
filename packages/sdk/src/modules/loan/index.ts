/**
 * Loan module - engine base shared by the loan variants
 */

export type {
	LoanTerms,
	SettlementOptions,
	RepayOptions,
	ExtendOptions,
	CreateLoanResult,
	RepayResult,
	ClaimResult,
	ExtendResult,
	LoanEngineDeps,
} from "./types.js";

export { MIN_LOAN_DURATION } from "./types.js";

export { LoanEngine } from "./loan-engine.js";
