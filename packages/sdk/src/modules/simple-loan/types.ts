/**
 * Simple Loan Types
 *
 * A fixed-deadline loan: the borrower repays principal plus interest before
 * the default timestamp, or the position holder takes the collateral.
 */

import { LoanRecordBase, LoanView } from "../../core/loan.js";
import { TransferInstruction } from "../settlement/settlement-plan.js";
import { RefinanceSplit } from "../settlement/refinance.js";

export interface SimpleLoan extends LoanRecordBase {
	/** Two decimals, 10_000 = 100% */
	accruingInterestApr: bigint;
	/**
	 * Credit held in custody for the position holder after a repayment that
	 * could not be settled directly. Zero while running.
	 */
	repaidAmount: bigint;
}

export type SimpleLoanView = LoanView<SimpleLoan>;

export interface RefinanceResult {
	/** The loan that was closed */
	loanId: number;
	newLoanId: number;
	newLoan: SimpleLoan;
	/** Amount the refinanced loan owed at the time of refinancing */
	owedAmount: bigint;
	split: RefinanceSplit;
	/** Whether the refinanced loan was settled and closed immediately */
	closed: boolean;
	transfers: readonly TransferInstruction[];
}
