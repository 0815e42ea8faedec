/**
 * Credit Line Types
 *
 * A debt-limit loan: repayments accumulate in custody for the position
 * holder, and the loan defaults as soon as outstanding debt reaches a
 * linearly falling limit.
 */

import { LoanRecordBase, LoanView } from "../../core/loan.js";

export interface CreditLine extends LoanRecordBase {
	/** Ten decimals, 1e10 = 100% per day */
	accruingInterestDailyRate: bigint;
	/** Repaid credit in custody not yet withdrawn by the holder */
	unclaimedAmount: bigint;
	/** Slope of the debt limit with 18 decimals, fixed at origination */
	debtLimitTangent: bigint;
}

export type CreditLineView = LoanView<CreditLine>;
