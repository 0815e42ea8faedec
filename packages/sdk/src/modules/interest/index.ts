/**
 * Interest module - accrual, fees and amortization
 */

export {
	type RateEncoding,
	type DebtSnapshot,
	type FeeSplit,
	type AppliedPayment,
	SECONDS_IN_MINUTE,
	MINUTES_IN_DAY,
	MINUTES_IN_YEAR,
	APR_DECIMALS,
	ACCRUING_INTEREST_APR_DENOMINATOR,
	DAILY_RATE_DECIMALS,
	DAILY_RATE_DENOMINATOR,
	APR_TO_DAILY_RATE_FACTOR,
	DAYS_IN_YEAR,
	FEE_DENOMINATOR,
	MAX_ACCRUING_INTEREST_APR,
	mulDiv,
	elapsedMinutes,
	accruedInterest,
	currentInterest,
	repaymentAmount,
	aprToDailyRate,
	computeFee,
	applyPayment,
} from "./interest.js";
