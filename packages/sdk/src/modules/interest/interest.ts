/**
 * Interest Model
 *
 * owed = principal + fixedInterest + floor(principal * rate * minutes / denominator)
 *
 * Two rate encodings exist:
 * - "apr": annual rate with two decimals (10_000 = 100%), used by simple loans
 * - "daily": per-day rate with ten decimals, used by credit lines. The daily
 *   rate is derived once from the negotiated APR with
 *   `dailyRate = floor(apr * 1e6 / 365)`, accepting the truncation loss.
 *
 * Every division rounds down, for interest and fees alike.
 */

import { Timestamp } from "../../core/types.js";

export const SECONDS_IN_MINUTE = 60;
export const MINUTES_IN_DAY = 1_440n;
export const MINUTES_IN_YEAR = 525_600n;

/** 10_000 = 100% */
export const APR_DECIMALS = 10_000n;
export const ACCRUING_INTEREST_APR_DENOMINATOR = APR_DECIMALS * MINUTES_IN_YEAR;

/** 1e10 = 100% per day */
export const DAILY_RATE_DECIMALS = 10_000_000_000n;
export const DAILY_RATE_DENOMINATOR = DAILY_RATE_DECIMALS * MINUTES_IN_DAY;

/** Scale from a two-decimal APR to a ten-decimal daily rate */
export const APR_TO_DAILY_RATE_FACTOR = 1_000_000n;
export const DAYS_IN_YEAR = 365n;

/** Fee basis points: 10_000 = 100% */
export const FEE_DENOMINATOR = 10_000n;

/** Highest accepted APR (160_000%) */
export const MAX_ACCRUING_INTEREST_APR = 16_000_000n;

export type RateEncoding =
	| { kind: "apr"; apr: bigint }
	| { kind: "daily"; dailyRate: bigint };

/**
 * Outstanding amounts that accrue interest.
 */
export interface DebtSnapshot {
	principalAmount: bigint;
	fixedInterestAmount: bigint;
	lastUpdateTimestamp: Timestamp;
}

/**
 * floor(a * b / denominator)
 */
export function mulDiv(a: bigint, b: bigint, denominator: bigint): bigint {
	if (denominator <= 0n) {
		throw new RangeError("Denominator must be positive");
	}
	return (a * b) / denominator;
}

/**
 * Whole minutes between `from` and `now`, never negative.
 */
export function elapsedMinutes(from: Timestamp, now: Timestamp): bigint {
	const seconds = Math.max(now - from, 0);
	return BigInt(Math.floor(seconds / SECONDS_IN_MINUTE));
}

/**
 * Interest accrued on `principal` over `minutes`.
 */
export function accruedInterest(
	principal: bigint,
	rate: RateEncoding,
	minutes: bigint,
): bigint {
	switch (rate.kind) {
		case "apr":
			return mulDiv(
				principal,
				rate.apr * minutes,
				ACCRUING_INTEREST_APR_DENOMINATOR,
			);
		case "daily":
			return mulDiv(principal, rate.dailyRate * minutes, DAILY_RATE_DENOMINATOR);
	}
}

/**
 * Interest owed at `now`: the frozen amount plus accrual since the last update.
 */
export function currentInterest(
	debt: DebtSnapshot,
	rate: RateEncoding,
	now: Timestamp,
): bigint {
	return (
		debt.fixedInterestAmount +
		accruedInterest(
			debt.principalAmount,
			rate,
			elapsedMinutes(debt.lastUpdateTimestamp, now),
		)
	);
}

/**
 * Total amount that settles the debt at `now`.
 */
export function repaymentAmount(
	debt: DebtSnapshot,
	rate: RateEncoding,
	now: Timestamp,
): bigint {
	return debt.principalAmount + currentInterest(debt, rate, now);
}

/**
 * Convert a negotiated APR into the stored daily rate.
 */
export function aprToDailyRate(apr: bigint): bigint {
	return mulDiv(apr, APR_TO_DAILY_RATE_FACTOR, DAYS_IN_YEAR);
}

export interface FeeSplit {
	feeAmount: bigint;
	netAmount: bigint;
}

/**
 * Split `amount` into the protocol fee and the remainder.
 */
export function computeFee(amount: bigint, feeBps: bigint): FeeSplit {
	if (feeBps < 0n || feeBps > FEE_DENOMINATOR) {
		throw new RangeError(`Fee out of range: ${feeBps}`);
	}
	const feeAmount = mulDiv(amount, feeBps, FEE_DENOMINATOR);
	return { feeAmount, netAmount: amount - feeAmount };
}

export interface AppliedPayment {
	principalAmount: bigint;
	fixedInterestAmount: bigint;
	/** Part of the payment that went to interest */
	interestPaid: bigint;
	/** Part of the payment that went to principal */
	principalPaid: bigint;
}

/**
 * Apply a payment against interest first and principal second.
 *
 * @throws RangeError if the payment exceeds the debt
 */
export function applyPayment(
	principalAmount: bigint,
	interestAmount: bigint,
	payment: bigint,
): AppliedPayment {
	if (payment < 0n || payment > principalAmount + interestAmount) {
		throw new RangeError(`Payment out of range: ${payment}`);
	}
	const interestPaid = payment < interestAmount ? payment : interestAmount;
	const principalPaid = payment - interestPaid;
	return {
		principalAmount: principalAmount - principalPaid,
		fixedInterestAmount: interestAmount - interestPaid,
		interestPaid,
		principalPaid,
	};
}
