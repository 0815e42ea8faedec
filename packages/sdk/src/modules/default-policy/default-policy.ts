/**
 * Default Policies
 *
 * Decide whether a running loan is in default at a given time. Nothing here
 * is persisted: the status resolver asks the policy on every read.
 */

import { LoanError } from "../../core/errors.js";
import { Timestamp } from "../../core/types.js";

export const SECONDS_IN_DAY = 86_400;

/**
 * Fixed-point decimals of the debt-limit tangent. The floor in the tangent
 * loses less than `duration - postponement` scaled units, so at this
 * precision the limit line still meets the committed debt exactly at the
 * postponement for raw-unit amounts.
 */
export const DEBT_LIMIT_TANGENT_DECIMALS = 18n;
export const DEBT_LIMIT_TANGENT_SCALE = 10n ** DEBT_LIMIT_TANGENT_DECIMALS;

/** Grace period before the debt limit starts falling */
export const DEFAULT_DEBT_LIMIT_POSTPONEMENT = 90 * SECONDS_IN_DAY;

/**
 * What a policy needs to know about a loan.
 */
export interface DefaultPolicyInput {
	defaultTimestamp: Timestamp;
	/** Current outstanding debt (principal + interest) */
	debt: bigint;
	/** Slope with 18 decimals, debt-limit loans only */
	debtLimitTangent?: bigint;
}

export interface DefaultPolicy {
	readonly name: string;
	isDefaulted(input: DefaultPolicyInput, now: Timestamp): boolean;
}

/**
 * Defaults once the deadline is reached.
 */
export class FixedDeadlinePolicy implements DefaultPolicy {
	readonly name = "fixed-deadline";

	isDefaulted(input: DefaultPolicyInput, now: Timestamp): boolean {
		return now >= input.defaultTimestamp;
	}
}

/**
 * Slope of the debt-limit line, computed once at origination.
 *
 * The limit equals the committed debt at `start + postponement` and
 * falls linearly to zero at the deadline.
 */
export function computeDebtLimitTangent(
	committedDebt: bigint,
	duration: number,
	postponement: number = DEFAULT_DEBT_LIMIT_POSTPONEMENT,
): bigint {
	if (!Number.isInteger(duration) || duration <= postponement) {
		throw new LoanError(
			"Loan duration must exceed the debt limit postponement",
			"OUT_OF_BOUNDS",
			{ duration, postponement },
		);
	}
	return (
		(committedDebt * DEBT_LIMIT_TANGENT_SCALE) / BigInt(duration - postponement)
	);
}

/**
 * Debt permitted at `now`, zero from the deadline on.
 */
export function debtLimit(
	tangent: bigint,
	defaultTimestamp: Timestamp,
	now: Timestamp,
): bigint {
	const remaining = BigInt(Math.max(defaultTimestamp - now, 0));
	return (tangent * remaining) / DEBT_LIMIT_TANGENT_SCALE;
}

/**
 * Exact comparison of `debt >= limit(now)`, free of the rounding in
 * {@link debtLimit}.
 */
export function isDebtLimitExceeded(
	debt: bigint,
	tangent: bigint,
	defaultTimestamp: Timestamp,
	now: Timestamp,
): boolean {
	const remaining = BigInt(Math.max(defaultTimestamp - now, 0));
	return debt * DEBT_LIMIT_TANGENT_SCALE >= tangent * remaining;
}

/**
 * Defaults when the outstanding debt reaches the linear limit.
 *
 * At the deadline the limit is zero, so any loan still running defaults.
 */
export class DebtLimitPolicy implements DefaultPolicy {
	readonly name = "debt-limit";

	isDefaulted(input: DefaultPolicyInput, now: Timestamp): boolean {
		if (now >= input.defaultTimestamp) return true;
		if (input.debtLimitTangent === undefined) {
			throw new LoanError("Debt limit tangent missing", "INVALID_STATE", {
				policy: this.name,
			});
		}
		return isDebtLimitExceeded(
			input.debt,
			input.debtLimitTangent,
			input.defaultTimestamp,
			now,
		);
	}
}
