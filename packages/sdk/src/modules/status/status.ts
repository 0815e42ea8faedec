/**
 * Status Resolver
 *
 * Combines the stored status with a default policy at read time.
 * "defaulted" is never written back to storage.
 */

import {
	StateMachine,
	createState,
	createTransition,
} from "../../contracts/state-machine.js";
import { LoanError } from "../../core/errors.js";
import {
	LOAN_STATUS_CODES,
	LoanStatus,
	LoanStatusCode,
	StoredLoanStatus,
} from "../../core/loan.js";
import { Timestamp } from "../../core/types.js";
import {
	DefaultPolicy,
	DefaultPolicyInput,
} from "../default-policy/default-policy.js";

/**
 * Actions the engines perform on a loan.
 */
export type LoanAction =
	| "originate" // Create a loan from negotiated terms
	| "repay" // Full repayment
	| "repay-partial" // Payment below the owed amount
	| "refinance" // Close into a new loan on the same collateral
	| "claim" // Terminal withdrawal by the position holder
	| "claim-unclaimed" // Withdraw repaid funds from a running credit line
	| "extend" // Push the deadline out
	| "default"; // Derived, never performed

export const LOAN_LIFECYCLE = new StateMachine<LoanStatus, LoanAction>({
	initialState: "none",
	states: [
		createState("none", ["originate"], {
			description: "No record exists for the id",
		}),
		createState(
			"running",
			[
				"repay",
				"repay-partial",
				"refinance",
				"claim-unclaimed",
				"extend",
				"default",
			],
			{ description: "Loan originated, repayment window open" },
		),
		createState("repaid", ["claim"], {
			description: "Fully repaid, awaiting claim by the position holder",
		}),
		createState("defaulted", ["claim", "extend"], {
			description: "Deadline or debt limit breached",
		}),
	],
	transitions: [
		createTransition("none", "originate", "running"),
		createTransition("running", "repay", "repaid"),
		createTransition("running", "repay-partial", "running"),
		createTransition("running", "refinance", "repaid"),
		createTransition("running", "claim-unclaimed", "running"),
		createTransition(["running", "defaulted"], "extend", "running"),
		createTransition("running", "default", "defaulted"),
		createTransition(["repaid", "defaulted"], "claim", "none"),
	],
});

const REPAYMENT_ACTIONS: readonly LoanAction[] = [
	"repay",
	"repay-partial",
	"refinance",
];

/**
 * Stored loan fields the resolver reads.
 */
export interface StatusSubject extends DefaultPolicyInput {
	status: StoredLoanStatus;
}

/**
 * Externally visible status of a loan at `now`.
 */
export function effectiveStatus(
	loan: StatusSubject | null,
	now: Timestamp,
	policy: DefaultPolicy,
): LoanStatus {
	if (loan === null) return "none";
	if (loan.status === "repaid") return "repaid";
	return policy.isDefaulted(loan, now) ? "defaulted" : "running";
}

export function statusCode(status: LoanStatus): LoanStatusCode {
	return LOAN_STATUS_CODES[status];
}

/**
 * Guard an action against the resolved status.
 *
 * @returns the status the action leads to
 * @throws LoanError NOT_FOUND, DEFAULTED or INVALID_STATE
 */
export function requireAction(
	loanId: number,
	status: LoanStatus,
	action: LoanAction,
): LoanStatus {
	if (LOAN_LIFECYCLE.canPerform(status, action)) {
		return LOAN_LIFECYCLE.next(status, action);
	}
	if (status === "none") {
		throw new LoanError(`Loan ${loanId} not found`, "NOT_FOUND", { loanId });
	}
	if (status === "defaulted" && REPAYMENT_ACTIONS.includes(action)) {
		throw new LoanError(`Loan ${loanId} is defaulted`, "DEFAULTED", {
			loanId,
			action,
		});
	}
	throw new LoanError(
		`Cannot ${action} loan ${loanId} in status ${status}`,
		"INVALID_STATE",
		{
			loanId,
			status,
			action,
			allowedActions: LOAN_LIFECYCLE.getAllowedActions(status),
		},
	);
}
