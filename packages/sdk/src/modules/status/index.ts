/**
 * Status module - derived loan status and the lifecycle guard
 */

export {
	type LoanAction,
	type StatusSubject,
	LOAN_LIFECYCLE,
	effectiveStatus,
	statusCode,
	requireAction,
} from "./status.js";
