/**
 * Error codes raised by the settlement engines.
 *
 * Every failure is synchronous and rejects the whole operation.
 */
export type LoanErrorCode =
	| "NOT_FOUND" // Operation on a nonexistent loan id
	| "INVALID_STATE" // Operation incompatible with the current status
	| "DEFAULTED" // Deadline or debt limit breached
	| "EXPIRED" // Proposal past its expiration
	| "MISMATCHED_TERMS" // Refinancing terms differ from the refinanced loan
	| "UNAUTHORIZED" // Missing capability, signature or token ownership
	| "OUT_OF_BOUNDS" // Duration, rate or amount outside configured limits
	| "NONCE_NOT_USABLE" // Nonce already consumed or revoked
	| "INVALID_ASSET" // Malformed asset descriptor
	| "INSUFFICIENT_FUNDS"; // Balance or allowance too low for a transfer

/**
 * Error thrown during loan operations.
 */
export class LoanError extends Error {
	constructor(
		message: string,
		public readonly code: LoanErrorCode,
		public readonly details?: Record<string, unknown>,
	) {
		super(message);
		this.name = "LoanError";
	}
}

export function isLoanError(err: unknown): err is LoanError {
	return err instanceof LoanError;
}
