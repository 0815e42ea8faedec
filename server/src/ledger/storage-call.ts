import { StorageError, isLoanError } from "@loanvault/sdk";

/**
 * Run a persistence call, reporting driver failures as StorageError.
 * Settlement errors raised inside pass through untouched.
 */
export async function storageCall<T>(
	description: string,
	code: string,
	fn: () => Promise<T>,
): Promise<T> {
	try {
		return await fn();
	} catch (error) {
		if (isLoanError(error) || error instanceof StorageError) throw error;
		throw new StorageError(`Failed to ${description}`, code, { error });
	}
}
