/**
 * Loan Store Types
 *
 * Defines interfaces for pluggable loan persistence. The engines only talk
 * to these interfaces; the server backs them with TypeORM and the SDK ships
 * an in-memory reference implementation.
 */

import { LoanRecordBase, StoredLoanStatus } from "../core/loan.js";
import { Address } from "../core/types.js";

/**
 * Query options for listing loans.
 */
export interface LoanQueryOptions {
	/** Filter by stored status(es) */
	status?: StoredLoanStatus | StoredLoanStatus[];
	/** Filter by borrower */
	borrower?: Address;
	/** Maximum number of results */
	limit?: number;
	/** Number of results to skip */
	offset?: number;
}

/**
 * Query result with pagination info.
 */
export interface QueryResult<T> {
	/** The items matching the query */
	items: T[];
	/** Total count of matching items (before pagination) */
	total: number;
	/** Whether there are more items */
	hasMore: boolean;
}

/**
 * Loan store interface.
 *
 * Owns the mapping from loan id to record. Ids come from the position
 * token, so the store never assigns them.
 *
 * @example
 * ```typescript
 * class PostgresLoanStore implements LoanStore<SimpleLoan> {
 *   constructor(private pool: Pool) {}
 *
 *   async save(loan: SimpleLoan): Promise<void> {
 *     await this.pool.query(
 *       'INSERT INTO loans (id, data) VALUES ($1, $2) ON CONFLICT (id) DO UPDATE SET data = $2',
 *       [loan.id, serialize(loan)]
 *     );
 *   }
 *
 *   // ... other methods
 * }
 * ```
 */
export interface LoanStore<TLoan extends LoanRecordBase> {
	/**
	 * Create or replace a loan record.
	 */
	save(loan: TLoan): Promise<void>;

	/**
	 * Load a loan record.
	 *
	 * @returns The record if found, null otherwise
	 */
	load(id: number): Promise<TLoan | null>;

	/**
	 * Delete a loan record.
	 *
	 * Should succeed even if the record doesn't exist.
	 */
	delete(id: number): Promise<void>;

	/**
	 * List loans with pagination info.
	 */
	query(options?: LoanQueryOptions): Promise<QueryResult<TLoan>>;
}

/**
 * Registry of extension proposals made on-ledger, keyed by proposal hash.
 */
export interface ExtensionProposalStore {
	markMade(hash: string): Promise<void>;
	isMade(hash: string): Promise<boolean>;
}

/**
 * Error thrown by storage operations.
 */
export class StorageError extends Error {
	constructor(
		message: string,
		public readonly code?: string,
		public readonly details?: unknown,
	) {
		super(message);
		this.name = "StorageError";
	}
}
