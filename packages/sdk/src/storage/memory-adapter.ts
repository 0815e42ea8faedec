/**
 * In-Memory Stores
 *
 * Reference stores for tests and single-process deployments.
 * Data is lost when the process exits.
 */

import { LoanRecordBase } from "../core/loan.js";
import { Snapshottable } from "../protocol/types.js";
import {
	ExtensionProposalStore,
	LoanQueryOptions,
	LoanStore,
	QueryResult,
} from "./types.js";

function cloneLoan<TLoan extends LoanRecordBase>(loan: TLoan): TLoan {
	return { ...loan, collateral: { ...loan.collateral } };
}

/**
 * In-memory loan store.
 *
 * @example
 * ```typescript
 * const store = new MemoryLoanStore<SimpleLoan>();
 * await store.save(loan);
 * const copy = await store.load(loan.id);
 * ```
 */
export class MemoryLoanStore<TLoan extends LoanRecordBase>
	implements LoanStore<TLoan>, Snapshottable
{
	private loans: Map<number, TLoan> = new Map();

	async save(loan: TLoan): Promise<void> {
		// Copy to prevent external mutations
		this.loans.set(loan.id, cloneLoan(loan));
	}

	async load(id: number): Promise<TLoan | null> {
		const loan = this.loans.get(id);
		return loan ? cloneLoan(loan) : null;
	}

	async delete(id: number): Promise<void> {
		this.loans.delete(id);
	}

	async query(options?: LoanQueryOptions): Promise<QueryResult<TLoan>> {
		let loans = Array.from(this.loans.values());

		if (options?.status) {
			const statuses = Array.isArray(options.status)
				? options.status
				: [options.status];
			loans = loans.filter((l) => statuses.includes(l.status));
		}

		if (options?.borrower) {
			const borrower = options.borrower;
			loans = loans.filter((l) => l.borrower === borrower);
		}

		const total = loans.length;

		loans.sort((a, b) => a.id - b.id);

		const offset = options?.offset ?? 0;
		const limit = options?.limit ?? loans.length;
		const items = loans.slice(offset, offset + limit).map(cloneLoan);

		return {
			items,
			total,
			hasMore: offset + items.length < total,
		};
	}

	checkpoint(): () => void {
		const saved = new Map(this.loans);
		return () => {
			this.loans = saved;
		};
	}

	/**
	 * Get the number of loans stored.
	 */
	size(): number {
		return this.loans.size;
	}

	clear(): void {
		this.loans.clear();
	}
}

/**
 * In-memory made-proposal registry.
 */
export class MemoryExtensionProposalStore
	implements ExtensionProposalStore, Snapshottable
{
	private made: Set<string> = new Set();

	async markMade(hash: string): Promise<void> {
		this.made.add(hash);
	}

	async isMade(hash: string): Promise<boolean> {
		return this.made.has(hash);
	}

	checkpoint(): () => void {
		const saved = new Set(this.made);
		return () => {
			this.made = saved;
		};
	}
}
