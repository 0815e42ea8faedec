/**
 * TypeORM Loan Store
 *
 * Implements the SDK's LoanStore over the `loans` table. Both variants
 * share the table; each store only sees rows of its own variant, so an id
 * belonging to the other variant reads as missing.
 */

import {
	LoanQueryOptions,
	LoanRecordBase,
	LoanStore,
	QueryResult,
} from "@loanvault/sdk";
import { storageCall } from "../ledger/storage-call";
import { LedgerUnitOfWork } from "../ledger/ledger-unit-of-work";
import { LoanEntity } from "./loan.entity";
import { LoanMapper } from "./loan-mappers";

export class TypeOrmLoanStore<TLoan extends LoanRecordBase>
	implements LoanStore<TLoan>
{
	constructor(
		private readonly uow: LedgerUnitOfWork,
		private readonly mapper: LoanMapper<TLoan>,
	) {}

	private get repository() {
		return this.uow.repository(LoanEntity);
	}

	save(loan: TLoan): Promise<void> {
		return storageCall(`save loan ${loan.id}`, "SAVE_ERROR", async () => {
			await this.repository.save(this.repository.create(this.mapper.toColumns(loan)));
		});
	}

	load(id: number): Promise<TLoan | null> {
		return storageCall(`load loan ${id}`, "LOAD_ERROR", async () => {
			const entity = await this.repository.findOne({
				where: { id, variant: this.mapper.variant },
			});
			return entity ? this.mapper.fromEntity(entity) : null;
		});
	}

	delete(id: number): Promise<void> {
		return storageCall(`delete loan ${id}`, "DELETE_ERROR", async () => {
			await this.repository.delete({ id, variant: this.mapper.variant });
		});
	}

	query(options?: LoanQueryOptions): Promise<QueryResult<TLoan>> {
		return storageCall("query loans", "QUERY_ERROR", async () => {
			const qb = this.repository
				.createQueryBuilder("l")
				.where("l.variant = :variant", { variant: this.mapper.variant });

			if (options?.status) {
				const statuses = Array.isArray(options.status)
					? options.status
					: [options.status];
				qb.andWhere("l.status IN (:...statuses)", { statuses });
			}
			if (options?.borrower) {
				qb.andWhere("l.borrower = :borrower", { borrower: options.borrower });
			}

			const total = await qb.getCount();
			const offset = options?.offset ?? 0;
			if (options?.limit === 0) {
				return { items: [], total, hasMore: offset < total };
			}

			qb.orderBy("l.id", "ASC");
			if (offset > 0) qb.skip(offset);
			if (options?.limit !== undefined) qb.take(options.limit);

			const entities = await qb.getMany();
			const items = entities.map((entity) => this.mapper.fromEntity(entity));
			return { items, total, hasMore: offset + items.length < total };
		});
	}
}
