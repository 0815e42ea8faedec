import { AsyncLocalStorage } from "node:async_hooks";
import { Injectable, Logger } from "@nestjs/common";
import { InjectDataSource } from "@nestjs/typeorm";
import { DataSource, EntityManager, EntityTarget, ObjectLiteral, Repository } from "typeorm";
import { AtomicScope, Mutex } from "@loanvault/sdk";

/**
 * Runs each settlement operation in one database transaction.
 *
 * Adapters resolve their repositories through `repository()`, which hands
 * out the transaction's manager while an operation is running. Operations
 * are serialized; a nested `run` joins the enclosing transaction.
 */
@Injectable()
export class LedgerUnitOfWork implements AtomicScope {
	private readonly logger = new Logger(LedgerUnitOfWork.name);
	private readonly mutex = new Mutex();
	private readonly current = new AsyncLocalStorage<EntityManager>();

	constructor(@InjectDataSource() private readonly dataSource: DataSource) {}

	run<T>(fn: () => Promise<T>): Promise<T> {
		if (this.current.getStore()) return fn();
		return this.mutex.runExclusive(() =>
			this.dataSource
				.transaction((manager) => this.current.run(manager, fn))
				.catch((err: unknown) => {
					this.logger.debug("Operation rolled back");
					throw err;
				}),
		);
	}

	manager(): EntityManager {
		return this.current.getStore() ?? this.dataSource.manager;
	}

	repository<E extends ObjectLiteral>(target: EntityTarget<E>): Repository<E> {
		return this.manager().getRepository(target);
	}
}
