import { Injectable } from "@nestjs/common";
import { Address, LoanError, PositionToken } from "@loanvault/sdk";
import { PositionTokenEntity } from "./entities/position-token.entity";
import { LedgerUnitOfWork } from "./ledger-unit-of-work";
import { storageCall } from "./storage-call";

@Injectable()
export class TypeOrmPositionToken implements PositionToken {
	constructor(private readonly uow: LedgerUnitOfWork) {}

	mint(owner: Address): Promise<number> {
		return storageCall("mint position token", "SAVE_ERROR", async () => {
			const repository = this.uow.repository(PositionTokenEntity);
			const token = await repository.save(repository.create({ owner }));
			return token.id;
		});
	}

	burn(id: number): Promise<void> {
		return storageCall(`burn position token ${id}`, "SAVE_ERROR", async () => {
			const repository = this.uow.repository(PositionTokenEntity);
			const token = await repository.findOne({ where: { id, burned: false } });
			if (!token) {
				throw new LoanError(`Position token ${id} not found`, "NOT_FOUND", { id });
			}
			await repository.update({ id }, { burned: true });
		});
	}

	ownerOf(id: number): Promise<Address | null> {
		return storageCall(`read position token ${id}`, "LOAD_ERROR", async () => {
			const token = await this.uow
				.repository(PositionTokenEntity)
				.findOne({ where: { id, burned: false } });
			return token?.owner ?? null;
		});
	}

	/**
	 * Move a position to a new holder.
	 */
	transfer(id: number, from: Address, to: Address): Promise<void> {
		return storageCall(`transfer position token ${id}`, "SAVE_ERROR", async () => {
			const owner = await this.ownerOf(id);
			if (owner === null) {
				throw new LoanError(`Position token ${id} not found`, "NOT_FOUND", { id });
			}
			if (owner !== from) {
				throw new LoanError(
					`Position token ${id} is not owned by ${from}`,
					"UNAUTHORIZED",
					{ id, from },
				);
			}
			await this.uow.repository(PositionTokenEntity).update({ id }, { owner: to });
		});
	}
}
