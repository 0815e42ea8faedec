import { Injectable } from "@nestjs/common";
import { ExtensionProposalStore } from "@loanvault/sdk";
import { ExtensionProposalEntity } from "./entities/extension-proposal.entity";
import { LedgerUnitOfWork } from "./ledger-unit-of-work";
import { storageCall } from "./storage-call";

@Injectable()
export class TypeOrmExtensionProposalStore implements ExtensionProposalStore {
	constructor(private readonly uow: LedgerUnitOfWork) {}

	markMade(hash: string): Promise<void> {
		return storageCall("record extension proposal", "SAVE_ERROR", async () => {
			await this.uow.repository(ExtensionProposalEntity).save({ hash });
		});
	}

	isMade(hash: string): Promise<boolean> {
		return storageCall("read extension proposal", "LOAD_ERROR", async () => {
			const count = await this.uow
				.repository(ExtensionProposalEntity)
				.count({ where: { hash } });
			return count > 0;
		});
	}
}
