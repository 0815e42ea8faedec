import { Injectable } from "@nestjs/common";
import { Address, LoanError, NonceRevocation } from "@loanvault/sdk";
import { NonceSpace } from "./entities/nonce-space.entity";
import { RevokedNonce } from "./entities/revoked-nonce.entity";
import { LedgerUnitOfWork } from "./ledger-unit-of-work";
import { storageCall } from "./storage-call";

@Injectable()
export class TypeOrmNonceRevocation implements NonceRevocation {
	constructor(private readonly uow: LedgerUnitOfWork) {}

	isNonceUsable(owner: Address, nonceSpace: bigint, nonce: bigint): Promise<boolean> {
		return storageCall("read nonce", "LOAD_ERROR", async () => {
			if ((await this.currentNonceSpace(owner)) !== nonceSpace) return false;
			const revoked = await this.uow.repository(RevokedNonce).count({
				where: {
					owner,
					nonceSpace: nonceSpace.toString(),
					nonce: nonce.toString(),
				},
			});
			return revoked === 0;
		});
	}

	revokeNonce(owner: Address, nonceSpace: bigint, nonce: bigint): Promise<void> {
		return storageCall("revoke nonce", "SAVE_ERROR", async () => {
			const repository = this.uow.repository(RevokedNonce);
			const key = {
				owner,
				nonceSpace: nonceSpace.toString(),
				nonce: nonce.toString(),
			};
			if ((await repository.count({ where: key })) > 0) {
				throw new LoanError("Nonce already revoked", "NONCE_NOT_USABLE", key);
			}
			await repository.insert(key);
		});
	}

	currentNonceSpace(owner: Address): Promise<bigint> {
		return storageCall("read nonce space", "LOAD_ERROR", async () => {
			const row = await this.uow.repository(NonceSpace).findOne({ where: { owner } });
			return row?.space ?? 0n;
		});
	}

	revokeNonceSpace(owner: Address): Promise<bigint> {
		return storageCall("revoke nonce space", "SAVE_ERROR", async () => {
			const space = (await this.currentNonceSpace(owner)) + 1n;
			await this.uow.repository(NonceSpace).save({ owner, space });
			return space;
		});
	}
}
