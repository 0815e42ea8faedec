import { Inject, Injectable, Logger } from "@nestjs/common";
import { Address, Asset, AssetVault, HoldingKey } from "@loanvault/sdk";
import { LedgerUnitOfWork } from "./ledger-unit-of-work";
import { LEDGER_VAULT } from "./ledger.tokens";
import { TypeOrmNonceRevocation } from "./typeorm-nonce-revocation";
import { TypeOrmPositionToken } from "./typeorm-position-token";

/**
 * Account-level operations on the ledger: funding, approvals of the vault,
 * nonce management and position transfers.
 */
@Injectable()
export class LedgerService {
	private readonly logger = new Logger(LedgerService.name);

	constructor(
		private readonly uow: LedgerUnitOfWork,
		@Inject(LEDGER_VAULT) private readonly vault: AssetVault,
		private readonly nonces: TypeOrmNonceRevocation,
		private readonly positions: TypeOrmPositionToken,
	) {}

	get custody(): Address {
		return this.vault.custody;
	}

	deposit(asset: Asset, owner: Address): Promise<void> {
		return this.uow.run(async () => {
			await this.vault.deposit(asset, owner);
			this.logger.log(
				`Deposited ${asset.amount} of ${asset.assetAddress}#${asset.id} to ${owner}`,
			);
		});
	}

	/**
	 * Let the vault spend up to `amount` of the owner's fungible asset.
	 */
	approve(owner: Address, assetAddress: Address, amount: bigint): Promise<void> {
		return this.uow.run(() =>
			this.vault.approve(assetAddress, owner, this.vault.custody, amount),
		);
	}

	setApprovalForAll(
		owner: Address,
		assetAddress: Address,
		approved: boolean,
	): Promise<void> {
		return this.uow.run(() =>
			this.vault.setApprovalForAll(assetAddress, owner, this.vault.custody, approved),
		);
	}

	holdingsOf(owner: Address): Promise<Array<HoldingKey & { amount: bigint }>> {
		return this.vault.holdingsOf(owner);
	}

	currentNonceSpace(owner: Address): Promise<bigint> {
		return this.nonces.currentNonceSpace(owner);
	}

	revokeNonce(owner: Address, nonceSpace: bigint, nonce: bigint): Promise<void> {
		return this.uow.run(() => this.nonces.revokeNonce(owner, nonceSpace, nonce));
	}

	revokeNonceSpace(owner: Address): Promise<bigint> {
		return this.uow.run(async () => {
			const space = await this.nonces.revokeNonceSpace(owner);
			this.logger.log(`Nonce space of ${owner} moved to ${space}`);
			return space;
		});
	}

	transferPosition(id: number, from: Address, to: Address): Promise<void> {
		return this.uow.run(async () => {
			await this.positions.transfer(id, from, to);
			this.logger.log(`Position ${id} transferred from ${from} to ${to}`);
		});
	}
}
