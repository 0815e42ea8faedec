/**
 * TypeORM Holdings Book
 *
 * Backs the SDK's AssetVault with the holdings, allowances and
 * operator_approvals tables.
 */

import { Injectable } from "@nestjs/common";
import type { Address, HoldingKey, HoldingsBook } from "@loanvault/sdk";
import { Allowance } from "./entities/allowance.entity";
import { Holding } from "./entities/holding.entity";
import { OperatorApproval } from "./entities/operator-approval.entity";
import { LedgerUnitOfWork } from "./ledger-unit-of-work";
import { storageCall } from "./storage-call";

@Injectable()
export class TypeOrmHoldingsBook implements HoldingsBook {
	constructor(private readonly uow: LedgerUnitOfWork) {}

	balanceOf(key: HoldingKey, owner: Address): Promise<bigint> {
		return storageCall("read balance", "LOAD_ERROR", async () => {
			const holding = await this.uow.repository(Holding).findOne({
				where: {
					category: key.category,
					assetAddress: key.assetAddress,
					tokenId: key.id.toString(),
					owner,
				},
			});
			return holding?.amount ?? 0n;
		});
	}

	setBalance(key: HoldingKey, owner: Address, amount: bigint): Promise<void> {
		return storageCall("write balance", "SAVE_ERROR", async () => {
			await this.uow.repository(Holding).save({
				category: key.category,
				assetAddress: key.assetAddress,
				tokenId: key.id.toString(),
				owner,
				amount,
			});
		});
	}

	holdingsOf(owner: Address): Promise<Array<HoldingKey & { amount: bigint }>> {
		return storageCall("list holdings", "QUERY_ERROR", async () => {
			const holdings = await this.uow.repository(Holding).find({
				where: { owner },
				order: { assetAddress: "ASC", tokenId: "ASC" },
			});
			return holdings
				.filter((holding) => holding.amount > 0n)
				.map((holding) => ({
					category: holding.category,
					assetAddress: holding.assetAddress,
					id: BigInt(holding.tokenId),
					amount: holding.amount,
				}));
		});
	}

	allowance(assetAddress: Address, owner: Address, spender: Address): Promise<bigint> {
		return storageCall("read allowance", "LOAD_ERROR", async () => {
			const allowance = await this.uow.repository(Allowance).findOne({
				where: { assetAddress, owner, spender },
			});
			return allowance?.amount ?? 0n;
		});
	}

	setAllowance(
		assetAddress: Address,
		owner: Address,
		spender: Address,
		amount: bigint,
	): Promise<void> {
		return storageCall("write allowance", "SAVE_ERROR", async () => {
			await this.uow
				.repository(Allowance)
				.save({ assetAddress, owner, spender, amount });
		});
	}

	isApprovedForAll(
		assetAddress: Address,
		owner: Address,
		operator: Address,
	): Promise<boolean> {
		return storageCall("read approval", "LOAD_ERROR", async () => {
			const count = await this.uow.repository(OperatorApproval).count({
				where: { assetAddress, owner, operator },
			});
			return count > 0;
		});
	}

	setApprovalForAll(
		assetAddress: Address,
		owner: Address,
		operator: Address,
		approved: boolean,
	): Promise<void> {
		return storageCall("write approval", "SAVE_ERROR", async () => {
			const repository = this.uow.repository(OperatorApproval);
			if (approved) {
				await repository.save({ assetAddress, owner, operator });
			} else {
				await repository.delete({ assetAddress, owner, operator });
			}
		});
	}
}
