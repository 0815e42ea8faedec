/**
 * Settlement Plan
 *
 * Collects the asset movements of one operation so they can run after every
 * store effect has been applied. Instructions execute in insertion order.
 */

import { Address, Asset, Permit } from "../../core/types.js";
import { AssetTransfer } from "../../protocol/types.js";

export type TransferInstruction =
	| { kind: "pull"; asset: Asset; from: Address; permit?: Permit }
	| { kind: "push"; asset: Asset; to: Address }
	| {
			kind: "push-from";
			asset: Asset;
			from: Address;
			to: Address;
			permit?: Permit;
	  };

export class SettlementPlan {
	private readonly instructions: TransferInstruction[] = [];
	private readonly unusedPermits: Permit[];

	/**
	 * @param permits - Off-line approvals, each attached to the first
	 * instruction spending the permit owner's matching asset
	 */
	constructor(permits: readonly Permit[] = []) {
		this.unusedPermits = [...permits];
	}

	pull(asset: Asset, from: Address): this {
		if (isEmpty(asset)) return this;
		this.instructions.push({
			kind: "pull",
			asset,
			from,
			...this.permitFor(asset, from),
		});
		return this;
	}

	push(asset: Asset, to: Address): this {
		if (isEmpty(asset)) return this;
		this.instructions.push({ kind: "push", asset, to });
		return this;
	}

	pushFrom(asset: Asset, from: Address, to: Address): this {
		if (isEmpty(asset)) return this;
		this.instructions.push({
			kind: "push-from",
			asset,
			from,
			to,
			...this.permitFor(asset, from),
		});
		return this;
	}

	get transfers(): readonly TransferInstruction[] {
		return [...this.instructions];
	}

	/**
	 * Run every instruction in order. Stops at the first failure.
	 */
	async execute(
		transfer: AssetTransfer,
	): Promise<readonly TransferInstruction[]> {
		for (const instruction of this.instructions) {
			switch (instruction.kind) {
				case "pull":
					await transfer.pull(
						instruction.asset,
						instruction.from,
						instruction.permit,
					);
					break;
				case "push":
					await transfer.push(instruction.asset, instruction.to);
					break;
				case "push-from":
					await transfer.pushFrom(
						instruction.asset,
						instruction.from,
						instruction.to,
						instruction.permit,
					);
					break;
			}
		}
		return this.transfers;
	}

	private permitFor(asset: Asset, owner: Address): { permit?: Permit } {
		const index = this.unusedPermits.findIndex(
			(p) => p.owner === owner && p.assetAddress === asset.assetAddress,
		);
		if (index < 0) return {};
		const [permit] = this.unusedPermits.splice(index, 1);
		return { permit };
	}
}

function isEmpty(asset: Asset): boolean {
	return asset.category === "fungible" && asset.amount === 0n;
}
