import { fungible } from "../../core/asset.js";
import { Address, Asset, Permit } from "../../core/types.js";
import { AssetTransfer } from "../../protocol/types.js";
import { computeRefinanceSplit } from "./refinance.js";
import { SettlementPlan } from "./settlement-plan.js";

const nft: Asset = { category: "unique", assetAddress: "nft", id: 1n, amount: 0n };

function recorder() {
	const calls: string[] = [];
	const transfer: AssetTransfer = {
		pull: async (asset: Asset, from: Address, permit?: Permit) => {
			calls.push(`pull ${asset.amount} ${from}${permit ? " +permit" : ""}`);
		},
		push: async (asset: Asset, to: Address) => {
			calls.push(`push ${asset.amount} ${to}`);
		},
		pushFrom: async (asset: Asset, from: Address, to: Address, permit?: Permit) => {
			calls.push(`push-from ${asset.amount} ${from} ${to}${permit ? " +permit" : ""}`);
		},
	};
	return { calls, transfer };
}

describe("SettlementPlan", () => {
	it("executes instructions in order", async () => {
		const { calls, transfer } = recorder();
		const plan = new SettlementPlan()
			.pull(fungible("usd", 5n), "alice")
			.pushFrom(fungible("usd", 3n), "bob", "carol")
			.push(fungible("usd", 2n), "dave");

		await plan.execute(transfer);

		expect(calls).toEqual(["pull 5 alice", "push-from 3 bob carol", "push 2 dave"]);
	});

	it("drops zero-amount fungible transfers but keeps unique assets", () => {
		const plan = new SettlementPlan()
			.pull(fungible("usd", 0n), "alice")
			.push(nft, "bob")
			.pushFrom(fungible("usd", 0n), "bob", "carol");

		expect(plan.transfers).toEqual([{ kind: "push", asset: nft, to: "bob" }]);
	});

	it("attaches a permit to the first matching instruction only", async () => {
		const { calls, transfer } = recorder();
		const permit: Permit = {
			assetAddress: "usd",
			owner: "bob",
			amount: 10n,
			deadline: 100,
		};
		const plan = new SettlementPlan([permit])
			.pull(fungible("usd", 1n), "alice")
			.pushFrom(fungible("eur", 1n), "bob", "carol")
			.pushFrom(fungible("usd", 2n), "bob", "carol")
			.pull(fungible("usd", 3n), "bob");

		await plan.execute(transfer);

		expect(calls).toEqual([
			"pull 1 alice",
			"push-from 1 bob carol",
			"push-from 2 bob carol +permit",
			"pull 3 bob",
		]);
	});

	it("stops at the first failing transfer", async () => {
		const calls: string[] = [];
		const transfer: AssetTransfer = {
			pull: async () => {
				throw new Error("pull failed");
			},
			push: async (_asset, to) => {
				calls.push(to);
			},
			pushFrom: async () => {},
		};
		const plan = new SettlementPlan()
			.pull(fungible("usd", 1n), "alice")
			.push(fungible("usd", 1n), "bob");

		await expect(plan.execute(transfer)).rejects.toThrow("pull failed");
		expect(calls).toEqual([]);
	});
});

describe("computeRefinanceSplit", () => {
	it("pays a surplus to the borrower when the new principal covers the debt", () => {
		expect(computeRefinanceSplit(1_000n, 100n, 900n)).toEqual({
			feeAmount: 10n,
			netAmount: 990n,
			commonAmount: 900n,
			surplusAmount: 90n,
			contributionAmount: 0n,
		});
	});

	it("asks the borrower to contribute the shortfall", () => {
		expect(computeRefinanceSplit(1_000n, 100n, 1_200n)).toEqual({
			feeAmount: 10n,
			netAmount: 990n,
			commonAmount: 990n,
			surplusAmount: 0n,
			contributionAmount: 210n,
		});
	});

	it("always reconciles to the new principal and the owed amount", () => {
		for (const principal of [1n, 99n, 1_000n, 123_457n]) {
			for (const owed of [0n, 1n, 500n, 123_000n]) {
				for (const fee of [0n, 1n, 37n, 10_000n]) {
					const split = computeRefinanceSplit(principal, fee, owed);

					expect(split.feeAmount + split.commonAmount + split.surplusAmount).toBe(
						principal,
					);
					expect(split.commonAmount + split.contributionAmount).toBe(owed);
					expect(split.surplusAmount === 0n || split.contributionAmount === 0n).toBe(
						true,
					);
				}
			}
		}
	});
});
