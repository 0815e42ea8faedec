import {
	BORROWER,
	BUYER,
	COLLATERAL,
	COLLECTOR,
	CREDIT,
	DAY,
	Harness,
	LENDER,
	NEW_LENDER,
	PROPOSAL_CONTRACT,
	T0,
	VAULT,
	createHarness,
	loanTerms,
} from "../../../test/harness.js";
import { ZERO_HASH } from "../../utils/encoding.js";
import { ExtensionProposal } from "../extension/extension.js";

describe("SimpleLoanEngine", () => {
	let h: Harness;

	beforeEach(async () => {
		h = createHarness({ feeBps: 100n });
		await h.fund(LENDER, 10_000n);
		await h.giveCollateral();
	});

	const originate = async () => {
		const { loanId } = await h.simple.createLoan(loanTerms(), PROPOSAL_CONTRACT);
		return loanId;
	};

	describe("createLoan", () => {
		it("locks the collateral and pays the principal minus the fee", async () => {
			const result = await h.simple.createLoan(loanTerms(), PROPOSAL_CONTRACT);

			expect(result.loanId).toBe(1);
			expect(result.feeAmount).toBe(10n);
			expect(result.loan).toMatchObject({
				status: "running",
				borrower: BORROWER,
				originalLender: LENDER,
				startTimestamp: T0,
				defaultTimestamp: T0 + 30 * DAY,
				principalAmount: 1_000n,
				fixedInterestAmount: 100n,
				repaidAmount: 0n,
			});
			expect(await h.balance(COLLECTOR)).toBe(10n);
			expect(await h.balance(BORROWER)).toBe(990n);
			expect(await h.balance(LENDER)).toBe(9_000n);
			expect(await h.collateralOf(VAULT)).toBe(1n);
			expect(await h.positionToken.ownerOf(1)).toBe(LENDER);
		});

		it("only accepts proposal contracts", async () => {
			await expect(h.simple.createLoan(loanTerms(), LENDER)).rejects.toMatchObject({
				code: "UNAUTHORIZED",
			});
		});

		it("rejects loans shorter than ten minutes", async () => {
			await expect(
				h.simple.createLoan(loanTerms({ duration: 599 }), PROPOSAL_CONTRACT),
			).rejects.toMatchObject({ code: "OUT_OF_BOUNDS" });
		});

		it("rejects a non-positive principal", async () => {
			await expect(
				h.simple.createLoan(loanTerms({ principalAmount: 0n }), PROPOSAL_CONTRACT),
			).rejects.toMatchObject({ code: "OUT_OF_BOUNDS" });
		});

		it("rolls back everything when a transfer fails", async () => {
			const poor = createHarness({ feeBps: 100n });
			await poor.fund(LENDER, 5n);
			await poor.giveCollateral();

			await expect(
				poor.simple.createLoan(loanTerms(), PROPOSAL_CONTRACT),
			).rejects.toMatchObject({ code: "INSUFFICIENT_FUNDS" });

			expect(await poor.collateralOf(BORROWER)).toBe(1n);
			expect(poor.simpleStore.size()).toBe(0);
			expect(await poor.positionToken.ownerOf(1)).toBeNull();

			await poor.fund(LENDER, 995n);
			const { loanId } = await poor.simple.createLoan(loanTerms(), PROPOSAL_CONTRACT);
			expect(loanId).toBe(1);
		});
	});

	describe("repayLoan", () => {
		beforeEach(async () => {
			await h.fund(BORROWER, 10_000n);
		});

		it("pays the original lender directly and closes the loan", async () => {
			const loanId = await originate();

			const result = await h.simple.repayLoan(loanId, BORROWER);

			expect(result).toMatchObject({
				paidAmount: 1_100n,
				remainingAmount: 0n,
				status: "repaid",
				closed: true,
			});
			expect(await h.balance(LENDER)).toBe(10_100n);
			expect(await h.collateralOf(BORROWER)).toBe(1n);
			expect(await h.simple.getStatus(loanId)).toBe("none");
			expect(await h.positionToken.ownerOf(loanId)).toBeNull();
		});

		it("keeps the credit in custody for a new holder", async () => {
			const loanId = await originate();
			await h.positionToken.transfer(loanId, LENDER, BUYER);

			const result = await h.simple.repayLoan(loanId, BORROWER);

			expect(result.closed).toBe(false);
			expect(await h.balance(VAULT)).toBe(1_100n);
			expect(await h.collateralOf(BORROWER)).toBe(1n);
			const loan = await h.simple.getLoan(loanId);
			expect(loan).toMatchObject({
				status: "repaid",
				statusCode: 3,
				repaidAmount: 1_100n,
				principalAmount: 0n,
				holder: BUYER,
			});
		});

		it("applies partial payments to interest first", async () => {
			const { loanId } = await h.simple.createLoan(
				loanTerms({ accruingInterestApr: 10_000n, duration: 400 * DAY }),
				PROPOSAL_CONTRACT,
			);
			h.clock.now = T0 + 365 * DAY;
			expect(await h.simple.computeRepaymentAmount(loanId)).toBe(2_100n);

			const result = await h.simple.repayLoan(loanId, BORROWER, { amount: 600n });

			expect(result).toMatchObject({
				paidAmount: 600n,
				remainingAmount: 1_500n,
				status: "running",
				closed: false,
			});
			const loan = await h.simple.getLoan(loanId);
			expect(loan.principalAmount).toBe(1_000n);
			expect(loan.fixedInterestAmount).toBe(500n);
			expect(loan.lastUpdateTimestamp).toBe(T0 + 365 * DAY);
			expect(loan.repaymentAmount).toBe(1_500n);
			expect(await h.balance(LENDER)).toBe(9_600n);
		});

		it("rejects payments outside (0, owed]", async () => {
			const loanId = await originate();

			await expect(
				h.simple.repayLoan(loanId, BORROWER, { amount: 1_101n }),
			).rejects.toMatchObject({ code: "OUT_OF_BOUNDS" });
			await expect(
				h.simple.repayLoan(loanId, BORROWER, { amount: 0n }),
			).rejects.toMatchObject({ code: "OUT_OF_BOUNDS" });
		});

		it("refuses defaulted and missing loans", async () => {
			const loanId = await originate();
			h.clock.now = T0 + 30 * DAY;

			await expect(h.simple.repayLoan(loanId, BORROWER)).rejects.toMatchObject({
				code: "DEFAULTED",
			});
			await expect(h.simple.repayLoan(99, BORROWER)).rejects.toMatchObject({
				code: "NOT_FOUND",
			});
		});
	});

	describe("claimLoan", () => {
		it("hands the collateral of a defaulted loan to the holder", async () => {
			const loanId = await originate();
			h.clock.now = T0 + 30 * DAY;
			expect(await h.simple.getStatus(loanId)).toBe("defaulted");

			const result = await h.simple.claimLoan(loanId, LENDER);

			expect(result).toMatchObject({ kind: "defaulted", closed: true, holder: LENDER });
			expect(await h.collateralOf(LENDER)).toBe(1n);
			expect(await h.simple.getStatus(loanId)).toBe("none");
		});

		it("pays a defaulted loan's collateral to the current holder", async () => {
			const loanId = await originate();
			await h.positionToken.transfer(loanId, LENDER, BUYER);
			h.clock.now = T0 + 30 * DAY;

			await expect(h.simple.claimLoan(loanId, LENDER)).rejects.toMatchObject({
				code: "UNAUTHORIZED",
			});
			const result = await h.simple.claimLoan(loanId, BUYER);

			expect(result).toMatchObject({ kind: "defaulted", holder: BUYER, claimedAmount: 1n });
			expect(await h.collateralOf(BUYER)).toBe(1n);
			expect(await h.collateralOf(LENDER)).toBe(0n);
			expect(await h.positionToken.ownerOf(loanId)).toBeNull();
		});

		it("counts a unique collateral as one claimed unit", async () => {
			const { loanId } = await h.simple.createLoan(
				loanTerms({ collateral: { ...COLLATERAL, amount: 0n } }),
				PROPOSAL_CONTRACT,
			);
			h.clock.now = T0 + 30 * DAY;

			const result = await h.simple.claimLoan(loanId, LENDER);

			expect(result.claimedAmount).toBe(1n);
			expect(await h.collateralOf(LENDER)).toBe(1n);
		});

		it("pays repaid credit to the holder", async () => {
			await h.fund(BORROWER, 10_000n);
			const loanId = await originate();
			await h.positionToken.transfer(loanId, LENDER, BUYER);
			await h.simple.repayLoan(loanId, BORROWER);

			await expect(h.simple.claimLoan(loanId, LENDER)).rejects.toMatchObject({
				code: "UNAUTHORIZED",
			});
			const result = await h.simple.claimLoan(loanId, BUYER);

			expect(result).toMatchObject({ kind: "repaid", claimedAmount: 1_100n });
			expect(await h.balance(BUYER)).toBe(1_100n);
			expect(await h.balance(VAULT)).toBe(0n);
			expect(await h.positionToken.ownerOf(loanId)).toBeNull();
		});

		it("refuses running loans", async () => {
			const loanId = await originate();

			await expect(h.simple.claimLoan(loanId, LENDER)).rejects.toMatchObject({
				code: "INVALID_STATE",
			});
		});
	});

	describe("refinanceLoan", () => {
		beforeEach(async () => {
			await h.fund(NEW_LENDER, 10_000n);
		});

		it("repays the old lender and pays the surplus to the borrower", async () => {
			const loanId = await originate();

			const result = await h.simple.refinanceLoan(
				loanId,
				loanTerms({ lender: NEW_LENDER, principalAmount: 2_000n }),
				PROPOSAL_CONTRACT,
			);

			expect(result.newLoanId).toBe(2);
			expect(result.owedAmount).toBe(1_100n);
			expect(result.split).toEqual({
				feeAmount: 20n,
				netAmount: 1_980n,
				commonAmount: 1_100n,
				surplusAmount: 880n,
				contributionAmount: 0n,
			});
			expect(result.closed).toBe(true);
			expect(await h.balance(LENDER)).toBe(10_100n);
			expect(await h.balance(NEW_LENDER)).toBe(8_000n);
			expect(await h.balance(BORROWER)).toBe(1_870n);
			expect(await h.balance(COLLECTOR)).toBe(30n);
			expect(await h.collateralOf(VAULT)).toBe(1n);
			expect(await h.positionToken.ownerOf(1)).toBeNull();
			expect(await h.positionToken.ownerOf(2)).toBe(NEW_LENDER);
		});

		it("asks the borrower for the shortfall", async () => {
			const loanId = await originate();

			const result = await h.simple.refinanceLoan(
				loanId,
				loanTerms({ lender: NEW_LENDER }),
				PROPOSAL_CONTRACT,
			);

			expect(result.split.contributionAmount).toBe(110n);
			expect(await h.balance(BORROWER)).toBe(880n);
			expect(await h.balance(LENDER)).toBe(10_100n);
		});

		it("skips the common leg when the new lender holds the old loan", async () => {
			const loanId = await originate();

			const result = await h.simple.refinanceLoan(
				loanId,
				loanTerms({ principalAmount: 2_000n }),
				PROPOSAL_CONTRACT,
			);

			expect(result.transfers.map((t) => [t.kind, t.asset.amount])).toEqual([
				["push-from", 20n],
				["push-from", 880n],
			]);
			expect(await h.balance(LENDER)).toBe(8_100n);
		});

		it("settles into custody when the loan changed hands", async () => {
			const loanId = await originate();
			await h.positionToken.transfer(loanId, LENDER, BUYER);

			const result = await h.simple.refinanceLoan(
				loanId,
				loanTerms({ lender: NEW_LENDER, principalAmount: 2_000n }),
				PROPOSAL_CONTRACT,
			);

			expect(result.closed).toBe(false);
			expect(await h.simple.getStatus(loanId)).toBe("repaid");
			expect(await h.balance(VAULT)).toBe(1_100n);

			await h.simple.claimLoan(loanId, BUYER);
			expect(await h.balance(BUYER)).toBe(1_100n);
		});

		it("rejects terms for another borrower", async () => {
			const loanId = await originate();

			await expect(
				h.simple.refinanceLoan(
					loanId,
					loanTerms({ lender: NEW_LENDER, borrower: BUYER }),
					PROPOSAL_CONTRACT,
				),
			).rejects.toMatchObject({ code: "MISMATCHED_TERMS" });
		});
	});

	describe("reads", () => {
		it("reports nonexistent loans as zeroed records", async () => {
			const loan = await h.simple.getLoan(42);

			expect(loan).toMatchObject({
				id: 42,
				status: "none",
				statusCode: 0,
				principalAmount: 0n,
				repaymentAmount: 0n,
				holder: null,
			});
			expect(await h.simple.computeRepaymentAmount(42)).toBe(0n);
			expect(await h.simple.computeStateFingerprint(42)).toBe(ZERO_HASH);
		});

		it("changes the fingerprint when the loan changes", async () => {
			await h.fund(BORROWER, 10_000n);
			const loanId = await originate();
			const before = await h.simple.computeStateFingerprint(loanId);

			expect(await h.simple.computeStateFingerprint(loanId)).toBe(before);
			await h.simple.repayLoan(loanId, BORROWER, { amount: 50n });

			expect(await h.simple.computeStateFingerprint(loanId)).not.toBe(before);
		});
	});

	describe("state at the first transfer", () => {
		const expectSettledBeforeTransfers = async (operation: () => Promise<unknown>) => {
			const seen = h.stateAtFirstTransfer();
			await operation();
			expect(seen.state).toBeDefined();
			expect(seen.state).toEqual(await h.ledgerState());
		};

		const extension = (loanId: number): ExtensionProposal => ({
			loanId,
			compensationAddress: CREDIT,
			compensationAmount: 50n,
			duration: 10 * DAY,
			expiration: T0 + DAY,
			proposer: BORROWER,
			nonceSpace: 0n,
			nonce: 1n,
		});

		beforeEach(async () => {
			await h.fund(BORROWER, 10_000n);
		});

		it("is final for originations", async () => {
			await expectSettledBeforeTransfers(originate);
		});

		it("is final for direct repayments", async () => {
			const loanId = await originate();

			await expectSettledBeforeTransfers(() => h.simple.repayLoan(loanId, BORROWER));
		});

		it("is final for repayments into custody", async () => {
			const loanId = await originate();
			await h.positionToken.transfer(loanId, LENDER, BUYER);

			await expectSettledBeforeTransfers(() => h.simple.repayLoan(loanId, BORROWER));
		});

		it("is final for refinancing", async () => {
			await h.fund(NEW_LENDER, 10_000n);
			const loanId = await originate();

			await expectSettledBeforeTransfers(() =>
				h.simple.refinanceLoan(
					loanId,
					loanTerms({ lender: NEW_LENDER, principalAmount: 2_000n }),
					PROPOSAL_CONTRACT,
				),
			);
		});

		it("is final for claims", async () => {
			const loanId = await originate();
			h.clock.now = T0 + 30 * DAY;

			await expectSettledBeforeTransfers(() => h.simple.claimLoan(loanId, LENDER));
		});

		it("is final for extensions", async () => {
			const loanId = await originate();
			await h.simple.makeExtensionProposal(extension(loanId), BORROWER);

			await expectSettledBeforeTransfers(() =>
				h.simple.extendLoan(extension(loanId), LENDER),
			);
		});
	});
});
