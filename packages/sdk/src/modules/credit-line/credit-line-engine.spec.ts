import {
	BORROWER,
	BUYER,
	CREDIT,
	DAY,
	Harness,
	LENDER,
	PROPOSAL_CONTRACT,
	T0,
	VAULT,
	createHarness,
	loanTerms,
} from "../../../test/harness.js";
import { DEBT_LIMIT_TANGENT_SCALE } from "../default-policy/default-policy.js";
import { ExtensionProposal } from "../extension/extension.js";

const E18 = 1_000_000_000_000_000_000n;

describe("CreditLineEngine", () => {
	let h: Harness;

	const terms = (apr = 0n) =>
		loanTerms({
			principalAmount: 800n * E18,
			fixedInterestAmount: 200n * E18,
			accruingInterestApr: apr,
			duration: 360 * DAY,
		});

	const originate = async (apr = 0n) => {
		const { loanId } = await h.creditLines.createLoan(terms(apr), PROPOSAL_CONTRACT);
		return loanId;
	};

	beforeEach(async () => {
		h = createHarness();
		await h.fund(LENDER, 1_000n * E18);
		await h.fund(BORROWER, 1_000n * E18);
		await h.giveCollateral();
	});

	describe("createLoan", () => {
		it("stores a daily rate and the debt limit slope", async () => {
			const { loan } = await h.creditLines.createLoan(terms(3_650n), PROPOSAL_CONTRACT);

			expect(loan.accruingInterestDailyRate).toBe(10_000_000n);
			expect(loan.debtLimitTangent).toBe(
				(1_000n * E18 * DEBT_LIMIT_TANGENT_SCALE) / BigInt(270 * DAY),
			);
			expect(loan.unclaimedAmount).toBe(0n);
			expect(await h.balance(BORROWER)).toBe(1_800n * E18);
			expect(await h.collateralOf(VAULT)).toBe(1n);
		});

		it("requires a duration beyond the postponement", async () => {
			await expect(
				h.creditLines.createLoan(
					loanTerms({ duration: 90 * DAY }),
					PROPOSAL_CONTRACT,
				),
			).rejects.toMatchObject({ code: "OUT_OF_BOUNDS" });
		});
	});

	describe("interest and default", () => {
		it("accrues interest per minute at the daily rate", async () => {
			const loanId = await originate(3_650n);
			h.clock.now = T0 + 10 * DAY;

			expect(await h.creditLines.computeRepaymentAmount(loanId)).toBe(1_008n * E18);
			expect(await h.creditLines.getStatus(loanId)).toBe("running");
		});

		it("defaults once the debt reaches the falling limit", async () => {
			const loanId = await originate();

			h.clock.now = T0 + 90 * DAY - 1;
			expect(await h.creditLines.getStatus(loanId)).toBe("running");
			expect(await h.creditLines.computeDebtLimit(loanId)).toBeGreaterThan(1_000n * E18);

			h.clock.now = T0 + 90 * DAY;
			expect(await h.creditLines.getStatus(loanId)).toBe("defaulted");
			expect(await h.creditLines.computeDebtLimit(loanId)).toBeLessThanOrEqual(
				1_000n * E18,
			);
			await expect(h.creditLines.repayLoan(loanId, BORROWER)).rejects.toMatchObject({
				code: "DEFAULTED",
			});
		});

		it("pushes the default out with partial repayments", async () => {
			const loanId = await originate();
			await h.creditLines.repayLoan(loanId, BORROWER, { amount: 400n * E18 });

			h.clock.now = T0 + 90 * DAY;
			expect(await h.creditLines.getStatus(loanId)).toBe("running");
		});

		it("reports a zero limit for missing loans and past the deadline", async () => {
			const loanId = await originate();

			expect(await h.creditLines.computeDebtLimit(99)).toBe(0n);
			h.clock.now = T0 + 360 * DAY;
			expect(await h.creditLines.computeDebtLimit(loanId)).toBe(0n);
		});
	});

	describe("repayLoan", () => {
		it("collects partial payments into custody", async () => {
			const loanId = await originate();

			const result = await h.creditLines.repayLoan(loanId, BORROWER, {
				amount: 400n * E18,
			});

			expect(result).toMatchObject({
				remainingAmount: 600n * E18,
				status: "running",
				closed: false,
			});
			const loan = await h.creditLines.getLoan(loanId);
			expect(loan.principalAmount).toBe(600n * E18);
			expect(loan.fixedInterestAmount).toBe(0n);
			expect(loan.unclaimedAmount).toBe(400n * E18);
			expect(await h.balance(VAULT)).toBe(400n * E18);
		});

		it("marks the line repaid on a full payment", async () => {
			const loanId = await originate(3_650n);

			const result = await h.creditLines.repayLoan(loanId, BORROWER);

			expect(result.status).toBe("repaid");
			expect(result.paidAmount).toBe(1_000n * E18);
			expect(await h.creditLines.getStatus(loanId)).toBe("repaid");
			expect(await h.creditLines.computeRepaymentAmount(loanId)).toBe(0n);
			expect((await h.creditLines.getLoan(loanId)).accruingInterestDailyRate).toBe(0n);
		});
	});

	describe("claimLoan", () => {
		it("withdraws repayments while the line keeps running", async () => {
			const loanId = await originate();
			await h.creditLines.repayLoan(loanId, BORROWER, { amount: 400n * E18 });

			const result = await h.creditLines.claimLoan(loanId, LENDER);

			expect(result).toMatchObject({
				kind: "unclaimed",
				claimedAmount: 400n * E18,
				closed: false,
			});
			expect(await h.balance(LENDER)).toBe(600n * E18);
			expect(await h.creditLines.getStatus(loanId)).toBe("running");
			await expect(h.creditLines.claimLoan(loanId, LENDER)).rejects.toMatchObject({
				code: "INVALID_STATE",
			});
		});

		it("returns the collateral to the borrower once repaid", async () => {
			const loanId = await originate();
			await h.creditLines.repayLoan(loanId, BORROWER);

			const result = await h.creditLines.claimLoan(loanId, LENDER);

			expect(result).toMatchObject({
				kind: "repaid",
				claimedAmount: 1_000n * E18,
				closed: true,
			});
			expect(await h.balance(LENDER)).toBe(1_200n * E18);
			expect(await h.collateralOf(BORROWER)).toBe(1n);
			expect(await h.creditLines.getStatus(loanId)).toBe("none");
			expect(await h.positionToken.ownerOf(loanId)).toBeNull();
		});

		it("gives collateral and repayments to the holder on default", async () => {
			const loanId = await originate();
			await h.creditLines.repayLoan(loanId, BORROWER, { amount: 100n * E18 });
			h.clock.now = T0 + 360 * DAY;

			const result = await h.creditLines.claimLoan(loanId, LENDER);

			expect(result).toMatchObject({ kind: "defaulted", claimedAmount: 100n * E18 });
			expect(await h.collateralOf(LENDER)).toBe(1n);
			expect(await h.balance(LENDER)).toBe(300n * E18);
		});

		it("pays a defaulted line's collateral to the current holder", async () => {
			const loanId = await originate();
			await h.positionToken.transfer(loanId, LENDER, BUYER);
			h.clock.now = T0 + 360 * DAY;

			await expect(h.creditLines.claimLoan(loanId, LENDER)).rejects.toMatchObject({
				code: "UNAUTHORIZED",
			});
			const result = await h.creditLines.claimLoan(loanId, BUYER);

			expect(result).toMatchObject({ kind: "defaulted", holder: BUYER, claimedAmount: 0n });
			expect(await h.collateralOf(BUYER)).toBe(1n);
			expect(await h.collateralOf(LENDER)).toBe(0n);
		});

		it("only pays the position holder", async () => {
			const loanId = await originate();
			await h.creditLines.repayLoan(loanId, BORROWER, { amount: 100n * E18 });

			await expect(h.creditLines.claimLoan(loanId, BUYER)).rejects.toMatchObject({
				code: "UNAUTHORIZED",
			});
		});
	});

	it("includes the unclaimed amount in the fingerprint", async () => {
		const loanId = await originate();
		await h.creditLines.repayLoan(loanId, BORROWER, { amount: 100n * E18 });
		const before = await h.creditLines.computeStateFingerprint(loanId);

		await h.creditLines.claimLoan(loanId, LENDER);

		expect(await h.creditLines.computeStateFingerprint(loanId)).not.toBe(before);
	});

	describe("state at the first transfer", () => {
		const expectSettledBeforeTransfers = async (operation: () => Promise<unknown>) => {
			const seen = h.stateAtFirstTransfer();
			await operation();
			expect(seen.state).toBeDefined();
			expect(seen.state).toEqual(await h.ledgerState());
		};

		it("is final for repayments", async () => {
			const loanId = await originate();

			await expectSettledBeforeTransfers(() =>
				h.creditLines.repayLoan(loanId, BORROWER, { amount: 400n * E18 }),
			);
		});

		it("is final for withdrawals of repayments", async () => {
			const loanId = await originate();
			await h.creditLines.repayLoan(loanId, BORROWER, { amount: 400n * E18 });

			await expectSettledBeforeTransfers(() => h.creditLines.claimLoan(loanId, LENDER));
		});

		it("is final for terminal claims", async () => {
			const loanId = await originate();
			await h.creditLines.repayLoan(loanId, BORROWER, { amount: 100n * E18 });
			h.clock.now = T0 + 360 * DAY;

			await expectSettledBeforeTransfers(() => h.creditLines.claimLoan(loanId, LENDER));
		});

		it("is final for extensions", async () => {
			const loanId = await originate();
			const offer: ExtensionProposal = {
				loanId,
				compensationAddress: CREDIT,
				compensationAmount: 50n,
				duration: 10 * DAY,
				expiration: T0 + DAY,
				proposer: BORROWER,
				nonceSpace: 0n,
				nonce: 1n,
			};
			await h.creditLines.makeExtensionProposal(offer, BORROWER);

			await expectSettledBeforeTransfers(() => h.creditLines.extendLoan(offer, LENDER));
		});
	});
});
