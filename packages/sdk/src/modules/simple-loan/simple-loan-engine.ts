/**
 * Simple Loan Engine
 *
 * Settlement for fixed-deadline loans.
 *
 * Repaid credit goes straight to the position holder while the holder is
 * still the original lender; otherwise it waits in custody and the loan
 * stays "repaid" until the holder claims it.
 *
 * @example
 * ```typescript
 * const engine = new SimpleLoanEngine({ store, positionToken, assets, ... });
 *
 * const { loanId } = await engine.createLoan(terms, proposalContract);
 * await engine.repayLoan(loanId, borrower);
 * ```
 */

import { assetsEqual, fungible, transferUnits } from "../../core/asset.js";
import { LoanError } from "../../core/errors.js";
import { LoanViewFields } from "../../core/loan.js";
import { Address } from "../../core/types.js";
import { EncodableValue } from "../../utils/encoding.js";
import { FixedDeadlinePolicy } from "../default-policy/default-policy.js";
import {
	RateEncoding,
	applyPayment,
	currentInterest,
} from "../interest/interest.js";
import { LoanEngine } from "../loan/loan-engine.js";
import {
	ClaimResult,
	CreateLoanResult,
	LoanTerms,
	RepayOptions,
	RepayResult,
	SettlementOptions,
} from "../loan/types.js";
import { computeRefinanceSplit } from "../settlement/refinance.js";
import { SettlementPlan } from "../settlement/settlement-plan.js";
import { requireAction } from "../status/status.js";
import { RefinanceResult, SimpleLoan, SimpleLoanView } from "./types.js";

export class SimpleLoanEngine extends LoanEngine<SimpleLoan> {
	readonly policy = new FixedDeadlinePolicy();

	/**
	 * Originate a loan from negotiated terms.
	 *
	 * @param caller - Proposal contract tagged LOAN_PROPOSAL
	 */
	createLoan(
		terms: LoanTerms,
		caller: Address,
		options: SettlementOptions = {},
	): Promise<CreateLoanResult<SimpleLoan>> {
		return this.deps.scope.run(async (): Promise<CreateLoanResult<SimpleLoan>> => {
			await this.requireProposalCaller(caller);
			this.validateTerms(terms);
			const now = this.now();

			const plan = new SettlementPlan(options.permits);
			const split = await this.planOrigination(plan, terms);

			const loanId = await this.deps.positionToken.mint(terms.lender);
			const loan = this.newRecord(loanId, terms, now);
			await this.deps.store.save(loan);

			const transfers = await plan.execute(this.deps.assets);
			return { loanId, loan, feeAmount: split.feeAmount, transfers };
		});
	}

	/**
	 * Repay all or part of a running loan.
	 *
	 * @param payer - Account the credit is taken from
	 */
	repayLoan(
		loanId: number,
		payer: Address,
		options: RepayOptions = {},
	): Promise<RepayResult> {
		return this.deps.scope.run(async (): Promise<RepayResult> => {
			const now = this.now();
			const loan = await this.requireLoan(loanId);
			requireAction(loanId, this.statusOf(loan, now), "repay");

			const owed = this.owedAt(loan, now);
			const amount = options.amount ?? owed;
			this.requirePayment(loanId, amount, owed);
			const holder = await this.requireHolder(loanId);
			const credit = fungible(loan.creditAddress, amount);
			const plan = new SettlementPlan(options.permits);

			if (amount < owed) {
				const applied = applyPayment(
					loan.principalAmount,
					currentInterest(loan, this.rateOf(loan), now),
					amount,
				);
				await this.deps.store.save({
					...loan,
					principalAmount: applied.principalAmount,
					fixedInterestAmount: applied.fixedInterestAmount,
					lastUpdateTimestamp: now,
				});
				plan.pushFrom(credit, payer, holder);
				const transfers = await plan.execute(this.deps.assets);
				return {
					loanId,
					paidAmount: amount,
					remainingAmount: owed - amount,
					status: "running",
					closed: false,
					transfers,
				};
			}

			const closed = holder === loan.originalLender;
			if (closed) {
				await this.deps.store.delete(loanId);
				await this.deps.positionToken.burn(loanId);
				plan.pushFrom(credit, payer, holder);
			} else {
				await this.deps.store.save(this.settled(loan, owed, now));
				plan.pull(credit, payer);
			}
			plan.push(loan.collateral, loan.borrower);

			const transfers = await plan.execute(this.deps.assets);
			return {
				loanId,
				paidAmount: amount,
				remainingAmount: 0n,
				status: "repaid",
				closed,
				transfers,
			};
		});
	}

	/**
	 * Close a running loan into a new one on the same collateral.
	 *
	 * @param caller - Proposal contract tagged LOAN_PROPOSAL
	 */
	refinanceLoan(
		loanId: number,
		terms: LoanTerms,
		caller: Address,
		options: SettlementOptions = {},
	): Promise<RefinanceResult> {
		return this.deps.scope.run(async (): Promise<RefinanceResult> => {
			await this.requireProposalCaller(caller);
			const now = this.now();
			const loan = await this.requireLoan(loanId);
			requireAction(loanId, this.statusOf(loan, now), "refinance");

			if (
				terms.creditAddress !== loan.creditAddress ||
				terms.borrower !== loan.borrower ||
				!assetsEqual(terms.collateral, loan.collateral)
			) {
				throw new LoanError(
					`Refinancing terms do not match loan ${loanId}`,
					"MISMATCHED_TERMS",
					{ loanId },
				);
			}
			this.validateTerms(terms);

			const owed = this.owedAt(loan, now);
			const holder = await this.requireHolder(loanId);
			const split = computeRefinanceSplit(
				terms.principalAmount,
				await this.deps.fees.fee(),
				owed,
			);
			const collector = await this.deps.fees.feeCollector();
			const closed = holder === loan.originalLender;

			const newLoanId = await this.deps.positionToken.mint(terms.lender);
			const newLoan = this.newRecord(newLoanId, terms, now);
			await this.deps.store.save(newLoan);
			if (closed) {
				await this.deps.store.delete(loanId);
				await this.deps.positionToken.burn(loanId);
			} else {
				await this.deps.store.save(this.settled(loan, owed, now));
			}

			const credit = (amount: bigint) => fungible(loan.creditAddress, amount);
			const plan = new SettlementPlan(options.permits);
			plan.pushFrom(credit(split.feeAmount), terms.lender, collector);
			if (!closed) {
				plan.pull(credit(split.commonAmount), terms.lender);
			} else if (terms.lender !== holder) {
				plan.pushFrom(credit(split.commonAmount), terms.lender, holder);
			}
			plan.pushFrom(credit(split.surplusAmount), terms.lender, loan.borrower);
			if (closed) {
				plan.pushFrom(credit(split.contributionAmount), loan.borrower, holder);
			} else {
				plan.pull(credit(split.contributionAmount), loan.borrower);
			}

			const transfers = await plan.execute(this.deps.assets);
			return {
				loanId,
				newLoanId,
				newLoan,
				owedAmount: owed,
				split,
				closed,
				transfers,
			};
		});
	}

	/**
	 * Terminal claim by the position holder: repaid credit, or the
	 * collateral of a defaulted loan.
	 */
	claimLoan(loanId: number, caller: Address): Promise<ClaimResult> {
		return this.deps.scope.run(async (): Promise<ClaimResult> => {
			const now = this.now();
			const loan = await this.requireLoan(loanId);
			const status = this.statusOf(loan, now);
			requireAction(loanId, status, "claim");
			const holder = await this.requireCallerIsHolder(loanId, caller);

			await this.deps.store.delete(loanId);
			await this.deps.positionToken.burn(loanId);

			const plan = new SettlementPlan();
			if (status === "repaid") {
				plan.push(fungible(loan.creditAddress, loan.repaidAmount), holder);
			} else {
				plan.push(loan.collateral, holder);
			}
			const transfers = await plan.execute(this.deps.assets);

			return {
				loanId,
				holder,
				kind: status === "repaid" ? "repaid" : "defaulted",
				claimedAmount:
					status === "repaid" ? loan.repaidAmount : transferUnits(loan.collateral),
				closed: true,
				transfers,
			};
		});
	}

	protected rateOf(loan: SimpleLoan): RateEncoding {
		return { kind: "apr", apr: loan.accruingInterestApr };
	}

	protected variantFingerprint(loan: SimpleLoan): EncodableValue[] {
		return [loan.repaidAmount];
	}

	protected emptyLoan(id: number): SimpleLoan {
		return {
			id,
			status: "running",
			creditAddress: "",
			borrower: "",
			originalLender: "",
			startTimestamp: 0,
			lastUpdateTimestamp: 0,
			defaultTimestamp: 0,
			fixedInterestAmount: 0n,
			principalAmount: 0n,
			collateral: { category: "fungible", assetAddress: "", id: 0n, amount: 0n },
			accruingInterestApr: 0n,
			repaidAmount: 0n,
		};
	}

	protected toView(loan: SimpleLoan, fields: LoanViewFields): SimpleLoanView {
		return { ...loan, ...fields };
	}

	private newRecord(id: number, terms: LoanTerms, now: number): SimpleLoan {
		return {
			...this.baseRecord(id, terms, now),
			accruingInterestApr: terms.accruingInterestApr,
			repaidAmount: 0n,
		};
	}

	/**
	 * Record of a fully repaid loan waiting for its holder.
	 */
	private settled(loan: SimpleLoan, owed: bigint, now: number): SimpleLoan {
		return {
			...loan,
			status: "repaid",
			principalAmount: 0n,
			fixedInterestAmount: 0n,
			accruingInterestApr: 0n,
			lastUpdateTimestamp: now,
			repaidAmount: owed,
		};
	}
}
