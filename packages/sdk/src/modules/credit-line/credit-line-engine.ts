/**
 * Credit Line Engine
 *
 * Settlement for debt-limit loans. Every repayment is pulled into custody
 * and credited to `unclaimedAmount`; the holder withdraws it at any time
 * with a claim. Collateral stays in custody until the terminal claim.
 */

import { fungible } from "../../core/asset.js";
import { LoanError } from "../../core/errors.js";
import { LoanViewFields } from "../../core/loan.js";
import { Address } from "../../core/types.js";
import { EncodableValue } from "../../utils/encoding.js";
import {
	DEFAULT_DEBT_LIMIT_POSTPONEMENT,
	DebtLimitPolicy,
	computeDebtLimitTangent,
	debtLimit,
} from "../default-policy/default-policy.js";
import {
	RateEncoding,
	applyPayment,
	aprToDailyRate,
	currentInterest,
} from "../interest/interest.js";
import { LoanEngine } from "../loan/loan-engine.js";
import {
	ClaimResult,
	CreateLoanResult,
	LoanEngineDeps,
	LoanTerms,
	RepayOptions,
	RepayResult,
	SettlementOptions,
} from "../loan/types.js";
import { SettlementPlan } from "../settlement/settlement-plan.js";
import { requireAction } from "../status/status.js";
import { CreditLine, CreditLineView } from "./types.js";

export interface CreditLineEngineDeps extends LoanEngineDeps<CreditLine> {
	/** Seconds after origination before the debt limit starts falling */
	debtLimitPostponement?: number;
}

export class CreditLineEngine extends LoanEngine<CreditLine> {
	readonly policy = new DebtLimitPolicy();
	readonly debtLimitPostponement: number;

	constructor(deps: CreditLineEngineDeps) {
		super(deps);
		this.debtLimitPostponement =
			deps.debtLimitPostponement ?? DEFAULT_DEBT_LIMIT_POSTPONEMENT;
	}

	/**
	 * Originate a credit line from negotiated terms.
	 *
	 * @param caller - Proposal contract tagged LOAN_PROPOSAL
	 */
	createLoan(
		terms: LoanTerms,
		caller: Address,
		options: SettlementOptions = {},
	): Promise<CreateLoanResult<CreditLine>> {
		return this.deps.scope.run(async (): Promise<CreateLoanResult<CreditLine>> => {
			await this.requireProposalCaller(caller);
			this.validateTerms(terms);
			const debtLimitTangent = computeDebtLimitTangent(
				terms.principalAmount + terms.fixedInterestAmount,
				terms.duration,
				this.debtLimitPostponement,
			);
			const now = this.now();

			const plan = new SettlementPlan(options.permits);
			const split = await this.planOrigination(plan, terms);

			const loanId = await this.deps.positionToken.mint(terms.lender);
			const loan: CreditLine = {
				...this.baseRecord(loanId, terms, now),
				accruingInterestDailyRate: aprToDailyRate(terms.accruingInterestApr),
				unclaimedAmount: 0n,
				debtLimitTangent,
			};
			await this.deps.store.save(loan);

			const transfers = await plan.execute(this.deps.assets);
			return { loanId, loan, feeAmount: split.feeAmount, transfers };
		});
	}

	/**
	 * Repay all or part of a running credit line into custody.
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

			const applied = applyPayment(
				loan.principalAmount,
				currentInterest(loan, this.rateOf(loan), now),
				amount,
			);
			const full = amount === owed;
			await this.deps.store.save({
				...loan,
				status: full ? "repaid" : "running",
				principalAmount: applied.principalAmount,
				fixedInterestAmount: applied.fixedInterestAmount,
				accruingInterestDailyRate: full ? 0n : loan.accruingInterestDailyRate,
				lastUpdateTimestamp: now,
				unclaimedAmount: loan.unclaimedAmount + amount,
			});

			const plan = new SettlementPlan(options.permits);
			plan.pull(fungible(loan.creditAddress, amount), payer);
			const transfers = await plan.execute(this.deps.assets);

			return {
				loanId,
				paidAmount: amount,
				remainingAmount: owed - amount,
				status: full ? "repaid" : "running",
				closed: false,
				transfers,
			};
		});
	}

	/**
	 * Claim by the position holder.
	 *
	 * A running line pays out its unclaimed repayments and stays open. A
	 * repaid line closes, returning the collateral to the borrower. A
	 * defaulted line closes, handing collateral and unclaimed repayments
	 * to the holder.
	 */
	claimLoan(loanId: number, caller: Address): Promise<ClaimResult> {
		return this.deps.scope.run(async (): Promise<ClaimResult> => {
			const now = this.now();
			const loan = await this.requireLoan(loanId);
			const status = this.statusOf(loan, now);
			const holder = await this.requireCallerIsHolder(loanId, caller);
			const credit = fungible(loan.creditAddress, loan.unclaimedAmount);
			const plan = new SettlementPlan();

			if (status === "running") {
				if (loan.unclaimedAmount === 0n) {
					throw new LoanError(
						`Loan ${loanId} has nothing to claim`,
						"INVALID_STATE",
						{ loanId, status },
					);
				}
				requireAction(loanId, status, "claim-unclaimed");
				await this.deps.store.save({ ...loan, unclaimedAmount: 0n });
				plan.push(credit, holder);
				const transfers = await plan.execute(this.deps.assets);
				return {
					loanId,
					holder,
					kind: "unclaimed",
					claimedAmount: loan.unclaimedAmount,
					closed: false,
					transfers,
				};
			}

			requireAction(loanId, status, "claim");
			await this.deps.store.delete(loanId);
			await this.deps.positionToken.burn(loanId);

			plan.push(credit, holder);
			plan.push(loan.collateral, status === "repaid" ? loan.borrower : holder);
			const transfers = await plan.execute(this.deps.assets);

			return {
				loanId,
				holder,
				kind: status === "repaid" ? "repaid" : "defaulted",
				claimedAmount: loan.unclaimedAmount,
				closed: true,
				transfers,
			};
		});
	}

	/**
	 * Debt permitted right now; zero for nonexistent loans.
	 */
	async computeDebtLimit(loanId: number): Promise<bigint> {
		const loan = await this.deps.store.load(loanId);
		if (!loan) return 0n;
		return debtLimit(loan.debtLimitTangent, loan.defaultTimestamp, this.now());
	}

	protected rateOf(loan: CreditLine): RateEncoding {
		return { kind: "daily", dailyRate: loan.accruingInterestDailyRate };
	}

	protected debtLimitTangentOf(loan: CreditLine): bigint {
		return loan.debtLimitTangent;
	}

	protected variantFingerprint(loan: CreditLine): EncodableValue[] {
		return [loan.unclaimedAmount, loan.debtLimitTangent];
	}

	protected emptyLoan(id: number): CreditLine {
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
			accruingInterestDailyRate: 0n,
			unclaimedAmount: 0n,
			debtLimitTangent: 0n,
		};
	}

	protected toView(loan: CreditLine, fields: LoanViewFields): CreditLineView {
		return { ...loan, ...fields };
	}
}
