/**
 * Loan Engine base
 *
 * Behaviour shared by both loan variants: status resolution, read models,
 * origination checks and the extension workflow. Every mutating operation
 * runs inside the atomic scope, finishes its checks and store effects, and
 * only then executes the settlement plan.
 */

import { assertValidAsset, fungible } from "../../core/asset.js";
import { LoanError } from "../../core/errors.js";
import {
	LOAN_STATUS_CODES,
	LoanRecordBase,
	LoanStatus,
	LoanView,
	LoanViewFields,
} from "../../core/loan.js";
import { Address, Clock, Timestamp, systemClock } from "../../core/types.js";
import { LOAN_PROPOSAL_TAG } from "../../protocol/types.js";
import { EncodableValue, ZERO_HASH, hashWords } from "../../utils/encoding.js";
import { DefaultPolicy } from "../default-policy/default-policy.js";
import {
	ExtensionProposal,
	ExtensionWorkflow,
} from "../extension/extension.js";
import {
	FeeSplit,
	MAX_ACCRUING_INTEREST_APR,
	RateEncoding,
	computeFee,
	repaymentAmount,
} from "../interest/interest.js";
import { SettlementPlan } from "../settlement/settlement-plan.js";
import { effectiveStatus, requireAction } from "../status/status.js";
import {
	ExtendOptions,
	ExtendResult,
	LoanEngineDeps,
	LoanTerms,
	MIN_LOAN_DURATION,
} from "./types.js";

export abstract class LoanEngine<TLoan extends LoanRecordBase> {
	protected readonly clock: Clock;
	protected readonly extensions: ExtensionWorkflow;

	abstract readonly policy: DefaultPolicy;

	constructor(protected readonly deps: LoanEngineDeps<TLoan>) {
		this.clock = deps.clock ?? systemClock;
		this.extensions = new ExtensionWorkflow({
			proposals: deps.proposals,
			nonces: deps.nonces,
			signatures: deps.signatures,
			domain: deps.domain,
			bounds: deps.extensionBounds,
		});
	}

	/** Rate the loan accrues at */
	protected abstract rateOf(loan: TLoan): RateEncoding;

	/** Variant fields appended to the state fingerprint */
	protected abstract variantFingerprint(loan: TLoan): EncodableValue[];

	/** Zeroed record reported for a nonexistent id */
	protected abstract emptyLoan(id: number): TLoan;

	/** Merge a record with its read-time fields */
	protected abstract toView(loan: TLoan, fields: LoanViewFields): LoanView<TLoan>;

	/** Slope for debt-limit loans */
	protected debtLimitTangentOf(_loan: TLoan): bigint | undefined {
		return undefined;
	}

	protected now(): Timestamp {
		return this.clock();
	}

	// =========================================================================
	// Reads
	// =========================================================================

	async getLoan(loanId: number): Promise<LoanView<TLoan>> {
		const now = this.now();
		const loan = await this.deps.store.load(loanId);
		if (!loan) {
			return this.toView(this.emptyLoan(loanId), {
				status: "none",
				statusCode: LOAN_STATUS_CODES.none,
				repaymentAmount: 0n,
				holder: null,
			});
		}
		const status = this.statusOf(loan, now);
		return this.toView(loan, {
			status,
			statusCode: LOAN_STATUS_CODES[status],
			repaymentAmount: this.owedAt(loan, now),
			holder: await this.deps.positionToken.ownerOf(loanId),
		});
	}

	async getStatus(loanId: number): Promise<LoanStatus> {
		const loan = await this.deps.store.load(loanId);
		return loan ? this.statusOf(loan, this.now()) : "none";
	}

	/**
	 * Amount that settles the loan now, zero for nonexistent loans.
	 */
	async computeRepaymentAmount(loanId: number): Promise<bigint> {
		const loan = await this.deps.store.load(loanId);
		return loan ? this.owedAt(loan, this.now()) : 0n;
	}

	/**
	 * Hash over the status code and the mutable economic fields.
	 */
	async computeStateFingerprint(loanId: number): Promise<string> {
		const loan = await this.deps.store.load(loanId);
		if (!loan) return ZERO_HASH;
		const rate = this.rateOf(loan);
		return hashWords([
			LOAN_STATUS_CODES[this.statusOf(loan, this.now())],
			loan.defaultTimestamp,
			loan.principalAmount,
			loan.fixedInterestAmount,
			rate.kind === "apr" ? rate.apr : rate.dailyRate,
			loan.lastUpdateTimestamp,
			...this.variantFingerprint(loan),
		]);
	}

	getExtensionHash(proposal: ExtensionProposal): string {
		return this.extensions.hash(proposal);
	}

	isExtensionProposalMade(proposal: ExtensionProposal): Promise<boolean> {
		return this.extensions.isMade(proposal);
	}

	// =========================================================================
	// Extensions
	// =========================================================================

	makeExtensionProposal(
		proposal: ExtensionProposal,
		caller: Address,
	): Promise<string> {
		return this.deps.scope.run(() =>
			this.extensions.makeProposal(proposal, caller),
		);
	}

	/**
	 * Void one of the caller's proposal nonces.
	 */
	revokeNonce(caller: Address, nonceSpace: bigint, nonce: bigint): Promise<void> {
		return this.deps.scope.run(() =>
			this.deps.nonces.revokeNonce(caller, nonceSpace, nonce),
		);
	}

	/**
	 * Accept an extension proposal made by the counterparty of `caller`.
	 */
	extendLoan(
		proposal: ExtensionProposal,
		caller: Address,
		options: ExtendOptions = {},
	): Promise<ExtendResult> {
		return this.deps.scope.run(async (): Promise<ExtendResult> => {
			const now = this.now();
			const loanId = proposal.loanId;
			const loan = await this.requireLoan(loanId);
			requireAction(loanId, this.statusOf(loan, now), "extend");

			const holder = await this.requireHolder(loanId);
			const approved = await this.extensions.approve(
				proposal,
				caller,
				{ borrower: loan.borrower, holder },
				options.signature === undefined
					? { kind: "registered" }
					: { kind: "signed", signature: options.signature },
				now,
			);

			await this.extensions.consume(proposal);
			const defaultTimestamp = loan.defaultTimestamp + proposal.duration;
			await this.deps.store.save({ ...loan, defaultTimestamp });

			const plan = new SettlementPlan(options.permits);
			if (approved.compensation) {
				plan.pushFrom(approved.compensation, loan.borrower, holder);
			}
			const transfers = await plan.execute(this.deps.assets);

			return { loanId, proposalHash: approved.hash, defaultTimestamp, transfers };
		});
	}

	// =========================================================================
	// Helpers for the variants
	// =========================================================================

	protected statusOf(loan: TLoan, now: Timestamp): LoanStatus {
		return effectiveStatus(
			{
				status: loan.status,
				defaultTimestamp: loan.defaultTimestamp,
				debt: this.owedAt(loan, now),
				debtLimitTangent: this.debtLimitTangentOf(loan),
			},
			now,
			this.policy,
		);
	}

	protected owedAt(loan: TLoan, now: Timestamp): bigint {
		return repaymentAmount(loan, this.rateOf(loan), now);
	}

	protected async requireLoan(loanId: number): Promise<TLoan> {
		const loan = await this.deps.store.load(loanId);
		if (!loan) {
			throw new LoanError(`Loan ${loanId} not found`, "NOT_FOUND", { loanId });
		}
		return loan;
	}

	protected async requireHolder(loanId: number): Promise<Address> {
		const holder = await this.deps.positionToken.ownerOf(loanId);
		if (holder === null) {
			throw new LoanError(
				`Position token for loan ${loanId} does not exist`,
				"INVALID_STATE",
				{ loanId },
			);
		}
		return holder;
	}

	protected async requireCallerIsHolder(
		loanId: number,
		caller: Address,
	): Promise<Address> {
		const holder = await this.requireHolder(loanId);
		if (caller !== holder) {
			throw new LoanError(
				`Caller is not the holder of loan ${loanId}`,
				"UNAUTHORIZED",
				{ loanId, caller },
			);
		}
		return holder;
	}

	protected async requireProposalCaller(caller: Address): Promise<void> {
		if (!(await this.deps.capabilities.hasTag(caller, LOAN_PROPOSAL_TAG))) {
			throw new LoanError(
				`Caller is missing the ${LOAN_PROPOSAL_TAG} tag`,
				"UNAUTHORIZED",
				{ caller, tag: LOAN_PROPOSAL_TAG },
			);
		}
	}

	protected validateTerms(terms: LoanTerms): void {
		assertValidAsset(
			fungible(terms.creditAddress, terms.principalAmount),
			"credit",
		);
		assertValidAsset(terms.collateral, "collateral");

		if (terms.principalAmount <= 0n) {
			throw new LoanError("Principal must be positive", "OUT_OF_BOUNDS", {
				principalAmount: terms.principalAmount.toString(),
			});
		}
		if (terms.fixedInterestAmount < 0n) {
			throw new LoanError("Fixed interest cannot be negative", "OUT_OF_BOUNDS", {
				fixedInterestAmount: terms.fixedInterestAmount.toString(),
			});
		}
		if (!Number.isInteger(terms.duration) || terms.duration < MIN_LOAN_DURATION) {
			throw new LoanError("Loan duration too short", "OUT_OF_BOUNDS", {
				duration: terms.duration,
				minDuration: MIN_LOAN_DURATION,
			});
		}
		if (
			terms.accruingInterestApr < 0n ||
			terms.accruingInterestApr > MAX_ACCRUING_INTEREST_APR
		) {
			throw new LoanError("Accruing interest APR out of bounds", "OUT_OF_BOUNDS", {
				accruingInterestApr: terms.accruingInterestApr.toString(),
				maxApr: MAX_ACCRUING_INTEREST_APR.toString(),
			});
		}
	}

	/**
	 * Fields every new record starts with.
	 */
	protected baseRecord(id: number, terms: LoanTerms, now: Timestamp): LoanRecordBase {
		return {
			id,
			status: "running",
			creditAddress: terms.creditAddress,
			borrower: terms.borrower,
			originalLender: terms.lender,
			startTimestamp: now,
			lastUpdateTimestamp: now,
			defaultTimestamp: now + terms.duration,
			fixedInterestAmount: terms.fixedInterestAmount,
			principalAmount: terms.principalAmount,
			collateral: { ...terms.collateral },
		};
	}

	/**
	 * Origination transfers: collateral into custody, fee to the collector,
	 * the rest of the principal to the borrower.
	 */
	protected async planOrigination(
		plan: SettlementPlan,
		terms: LoanTerms,
	): Promise<FeeSplit> {
		const split = computeFee(terms.principalAmount, await this.deps.fees.fee());
		const collector = await this.deps.fees.feeCollector();
		plan
			.pull(terms.collateral, terms.borrower)
			.pushFrom(
				fungible(terms.creditAddress, split.feeAmount),
				terms.lender,
				collector,
			)
			.pushFrom(
				fungible(terms.creditAddress, split.netAmount),
				terms.lender,
				terms.borrower,
			);
		return split;
	}

	protected requirePayment(loanId: number, amount: bigint, owed: bigint): void {
		if (amount <= 0n || amount > owed) {
			throw new LoanError("Repayment amount out of bounds", "OUT_OF_BOUNDS", {
				loanId,
				amount: amount.toString(),
				owed: owed.toString(),
			});
		}
	}
}
