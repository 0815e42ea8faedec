import { Logger } from "@nestjs/common";
import { EventEmitter2 } from "@nestjs/event-emitter";
import {
	Address,
	ClaimResult,
	CreateLoanResult,
	LoanEngine,
	LoanRecordBase,
	LoanStore,
	LoanTerms,
	LoanView,
	RepayOptions,
	RepayResult,
	SettlementOptions,
} from "@loanvault/sdk";
import { newEventId } from "../common/event-id";
import {
	EXTENSION_PROPOSAL_MADE_ID,
	type ExtensionProposalMade,
	LOAN_CLAIMED_ID,
	LOAN_CREATED_ID,
	LOAN_EXTENDED_ID,
	LOAN_REPAID_ID,
	type LoanClaimed,
	type LoanCreated,
	type LoanExtended,
	type LoanRepaid,
	type LoanVariant,
} from "../common/loan.events";
import { ApiPaginatedMeta } from "../common/dto/envelopes";
import { ListLoansQueryDto } from "./dto/list-loans.query";
import {
	AcceptExtensionInDto,
	ExtensionProposalDto,
	LoanTermsInDto,
	RepayInDto,
} from "./dto/loan-requests.dto";
import {
	ClaimOutDto,
	CreateLoanOutDto,
	ExtendOutDto,
	FingerprintDto,
	LoanAmountDto,
	LoanViewDto,
	ProposalHashDto,
	RepayOutDto,
} from "./dto/loan-responses.dto";
import {
	toClaimOutDto,
	toExtendOutDto,
	toExtensionProposal,
	toLoanTerms,
	toRepayOutDto,
	toSettlementOptions,
	toTransferDtos,
} from "./dto/loan-dto.mappers";

/**
 * Operations both engines expose with the same shape.
 */
export interface SettlementEngine<TLoan extends LoanRecordBase> extends LoanEngine<TLoan> {
	createLoan(
		terms: LoanTerms,
		caller: Address,
		options?: SettlementOptions,
	): Promise<CreateLoanResult<TLoan>>;
	repayLoan(loanId: number, caller: Address, options?: RepayOptions): Promise<RepayResult>;
	claimLoan(loanId: number, caller: Address): Promise<ClaimResult>;
}

export const DEFAULT_PAGE_SIZE = 20;

/**
 * HTTP-facing wrapper around a settlement engine: converts payloads, logs
 * every mutation and announces it on the event bus once committed.
 */
export abstract class LoanEngineService<
	TLoan extends LoanRecordBase,
	TDto extends LoanViewDto,
> {
	protected abstract readonly logger: Logger;
	protected abstract readonly variant: LoanVariant;

	protected constructor(
		protected readonly engine: SettlementEngine<TLoan>,
		private readonly store: LoanStore<TLoan>,
		protected readonly events: EventEmitter2,
	) {}

	protected abstract toDto(view: LoanView<TLoan>): TDto;

	async create(
		dto: LoanTermsInDto,
		caller: Address,
	): Promise<CreateLoanOutDto<TDto>> {
		const result = await this.engine.createLoan(
			toLoanTerms(dto),
			caller,
			toSettlementOptions(dto),
		);
		const loan = await this.engine.getLoan(result.loanId);
		this.logger.log(
			`Loan ${result.loanId} created for ${loan.borrower}, principal ${loan.principalAmount}`,
		);
		this.events.emit(LOAN_CREATED_ID, {
			eventId: newEventId(),
			variant: this.variant,
			loanId: result.loanId,
			lender: loan.originalLender,
			borrower: loan.borrower,
			principalAmount: loan.principalAmount.toString(),
			feeAmount: result.feeAmount.toString(),
			createdAt: new Date().toISOString(),
		} satisfies LoanCreated);
		return {
			loanId: result.loanId,
			feeAmount: result.feeAmount.toString(),
			loan: this.toDto(loan),
			transfers: toTransferDtos(result.transfers),
		};
	}

	async repay(loanId: number, dto: RepayInDto, caller: Address): Promise<RepayOutDto> {
		const result = await this.engine.repayLoan(loanId, caller, {
			...toSettlementOptions(dto),
			amount: dto.amount === undefined ? undefined : BigInt(dto.amount),
		});
		this.logger.log(
			`Loan ${loanId} repaid ${result.paidAmount} by ${caller}, ${result.remainingAmount} remaining`,
		);
		this.events.emit(LOAN_REPAID_ID, {
			eventId: newEventId(),
			variant: this.variant,
			loanId,
			payer: caller,
			paidAmount: result.paidAmount.toString(),
			remainingAmount: result.remainingAmount.toString(),
			status: result.status,
			repaidAt: new Date().toISOString(),
		} satisfies LoanRepaid);
		return toRepayOutDto(result);
	}

	async claim(loanId: number, caller: Address): Promise<ClaimOutDto> {
		const result = await this.engine.claimLoan(loanId, caller);
		this.logger.log(
			`Loan ${loanId} claimed (${result.kind}) by ${caller}: ${result.claimedAmount}`,
		);
		this.events.emit(LOAN_CLAIMED_ID, {
			eventId: newEventId(),
			variant: this.variant,
			loanId,
			holder: result.holder,
			kind: result.kind,
			claimedAmount: result.claimedAmount.toString(),
			claimedAt: new Date().toISOString(),
		} satisfies LoanClaimed);
		return toClaimOutDto(result);
	}

	async makeExtensionProposal(
		dto: ExtensionProposalDto,
		caller: Address,
	): Promise<ProposalHashDto> {
		const proposalHash = await this.engine.makeExtensionProposal(
			toExtensionProposal(dto),
			caller,
		);
		this.logger.log(`Extension proposal ${proposalHash} made for loan ${dto.loanId}`);
		this.events.emit(EXTENSION_PROPOSAL_MADE_ID, {
			eventId: newEventId(),
			variant: this.variant,
			loanId: dto.loanId,
			proposalHash,
			proposer: caller,
			madeAt: new Date().toISOString(),
		} satisfies ExtensionProposalMade);
		return { proposalHash };
	}

	async extend(dto: AcceptExtensionInDto, caller: Address): Promise<ExtendOutDto> {
		const result = await this.engine.extendLoan(toExtensionProposal(dto.proposal), caller, {
			...toSettlementOptions(dto),
			signature: dto.signature,
		});
		this.logger.log(
			`Loan ${result.loanId} extended to ${result.defaultTimestamp} by ${caller}`,
		);
		this.events.emit(LOAN_EXTENDED_ID, {
			eventId: newEventId(),
			variant: this.variant,
			loanId: result.loanId,
			proposalHash: result.proposalHash,
			defaultTimestamp: result.defaultTimestamp,
			extendedAt: new Date().toISOString(),
		} satisfies LoanExtended);
		return toExtendOutDto(result);
	}

	extensionHash(dto: ExtensionProposalDto): ProposalHashDto {
		return { proposalHash: this.engine.getExtensionHash(toExtensionProposal(dto)) };
	}

	async get(loanId: number): Promise<TDto> {
		return this.toDto(await this.engine.getLoan(loanId));
	}

	async list(query: ListLoansQueryDto): Promise<{ items: TDto[]; meta: ApiPaginatedMeta }> {
		const limit = query.limit ?? DEFAULT_PAGE_SIZE;
		const offset = query.offset ?? 0;
		const page = await this.store.query({
			status: query.status,
			borrower: query.borrower,
			limit,
			offset,
		});
		const items = await Promise.all(page.items.map((loan) => this.get(loan.id)));
		return {
			items,
			meta: {
				total: page.total,
				limit,
				offset,
				nextOffset: page.hasMore ? offset + items.length : undefined,
			},
		};
	}

	async repaymentAmount(loanId: number): Promise<LoanAmountDto> {
		const amount = await this.engine.computeRepaymentAmount(loanId);
		return { loanId, amount: amount.toString() };
	}

	async fingerprint(loanId: number): Promise<FingerprintDto> {
		return { loanId, fingerprint: await this.engine.computeStateFingerprint(loanId) };
	}
}
