import { Inject, Injectable, Logger } from "@nestjs/common";
import { EventEmitter2 } from "@nestjs/event-emitter";
import {
	Address,
	LoanStore,
	SimpleLoan,
	SimpleLoanEngine,
	SimpleLoanView,
} from "@loanvault/sdk";
import { newEventId } from "../common/event-id";
import { LOAN_REFINANCED_ID, type LoanRefinanced } from "../common/loan.events";
import { LoanTermsInDto } from "./dto/loan-requests.dto";
import { RefinanceOutDto, SimpleLoanDto } from "./dto/loan-responses.dto";
import {
	toLoanTerms,
	toRefinanceOutDto,
	toSettlementOptions,
	toSimpleLoanDto,
} from "./dto/loan-dto.mappers";
import { SIMPLE_LOAN_ENGINE, SIMPLE_LOAN_STORE } from "./loan-engines.providers";
import { LoanEngineService } from "./loan-engine.service";

@Injectable()
export class LoansService extends LoanEngineService<SimpleLoan, SimpleLoanDto> {
	protected readonly logger = new Logger(LoansService.name);
	protected readonly variant = "simple";

	constructor(
		@Inject(SIMPLE_LOAN_ENGINE) private readonly simple: SimpleLoanEngine,
		@Inject(SIMPLE_LOAN_STORE) store: LoanStore<SimpleLoan>,
		events: EventEmitter2,
	) {
		super(simple, store, events);
	}

	protected toDto(view: SimpleLoanView): SimpleLoanDto {
		return toSimpleLoanDto(view);
	}

	/**
	 * Replace a loan with a new one on the same collateral.
	 */
	async refinance(
		loanId: number,
		dto: LoanTermsInDto,
		caller: Address,
	): Promise<RefinanceOutDto> {
		const result = await this.simple.refinanceLoan(
			loanId,
			toLoanTerms(dto),
			caller,
			toSettlementOptions(dto),
		);
		this.logger.log(
			`Loan ${loanId} refinanced into ${result.newLoanId}, owed ${result.owedAmount}`,
		);
		this.events.emit(LOAN_REFINANCED_ID, {
			eventId: newEventId(),
			variant: this.variant,
			loanId,
			newLoanId: result.newLoanId,
			owedAmount: result.owedAmount.toString(),
			refinancedAt: new Date().toISOString(),
		} satisfies LoanRefinanced);
		return toRefinanceOutDto(result);
	}
}
