import { Inject, Injectable, Logger } from "@nestjs/common";
import { EventEmitter2 } from "@nestjs/event-emitter";
import {
	CreditLine,
	CreditLineEngine,
	CreditLineView,
	LoanStore,
} from "@loanvault/sdk";
import { CreditLineDto, LoanAmountDto } from "../loans/dto/loan-responses.dto";
import { toCreditLineDto } from "../loans/dto/loan-dto.mappers";
import { CREDIT_LINE_ENGINE, CREDIT_LINE_STORE } from "../loans/loan-engines.providers";
import { LoanEngineService } from "../loans/loan-engine.service";

@Injectable()
export class CreditLinesService extends LoanEngineService<CreditLine, CreditLineDto> {
	protected readonly logger = new Logger(CreditLinesService.name);
	protected readonly variant = "credit-line";

	constructor(
		@Inject(CREDIT_LINE_ENGINE) private readonly creditLines: CreditLineEngine,
		@Inject(CREDIT_LINE_STORE) store: LoanStore<CreditLine>,
		events: EventEmitter2,
	) {
		super(creditLines, store, events);
	}

	protected toDto(view: CreditLineView): CreditLineDto {
		return toCreditLineDto(view);
	}

	/**
	 * Current debt limit; the line defaults once its debt reaches it.
	 */
	async debtLimit(loanId: number): Promise<LoanAmountDto> {
		const limit = await this.creditLines.computeDebtLimit(loanId);
		return { loanId, amount: limit.toString() };
	}
}
