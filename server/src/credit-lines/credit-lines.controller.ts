import {
	Body,
	Controller,
	Get,
	HttpCode,
	Param,
	ParseIntPipe,
	Post,
	Query,
	Sse,
} from "@nestjs/common";
import {
	ApiBody,
	ApiCreatedResponse,
	ApiExtraModels,
	ApiHeader,
	ApiOkResponse,
	ApiOperation,
	ApiQuery,
	ApiTags,
} from "@nestjs/swagger";
import { map, Observable } from "rxjs";
import { CALLER_HEADER, Caller } from "../common/decorators/caller.decorator";
import {
	type ApiEnvelope,
	type ApiPaginatedEnvelope,
	ApiEnvelopeShellDto,
	ApiPaginatedMetaDto,
	envelope,
	getSchemaPathForDto,
	getSchemaPathForPaginatedDto,
	paginatedEnvelope,
} from "../common/dto/envelopes";
import { ListLoansQueryDto } from "../loans/dto/list-loans.query";
import {
	AcceptExtensionInDto,
	ExtensionProposalDto,
	LoanTermsInDto,
	RepayInDto,
} from "../loans/dto/loan-requests.dto";
import {
	ClaimOutDto,
	CreateLoanOutDto,
	CreditLineDto,
	ExtendOutDto,
	FingerprintDto,
	LoanAmountDto,
	ProposalHashDto,
	RepayOutDto,
} from "../loans/dto/loan-responses.dto";
import {
	LoanEventsService,
	SseEvent,
	optionalLoanId,
} from "../loans/loan-events.service";
import { CreditLinesService } from "./credit-lines.service";

@ApiTags("2 - Credit lines")
@ApiExtraModels(ApiEnvelopeShellDto, ApiPaginatedMetaDto, CreditLineDto)
@Controller("api/v1/credit-lines")
export class CreditLinesController {
	constructor(
		private readonly creditLines: CreditLinesService,
		private readonly sseService: LoanEventsService,
	) {}

	@Get("")
	@ApiOperation({ summary: "List stored credit lines" })
	@ApiOkResponse({ schema: getSchemaPathForPaginatedDto(CreditLineDto) })
	async list(
		@Query() query: ListLoansQueryDto,
	): Promise<ApiPaginatedEnvelope<CreditLineDto[]>> {
		const { items, meta } = await this.creditLines.list(query);
		return paginatedEnvelope(items, meta);
	}

	@Post("")
	@ApiHeader({ name: CALLER_HEADER, description: "Proposal contract", required: true })
	@ApiOperation({ summary: "Originate a credit line from negotiated terms" })
	@ApiBody({ type: LoanTermsInDto })
	@ApiCreatedResponse({ schema: getSchemaPathForDto(CreateLoanOutDto) })
	async create(
		@Body() dto: LoanTermsInDto,
		@Caller() caller: string,
	): Promise<ApiEnvelope<CreateLoanOutDto<CreditLineDto>>> {
		return envelope(await this.creditLines.create(dto, caller));
	}

	@Sse("sse")
	@ApiQuery({ name: "loanId", required: false })
	@ApiOperation({ summary: "Subscribe to credit line events" })
	sse(@Query("loanId") loanId?: string): Observable<SseEvent> {
		return this.sseService
			.stream("credit-line", optionalLoanId(loanId))
			.pipe(map((event) => ({ data: event })));
	}

	@Post("extensions")
	@ApiHeader({ name: CALLER_HEADER, required: true })
	@ApiOperation({ summary: "Register an extension proposal on the ledger" })
	@ApiBody({ type: ExtensionProposalDto })
	@ApiCreatedResponse({ schema: getSchemaPathForDto(ProposalHashDto) })
	async makeExtensionProposal(
		@Body() dto: ExtensionProposalDto,
		@Caller() caller: string,
	): Promise<ApiEnvelope<ProposalHashDto>> {
		return envelope(await this.creditLines.makeExtensionProposal(dto, caller));
	}

	@Post("extensions/hash")
	@HttpCode(200)
	@ApiOperation({ summary: "Hash an extension proposal for signing" })
	@ApiBody({ type: ExtensionProposalDto })
	@ApiOkResponse({ schema: getSchemaPathForDto(ProposalHashDto) })
	extensionHash(@Body() dto: ExtensionProposalDto): ApiEnvelope<ProposalHashDto> {
		return envelope(this.creditLines.extensionHash(dto));
	}

	@Post("extensions/accept")
	@HttpCode(200)
	@ApiHeader({ name: CALLER_HEADER, required: true })
	@ApiOperation({ summary: "Accept the counterparty's extension proposal" })
	@ApiBody({ type: AcceptExtensionInDto })
	@ApiOkResponse({ schema: getSchemaPathForDto(ExtendOutDto) })
	async extend(
		@Body() dto: AcceptExtensionInDto,
		@Caller() caller: string,
	): Promise<ApiEnvelope<ExtendOutDto>> {
		return envelope(await this.creditLines.extend(dto, caller));
	}

	@Get(":id")
	@ApiOperation({ summary: "Credit line with its derived status" })
	@ApiOkResponse({ schema: getSchemaPathForDto(CreditLineDto) })
	async get(@Param("id", ParseIntPipe) id: number): Promise<ApiEnvelope<CreditLineDto>> {
		return envelope(await this.creditLines.get(id));
	}

	@Get(":id/repayment-amount")
	@ApiOkResponse({ schema: getSchemaPathForDto(LoanAmountDto) })
	async repaymentAmount(
		@Param("id", ParseIntPipe) id: number,
	): Promise<ApiEnvelope<LoanAmountDto>> {
		return envelope(await this.creditLines.repaymentAmount(id));
	}

	@Get(":id/debt-limit")
	@ApiOperation({ summary: "Debt level at which the line defaults now" })
	@ApiOkResponse({ schema: getSchemaPathForDto(LoanAmountDto) })
	async debtLimit(
		@Param("id", ParseIntPipe) id: number,
	): Promise<ApiEnvelope<LoanAmountDto>> {
		return envelope(await this.creditLines.debtLimit(id));
	}

	@Get(":id/fingerprint")
	@ApiOkResponse({ schema: getSchemaPathForDto(FingerprintDto) })
	async fingerprint(
		@Param("id", ParseIntPipe) id: number,
	): Promise<ApiEnvelope<FingerprintDto>> {
		return envelope(await this.creditLines.fingerprint(id));
	}

	@Post(":id/repay")
	@HttpCode(200)
	@ApiHeader({ name: CALLER_HEADER, required: true })
	@ApiOperation({ summary: "Pay into the line; the holder withdraws it with a claim" })
	@ApiBody({ type: RepayInDto })
	@ApiOkResponse({ schema: getSchemaPathForDto(RepayOutDto) })
	async repay(
		@Param("id", ParseIntPipe) id: number,
		@Body() dto: RepayInDto,
		@Caller() caller: string,
	): Promise<ApiEnvelope<RepayOutDto>> {
		return envelope(await this.creditLines.repay(id, dto, caller));
	}

	@Post(":id/claim")
	@HttpCode(200)
	@ApiHeader({ name: CALLER_HEADER, description: "Position holder", required: true })
	@ApiOperation({ summary: "Withdraw repayments, or settle a repaid or defaulted line" })
	@ApiOkResponse({ schema: getSchemaPathForDto(ClaimOutDto) })
	async claim(
		@Param("id", ParseIntPipe) id: number,
		@Caller() caller: string,
	): Promise<ApiEnvelope<ClaimOutDto>> {
		return envelope(await this.creditLines.claim(id, caller));
	}
}
