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
	ProposalHashDto,
	RefinanceOutDto,
	RepayOutDto,
	SimpleLoanDto,
} from "./dto/loan-responses.dto";
import { LoanEventsService, SseEvent, optionalLoanId } from "./loan-events.service";
import { LoansService } from "./loans.service";

@ApiTags("1 - Loans")
@ApiExtraModels(
	ApiEnvelopeShellDto,
	ApiPaginatedMetaDto,
	SimpleLoanDto,
	CreateLoanOutDto,
	RepayOutDto,
	ClaimOutDto,
	RefinanceOutDto,
	ExtendOutDto,
	ProposalHashDto,
	LoanAmountDto,
	FingerprintDto,
)
@Controller("api/v1/loans")
export class LoansController {
	constructor(
		private readonly loans: LoansService,
		private readonly sseService: LoanEventsService,
	) {}

	@Get("")
	@ApiOperation({ summary: "List stored loans" })
	@ApiOkResponse({ schema: getSchemaPathForPaginatedDto(SimpleLoanDto) })
	async list(
		@Query() query: ListLoansQueryDto,
	): Promise<ApiPaginatedEnvelope<SimpleLoanDto[]>> {
		const { items, meta } = await this.loans.list(query);
		return paginatedEnvelope(items, meta);
	}

	@Post("")
	@ApiHeader({ name: CALLER_HEADER, description: "Proposal contract", required: true })
	@ApiOperation({ summary: "Originate a loan from negotiated terms" })
	@ApiBody({ type: LoanTermsInDto })
	@ApiCreatedResponse({ schema: getSchemaPathForDto(CreateLoanOutDto) })
	async create(
		@Body() dto: LoanTermsInDto,
		@Caller() caller: string,
	): Promise<ApiEnvelope<CreateLoanOutDto<SimpleLoanDto>>> {
		return envelope(await this.loans.create(dto, caller));
	}

	@Sse("sse")
	@ApiQuery({ name: "loanId", required: false })
	@ApiOperation({ summary: "Subscribe to loan events" })
	sse(@Query("loanId") loanId?: string): Observable<SseEvent> {
		return this.sseService
			.stream("simple", optionalLoanId(loanId))
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
		return envelope(await this.loans.makeExtensionProposal(dto, caller));
	}

	@Post("extensions/hash")
	@HttpCode(200)
	@ApiOperation({ summary: "Hash an extension proposal for signing" })
	@ApiBody({ type: ExtensionProposalDto })
	@ApiOkResponse({ schema: getSchemaPathForDto(ProposalHashDto) })
	extensionHash(@Body() dto: ExtensionProposalDto): ApiEnvelope<ProposalHashDto> {
		return envelope(this.loans.extensionHash(dto));
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
		return envelope(await this.loans.extend(dto, caller));
	}

	@Get(":id")
	@ApiOperation({ summary: "Loan with its derived status; missing loans read as zeroed" })
	@ApiOkResponse({ schema: getSchemaPathForDto(SimpleLoanDto) })
	async get(@Param("id", ParseIntPipe) id: number): Promise<ApiEnvelope<SimpleLoanDto>> {
		return envelope(await this.loans.get(id));
	}

	@Get(":id/repayment-amount")
	@ApiOperation({ summary: "Amount that settles the loan now" })
	@ApiOkResponse({ schema: getSchemaPathForDto(LoanAmountDto) })
	async repaymentAmount(
		@Param("id", ParseIntPipe) id: number,
	): Promise<ApiEnvelope<LoanAmountDto>> {
		return envelope(await this.loans.repaymentAmount(id));
	}

	@Get(":id/fingerprint")
	@ApiOperation({ summary: "Hash of the loan's mutable state" })
	@ApiOkResponse({ schema: getSchemaPathForDto(FingerprintDto) })
	async fingerprint(
		@Param("id", ParseIntPipe) id: number,
	): Promise<ApiEnvelope<FingerprintDto>> {
		return envelope(await this.loans.fingerprint(id));
	}

	@Post(":id/repay")
	@HttpCode(200)
	@ApiHeader({ name: CALLER_HEADER, required: true })
	@ApiOperation({ summary: "Repay part or all of a loan" })
	@ApiBody({ type: RepayInDto })
	@ApiOkResponse({ schema: getSchemaPathForDto(RepayOutDto) })
	async repay(
		@Param("id", ParseIntPipe) id: number,
		@Body() dto: RepayInDto,
		@Caller() caller: string,
	): Promise<ApiEnvelope<RepayOutDto>> {
		return envelope(await this.loans.repay(id, dto, caller));
	}

	@Post(":id/refinance")
	@HttpCode(200)
	@ApiHeader({ name: CALLER_HEADER, description: "Proposal contract", required: true })
	@ApiOperation({ summary: "Close a running loan into a new one" })
	@ApiBody({ type: LoanTermsInDto })
	@ApiOkResponse({ schema: getSchemaPathForDto(RefinanceOutDto) })
	async refinance(
		@Param("id", ParseIntPipe) id: number,
		@Body() dto: LoanTermsInDto,
		@Caller() caller: string,
	): Promise<ApiEnvelope<RefinanceOutDto>> {
		return envelope(await this.loans.refinance(id, dto, caller));
	}

	@Post(":id/claim")
	@HttpCode(200)
	@ApiHeader({ name: CALLER_HEADER, description: "Position holder", required: true })
	@ApiOperation({ summary: "Claim repaid credit or defaulted collateral" })
	@ApiOkResponse({ schema: getSchemaPathForDto(ClaimOutDto) })
	async claim(
		@Param("id", ParseIntPipe) id: number,
		@Caller() caller: string,
	): Promise<ApiEnvelope<ClaimOutDto>> {
		return envelope(await this.loans.claim(id, caller));
	}
}
