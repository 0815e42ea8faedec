import {
	Body,
	Controller,
	Get,
	HttpCode,
	Param,
	ParseIntPipe,
	Post,
} from "@nestjs/common";
import {
	ApiBody,
	ApiCreatedResponse,
	ApiExtraModels,
	ApiHeader,
	ApiOkResponse,
	ApiOperation,
	ApiTags,
} from "@nestjs/swagger";
import { CALLER_HEADER, Caller } from "../common/decorators/caller.decorator";
import { fromAsset, toAsset } from "../common/dto/asset.dto";
import {
	type ApiEnvelope,
	ApiEnvelopeShellDto,
	envelope,
	getSchemaPathForDto,
} from "../common/dto/envelopes";
import {
	ApproveInDto,
	DepositInDto,
	HoldingsDto,
	NonceSpaceDto,
	OperatorApprovalInDto,
	RevokeNonceInDto,
	TransferPositionInDto,
} from "./dto/ledger.dto";
import { LedgerService } from "./ledger.service";

@ApiTags("3 - Ledger")
@ApiExtraModels(ApiEnvelopeShellDto, HoldingsDto, NonceSpaceDto)
@Controller("api/v1/ledger")
export class LedgerController {
	constructor(private readonly ledger: LedgerService) {}

	@Post("deposits")
	@ApiOperation({ summary: "Credit an account with newly issued units" })
	@ApiBody({ type: DepositInDto })
	@ApiCreatedResponse({ schema: getSchemaPathForDto(HoldingsDto) })
	async deposit(@Body() dto: DepositInDto): Promise<ApiEnvelope<HoldingsDto>> {
		await this.ledger.deposit(toAsset(dto.asset), dto.owner);
		return envelope(await this.holdings(dto.owner));
	}

	@Post("approvals")
	@HttpCode(204)
	@ApiHeader({ name: CALLER_HEADER, required: true })
	@ApiOperation({ summary: "Set the vault's allowance on a fungible asset" })
	@ApiBody({ type: ApproveInDto })
	async approve(@Body() dto: ApproveInDto, @Caller() caller: string): Promise<void> {
		await this.ledger.approve(caller, dto.assetAddress, BigInt(dto.amount));
	}

	@Post("operator-approvals")
	@HttpCode(204)
	@ApiHeader({ name: CALLER_HEADER, required: true })
	@ApiOperation({ summary: "Let the vault move every unit of an asset" })
	@ApiBody({ type: OperatorApprovalInDto })
	async setApprovalForAll(
		@Body() dto: OperatorApprovalInDto,
		@Caller() caller: string,
	): Promise<void> {
		await this.ledger.setApprovalForAll(caller, dto.assetAddress, dto.approved);
	}

	@Get("balances/:owner")
	@ApiOperation({ summary: "Non-zero holdings of an account" })
	@ApiOkResponse({ schema: getSchemaPathForDto(HoldingsDto) })
	async balances(@Param("owner") owner: string): Promise<ApiEnvelope<HoldingsDto>> {
		return envelope(await this.holdings(owner));
	}

	@Get("nonces/:owner")
	@ApiOperation({ summary: "Current nonce space of an account" })
	@ApiOkResponse({ schema: getSchemaPathForDto(NonceSpaceDto) })
	async nonceSpace(@Param("owner") owner: string): Promise<ApiEnvelope<NonceSpaceDto>> {
		const space = await this.ledger.currentNonceSpace(owner);
		return envelope({ owner, nonceSpace: space.toString() });
	}

	@Post("nonces/revoke")
	@HttpCode(204)
	@ApiHeader({ name: CALLER_HEADER, required: true })
	@ApiOperation({ summary: "Revoke one of the caller's nonces" })
	@ApiBody({ type: RevokeNonceInDto })
	async revokeNonce(
		@Body() dto: RevokeNonceInDto,
		@Caller() caller: string,
	): Promise<void> {
		await this.ledger.revokeNonce(caller, BigInt(dto.nonceSpace), BigInt(dto.nonce));
	}

	@Post("nonces/revoke-space")
	@HttpCode(200)
	@ApiHeader({ name: CALLER_HEADER, required: true })
	@ApiOperation({ summary: "Revoke every nonce of the caller's current space" })
	@ApiOkResponse({ schema: getSchemaPathForDto(NonceSpaceDto) })
	async revokeNonceSpace(@Caller() caller: string): Promise<ApiEnvelope<NonceSpaceDto>> {
		const space = await this.ledger.revokeNonceSpace(caller);
		return envelope({ owner: caller, nonceSpace: space.toString() });
	}

	@Post("positions/:id/transfer")
	@HttpCode(204)
	@ApiHeader({ name: CALLER_HEADER, required: true })
	@ApiOperation({ summary: "Hand a loan position to another holder" })
	@ApiBody({ type: TransferPositionInDto })
	async transferPosition(
		@Param("id", ParseIntPipe) id: number,
		@Body() dto: TransferPositionInDto,
		@Caller() caller: string,
	): Promise<void> {
		await this.ledger.transferPosition(id, caller, dto.to);
	}

	private async holdings(owner: string): Promise<HoldingsDto> {
		const lines = await this.ledger.holdingsOf(owner);
		return {
			owner,
			holdings: lines.map(({ category, assetAddress, id, amount }) =>
				fromAsset({ category, assetAddress, id, amount }),
			),
		};
	}
}
