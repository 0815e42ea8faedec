import { ApiProperty, ApiPropertyOptional } from "@nestjs/swagger";
import { Type } from "class-transformer";
import {
	IsArray,
	IsInt,
	IsNotEmpty,
	IsOptional,
	IsString,
	Matches,
	Max,
	Min,
	ValidateNested,
} from "class-validator";
import { AssetDto, DECIMAL_AMOUNT, PermitDto } from "../../common/dto/asset.dto";

/**
 * Off-line approvals attached to an operation's transfers.
 */
export class SettlementInDto {
	@ApiPropertyOptional({ type: [PermitDto] })
	@IsOptional()
	@IsArray()
	@ValidateNested({ each: true })
	@Type(() => PermitDto)
	permits?: PermitDto[];
}

export class LoanTermsInDto extends SettlementInDto {
	@ApiProperty()
	@IsString()
	@IsNotEmpty()
	lender!: string;

	@ApiProperty()
	@IsString()
	@IsNotEmpty()
	borrower!: string;

	@ApiProperty({ example: 2_592_000, description: "Seconds until default" })
	@IsInt()
	@Min(0)
	@Max(Number.MAX_SAFE_INTEGER)
	duration!: number;

	@ApiProperty({ type: AssetDto })
	@ValidateNested()
	@Type(() => AssetDto)
	collateral!: AssetDto;

	@ApiProperty({ example: "usd" })
	@IsString()
	@IsNotEmpty()
	creditAddress!: string;

	@ApiProperty({ example: "1000" })
	@Matches(DECIMAL_AMOUNT)
	principalAmount!: string;

	@ApiProperty({ example: "100" })
	@Matches(DECIMAL_AMOUNT)
	fixedInterestAmount!: string;

	@ApiProperty({ example: "1000", description: "Two decimals, 10000 = 100%" })
	@Matches(DECIMAL_AMOUNT)
	accruingInterestApr!: string;
}

export class RepayInDto extends SettlementInDto {
	@ApiPropertyOptional({
		example: "500",
		description: "Defaults to the full repayment amount",
	})
	@IsOptional()
	@Matches(DECIMAL_AMOUNT)
	amount?: string;
}

export class ExtensionProposalDto {
	@ApiProperty()
	@IsInt()
	@Min(1)
	loanId!: number;

	@ApiProperty({ example: "usd" })
	@IsString()
	@IsNotEmpty()
	compensationAddress!: string;

	@ApiProperty({ example: "50" })
	@Matches(DECIMAL_AMOUNT)
	compensationAmount!: string;

	@ApiProperty({ example: 864_000, description: "Seconds added to the deadline" })
	@IsInt()
	@Min(0)
	@Max(Number.MAX_SAFE_INTEGER)
	duration!: number;

	@ApiProperty({ description: "Unix second from which the proposal is void" })
	@IsInt()
	@Min(0)
	@Max(Number.MAX_SAFE_INTEGER)
	expiration!: number;

	@ApiProperty()
	@IsString()
	@IsNotEmpty()
	proposer!: string;

	@ApiProperty({ example: "0" })
	@Matches(DECIMAL_AMOUNT)
	nonceSpace!: string;

	@ApiProperty({ example: "1" })
	@Matches(DECIMAL_AMOUNT)
	nonce!: string;
}

export class AcceptExtensionInDto extends SettlementInDto {
	@ApiProperty({ type: ExtensionProposalDto })
	@ValidateNested()
	@Type(() => ExtensionProposalDto)
	proposal!: ExtensionProposalDto;

	@ApiPropertyOptional({
		description: "Proposer's signature; without it the proposal must be registered",
	})
	@IsOptional()
	@IsString()
	signature?: string;
}
