import { ApiProperty } from "@nestjs/swagger";
import { Type } from "class-transformer";
import {
	IsBoolean,
	IsNotEmpty,
	IsString,
	Matches,
	ValidateNested,
} from "class-validator";
import { AssetDto, DECIMAL_AMOUNT } from "../../common/dto/asset.dto";

export class DepositInDto {
	@ApiProperty({ type: AssetDto })
	@ValidateNested()
	@Type(() => AssetDto)
	asset!: AssetDto;

	@ApiProperty({ description: "Account credited with the asset" })
	@IsString()
	@IsNotEmpty()
	owner!: string;
}

export class ApproveInDto {
	@ApiProperty({ example: "usd" })
	@IsString()
	@IsNotEmpty()
	assetAddress!: string;

	@ApiProperty({
		example: "1000",
		description: "Allowance granted to the vault, replacing the previous one",
	})
	@Matches(DECIMAL_AMOUNT)
	amount!: string;
}

export class OperatorApprovalInDto {
	@ApiProperty({ example: "punks" })
	@IsString()
	@IsNotEmpty()
	assetAddress!: string;

	@ApiProperty()
	@IsBoolean()
	approved!: boolean;
}

export class RevokeNonceInDto {
	@ApiProperty({ example: "0" })
	@Matches(DECIMAL_AMOUNT)
	nonceSpace!: string;

	@ApiProperty({ example: "1" })
	@Matches(DECIMAL_AMOUNT)
	nonce!: string;
}

export class NonceSpaceDto {
	@ApiProperty()
	owner!: string;

	@ApiProperty({ example: "0" })
	nonceSpace!: string;
}

export class TransferPositionInDto {
	@ApiProperty({ description: "New holder of the position" })
	@IsString()
	@IsNotEmpty()
	to!: string;
}

export class HoldingsDto {
	@ApiProperty()
	owner!: string;

	@ApiProperty({ type: [AssetDto] })
	holdings!: AssetDto[];
}
