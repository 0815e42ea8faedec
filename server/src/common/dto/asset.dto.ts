import { ApiProperty, ApiPropertyOptional } from "@nestjs/swagger";
import {
	IsIn,
	IsInt,
	IsNotEmpty,
	IsOptional,
	IsString,
	Matches,
	Min,
} from "class-validator";
import { ASSET_CATEGORIES, Asset, AssetCategory, Permit } from "@loanvault/sdk";

/** Non-negative integer written in decimal */
export const DECIMAL_AMOUNT = /^\d+$/;

export class AssetDto {
	@ApiProperty({ enum: ASSET_CATEGORIES, example: "unique" })
	@IsIn(ASSET_CATEGORIES)
	category!: AssetCategory;

	@ApiProperty({ example: "punks" })
	@IsString()
	@IsNotEmpty()
	assetAddress!: string;

	@ApiProperty({ example: "7", description: "Token id, 0 for fungible assets" })
	@Matches(DECIMAL_AMOUNT)
	id!: string;

	@ApiProperty({ example: "1" })
	@Matches(DECIMAL_AMOUNT)
	amount!: string;
}

export class PermitDto {
	@ApiProperty({ example: "usd" })
	@IsString()
	@IsNotEmpty()
	assetAddress!: string;

	@ApiProperty()
	@IsString()
	@IsNotEmpty()
	owner!: string;

	@ApiProperty({ example: "1000" })
	@Matches(DECIMAL_AMOUNT)
	amount!: string;

	@ApiProperty({ description: "Last unix second the permit is valid" })
	@IsInt()
	@Min(0)
	deadline!: number;

	@ApiPropertyOptional({ description: "Owner's signature over the permit hash" })
	@IsOptional()
	@IsString()
	signature?: string;
}

export function toAsset(dto: AssetDto): Asset {
	return {
		category: dto.category,
		assetAddress: dto.assetAddress,
		id: BigInt(dto.id),
		amount: BigInt(dto.amount),
	};
}

export function fromAsset(asset: Asset): AssetDto {
	return {
		category: asset.category,
		assetAddress: asset.assetAddress,
		id: asset.id.toString(),
		amount: asset.amount.toString(),
	};
}

export function toPermit(dto: PermitDto): Permit {
	return {
		assetAddress: dto.assetAddress,
		owner: dto.owner,
		amount: BigInt(dto.amount),
		deadline: dto.deadline,
		signature: dto.signature,
	};
}
