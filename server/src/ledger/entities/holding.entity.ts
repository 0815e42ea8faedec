import { Column, Entity, Index, PrimaryColumn } from "typeorm";
import type { AssetCategory } from "@loanvault/sdk";
import { bigintTransformer } from "../../common/bigint.transformer";

@Entity("holdings")
export class Holding {
	@PrimaryColumn({ type: "text" })
	category!: AssetCategory;

	@PrimaryColumn({ type: "text" })
	assetAddress!: string;

	/** Token id as decimal text */
	@PrimaryColumn({ type: "text" })
	tokenId!: string;

	@Index()
	@PrimaryColumn({ type: "text" })
	owner!: string;

	@Column({ type: "text", transformer: bigintTransformer })
	amount!: bigint;
}
