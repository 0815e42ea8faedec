import { Column, Entity, PrimaryColumn } from "typeorm";
import { bigintTransformer } from "../../common/bigint.transformer";

@Entity("allowances")
export class Allowance {
	@PrimaryColumn({ type: "text" })
	assetAddress!: string;

	@PrimaryColumn({ type: "text" })
	owner!: string;

	@PrimaryColumn({ type: "text" })
	spender!: string;

	@Column({ type: "text", transformer: bigintTransformer })
	amount!: bigint;
}
