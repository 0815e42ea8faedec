import { Column, Entity, PrimaryColumn } from "typeorm";
import { bigintTransformer } from "../../common/bigint.transformer";

@Entity("nonce_spaces")
export class NonceSpace {
	@PrimaryColumn({ type: "text" })
	owner!: string;

	@Column({ type: "text", transformer: bigintTransformer })
	space!: bigint;
}
