import { CreateDateColumn, Entity, PrimaryColumn } from "typeorm";

@Entity("revoked_nonces")
export class RevokedNonce {
	@PrimaryColumn({ type: "text" })
	owner!: string;

	/** Decimal text */
	@PrimaryColumn({ type: "text" })
	nonceSpace!: string;

	/** Decimal text */
	@PrimaryColumn({ type: "text" })
	nonce!: string;

	@CreateDateColumn()
	revokedAt!: Date;
}
