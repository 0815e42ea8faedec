import { CreateDateColumn, Entity, PrimaryColumn } from "typeorm";

/**
 * Presence of a row approves `operator` for all of `owner`'s units of
 * `assetAddress`.
 */
@Entity("operator_approvals")
export class OperatorApproval {
	@PrimaryColumn({ type: "text" })
	assetAddress!: string;

	@PrimaryColumn({ type: "text" })
	owner!: string;

	@PrimaryColumn({ type: "text" })
	operator!: string;

	@CreateDateColumn()
	createdAt!: Date;
}
