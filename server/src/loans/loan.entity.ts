import {
	Column,
	CreateDateColumn,
	Entity,
	Index,
	PrimaryColumn,
	UpdateDateColumn,
} from "typeorm";
import type { AssetCategory, StoredLoanStatus } from "@loanvault/sdk";
import { bigintTransformer } from "../common/bigint.transformer";
import type { LoanVariant } from "../common/loan.events";

/**
 * One row per open loan of either variant. Ids come from the position
 * token, which both variants share.
 */
@Entity("loans")
export class LoanEntity {
	@PrimaryColumn({ type: "integer" })
	id!: number;

	@Index()
	@Column({ type: "text" })
	variant!: LoanVariant;

	@Index()
	@Column({ type: "text" })
	status!: StoredLoanStatus;

	@Column({ type: "text" })
	creditAddress!: string;

	@Index()
	@Column({ type: "text" })
	borrower!: string;

	@Column({ type: "text" })
	originalLender!: string;

	@Column({ type: "integer" })
	startTimestamp!: number;

	@Column({ type: "integer" })
	lastUpdateTimestamp!: number;

	@Column({ type: "integer" })
	defaultTimestamp!: number;

	@Column({ type: "text", transformer: bigintTransformer })
	principalAmount!: bigint;

	@Column({ type: "text", transformer: bigintTransformer })
	fixedInterestAmount!: bigint;

	@Column({ type: "text" })
	collateralCategory!: AssetCategory;

	@Column({ type: "text" })
	collateralAddress!: string;

	@Column({ type: "text", transformer: bigintTransformer })
	collateralTokenId!: bigint;

	@Column({ type: "text", transformer: bigintTransformer })
	collateralAmount!: bigint;

	// Simple loans
	@Column({ type: "text", nullable: true, transformer: bigintTransformer })
	accruingInterestApr!: bigint | null;

	@Column({ type: "text", nullable: true, transformer: bigintTransformer })
	repaidAmount!: bigint | null;

	// Credit lines
	@Column({ type: "text", nullable: true, transformer: bigintTransformer })
	accruingInterestDailyRate!: bigint | null;

	@Column({ type: "text", nullable: true, transformer: bigintTransformer })
	unclaimedAmount!: bigint | null;

	@Column({ type: "text", nullable: true, transformer: bigintTransformer })
	debtLimitTangent!: bigint | null;

	@CreateDateColumn()
	createdAt!: Date;

	@UpdateDateColumn()
	updatedAt!: Date;
}
