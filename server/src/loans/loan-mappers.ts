/**
 * Translation between the SDK's loan records and `LoanEntity` rows.
 */

import { CreditLine, LoanRecordBase, SimpleLoan, StorageError } from "@loanvault/sdk";
import type { LoanVariant } from "../common/loan.events";
import { LoanEntity } from "./loan.entity";

export type LoanColumns = Omit<LoanEntity, "createdAt" | "updatedAt">;

export interface LoanMapper<TLoan extends LoanRecordBase> {
	variant: LoanVariant;
	toColumns(loan: TLoan): LoanColumns;
	fromEntity(entity: LoanEntity): TLoan;
}

function baseColumns(
	loan: LoanRecordBase,
	variant: LoanVariant,
): Omit<
	LoanColumns,
	| "accruingInterestApr"
	| "repaidAmount"
	| "accruingInterestDailyRate"
	| "unclaimedAmount"
	| "debtLimitTangent"
> {
	return {
		id: loan.id,
		variant,
		status: loan.status,
		creditAddress: loan.creditAddress,
		borrower: loan.borrower,
		originalLender: loan.originalLender,
		startTimestamp: loan.startTimestamp,
		lastUpdateTimestamp: loan.lastUpdateTimestamp,
		defaultTimestamp: loan.defaultTimestamp,
		principalAmount: loan.principalAmount,
		fixedInterestAmount: loan.fixedInterestAmount,
		collateralCategory: loan.collateral.category,
		collateralAddress: loan.collateral.assetAddress,
		collateralTokenId: loan.collateral.id,
		collateralAmount: loan.collateral.amount,
	};
}

function baseRecord(entity: LoanEntity): LoanRecordBase {
	return {
		id: entity.id,
		status: entity.status,
		creditAddress: entity.creditAddress,
		borrower: entity.borrower,
		originalLender: entity.originalLender,
		startTimestamp: entity.startTimestamp,
		lastUpdateTimestamp: entity.lastUpdateTimestamp,
		defaultTimestamp: entity.defaultTimestamp,
		principalAmount: entity.principalAmount,
		fixedInterestAmount: entity.fixedInterestAmount,
		collateral: {
			category: entity.collateralCategory,
			assetAddress: entity.collateralAddress,
			id: entity.collateralTokenId,
			amount: entity.collateralAmount,
		},
	};
}

function required(entity: LoanEntity, column: string, value: bigint | null): bigint {
	if (value === null) {
		throw new StorageError(
			`Loan ${entity.id} is missing ${column}`,
			"CORRUPT_RECORD",
			{ id: entity.id, column },
		);
	}
	return value;
}

export const simpleLoanMapper: LoanMapper<SimpleLoan> = {
	variant: "simple",
	toColumns: (loan) => ({
		...baseColumns(loan, "simple"),
		accruingInterestApr: loan.accruingInterestApr,
		repaidAmount: loan.repaidAmount,
		accruingInterestDailyRate: null,
		unclaimedAmount: null,
		debtLimitTangent: null,
	}),
	fromEntity: (entity) => ({
		...baseRecord(entity),
		accruingInterestApr: required(entity, "accruingInterestApr", entity.accruingInterestApr),
		repaidAmount: required(entity, "repaidAmount", entity.repaidAmount),
	}),
};

export const creditLineMapper: LoanMapper<CreditLine> = {
	variant: "credit-line",
	toColumns: (loan) => ({
		...baseColumns(loan, "credit-line"),
		accruingInterestApr: null,
		repaidAmount: null,
		accruingInterestDailyRate: loan.accruingInterestDailyRate,
		unclaimedAmount: loan.unclaimedAmount,
		debtLimitTangent: loan.debtLimitTangent,
	}),
	fromEntity: (entity) => ({
		...baseRecord(entity),
		accruingInterestDailyRate: required(
			entity,
			"accruingInterestDailyRate",
			entity.accruingInterestDailyRate,
		),
		unclaimedAmount: required(entity, "unclaimedAmount", entity.unclaimedAmount),
		debtLimitTangent: required(entity, "debtLimitTangent", entity.debtLimitTangent),
	}),
};
