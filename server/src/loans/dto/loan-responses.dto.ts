import { ApiProperty, ApiPropertyOptional } from "@nestjs/swagger";
import { LOAN_STATUSES, LoanStatus } from "@loanvault/sdk";
import { AssetDto } from "../../common/dto/asset.dto";

export class TransferDto {
	@ApiProperty({ enum: ["pull", "push", "push-from"] })
	kind!: "pull" | "push" | "push-from";

	@ApiProperty({ type: AssetDto })
	asset!: AssetDto;

	@ApiPropertyOptional()
	from?: string;

	@ApiPropertyOptional()
	to?: string;
}

export class LoanViewDto {
	@ApiProperty()
	id!: number;

	@ApiProperty({ enum: LOAN_STATUSES })
	status!: LoanStatus;

	@ApiProperty({ enum: [0, 2, 3, 4] })
	statusCode!: number;

	@ApiProperty()
	creditAddress!: string;

	@ApiProperty()
	borrower!: string;

	@ApiProperty()
	originalLender!: string;

	@ApiProperty({ nullable: true, type: String })
	holder!: string | null;

	@ApiProperty({ description: "Unix seconds" })
	startTimestamp!: number;

	@ApiProperty({ description: "Unix seconds" })
	lastUpdateTimestamp!: number;

	@ApiProperty({ description: "Unix seconds" })
	defaultTimestamp!: number;

	@ApiProperty()
	principalAmount!: string;

	@ApiProperty()
	fixedInterestAmount!: string;

	@ApiProperty({ description: "Amount that settles the loan now" })
	repaymentAmount!: string;

	@ApiProperty({ type: AssetDto })
	collateral!: AssetDto;
}

export class SimpleLoanDto extends LoanViewDto {
	@ApiProperty()
	accruingInterestApr!: string;

	@ApiProperty({ description: "Credit in custody for the holder" })
	repaidAmount!: string;
}

export class CreditLineDto extends LoanViewDto {
	@ApiProperty({ description: "Ten decimals, 1e10 = 100% per day" })
	accruingInterestDailyRate!: string;

	@ApiProperty({ description: "Repayments in custody not yet claimed" })
	unclaimedAmount!: string;

	@ApiProperty()
	debtLimitTangent!: string;
}

export class CreateLoanOutDto<TLoan extends LoanViewDto = LoanViewDto> {
	@ApiProperty()
	loanId!: number;

	@ApiProperty()
	feeAmount!: string;

	@ApiProperty({ type: LoanViewDto })
	loan!: TLoan;

	@ApiProperty({ type: [TransferDto] })
	transfers!: TransferDto[];
}

export class RepayOutDto {
	@ApiProperty()
	loanId!: number;

	@ApiProperty()
	paidAmount!: string;

	@ApiProperty()
	remainingAmount!: string;

	@ApiProperty({ enum: ["running", "repaid"] })
	status!: "running" | "repaid";

	@ApiProperty({ description: "Whether the loan record was closed" })
	closed!: boolean;

	@ApiProperty({ type: [TransferDto] })
	transfers!: TransferDto[];
}

export class ClaimOutDto {
	@ApiProperty()
	loanId!: number;

	@ApiProperty()
	holder!: string;

	@ApiProperty({ enum: ["repaid", "defaulted", "unclaimed"] })
	kind!: "repaid" | "defaulted" | "unclaimed";

	@ApiProperty()
	claimedAmount!: string;

	@ApiProperty()
	closed!: boolean;

	@ApiProperty({ type: [TransferDto] })
	transfers!: TransferDto[];
}

export class RefinanceSplitDto {
	@ApiProperty()
	feeAmount!: string;

	@ApiProperty()
	netAmount!: string;

	@ApiProperty()
	commonAmount!: string;

	@ApiProperty()
	surplusAmount!: string;

	@ApiProperty()
	contributionAmount!: string;
}

export class RefinanceOutDto {
	@ApiProperty()
	loanId!: number;

	@ApiProperty()
	newLoanId!: number;

	@ApiProperty()
	owedAmount!: string;

	@ApiProperty({ type: RefinanceSplitDto })
	split!: RefinanceSplitDto;

	@ApiProperty()
	closed!: boolean;

	@ApiProperty({ type: [TransferDto] })
	transfers!: TransferDto[];
}

export class ExtendOutDto {
	@ApiProperty()
	loanId!: number;

	@ApiProperty()
	proposalHash!: string;

	@ApiProperty()
	defaultTimestamp!: number;

	@ApiProperty({ type: [TransferDto] })
	transfers!: TransferDto[];
}

export class ProposalHashDto {
	@ApiProperty()
	proposalHash!: string;
}

export class LoanAmountDto {
	@ApiProperty()
	loanId!: number;

	@ApiProperty()
	amount!: string;
}

export class FingerprintDto {
	@ApiProperty()
	loanId!: number;

	@ApiProperty({ description: "0x-prefixed hash, zero for missing loans" })
	fingerprint!: string;
}
