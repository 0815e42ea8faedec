import { ApiPropertyOptional } from "@nestjs/swagger";
import { Type } from "class-transformer";
import { IsIn, IsInt, IsOptional, IsString, Max, Min } from "class-validator";
import type { StoredLoanStatus } from "@loanvault/sdk";

export const LISTED_STATUSES: readonly StoredLoanStatus[] = ["running", "repaid"];

export class ListLoansQueryDto {
	@ApiPropertyOptional({
		enum: LISTED_STATUSES,
		description: "Stored status; defaulted loans are stored as running",
	})
	@IsOptional()
	@IsIn(LISTED_STATUSES)
	status?: StoredLoanStatus;

	@ApiPropertyOptional()
	@IsOptional()
	@IsString()
	borrower?: string;

	@ApiPropertyOptional({ minimum: 1, maximum: 100, default: 20 })
	@IsOptional()
	@Type(() => Number)
	@IsInt()
	@Min(1)
	@Max(100)
	limit?: number;

	@ApiPropertyOptional({ minimum: 0, default: 0 })
	@IsOptional()
	@Type(() => Number)
	@IsInt()
	@Min(0)
	offset?: number;
}
