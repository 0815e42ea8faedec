/**
 * Conversions between HTTP payloads (decimal strings) and SDK values.
 */

import {
	ClaimResult,
	CreditLineView,
	ExtendResult,
	ExtensionProposal,
	LoanRecordBase,
	LoanTerms,
	LoanView,
	RefinanceResult,
	RepayResult,
	SettlementOptions,
	SimpleLoanView,
	TransferInstruction,
} from "@loanvault/sdk";
import { fromAsset, toAsset, toPermit } from "../../common/dto/asset.dto";
import {
	ExtensionProposalDto,
	LoanTermsInDto,
	SettlementInDto,
} from "./loan-requests.dto";
import {
	ClaimOutDto,
	CreditLineDto,
	ExtendOutDto,
	LoanViewDto,
	RefinanceOutDto,
	RepayOutDto,
	SimpleLoanDto,
	TransferDto,
} from "./loan-responses.dto";

export function toSettlementOptions(dto: SettlementInDto): SettlementOptions {
	return { permits: dto.permits?.map(toPermit) };
}

export function toLoanTerms(dto: LoanTermsInDto): LoanTerms {
	return {
		lender: dto.lender,
		borrower: dto.borrower,
		duration: dto.duration,
		collateral: toAsset(dto.collateral),
		creditAddress: dto.creditAddress,
		principalAmount: BigInt(dto.principalAmount),
		fixedInterestAmount: BigInt(dto.fixedInterestAmount),
		accruingInterestApr: BigInt(dto.accruingInterestApr),
	};
}

export function toExtensionProposal(dto: ExtensionProposalDto): ExtensionProposal {
	return {
		loanId: dto.loanId,
		compensationAddress: dto.compensationAddress,
		compensationAmount: BigInt(dto.compensationAmount),
		duration: dto.duration,
		expiration: dto.expiration,
		proposer: dto.proposer,
		nonceSpace: BigInt(dto.nonceSpace),
		nonce: BigInt(dto.nonce),
	};
}

export function toTransferDtos(transfers: readonly TransferInstruction[]): TransferDto[] {
	return transfers.map((transfer) => {
		switch (transfer.kind) {
			case "pull":
				return { kind: transfer.kind, asset: fromAsset(transfer.asset), from: transfer.from };
			case "push":
				return { kind: transfer.kind, asset: fromAsset(transfer.asset), to: transfer.to };
			case "push-from":
				return {
					kind: transfer.kind,
					asset: fromAsset(transfer.asset),
					from: transfer.from,
					to: transfer.to,
				};
		}
	});
}

function toLoanViewDto(view: LoanView<LoanRecordBase>): LoanViewDto {
	return {
		id: view.id,
		status: view.status,
		statusCode: view.statusCode,
		creditAddress: view.creditAddress,
		borrower: view.borrower,
		originalLender: view.originalLender,
		holder: view.holder,
		startTimestamp: view.startTimestamp,
		lastUpdateTimestamp: view.lastUpdateTimestamp,
		defaultTimestamp: view.defaultTimestamp,
		principalAmount: view.principalAmount.toString(),
		fixedInterestAmount: view.fixedInterestAmount.toString(),
		repaymentAmount: view.repaymentAmount.toString(),
		collateral: fromAsset(view.collateral),
	};
}

export function toSimpleLoanDto(view: SimpleLoanView): SimpleLoanDto {
	return {
		...toLoanViewDto(view),
		accruingInterestApr: view.accruingInterestApr.toString(),
		repaidAmount: view.repaidAmount.toString(),
	};
}

export function toCreditLineDto(view: CreditLineView): CreditLineDto {
	return {
		...toLoanViewDto(view),
		accruingInterestDailyRate: view.accruingInterestDailyRate.toString(),
		unclaimedAmount: view.unclaimedAmount.toString(),
		debtLimitTangent: view.debtLimitTangent.toString(),
	};
}

export function toRepayOutDto(result: RepayResult): RepayOutDto {
	return {
		loanId: result.loanId,
		paidAmount: result.paidAmount.toString(),
		remainingAmount: result.remainingAmount.toString(),
		status: result.status,
		closed: result.closed,
		transfers: toTransferDtos(result.transfers),
	};
}

export function toClaimOutDto(result: ClaimResult): ClaimOutDto {
	return {
		loanId: result.loanId,
		holder: result.holder,
		kind: result.kind,
		claimedAmount: result.claimedAmount.toString(),
		closed: result.closed,
		transfers: toTransferDtos(result.transfers),
	};
}

export function toRefinanceOutDto(result: RefinanceResult): RefinanceOutDto {
	const { split } = result;
	return {
		loanId: result.loanId,
		newLoanId: result.newLoanId,
		owedAmount: result.owedAmount.toString(),
		split: {
			feeAmount: split.feeAmount.toString(),
			netAmount: split.netAmount.toString(),
			commonAmount: split.commonAmount.toString(),
			surplusAmount: split.surplusAmount.toString(),
			contributionAmount: split.contributionAmount.toString(),
		},
		closed: result.closed,
		transfers: toTransferDtos(result.transfers),
	};
}

export function toExtendOutDto(result: ExtendResult): ExtendOutDto {
	return {
		loanId: result.loanId,
		proposalHash: result.proposalHash,
		defaultTimestamp: result.defaultTimestamp,
		transfers: toTransferDtos(result.transfers),
	};
}
