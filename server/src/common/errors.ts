import {
	BadRequestException,
	ConflictException,
	ForbiddenException,
	GoneException,
	HttpException,
	InternalServerErrorException,
	NotFoundException,
	UnprocessableEntityException,
} from "@nestjs/common";
import { LoanError, LoanErrorCode, StorageError, isLoanError } from "@loanvault/sdk";
import { toJsonSafe } from "./json";

export function toError(err: unknown): Error {
	return err instanceof Error
		? err
		: new Error("Invalid error type", { cause: err });
}

type HttpExceptionClass = new (
	body: Record<string, unknown>,
) => HttpException;

const LOAN_ERROR_STATUS: Record<LoanErrorCode, HttpExceptionClass> = {
	NOT_FOUND: NotFoundException,
	INVALID_STATE: ConflictException,
	DEFAULTED: ConflictException,
	NONCE_NOT_USABLE: ConflictException,
	EXPIRED: GoneException,
	MISMATCHED_TERMS: UnprocessableEntityException,
	INSUFFICIENT_FUNDS: UnprocessableEntityException,
	UNAUTHORIZED: ForbiddenException,
	OUT_OF_BOUNDS: BadRequestException,
	INVALID_ASSET: BadRequestException,
};

export function loanErrorToHttp(err: LoanError): HttpException {
	const Exception = LOAN_ERROR_STATUS[err.code];
	return new Exception({
		message: err.message,
		code: err.code,
		details: toJsonSafe(err.details ?? {}),
	});
}

/**
 * Normalise anything thrown by a handler into an HttpException.
 */
export function toHttpException(err: unknown): HttpException {
	if (err instanceof HttpException) return err;
	if (isLoanError(err)) return loanErrorToHttp(err);
	if (err instanceof StorageError) {
		return new InternalServerErrorException({
			message: "Storage failure",
			code: err.code ?? "STORAGE_ERROR",
		});
	}
	return new InternalServerErrorException();
}
