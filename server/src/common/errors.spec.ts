import { BadRequestException, HttpStatus } from "@nestjs/common";
import { LoanError, StorageError } from "@loanvault/sdk";
import { toError, toHttpException } from "./errors";

describe("toHttpException", () => {
	it("keeps HTTP exceptions as they are", () => {
		const exception = new BadRequestException("bad input");

		expect(toHttpException(exception)).toBe(exception);
	});

	it.each([
		["NOT_FOUND", HttpStatus.NOT_FOUND],
		["DEFAULTED", HttpStatus.CONFLICT],
		["NONCE_NOT_USABLE", HttpStatus.CONFLICT],
		["EXPIRED", HttpStatus.GONE],
		["INSUFFICIENT_FUNDS", HttpStatus.UNPROCESSABLE_ENTITY],
		["UNAUTHORIZED", HttpStatus.FORBIDDEN],
		["OUT_OF_BOUNDS", HttpStatus.BAD_REQUEST],
	] as const)("maps %s to %i", (code, status) => {
		expect(toHttpException(new LoanError("failed", code)).getStatus()).toBe(status);
	});

	it("renders bigint details as strings", () => {
		const http = toHttpException(
			new LoanError("short", "INSUFFICIENT_FUNDS", { required: 10n }),
		);

		expect(http.getResponse()).toEqual({
			message: "short",
			code: "INSUFFICIENT_FUNDS",
			details: { required: "10" },
		});
	});

	it("hides storage failures behind a 500", () => {
		const http = toHttpException(new StorageError("disk full", "SAVE_ERROR"));

		expect(http.getStatus()).toBe(HttpStatus.INTERNAL_SERVER_ERROR);
		expect(http.getResponse()).toEqual({ message: "Storage failure", code: "SAVE_ERROR" });
	});

	it("wraps values that are not errors", () => {
		const error = toError("boom");

		expect(error.message).toBe("Invalid error type");
		expect(error.cause).toBe("boom");
	});
});
