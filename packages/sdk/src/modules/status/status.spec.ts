import { FixedDeadlinePolicy } from "../default-policy/default-policy.js";
import {
	LOAN_LIFECYCLE,
	effectiveStatus,
	requireAction,
	statusCode,
} from "./status.js";

const policy = new FixedDeadlinePolicy();
const DEADLINE = 1_000;

describe("effectiveStatus", () => {
	it("reports none for a missing record regardless of time", () => {
		expect(effectiveStatus(null, 0, policy)).toBe("none");
		expect(effectiveStatus(null, DEADLINE * 10, policy)).toBe("none");
	});

	it("derives defaulted from a running record past its deadline", () => {
		const loan = { status: "running" as const, defaultTimestamp: DEADLINE, debt: 5n };

		expect(effectiveStatus(loan, DEADLINE - 1, policy)).toBe("running");
		expect(effectiveStatus(loan, DEADLINE, policy)).toBe("defaulted");
	});

	it("keeps repaid loans repaid after the deadline", () => {
		const loan = { status: "repaid" as const, defaultTimestamp: DEADLINE, debt: 0n };

		expect(effectiveStatus(loan, DEADLINE + 1, policy)).toBe("repaid");
	});

	it("maps statuses to their codes", () => {
		expect(statusCode("none")).toBe(0);
		expect(statusCode("running")).toBe(2);
		expect(statusCode("repaid")).toBe(3);
		expect(statusCode("defaulted")).toBe(4);
	});
});

describe("requireAction", () => {
	it("returns the state an allowed action leads to", () => {
		expect(requireAction(1, "none", "originate")).toBe("running");
		expect(requireAction(1, "running", "repay")).toBe("repaid");
		expect(requireAction(1, "running", "repay-partial")).toBe("running");
		expect(requireAction(1, "repaid", "claim")).toBe("none");
		expect(requireAction(1, "defaulted", "claim")).toBe("none");
		expect(requireAction(1, "defaulted", "extend")).toBe("running");
	});

	it("rejects actions on missing loans as not found", () => {
		expect(() => requireAction(9, "none", "repay")).toThrow(
			expect.objectContaining({ code: "NOT_FOUND", details: { loanId: 9 } }),
		);
	});

	it("rejects repayments of defaulted loans as defaulted", () => {
		expect(() => requireAction(1, "defaulted", "repay")).toThrow(
			expect.objectContaining({ code: "DEFAULTED" }),
		);
		expect(() => requireAction(1, "defaulted", "refinance")).toThrow(
			expect.objectContaining({ code: "DEFAULTED" }),
		);
	});

	it("rejects other disallowed actions as invalid state", () => {
		expect(() => requireAction(1, "repaid", "repay")).toThrow(
			expect.objectContaining({ code: "INVALID_STATE" }),
		);
		expect(() => requireAction(1, "running", "claim")).toThrow(
			expect.objectContaining({ code: "INVALID_STATE" }),
		);
		expect(() => requireAction(1, "repaid", "extend")).toThrow(
			expect.objectContaining({ code: "INVALID_STATE" }),
		);
	});

	it("only allows claims on repaid loans", () => {
		expect(LOAN_LIFECYCLE.canPerform("repaid", "default")).toBe(false);
		expect(LOAN_LIFECYCLE.getAllowedActions("repaid")).toEqual(["claim"]);
	});
});
