import { registerAs } from "@nestjs/config";
import {
	DEFAULT_DEBT_LIMIT_POSTPONEMENT,
	DEFAULT_MAX_EXTENSION_DURATION,
	DEFAULT_MIN_EXTENSION_DURATION,
} from "@loanvault/sdk";

export type LoansConfig = {
	feeBps: bigint;
	feeCollector: string;
	/** Custody account the vault operates */
	vaultAddress: string;
	/** Accounts allowed to originate and refinance loans */
	proposalCallers: string[];
	minExtensionSeconds: number;
	maxExtensionSeconds: number;
	debtLimitPostponementSeconds: number;
	chainId: bigint;
	/** Require signed permits for off-line approvals */
	verifyPermits: boolean;
};

function intFromEnv(name: string, fallback: number): number {
	const raw = process.env[name];
	if (raw === undefined || raw === "") return fallback;
	const value = Number(raw);
	if (!Number.isSafeInteger(value) || value < 0) {
		throw new Error(`${name} must be a non-negative integer, got "${raw}"`);
	}
	return value;
}

function bigintFromEnv(name: string, fallback: bigint): bigint {
	const raw = process.env[name];
	if (raw === undefined || raw === "") return fallback;
	if (!/^\d+$/.test(raw)) {
		throw new Error(`${name} must be a non-negative integer, got "${raw}"`);
	}
	return BigInt(raw);
}

export const loansConfig = registerAs(
	"loans",
	(): LoansConfig => ({
		feeBps: bigintFromEnv("LOANS_FEE_BPS", 0n),
		feeCollector: process.env.LOANS_FEE_COLLECTOR ?? "fee-collector",
		vaultAddress: process.env.LOANS_VAULT_ADDRESS ?? "loanvault",
		proposalCallers: (process.env.LOANS_PROPOSAL_CALLERS ?? "")
			.split(",")
			.map((caller) => caller.trim())
			.filter((caller) => caller.length > 0),
		minExtensionSeconds: intFromEnv(
			"LOANS_MIN_EXTENSION_SECONDS",
			DEFAULT_MIN_EXTENSION_DURATION,
		),
		maxExtensionSeconds: intFromEnv(
			"LOANS_MAX_EXTENSION_SECONDS",
			DEFAULT_MAX_EXTENSION_DURATION,
		),
		debtLimitPostponementSeconds: intFromEnv(
			"LOANS_DEBT_LIMIT_POSTPONEMENT_SECONDS",
			DEFAULT_DEBT_LIMIT_POSTPONEMENT,
		),
		chainId: bigintFromEnv("LOANS_CHAIN_ID", 1n),
		verifyPermits: process.env.LOANS_VERIFY_PERMITS === "true",
	}),
);
