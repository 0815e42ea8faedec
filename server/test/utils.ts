import request from "supertest";
import { Test } from "@nestjs/testing";
import type { INestApplication } from "@nestjs/common";
import { AppModule } from "../src/app.module";
import { CALLER_HEADER } from "../src/common/decorators/caller.decorator";
import { LEDGER_CLOCK } from "../src/ledger/ledger.tokens";
import { configureApp } from "../src/setup";

export const T0 = 1_700_000_000;
export const DAY = 86_400;

export const LENDER = "lender";
export const NEW_LENDER = "new-lender";
export const BORROWER = "borrower";
export const PROPOSAL_CONTRACT = "proposal-contract";
export const COLLATERAL = {
	category: "unique",
	assetAddress: "punks",
	id: "7",
	amount: "1",
};

process.env.LOANS_PROPOSAL_CALLERS = PROPOSAL_CONTRACT;
process.env.LOANS_FEE_BPS = "100";
process.env.LOANS_FEE_COLLECTOR = "fee-collector";

export type TestClock = { now: number };

export async function createTestApp(clock: TestClock): Promise<INestApplication> {
	const moduleFixture = await Test.createTestingModule({
		imports: [AppModule],
	})
		.overrideProvider(LEDGER_CLOCK)
		.useValue(() => clock.now)
		.compile();

	const app = configureApp(moduleFixture.createNestApplication({ logger: false }));
	await app.init();
	return app;
}

export async function fund(app: INestApplication, owner: string, amount: string) {
	await request(app.getHttpServer())
		.post("/api/v1/ledger/deposits")
		.send({
			asset: { category: "fungible", assetAddress: "usd", id: "0", amount },
			owner,
		})
		.expect(201);
	await approveAll(app, owner, "usd");
}

export async function giveCollateral(app: INestApplication, owner = BORROWER) {
	await request(app.getHttpServer())
		.post("/api/v1/ledger/deposits")
		.send({ asset: COLLATERAL, owner })
		.expect(201);
	await approveAll(app, owner, COLLATERAL.assetAddress);
}

async function approveAll(app: INestApplication, owner: string, assetAddress: string) {
	await request(app.getHttpServer())
		.post("/api/v1/ledger/operator-approvals")
		.set(CALLER_HEADER, owner)
		.send({ assetAddress, approved: true })
		.expect(204);
}

export async function balancesOf(app: INestApplication, owner: string) {
	const res = await request(app.getHttpServer())
		.get(`/api/v1/ledger/balances/${owner}`)
		.expect(200);
	return res.body.data.holdings;
}

export const usd = (amount: string) => ({
	category: "fungible",
	assetAddress: "usd",
	id: "0",
	amount,
});

export function loanTerms(overrides: Record<string, unknown> = {}) {
	return {
		lender: LENDER,
		borrower: BORROWER,
		duration: 30 * DAY,
		collateral: COLLATERAL,
		creditAddress: "usd",
		principalAmount: "1000",
		fixedInterestAmount: "100",
		accruingInterestApr: "0",
		...overrides,
	};
}
