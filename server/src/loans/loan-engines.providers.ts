import { Inject, Injectable, Provider } from "@nestjs/common";
import { ConfigType } from "@nestjs/config";
import {
	AssetVault,
	Clock,
	CreditLine,
	CreditLineEngine,
	LoanEngineDeps,
	LoanRecordBase,
	LoanStore,
	ProposalDomain,
	SchnorrSignatureVerifier,
	SimpleLoan,
	SimpleLoanEngine,
} from "@loanvault/sdk";
import { loansConfig } from "../config/loans.config";
import { ConfigCapabilityRegistry, ConfigFeeSource } from "../ledger/config-collaborators";
import { LedgerUnitOfWork } from "../ledger/ledger-unit-of-work";
import { LEDGER_CLOCK, LEDGER_VAULT } from "../ledger/ledger.tokens";
import { TypeOrmExtensionProposalStore } from "../ledger/typeorm-extension-proposal-store";
import { TypeOrmNonceRevocation } from "../ledger/typeorm-nonce-revocation";
import { TypeOrmPositionToken } from "../ledger/typeorm-position-token";
import { creditLineMapper, simpleLoanMapper } from "./loan-mappers";
import { TypeOrmLoanStore } from "./typeorm-loan-store";

export const SIMPLE_LOAN_ENGINE = Symbol("SIMPLE_LOAN_ENGINE");
export const CREDIT_LINE_ENGINE = Symbol("CREDIT_LINE_ENGINE");
export const SIMPLE_LOAN_STORE = Symbol("SIMPLE_LOAN_STORE");
export const CREDIT_LINE_STORE = Symbol("CREDIT_LINE_STORE");

export function proposalDomain(config: ConfigType<typeof loansConfig>): ProposalDomain {
	return {
		name: "loanvault",
		version: "1",
		chainId: config.chainId,
		verifyingContract: config.vaultAddress,
	};
}

/**
 * Ledger-backed collaborators shared by both engines.
 */
@Injectable()
export class LoanEngineCollaborators {
	constructor(
		@Inject(loansConfig.KEY)
		readonly config: ConfigType<typeof loansConfig>,
		private readonly uow: LedgerUnitOfWork,
		private readonly positionToken: TypeOrmPositionToken,
		@Inject(LEDGER_VAULT) private readonly vault: AssetVault,
		private readonly fees: ConfigFeeSource,
		private readonly capabilities: ConfigCapabilityRegistry,
		private readonly nonces: TypeOrmNonceRevocation,
		private readonly signatures: SchnorrSignatureVerifier,
		private readonly proposals: TypeOrmExtensionProposalStore,
		@Inject(LEDGER_CLOCK) private readonly clock: Clock,
	) {}

	depsFor<TLoan extends LoanRecordBase>(store: LoanStore<TLoan>): LoanEngineDeps<TLoan> {
		return {
			store,
			positionToken: this.positionToken,
			assets: this.vault,
			fees: this.fees,
			capabilities: this.capabilities,
			nonces: this.nonces,
			signatures: this.signatures,
			proposals: this.proposals,
			scope: this.uow,
			domain: proposalDomain(this.config),
			extensionBounds: {
				minDuration: this.config.minExtensionSeconds,
				maxDuration: this.config.maxExtensionSeconds,
			},
			clock: this.clock,
		};
	}
}

export const loanEngineProviders: Provider[] = [
	LoanEngineCollaborators,
	{
		provide: SIMPLE_LOAN_STORE,
		inject: [LedgerUnitOfWork],
		useFactory: (uow: LedgerUnitOfWork) =>
			new TypeOrmLoanStore<SimpleLoan>(uow, simpleLoanMapper),
	},
	{
		provide: CREDIT_LINE_STORE,
		inject: [LedgerUnitOfWork],
		useFactory: (uow: LedgerUnitOfWork) =>
			new TypeOrmLoanStore<CreditLine>(uow, creditLineMapper),
	},
	{
		provide: SIMPLE_LOAN_ENGINE,
		inject: [LoanEngineCollaborators, SIMPLE_LOAN_STORE],
		useFactory: (collaborators: LoanEngineCollaborators, store: LoanStore<SimpleLoan>) =>
			new SimpleLoanEngine(collaborators.depsFor(store)),
	},
	{
		provide: CREDIT_LINE_ENGINE,
		inject: [LoanEngineCollaborators, CREDIT_LINE_STORE],
		useFactory: (collaborators: LoanEngineCollaborators, store: LoanStore<CreditLine>) =>
			new CreditLineEngine({
				...collaborators.depsFor(store),
				debtLimitPostponement: collaborators.config.debtLimitPostponementSeconds,
			}),
	},
];
