import { Module } from "@nestjs/common";
import { ConfigType } from "@nestjs/config";
import { TypeOrmModule } from "@nestjs/typeorm";
import { AssetVault, Clock, SchnorrSignatureVerifier, systemClock } from "@loanvault/sdk";
import { loansConfig } from "../config/loans.config";
import { ConfigCapabilityRegistry, ConfigFeeSource } from "./config-collaborators";
import { Allowance } from "./entities/allowance.entity";
import { ExtensionProposalEntity } from "./entities/extension-proposal.entity";
import { Holding } from "./entities/holding.entity";
import { NonceSpace } from "./entities/nonce-space.entity";
import { OperatorApproval } from "./entities/operator-approval.entity";
import { PositionTokenEntity } from "./entities/position-token.entity";
import { RevokedNonce } from "./entities/revoked-nonce.entity";
import { LedgerUnitOfWork } from "./ledger-unit-of-work";
import { LedgerController } from "./ledger.controller";
import { LedgerService } from "./ledger.service";
import { LEDGER_CLOCK, LEDGER_VAULT } from "./ledger.tokens";
import { TypeOrmExtensionProposalStore } from "./typeorm-extension-proposal-store";
import { TypeOrmHoldingsBook } from "./typeorm-holdings-book";
import { TypeOrmNonceRevocation } from "./typeorm-nonce-revocation";
import { TypeOrmPositionToken } from "./typeorm-position-token";

@Module({
	imports: [
		TypeOrmModule.forFeature([
			Holding,
			Allowance,
			OperatorApproval,
			PositionTokenEntity,
			NonceSpace,
			RevokedNonce,
			ExtensionProposalEntity,
		]),
	],
	controllers: [LedgerController],
	providers: [
		LedgerUnitOfWork,
		TypeOrmHoldingsBook,
		TypeOrmPositionToken,
		TypeOrmNonceRevocation,
		TypeOrmExtensionProposalStore,
		ConfigFeeSource,
		ConfigCapabilityRegistry,
		SchnorrSignatureVerifier,
		{ provide: LEDGER_CLOCK, useValue: systemClock },
		{
			provide: LEDGER_VAULT,
			inject: [TypeOrmHoldingsBook, loansConfig.KEY, LEDGER_CLOCK, SchnorrSignatureVerifier],
			useFactory: (
				book: TypeOrmHoldingsBook,
				config: ConfigType<typeof loansConfig>,
				clock: Clock,
				verifier: SchnorrSignatureVerifier,
			) =>
				new AssetVault(book, config.vaultAddress, {
					clock,
					permitVerifier: config.verifyPermits ? verifier : undefined,
				}),
		},
		LedgerService,
	],
	exports: [
		LedgerUnitOfWork,
		TypeOrmPositionToken,
		TypeOrmNonceRevocation,
		TypeOrmExtensionProposalStore,
		ConfigFeeSource,
		ConfigCapabilityRegistry,
		SchnorrSignatureVerifier,
		LEDGER_CLOCK,
		LEDGER_VAULT,
		LedgerService,
	],
})
export class LedgerModule {}
