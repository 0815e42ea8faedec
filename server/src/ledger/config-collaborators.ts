/**
 * Fee source and capability registry read from the loans configuration.
 */

import { Inject, Injectable } from "@nestjs/common";
import { ConfigType } from "@nestjs/config";
import { Address, CapabilityRegistry, FeeSource, LOAN_PROPOSAL_TAG } from "@loanvault/sdk";
import { loansConfig } from "../config/loans.config";

@Injectable()
export class ConfigFeeSource implements FeeSource {
	constructor(
		@Inject(loansConfig.KEY)
		private readonly config: ConfigType<typeof loansConfig>,
	) {}

	async fee(): Promise<bigint> {
		return this.config.feeBps;
	}

	async feeCollector(): Promise<Address> {
		return this.config.feeCollector;
	}
}

/**
 * Grants LOAN_PROPOSAL to the configured proposal callers. No other tags
 * exist.
 */
@Injectable()
export class ConfigCapabilityRegistry implements CapabilityRegistry {
	constructor(
		@Inject(loansConfig.KEY)
		private readonly config: ConfigType<typeof loansConfig>,
	) {}

	async hasTag(address: Address, tag: string): Promise<boolean> {
		return tag === LOAN_PROPOSAL_TAG && this.config.proposalCallers.includes(address);
	}
}
