/**
 * Refinance split
 *
 * One computation covers every payer/payee topology:
 *
 *   fee    = floor(newPrincipal * feeBps / 1e4)
 *   net    = newPrincipal - fee
 *   common = min(net, owed)            new lender -> old holder
 *   surplus      = net - common        new lender -> borrower
 *   contribution = owed - common       borrower   -> old holder
 *
 * so `fee + common + surplus == newPrincipal` and
 * `common + contribution == owed`, with at most one of surplus and
 * contribution non-zero.
 */

import { computeFee } from "../interest/interest.js";

export interface RefinanceSplit {
	feeAmount: bigint;
	netAmount: bigint;
	commonAmount: bigint;
	surplusAmount: bigint;
	contributionAmount: bigint;
}

export function computeRefinanceSplit(
	newPrincipal: bigint,
	feeBps: bigint,
	owed: bigint,
): RefinanceSplit {
	const { feeAmount, netAmount } = computeFee(newPrincipal, feeBps);
	const commonAmount = netAmount < owed ? netAmount : owed;
	return {
		feeAmount,
		netAmount,
		commonAmount,
		surplusAmount: netAmount - commonAmount,
		contributionAmount: owed - commonAmount,
	};
}
