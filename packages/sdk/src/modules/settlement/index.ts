/**
 * Settlement module - ordered asset movements
 */

export {
	type TransferInstruction,
	SettlementPlan,
} from "./settlement-plan.js";

export { type RefinanceSplit, computeRefinanceSplit } from "./refinance.js";
