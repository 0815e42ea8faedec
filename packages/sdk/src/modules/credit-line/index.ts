/**
 * Credit line module - debt-limit loans
 */

export type { CreditLine, CreditLineView } from "./types.js";

export {
	type CreditLineEngineDeps,
	CreditLineEngine,
} from "./credit-line-engine.js";
