/**
 * Simple loan module - fixed-deadline loans
 */

export type { SimpleLoan, SimpleLoanView, RefinanceResult } from "./types.js";

export { SimpleLoanEngine } from "./simple-loan-engine.js";
