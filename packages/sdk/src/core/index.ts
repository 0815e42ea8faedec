/**
 * Core module - primitives shared across the SDK
 */

// Types
export type {
	Address,
	Timestamp,
	Clock,
	AssetCategory,
	Asset,
	Permit,
} from "./types.js";

export { ASSET_CATEGORIES, systemClock } from "./types.js";

// Errors
export { type LoanErrorCode, LoanError, isLoanError } from "./errors.js";

// Asset helpers
export {
	fungible,
	isValidAsset,
	assertValidAsset,
	assetsEqual,
	transferUnits,
} from "./asset.js";

// Loan records
export type {
	LoanStatus,
	StoredLoanStatus,
	LoanStatusCode,
	LoanRecordBase,
	LoanView,
	LoanViewFields,
} from "./loan.js";

export { LOAN_STATUS_CODES, LOAN_STATUSES } from "./loan.js";
