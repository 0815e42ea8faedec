/**
 * Loanvault SDK
 *
 * Settlement engine for collateralized loans: interest accrual, default
 * policies, derived loan status and the ordered asset movements of every
 * loan operation.
 *
 * @example
 * ```typescript
 * import {
 *   SimpleLoanEngine,
 *   MemoryLoanStore,
 *   MemoryPositionToken,
 *   MemoryAssetVault,
 *   MemoryAtomicScope,
 * } from "@loanvault/sdk";
 *
 * const store = new MemoryLoanStore<SimpleLoan>();
 * const positionToken = new MemoryPositionToken();
 * const assets = new MemoryAssetVault("vault");
 *
 * const engine = new SimpleLoanEngine({
 *   store,
 *   positionToken,
 *   assets,
 *   scope: new MemoryAtomicScope([store, positionToken, assets]),
 *   // fees, capabilities, nonces, signatures, proposals, domain
 * });
 *
 * const { loanId } = await engine.createLoan(terms, proposalContract);
 * ```
 */

// Core - Shared primitives
export {
	// Types
	type Address,
	type Timestamp,
	type Clock,
	type AssetCategory,
	type Asset,
	type Permit,
	type LoanErrorCode,
	type LoanStatus,
	type StoredLoanStatus,
	type LoanStatusCode,
	type LoanRecordBase,
	type LoanView,
	type LoanViewFields,
	// Classes
	LoanError,
	// Constants
	ASSET_CATEGORIES,
	LOAN_STATUSES,
	LOAN_STATUS_CODES,
	// Utilities
	systemClock,
	isLoanError,
	fungible,
	isValidAsset,
	assertValidAsset,
	assetsEqual,
	transferUnits,
} from "./core/index.js";

// Contracts - Lifecycle state machines
export {
	type StateDefinition,
	type StateTransition,
	type StateMachineConfig,
	StateMachine,
	StateMachineError,
	createState,
	createTransition,
} from "./contracts/index.js";

// Storage - Persistence adapters
export {
	type LoanQueryOptions,
	type QueryResult,
	type LoanStore,
	type ExtensionProposalStore,
	MemoryLoanStore,
	MemoryExtensionProposalStore,
	StorageError,
} from "./storage/index.js";

// Protocol - Collaborators
export {
	type PositionToken,
	type AssetTransfer,
	type FeeSource,
	type CapabilityRegistry,
	type NonceRevocation,
	type SignatureVerifier,
	type AtomicScope,
	type Snapshottable,
	type HoldingKey,
	type HoldingsBook,
	type AssetVaultOptions,
	LOAN_PROPOSAL_TAG,
	MemoryPositionToken,
	StaticFeeSource,
	MemoryCapabilityRegistry,
	MemoryNonceRevocation,
	MemoryAtomicScope,
	AssetVault,
	MemoryAssetVault,
	MemoryHoldingsBook,
	SchnorrSignatureVerifier,
	permitHash,
} from "./protocol/index.js";

// Utils
export {
	type EncodableValue,
	bytesToHex,
	hexToBytes,
	stringToBytes,
	concatBytes,
	encodeUint,
	encodeString,
	encodeWords,
	hashWords,
	ZERO_HASH,
	Mutex,
} from "./utils/index.js";

// Modules - Loan mechanics
// Interest model
export {
	type RateEncoding,
	type DebtSnapshot,
	type FeeSplit,
	type AppliedPayment,
	MINUTES_IN_DAY,
	MINUTES_IN_YEAR,
	ACCRUING_INTEREST_APR_DENOMINATOR,
	DAILY_RATE_DENOMINATOR,
	FEE_DENOMINATOR,
	MAX_ACCRUING_INTEREST_APR,
	mulDiv,
	elapsedMinutes,
	accruedInterest,
	currentInterest,
	repaymentAmount,
	aprToDailyRate,
	computeFee,
	applyPayment,
} from "./modules/interest/index.js";

// Default policies
export {
	type DefaultPolicy,
	type DefaultPolicyInput,
	SECONDS_IN_DAY,
	DEBT_LIMIT_TANGENT_SCALE,
	DEFAULT_DEBT_LIMIT_POSTPONEMENT,
	FixedDeadlinePolicy,
	DebtLimitPolicy,
	computeDebtLimitTangent,
	debtLimit,
	isDebtLimitExceeded,
} from "./modules/default-policy/index.js";

// Status resolver
export {
	type LoanAction,
	type StatusSubject,
	LOAN_LIFECYCLE,
	effectiveStatus,
	statusCode,
	requireAction,
} from "./modules/status/index.js";

// Settlement
export {
	type TransferInstruction,
	type RefinanceSplit,
	SettlementPlan,
	computeRefinanceSplit,
} from "./modules/settlement/index.js";

// Extensions
export {
	type ExtensionProposal,
	type ProposalDomain,
	type ExtensionAuthorization,
	type ExtensionBounds,
	type ExtensionParties,
	type ApprovedExtension,
	DEFAULT_MIN_EXTENSION_DURATION,
	DEFAULT_MAX_EXTENSION_DURATION,
	ExtensionWorkflow,
	extensionProposalHash,
} from "./modules/extension/index.js";

// Engines
export {
	type LoanTerms,
	type SettlementOptions,
	type RepayOptions,
	type ExtendOptions,
	type CreateLoanResult,
	type RepayResult,
	type ClaimResult,
	type ExtendResult,
	type LoanEngineDeps,
	MIN_LOAN_DURATION,
	LoanEngine,
} from "./modules/loan/index.js";

export {
	type SimpleLoan,
	type SimpleLoanView,
	type RefinanceResult,
	SimpleLoanEngine,
} from "./modules/simple-loan/index.js";

export {
	type CreditLine,
	type CreditLineView,
	type CreditLineEngineDeps,
	CreditLineEngine,
} from "./modules/credit-line/index.js";
