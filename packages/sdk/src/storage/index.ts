/**
 * Storage module - Pluggable loan persistence
 *
 * This module defines storage interfaces and provides reference implementations.
 * Hosts bring their own persistence layer by implementing LoanStore.
 */

// Types
export type {
	LoanQueryOptions,
	QueryResult,
	LoanStore,
	ExtensionProposalStore,
} from "./types.js";

export { StorageError } from "./types.js";

// Reference implementations
export {
	MemoryLoanStore,
	MemoryExtensionProposalStore,
} from "./memory-adapter.js";
