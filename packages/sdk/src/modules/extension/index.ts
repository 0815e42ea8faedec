/**
 * Extension module - deadline extensions agreed by both parties
 */

export {
	type ExtensionProposal,
	type ProposalDomain,
	type ExtensionAuthorization,
	type ExtensionBounds,
	type ExtensionParties,
	type ApprovedExtension,
	type ExtensionWorkflowDeps,
	DEFAULT_MIN_EXTENSION_DURATION,
	DEFAULT_MAX_EXTENSION_DURATION,
	ExtensionWorkflow,
	extensionProposalHash,
} from "./extension.js";
