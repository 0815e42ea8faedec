/**
 * Contracts module - declarative lifecycle state machines
 */

// Types
export type {
	StateDefinition,
	StateTransition,
	StateMachineConfig,
} from "./types.js";

export { StateMachineError } from "./types.js";

// State machine
export {
	StateMachine,
	createState,
	createTransition,
} from "./state-machine.js";
