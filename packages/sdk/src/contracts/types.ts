/**
 * Lifecycle types
 *
 * Types for declaring the state machines that guard loan actions.
 */

/**
 * Generic state definition for a lifecycle state machine.
 */
export interface StateDefinition<TState extends string, TAction extends string> {
	/** The state name */
	name: TState;
	/** Actions allowed from this state */
	allowedActions: TAction[];
	/** Is this a terminal state (no further transitions)? */
	isFinal: boolean;
	/** Human-readable description of this state */
	description?: string;
}

/**
 * State transition definition.
 */
export interface StateTransition<
	TState extends string,
	TAction extends string,
> {
	/** Source state(s) for this transition */
	from: TState | TState[];
	/** Action that triggers this transition */
	action: TAction;
	/** Target state after transition */
	to: TState;
}

/**
 * State machine configuration.
 */
export interface StateMachineConfig<
	TState extends string,
	TAction extends string,
> {
	/** Initial state of a new record */
	initialState: TState;
	/** All possible states */
	states: StateDefinition<TState, TAction>[];
	/** All possible transitions */
	transitions: StateTransition<TState, TAction>[];
}

/**
 * Error thrown when an action is not allowed from a state.
 */
export class StateMachineError extends Error {
	constructor(
		message: string,
		public readonly code: "UNKNOWN_STATE" | "ACTION_NOT_ALLOWED",
		public readonly details?: Record<string, unknown>,
	) {
		super(message);
		this.name = "StateMachineError";
	}
}
