/**
 * Lifecycle State Machine
 *
 * A declarative transition table. The machine holds no current state:
 * loan status is derived from storage and time on every read, so callers
 * pass the state they resolved and ask where an action leads.
 */

import {
	StateMachineConfig,
	StateDefinition,
	StateTransition,
	StateMachineError,
} from "./types.js";

/**
 * Transition table for a lifecycle.
 *
 * @example
 * ```typescript
 * type State = "open" | "closed";
 * type Action = "close";
 *
 * const machine = new StateMachine<State, Action>({
 *   initialState: "open",
 *   states: [
 *     createState("open", ["close"]),
 *     createState("closed", [], { isFinal: true }),
 *   ],
 *   transitions: [createTransition("open", "close", "closed")],
 * });
 *
 * machine.next("open", "close"); // "closed"
 * ```
 */
export class StateMachine<TState extends string, TAction extends string> {
	private readonly stateMap: Map<TState, StateDefinition<TState, TAction>>;
	private readonly transitionMap: Map<string, StateTransition<TState, TAction>>;

	constructor(private readonly config: StateMachineConfig<TState, TAction>) {
		this.stateMap = new Map();
		for (const state of config.states) {
			this.stateMap.set(state.name, state);
		}

		this.transitionMap = new Map();
		for (const transition of config.transitions) {
			const froms = Array.isArray(transition.from)
				? transition.from
				: [transition.from];
			for (const from of froms) {
				this.transitionMap.set(`${from}:${transition.action}`, transition);
			}
		}
	}

	get initialState(): TState {
		return this.config.initialState;
	}

	/**
	 * Check if an action is allowed from `state`.
	 */
	canPerform(state: TState, action: TAction): boolean {
		const definition = this.stateMap.get(state);
		return (
			(definition?.allowedActions.includes(action) ?? false) &&
			this.transitionMap.has(`${state}:${action}`)
		);
	}

	/**
	 * Actions allowed from `state`.
	 */
	getAllowedActions(state: TState): TAction[] {
		return [...(this.stateMap.get(state)?.allowedActions ?? [])];
	}

	/**
	 * State reached by performing `action` from `state`.
	 *
	 * @throws StateMachineError if the action is not allowed
	 */
	next(state: TState, action: TAction): TState {
		if (!this.stateMap.has(state)) {
			throw new StateMachineError(`Unknown state: ${state}`, "UNKNOWN_STATE", {
				state,
			});
		}
		const transition = this.transitionMap.get(`${state}:${action}`);
		if (!transition || !this.canPerform(state, action)) {
			throw new StateMachineError(
				`Action "${action}" is not allowed from state "${state}"`,
				"ACTION_NOT_ALLOWED",
				{ action, state, allowedActions: this.getAllowedActions(state) },
			);
		}
		return transition.to;
	}

	isFinal(state: TState): boolean {
		return this.stateMap.get(state)?.isFinal ?? false;
	}

	getAllStates(): TState[] {
		return Array.from(this.stateMap.keys());
	}
}

/**
 * Helper to create a state definition.
 */
export function createState<TState extends string, TAction extends string>(
	name: TState,
	allowedActions: TAction[],
	options: { isFinal?: boolean; description?: string } = {},
): StateDefinition<TState, TAction> {
	return {
		name,
		allowedActions,
		isFinal: options.isFinal ?? false,
		description: options.description,
	};
}

/**
 * Helper to create a state transition.
 */
export function createTransition<TState extends string, TAction extends string>(
	from: TState | TState[],
	action: TAction,
	to: TState,
): StateTransition<TState, TAction> {
	return { from, action, to };
}
