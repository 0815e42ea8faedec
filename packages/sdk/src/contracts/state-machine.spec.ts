import { StateMachine, createState, createTransition } from "./state-machine.js";
import { StateMachineError } from "./types.js";

type State = "open" | "locked" | "closed";
type Action = "lock" | "unlock" | "close";

const machine = new StateMachine<State, Action>({
	initialState: "open",
	states: [
		createState("open", ["lock", "close"]),
		createState("locked", ["unlock"]),
		createState("closed", [], { isFinal: true }),
	],
	transitions: [
		createTransition("open", "lock", "locked"),
		createTransition("locked", "unlock", "open"),
		createTransition("open", "close", "closed"),
	],
});

describe("StateMachine", () => {
	it("follows declared transitions", () => {
		expect(machine.initialState).toBe("open");
		expect(machine.next("open", "lock")).toBe("locked");
		expect(machine.next("locked", "unlock")).toBe("open");
	});

	it("refuses actions not allowed from a state", () => {
		expect(machine.canPerform("locked", "close")).toBe(false);
		expect(() => machine.next("locked", "close")).toThrow(StateMachineError);
		expect(() => machine.next("locked", "close")).toThrow(
			'Action "close" is not allowed from state "locked"',
		);
	});

	it("requires both an allowed action and a transition", () => {
		const partial = new StateMachine<State, Action>({
			initialState: "open",
			states: [createState("open", ["lock"]), createState("locked", [])],
			transitions: [],
		});

		expect(partial.canPerform("open", "lock")).toBe(false);
	});

	it("reports final states", () => {
		expect(machine.isFinal("closed")).toBe(true);
		expect(machine.isFinal("open")).toBe(false);
		expect(machine.getAllStates()).toEqual(["open", "locked", "closed"]);
	});
});
