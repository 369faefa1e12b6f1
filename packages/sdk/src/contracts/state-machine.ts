/**
 * Contract State Machine
 *
 * A table-driven state machine for contract lifecycle states and transitions.
 * Guards that depend on contract data (callers, heights, amounts) are
 * evaluated by the owner of that data before `perform` is called; the machine
 * only enforces that the transition exists.
 */

import {
	StateMachineConfig,
	StateDefinition,
	StateTransition,
	ContractError,
} from "./types.js";

/**
 * Generic state machine for contract lifecycle management.
 *
 * @example
 * ```typescript
 * type DoorState = "closed" | "open" | "locked";
 * type DoorAction = "open" | "close" | "lock";
 *
 * const config: StateMachineConfig<DoorState, DoorAction> = {
 *   initialState: "closed",
 *   states: [
 *     createState("closed", ["open", "lock"]),
 *     createState("open", ["close"]),
 *     createState("locked", [], { isFinal: true }),
 *   ],
 *   transitions: [
 *     createTransition("closed", "open", "open"),
 *     createTransition("open", "close", "closed"),
 *     createTransition("closed", "lock", "locked"),
 *   ],
 * };
 *
 * const machine = new ContractStateMachine(config);
 * machine.perform("open"); // "open"
 * ```
 */
export class ContractStateMachine<
	TState extends string,
	TAction extends string,
> {
	private currentState: TState;
	private readonly stateMap: Map<TState, StateDefinition<TState, TAction>>;
	private readonly transitionMap: Map<string, StateTransition<TState, TAction>>;

	constructor(
		private readonly config: StateMachineConfig<TState, TAction>,
		initialState?: TState,
	) {
		this.currentState = initialState ?? config.initialState;

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

		if (!this.stateMap.has(this.currentState)) {
			throw new ContractError(
				`Unknown state: ${this.currentState}`,
				"UNKNOWN_STATE",
				{ state: this.currentState, validStates: this.getAllStates() },
			);
		}
	}

	/**
	 * Get the current state.
	 */
	getState(): TState {
		return this.currentState;
	}

	/**
	 * Check if an action is allowed from the current state.
	 */
	canPerform(action: TAction): boolean {
		const state = this.stateMap.get(this.currentState);
		return state?.allowedActions.includes(action) ?? false;
	}

	/**
	 * Get the list of allowed actions from the current state.
	 */
	getAllowedActions(): TAction[] {
		return this.stateMap.get(this.currentState)?.allowedActions ?? [];
	}

	/**
	 * Preview what state would result from an action without performing it.
	 */
	previewTransition(action: TAction): TState | undefined {
		return this.transitionMap.get(`${this.currentState}:${action}`)?.to;
	}

	/**
	 * Perform an action, transitioning state if valid.
	 *
	 * @returns The new state after transition
	 * @throws ContractError if the action is not allowed from the current state
	 */
	perform(action: TAction): TState {
		const next = this.canPerform(action)
			? this.previewTransition(action)
			: undefined;
		if (next === undefined) {
			throw new ContractError(
				`Action "${action}" is not allowed from state "${this.currentState}"`,
				"ACTION_NOT_ALLOWED",
				{
					action,
					currentState: this.currentState,
					allowedActions: this.getAllowedActions(),
				},
			);
		}
		this.currentState = next;
		return next;
	}

	/**
	 * Check if the current state is a final (terminal) state.
	 */
	isFinal(): boolean {
		return this.stateMap.get(this.currentState)?.isFinal ?? false;
	}

	/**
	 * Get all possible states.
	 */
	getAllStates(): TState[] {
		return Array.from(this.stateMap.keys());
	}

	/**
	 * Get all final (terminal) states.
	 */
	getFinalStates(): TState[] {
		return Array.from(this.stateMap.values())
			.filter((s) => s.isFinal)
			.map((s) => s.name);
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
