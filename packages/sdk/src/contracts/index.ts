/**
 * Contracts module - State machines and contract lifecycle management
 */

// Types
export type {
	StateDefinition,
	StateTransition,
	StateMachineConfig,
} from "./types.js";

export { ContractError } from "./types.js";

// State machine
export {
	ContractStateMachine,
	createState,
	createTransition,
} from "./state-machine.js";
