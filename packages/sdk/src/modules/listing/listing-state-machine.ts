/**
 * Listing State Machine Configuration
 *
 * Defines the lifecycle of an inscription listing.
 */

import {
	ContractStateMachine,
	StateMachineConfig,
	createState,
	createTransition,
} from "../../contracts/index.js";
import { EscrowError } from "./errors.js";
import { ListingAction, ListingStatus } from "./types.js";

/**
 * Listing state machine configuration.
 *
 * States:
 * - open: waiting for a buyer
 * - escrowed: buyer funds held, waiting for seller collateral
 * - committed: collateral held, waiting for the delivery proof
 * - done: delivered and paid (terminal)
 * - cancelled: abandoned and refunded (terminal)
 */
export const LISTING_STATE_MACHINE: StateMachineConfig<
	ListingStatus,
	ListingAction
> = {
	initialState: "open",
	states: [
		createState("open", ["accept", "cancel"], {
			description: "Listed, waiting for a buyer",
		}),
		createState("escrowed", ["commit", "cancel"], {
			description: "Buyer funds escrowed, waiting for seller collateral",
		}),
		createState("committed", ["settle", "cancel"], {
			description: "Collateral posted, waiting for delivery proof",
		}),
		createState("done", [], {
			isFinal: true,
			description: "Delivery proven and seller paid",
		}),
		createState("cancelled", [], {
			isFinal: true,
			description: "Listing abandoned, escrowed funds refunded",
		}),
	],
	transitions: [
		createTransition("open", "accept", "escrowed"),
		createTransition("escrowed", "commit", "committed"),
		createTransition("committed", "settle", "done"),
		createTransition(["open", "escrowed", "committed"], "cancel", "cancelled"),
	],
};

/**
 * Resolve the status a listing moves to when `action` is applied.
 *
 * @throws EscrowError `AlreadyDone` when the action is not available from `status`
 */
export function nextStatus(
	status: ListingStatus,
	action: ListingAction,
): ListingStatus {
	const machine = new ContractStateMachine(LISTING_STATE_MACHINE, status);
	if (!machine.canPerform(action)) {
		throw new EscrowError(
			"AlreadyDone",
			`Listing in status "${status}" does not accept "${action}"`,
			{ status, action, allowedActions: machine.getAllowedActions() },
		);
	}
	return machine.perform(action);
}

/**
 * Check if a status is terminal.
 */
export function isFinalStatus(status: ListingStatus): boolean {
	return new ContractStateMachine(LISTING_STATE_MACHINE, status).isFinal();
}

/**
 * Get the actions available from a status.
 */
export function getAllowedActions(status: ListingStatus): ListingAction[] {
	return new ContractStateMachine(
		LISTING_STATE_MACHINE,
		status,
	).getAllowedActions();
}
