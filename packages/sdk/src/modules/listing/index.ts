/**
 * Listing Module
 *
 * Lifecycle, parameters and error taxonomy for inscription listings.
 */

// Types
export type {
	ListingStatus,
	ListingAction,
	Outpoint,
	ListingParameters,
	ListingData,
} from "./types.js";

export {
	LISTING_STATUSES,
	DEFAULT_LISTING_PARAMETERS,
	MAX_DESTINATION_SCRIPT_BYTES,
} from "./types.js";

// Errors
export type { EscrowErrorCode } from "./errors.js";
export { EscrowError, isEscrowError } from "./errors.js";

// State machine
export {
	LISTING_STATE_MACHINE,
	nextStatus,
	isFinalStatus,
	getAllowedActions,
} from "./listing-state-machine.js";
