/**
 * Listing Module Types
 *
 * Types for an inscription listing: one proposed trade of a single
 * Bitcoin outpoint for settlement tokens.
 */

/**
 * Listing states.
 *
 * Lifecycle:
 * - open: Listed by the seller, no buyer yet
 * - escrowed: A buyer has escrowed price + premium
 * - committed: The seller has posted collateral, the delivery clock runs
 * - done: Delivery proven, seller paid
 * - cancelled: Abandoned, escrowed funds refunded
 */
export type ListingStatus =
	| "open"
	| "escrowed"
	| "committed"
	| "done"
	| "cancelled";

export const LISTING_STATUSES = [
	"open",
	"escrowed",
	"committed",
	"done",
	"cancelled",
] as const satisfies readonly ListingStatus[];

/**
 * Listing actions.
 */
export type ListingAction =
	| "accept" // Buyer escrows price + premium
	| "commit" // Seller posts collateral
	| "settle" // Delivery proof accepted
	| "cancel"; // Seller withdraws, or anyone after expiry

/**
 * Bitcoin outpoint. `txid` is hex in display order.
 */
export interface Outpoint {
	txid: string;
	vout: number;
}

/**
 * Escrow parameters shared by every listing.
 */
export interface ListingParameters {
	/** Minimum listing price, in settlement token units */
	minPrice: number;
	/** Blocks the seller has to commit after a buyer accepts */
	commitExpiry: number;
	/** Blocks the seller has to deliver after committing */
	expiry: number;
	/** Minimum value of the delivery output, in satoshis */
	dustFloor: number;
}

export const DEFAULT_LISTING_PARAMETERS: ListingParameters = {
	minPrice: 1000,
	commitExpiry: 100,
	expiry: 1008,
	dustFloor: 546,
};

/** Longest destination script accepted for either party. */
export const MAX_DESTINATION_SCRIPT_BYTES = 40;

/**
 * Listing as exposed to clients.
 */
export interface ListingData {
	id: number;
	foreignTxid: string;
	foreignVout: number;
	price: number;
	premium: number;
	seller: string;
	buyer: string | null;
	sellerDest: string;
	buyerDest: string | null;
	collateral: number;
	status: ListingStatus;
	lastChangeHeight: number;
	settlementTxid: string | null;
}
