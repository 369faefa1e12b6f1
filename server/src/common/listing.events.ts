import type { ListingStatus } from "@inscription-escrow/sdk";

export type ListingId = number;

export const LISTING_CREATED_ID = "listing.created";
export type ListingCreated = {
	eventId: string;
	listingId: ListingId;
	seller: string;
	foreignTxid: string;
	foreignVout: number;
	price: number;
	premium: number;
	createdAt: string; // ISO timestamp
};

export const LISTING_ACCEPTED_ID = "listing.accepted";
export type ListingAccepted = {
	eventId: string;
	listingId: ListingId;
	buyer: string;
	escrowed: number; // price + premium
	acceptedAt: string;
};

export const LISTING_COMMITTED_ID = "listing.committed";
export type ListingCommitted = {
	eventId: string;
	listingId: ListingId;
	collateral: number;
	committedAt: string;
};

export const LISTING_CANCELLED_ID = "listing.cancelled";
export type ListingCancelled = {
	eventId: string;
	listingId: ListingId;
	cancelledBy: string;
	previousStatus: ListingStatus;
	refunded: number;
	refundedTo: string | null;
	cancelledAt: string;
};

export const LISTING_SETTLED_ID = "listing.settled";
export type ListingSettled = {
	eventId: string;
	listingId: ListingId;
	seller: string;
	buyer: string;
	foreignTxid: string;
	foreignVout: number;
	price: number;
	premium: number;
	collateral: number;
	settlementTxid: string;
	settledAt: string;
};
