/**
 * Transactions module - Decoding and delivery matching
 */

// Types
export type {
	TxInputRef,
	TxOutputEntry,
	ParsedTransaction,
	DeliveryRequirement,
	DeliveryPayment,
	DeliveryMismatchReason,
	DeliveryMatch,
} from "./types.js";

// Decoding
export { parseTransaction, stripWitness, computeTxid } from "./parse.js";

// Matching
export { spendsOutpoint, findPaymentTo, matchDelivery } from "./matcher.js";
