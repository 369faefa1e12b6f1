/**
 * Transaction layer types
 *
 * Structured view of a serialized Bitcoin transaction, reduced to what the
 * delivery matcher inspects.
 */

import { Outpoint } from "../modules/listing/types.js";

/**
 * Input reference to the outpoint it spends.
 */
export interface TxInputRef {
	/** Previous transaction id, hex in display order */
	txid: string;
	/** Previous output index */
	index: number;
}

/**
 * Transaction output.
 */
export interface TxOutputEntry {
	/** Output script */
	script: Uint8Array;
	/** Value in satoshis */
	value: bigint;
}

/**
 * Decoded transaction.
 */
export interface ParsedTransaction {
	/** Transaction id (witness excluded), hex in display order */
	txid: string;
	/** Whether the serialization carried witness data */
	hasWitness: boolean;
	inputs: TxInputRef[];
	outputs: TxOutputEntry[];
}

/**
 * What a delivery transaction must do to settle a listing.
 */
export interface DeliveryRequirement {
	/** The inscription outpoint that must be spent */
	outpoint: Outpoint;
	/** The buyer's destination script that must be paid */
	destination: Uint8Array;
	/** Minimum value of the payment output, in satoshis */
	dustFloor: number;
}

/**
 * Output found paying a destination script.
 */
export interface DeliveryPayment {
	/** Output index */
	index: number;
	/** Value in satoshis */
	value: bigint;
}

export type DeliveryMismatchReason =
	| "InscriptionMismatch"
	| "TxNotForReceiver"
	| "ValueTooSmall";

export type DeliveryMatch =
	| { ok: true; payment: DeliveryPayment }
	| { ok: false; reason: DeliveryMismatchReason; message: string };
