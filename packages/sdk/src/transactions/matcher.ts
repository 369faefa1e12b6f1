/**
 * Delivery matcher
 *
 * Checks that a transaction delivers a listed outpoint to the buyer.
 * Existence of the transaction is established elsewhere (see the proof gate).
 *
 * The payment output is not checked to carry the inscribed satoshi: a
 * transaction can pass by paying the buyer from another output while routing
 * the inscription elsewhere. Ordinal routing is not tracked here.
 */

import { Outpoint } from "../modules/listing/types.js";
import { bytesEqual } from "../utils/encoding.js";
import {
	DeliveryMatch,
	DeliveryPayment,
	DeliveryRequirement,
	ParsedTransaction,
} from "./types.js";

/**
 * Whether some input spends `outpoint`.
 */
export function spendsOutpoint(
	tx: ParsedTransaction,
	outpoint: Outpoint,
): boolean {
	const txid = outpoint.txid.toLowerCase();
	for (const input of tx.inputs) {
		if (input.index === outpoint.vout && input.txid === txid) return true;
	}
	return false;
}

/**
 * First output paying exactly `script`, if any. Values of several matching
 * outputs are never summed.
 */
export function findPaymentTo(
	tx: ParsedTransaction,
	script: Uint8Array,
): DeliveryPayment | undefined {
	for (let index = 0; index < tx.outputs.length; index++) {
		const output = tx.outputs[index];
		if (bytesEqual(output.script, script)) {
			return { index, value: output.value };
		}
	}
	return undefined;
}

/**
 * Evaluate a delivery transaction against a listing's requirement.
 */
export function matchDelivery(
	tx: ParsedTransaction,
	requirement: DeliveryRequirement,
): DeliveryMatch {
	if (!spendsOutpoint(tx, requirement.outpoint)) {
		return {
			ok: false,
			reason: "InscriptionMismatch",
			message: `Transaction does not spend ${requirement.outpoint.txid}:${requirement.outpoint.vout}`,
		};
	}
	const payment = findPaymentTo(tx, requirement.destination);
	if (!payment) {
		return {
			ok: false,
			reason: "TxNotForReceiver",
			message: "No output pays the buyer destination",
		};
	}
	if (payment.value < BigInt(requirement.dustFloor)) {
		return {
			ok: false,
			reason: "ValueTooSmall",
			message: `Output ${payment.index} pays ${payment.value} sats, below ${requirement.dustFloor}`,
		};
	}
	return { ok: true, payment };
}
