/**
 * Bitcoin transaction decoding.
 */

import { Transaction } from "@scure/btc-signer";
import { EscrowError } from "../modules/listing/errors.js";
import {
	bytesEqual,
	bytesToHex,
	doubleSha256,
	reverseBytes,
} from "../utils/encoding.js";
import { ParsedTransaction, TxInputRef, TxOutputEntry } from "./types.js";

const DECODE_OPTIONS = {
	allowUnknownInputs: true,
	allowUnknownOutputs: true,
	disableScriptCheck: true,
};

function decode(bytes: Uint8Array): Transaction {
	try {
		return Transaction.fromRaw(bytes, DECODE_OPTIONS);
	} catch (e) {
		throw new EscrowError("OutOfBounds", "Malformed transaction", {
			cause: e instanceof Error ? e.message : String(e),
		});
	}
}

/**
 * Serialization without witness data, the preimage of the txid.
 *
 * @throws EscrowError `OutOfBounds` when the bytes are not a transaction
 */
export function stripWitness(bytes: Uint8Array): Uint8Array {
	return decode(bytes).toBytes(true, false);
}

/**
 * Transaction id (display order hex) of a legacy or witness serialization.
 */
export function computeTxid(bytes: Uint8Array): string {
	return bytesToHex(reverseBytes(doubleSha256(stripWitness(bytes))));
}

/**
 * Decode a serialized transaction, legacy or witness encoding.
 *
 * @throws EscrowError `OutOfBounds` when the bytes are not a transaction
 */
export function parseTransaction(bytes: Uint8Array): ParsedTransaction {
	const tx = decode(bytes);

	const inputs: TxInputRef[] = [];
	for (let i = 0; i < tx.inputsLength; i++) {
		const input = tx.getInput(i);
		if (input.txid === undefined || input.index === undefined) {
			throw new EscrowError("OutOfBounds", "Transaction input without outpoint", {
				inputIndex: i,
			});
		}
		inputs.push({ txid: bytesToHex(input.txid), index: input.index });
	}

	const outputs: TxOutputEntry[] = [];
	for (let i = 0; i < tx.outputsLength; i++) {
		const output = tx.getOutput(i);
		if (output.script === undefined || output.amount === undefined) {
			throw new EscrowError("OutOfBounds", "Transaction output without value", {
				outputIndex: i,
			});
		}
		outputs.push({ script: output.script, value: output.amount });
	}

	const stripped = tx.toBytes(true, false);
	return {
		txid: bytesToHex(reverseBytes(doubleSha256(stripped))),
		hasWitness: !bytesEqual(stripped, bytes),
		inputs,
		outputs,
	};
}
