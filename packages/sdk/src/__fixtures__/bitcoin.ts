import { Transaction } from "@scure/btc-signer";
import {
	bytesToHex,
	concatBytes,
	doubleSha256,
	hexToBytes,
	reverseBytes,
} from "../utils/encoding.js";
import { stripWitness } from "../transactions/parse.js";

export const LISTED_TXID = Array.from({ length: 32 }, (_, i) =>
	i.toString(16).padStart(2, "0"),
).join("");
export const LISTED_VOUT = 1;

export const BUYER_SCRIPT = hexToBytes(`0014${"11".repeat(20)}`);
export const SELLER_SCRIPT = hexToBytes(`5120${"22".repeat(32)}`);
export const CHANGE_SCRIPT = hexToBytes(`0014${"33".repeat(20)}`);

export interface FixtureInput {
	txid: string;
	vout: number;
	scriptSig?: Uint8Array;
	witness?: Uint8Array[];
}

export interface FixtureOutput {
	script: Uint8Array;
	value: bigint;
}

export function buildTx(
	inputs: FixtureInput[],
	outputs: FixtureOutput[],
): Uint8Array {
	const tx = new Transaction({
		allowUnknownInputs: true,
		allowUnknownOutputs: true,
		disableScriptCheck: true,
	});
	for (const input of inputs) {
		tx.addInput({
			txid: hexToBytes(input.txid),
			index: input.vout,
			...(input.scriptSig ? { finalScriptSig: input.scriptSig } : {}),
			...(input.witness ? { finalScriptWitness: input.witness } : {}),
		});
	}
	for (const output of outputs) {
		tx.addOutput({ script: output.script, amount: output.value });
	}
	const withWitness = inputs.some((i) => i.witness !== undefined);
	return tx.toBytes(true, withWitness);
}

/** Delivery of the listed outpoint to the buyer, optionally with witness data. */
export function deliveryTx(
	options: { value?: bigint; witness?: boolean } = {},
): Uint8Array {
	return buildTx(
		[
			{
				txid: LISTED_TXID,
				vout: LISTED_VOUT,
				witness: options.witness ? [new Uint8Array(64).fill(7)] : undefined,
			},
			{ txid: "ee".repeat(32), vout: 0 },
		],
		[
			{ script: BUYER_SCRIPT, value: options.value ?? 10_000n },
			{ script: CHANGE_SCRIPT, value: 50_000n },
		],
	);
}

/** Internal-order leaf of a transaction in the txid tree. */
export function txidLeaf(tx: Uint8Array): Uint8Array {
	return doubleSha256(stripWitness(tx));
}

/**
 * Merkle tree over internal-order leaves, duplicating the last node of odd
 * levels. Paths are returned in display order.
 */
export function merkleTree(leaves: Uint8Array[]) {
	const levels: Uint8Array[][] = [leaves];
	while (levels[levels.length - 1].length > 1) {
		const level = levels[levels.length - 1];
		const next: Uint8Array[] = [];
		for (let i = 0; i < level.length; i += 2) {
			const right = level[i + 1] ?? level[i];
			next.push(doubleSha256(concatBytes(level[i], right)));
		}
		levels.push(next);
	}
	return {
		root: levels[levels.length - 1][0],
		path(index: number): Uint8Array[] {
			const path: Uint8Array[] = [];
			let position = index;
			for (const level of levels.slice(0, -1)) {
				const sibling = level[position ^ 1] ?? level[position];
				path.push(reverseBytes(sibling));
				position = position >> 1;
			}
			return path;
		},
	};
}

/** 80-byte header committing to `merkleRoot` (internal order). */
export function buildHeader(merkleRoot: Uint8Array): Uint8Array {
	return concatBytes(
		Uint8Array.from([0x00, 0x00, 0x00, 0x20]),
		new Uint8Array(32).fill(0x42),
		merkleRoot,
		Uint8Array.from([0x10, 0x32, 0x54, 0x65]),
		Uint8Array.from([0xff, 0xff, 0x00, 0x1d]),
		Uint8Array.from([0x01, 0x02, 0x03, 0x04]),
	);
}

export function blockHash(header: Uint8Array): string {
	return bytesToHex(reverseBytes(doubleSha256(header)));
}

export function coinbaseTx(witnessCommitment: Uint8Array): Uint8Array {
	return buildTx(
		[
			{
				txid: "00".repeat(32),
				vout: 0xffffffff,
				scriptSig: hexToBytes("0340420f"),
				witness: [new Uint8Array(32)],
			},
		],
		[
			{ script: SELLER_SCRIPT, value: 312_500_000n },
			{
				script: concatBytes(hexToBytes("6a24aa21a9ed"), witnessCommitment),
				value: 0n,
			},
		],
	);
}
