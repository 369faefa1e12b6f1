/**
 * Merkle inclusion verifier
 *
 * Checks inclusion claims against block hashes from a `HeaderSource`.
 */

import { parseTransaction } from "../transactions/parse.js";
import { ParsedTransaction } from "../transactions/types.js";
import {
	bytesEqual,
	bytesToHex,
	concatBytes,
	doubleSha256,
	hexToBytes,
	reverseBytes,
} from "../utils/encoding.js";
import { isEscrowError } from "../modules/listing/errors.js";
import {
	HeaderSource,
	InclusionResult,
	InclusionVerifier,
	LegacyInclusionClaim,
	SegwitInclusionClaim,
} from "./types.js";

const HEADER_BYTES = 80;
const HASH_BYTES = 32;
const MAX_TREE_DEPTH = 32;
const WITNESS_COMMITMENT_PREFIX = Uint8Array.from([
	0x6a, 0x24, 0xaa, 0x21, 0xa9, 0xed,
]);
const NULL_TXID = "00".repeat(HASH_BYTES);

class InclusionFailure extends Error {}

function fail(reason: string): never {
	throw new InclusionFailure(reason);
}

/**
 * Fold a leaf (internal byte order) up a merkle path of display-order hashes.
 * Returns the root in internal byte order.
 */
export function foldMerklePath(
	leaf: Uint8Array,
	index: number,
	path: Uint8Array[],
): Uint8Array {
	let node = leaf;
	let position = index;
	for (const sibling of path) {
		if (sibling.length !== HASH_BYTES) fail("merkle path hash is not 32 bytes");
		const other = reverseBytes(sibling);
		node =
			position % 2 === 1
				? doubleSha256(concatBytes(other, node))
				: doubleSha256(concatBytes(node, other));
		position = Math.floor(position / 2);
	}
	if (position !== 0) fail("transaction index exceeds tree size");
	return node;
}

function checkTreeShape(index: number, depth: number, path: Uint8Array[]) {
	if (!Number.isSafeInteger(index) || index < 0) fail("invalid transaction index");
	if (!Number.isSafeInteger(depth) || depth < 0 || depth > MAX_TREE_DEPTH) {
		fail("invalid tree depth");
	}
	if (path.length !== depth) fail("merkle path length does not match tree depth");
}

function decodeTransaction(bytes: Uint8Array): ParsedTransaction {
	// 64-byte transactions can be confused with inner merkle nodes
	if (bytes.length === 64) fail("64-byte transactions are not accepted");
	try {
		return parseTransaction(bytes);
	} catch (e) {
		if (isEscrowError(e)) fail("malformed transaction");
		throw e;
	}
}

function witnessCommitment(coinbase: ParsedTransaction): Uint8Array {
	let commitment: Uint8Array | undefined;
	for (const output of coinbase.outputs) {
		const prefix = output.script.subarray(0, WITNESS_COMMITMENT_PREFIX.length);
		if (
			output.script.length >= WITNESS_COMMITMENT_PREFIX.length + HASH_BYTES &&
			bytesEqual(prefix, WITNESS_COMMITMENT_PREFIX)
		) {
			commitment = output.script.subarray(
				WITNESS_COMMITMENT_PREFIX.length,
				WITNESS_COMMITMENT_PREFIX.length + HASH_BYTES,
			);
		}
	}
	if (!commitment) fail("coinbase carries no witness commitment");
	return commitment;
}

export class MerkleInclusionVerifier implements InclusionVerifier {
	constructor(private readonly headers: HeaderSource) {}

	verifyLegacy(claim: LegacyInclusionClaim): Promise<InclusionResult> {
		return this.run(async () => {
			const merkleRoot = await this.checkHeader(claim.height, claim.header);
			const { txIndex, treeDepth, hashes } = claim.proof;
			checkTreeShape(txIndex, treeDepth, hashes);
			const tx = decodeTransaction(claim.tx);
			if (tx.hasWitness) fail("witness serialization needs a segwit claim");
			const leaf = doubleSha256(claim.tx);
			if (!bytesEqual(foldMerklePath(leaf, txIndex, hashes), merkleRoot)) {
				fail("merkle path does not lead to the header merkle root");
			}
			return tx.txid;
		});
	}

	verifySegwit(claim: SegwitInclusionClaim): Promise<InclusionResult> {
		return this.run(async () => {
			const merkleRoot = await this.checkHeader(claim.height, claim.header);
			checkTreeShape(claim.txIndex, claim.treeDepth, claim.witnessProof);
			checkTreeShape(0, claim.treeDepth, claim.coinbaseProof);
			if (claim.txIndex === 0) fail("the coinbase cannot settle a listing");
			if (claim.witnessMerkleRoot.length !== HASH_BYTES) {
				fail("witness merkle root is not 32 bytes");
			}
			if (claim.witnessReservedValue.length !== HASH_BYTES) {
				fail("witness reserved value is not 32 bytes");
			}

			const coinbase = decodeTransaction(claim.coinbaseTx);
			const [coinbaseInput] = coinbase.inputs;
			if (
				coinbase.inputs.length !== 1 ||
				coinbaseInput.txid !== NULL_TXID ||
				coinbaseInput.index !== 0xffffffff
			) {
				fail("coinbase transaction is not a coinbase");
			}
			const coinbaseHash = reverseBytes(hexToBytes(coinbase.txid));
			if (
				!bytesEqual(
					foldMerklePath(coinbaseHash, 0, claim.coinbaseProof),
					merkleRoot,
				)
			) {
				fail("coinbase path does not lead to the header merkle root");
			}

			const witnessRoot = reverseBytes(claim.witnessMerkleRoot);
			const expected = doubleSha256(
				concatBytes(witnessRoot, claim.witnessReservedValue),
			);
			if (!bytesEqual(witnessCommitment(coinbase), expected)) {
				fail("witness commitment does not match the witness merkle root");
			}

			const tx = decodeTransaction(claim.tx);
			const wtxid = doubleSha256(claim.tx);
			if (
				!bytesEqual(
					foldMerklePath(wtxid, claim.txIndex, claim.witnessProof),
					witnessRoot,
				)
			) {
				fail("witness path does not lead to the witness merkle root");
			}
			return tx.txid;
		});
	}

	private async checkHeader(
		height: number,
		header: Uint8Array,
	): Promise<Uint8Array> {
		if (!Number.isSafeInteger(height) || height < 0) fail("invalid block height");
		if (header.length !== HEADER_BYTES) fail("block header is not 80 bytes");
		const blockHash = bytesToHex(reverseBytes(doubleSha256(header)));
		const canonical = await this.headers.getBlockHash(height);
		if (canonical === null) fail(`no block known at height ${height}`);
		if (canonical.toLowerCase() !== blockHash) {
			fail(`header is not the block at height ${height}`);
		}
		return header.subarray(36, 68);
	}

	private async run(check: () => Promise<string>): Promise<InclusionResult> {
		try {
			return { ok: true, txid: await check() };
		} catch (e) {
			if (e instanceof InclusionFailure) return { ok: false, reason: e.message };
			throw e;
		}
	}
}
