/**
 * Proof layer types
 *
 * Claims that a Bitcoin transaction was mined, and the collaborators that
 * check them. Every hash is carried in display order (as block explorers
 * print it) unless noted otherwise.
 */

/**
 * Merkle path from a transaction to its block's merkle root.
 */
export interface MerkleProof {
	/** Position of the transaction in the block */
	txIndex: number;
	/** Sibling hashes from the leaf upwards */
	hashes: Uint8Array[];
	/** Height of the tree, must equal `hashes.length` */
	treeDepth: number;
}

/**
 * Inclusion claim for a transaction without witness data.
 */
export interface LegacyInclusionClaim {
	kind: "legacy";
	/** Height of the block containing the transaction */
	height: number;
	/** Serialized transaction */
	tx: Uint8Array;
	/** 80-byte block header */
	header: Uint8Array;
	proof: MerkleProof;
}

/**
 * Inclusion claim for a transaction in witness serialization. The
 * transaction is tied to the header through the coinbase witness commitment.
 */
export interface SegwitInclusionClaim {
	kind: "segwit";
	height: number;
	/** Serialized transaction, witness included */
	tx: Uint8Array;
	header: Uint8Array;
	/** Position of the transaction in the block */
	txIndex: number;
	treeDepth: number;
	/** Path from the wtxid to the witness merkle root */
	witnessProof: Uint8Array[];
	witnessMerkleRoot: Uint8Array;
	/** Coinbase witness reserved value, raw 32 bytes */
	witnessReservedValue: Uint8Array;
	/** Serialized coinbase transaction */
	coinbaseTx: Uint8Array;
	/** Path from the coinbase txid to the header merkle root */
	coinbaseProof: Uint8Array[];
}

export type InclusionClaim = LegacyInclusionClaim | SegwitInclusionClaim;

/**
 * Outcome of an inclusion check. The txid is derived by the verifier from the
 * transaction bytes.
 */
export type InclusionResult =
	| { ok: true; txid: string }
	| { ok: false; reason: string };

/**
 * Proof-of-inclusion collaborator.
 */
export interface InclusionVerifier {
	verifyLegacy(claim: LegacyInclusionClaim): Promise<InclusionResult>;
	verifySegwit(claim: SegwitInclusionClaim): Promise<InclusionResult>;
}

/**
 * Set of settlement transaction ids already used by a listing.
 */
export interface ConsumedTxRegistry {
	isConsumed(txid: string): Promise<boolean>;
}

/**
 * Source of canonical block hashes.
 */
export interface HeaderSource {
	/** Block hash at `height` in display order hex, or null if unknown */
	getBlockHash(height: number): Promise<string | null>;
}
