/**
 * Proof module - Inclusion claims, verification and replay guard
 */

// Types
export type {
	MerkleProof,
	LegacyInclusionClaim,
	SegwitInclusionClaim,
	InclusionClaim,
	InclusionResult,
	InclusionVerifier,
	ConsumedTxRegistry,
	HeaderSource,
} from "./types.js";

export { ProofGate } from "./proof-gate.js";
export { MerkleInclusionVerifier, foldMerklePath } from "./merkle-verifier.js";
