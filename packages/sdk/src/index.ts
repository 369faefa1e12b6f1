/**
 * Inscription Escrow SDK
 *
 * Framework-free building blocks for trading a Bitcoin inscription outpoint
 * against a settlement token: the listing lifecycle, delivery matching and
 * inclusion proof checks.
 *
 * @example
 * ```typescript
 * import {
 *   ProofGate,
 *   MerkleInclusionVerifier,
 *   parseTransaction,
 *   matchDelivery,
 * } from "@inscription-escrow/sdk";
 *
 * const gate = new ProofGate(new MerkleInclusionVerifier(chain), registry);
 * const txid = await gate.admit(claim);
 * const match = matchDelivery(parseTransaction(claim.tx), {
 *   outpoint: { txid: listing.foreignTxid, vout: listing.foreignVout },
 *   destination: buyerScript,
 *   dustFloor: 546,
 * });
 * ```
 */

// Contracts - State machines and lifecycle
export {
	// Types
	type StateDefinition,
	type StateTransition,
	type StateMachineConfig,
	// Classes
	ContractStateMachine,
	ContractError,
	// Utilities
	createState,
	createTransition,
} from "./contracts/index.js";

// Listing module
export {
	type ListingStatus,
	type ListingAction,
	type Outpoint,
	type ListingParameters,
	type ListingData,
	type EscrowErrorCode,
	LISTING_STATUSES,
	DEFAULT_LISTING_PARAMETERS,
	MAX_DESTINATION_SCRIPT_BYTES,
	EscrowError,
	isEscrowError,
	LISTING_STATE_MACHINE,
	nextStatus,
	isFinalStatus,
	getAllowedActions,
} from "./modules/listing/index.js";

// Transactions - Decoding and delivery matching
export {
	type TxInputRef,
	type TxOutputEntry,
	type ParsedTransaction,
	type DeliveryRequirement,
	type DeliveryPayment,
	type DeliveryMismatchReason,
	type DeliveryMatch,
	parseTransaction,
	stripWitness,
	computeTxid,
	spendsOutpoint,
	findPaymentTo,
	matchDelivery,
} from "./transactions/index.js";

// Proof - Inclusion checks and replay guard
export {
	type MerkleProof,
	type LegacyInclusionClaim,
	type SegwitInclusionClaim,
	type InclusionClaim,
	type InclusionResult,
	type InclusionVerifier,
	type ConsumedTxRegistry,
	type HeaderSource,
	ProofGate,
	MerkleInclusionVerifier,
	foldMerklePath,
} from "./proof/index.js";

// Utils
export {
	bytesToHex,
	hexToBytes,
	tryHexToBytes,
	concatBytes,
	bytesEqual,
	reverseBytes,
	doubleSha256,
} from "./utils/index.js";
