/**
 * Listing error taxonomy.
 */

import { ContractError } from "../../contracts/types.js";

export type EscrowErrorCode =
	// input validation
	| "DustAmount"
	| "OutOfBounds"
	// authorization
	| "Forbidden"
	| "SelfTrade"
	// state conflict
	| "AlreadyDone"
	| "NotCommitted"
	| "ListingExists"
	| "InvalidId"
	// temporal guard
	| "Expired"
	| "NotExpired"
	// proof and consistency
	| "BtcTxAlreadyUsed"
	| "InscriptionMismatch"
	| "TxNotForReceiver"
	| "ValueTooSmall"
	| "ProofInvalid"
	// counterparty
	| "NoBuyer"
	// token ledger refused a transfer
	| "TransferFailed";

/**
 * Error raised by every listing operation. Exactly one code per failure.
 */
export class EscrowError extends ContractError<EscrowErrorCode> {
	constructor(code: EscrowErrorCode, message: string, details?: unknown) {
		super(message, code, details);
		this.name = "EscrowError";
	}
}

export function isEscrowError(e: unknown): e is EscrowError {
	return e instanceof EscrowError;
}
