export type TokenTransferErrorCode = "InvalidAmount" | "InsufficientBalance";

/**
 * Refusal from the settlement-token ledger. Balances are unchanged.
 */
export class TokenTransferError extends Error {
	constructor(
		public readonly code: TokenTransferErrorCode,
		message: string,
	) {
		super(message);
		this.name = "TokenTransferError";
	}
}
