/**
 * Proof Gate
 *
 * Admits a settlement transaction once its inclusion is proven and its id has
 * not settled another listing. Recording the id as consumed belongs to the
 * caller, in the same unit of work as the payout.
 */

import { EscrowError } from "../modules/listing/errors.js";
import {
	ConsumedTxRegistry,
	InclusionClaim,
	InclusionResult,
	InclusionVerifier,
	LegacyInclusionClaim,
	SegwitInclusionClaim,
} from "./types.js";

export class ProofGate {
	constructor(
		private readonly verifier: InclusionVerifier,
		private readonly registry: ConsumedTxRegistry,
	) {}

	/**
	 * Admit a claim of either encoding.
	 *
	 * @returns The settlement txid, display order hex
	 * @throws EscrowError `ProofInvalid` or `BtcTxAlreadyUsed`
	 */
	admit(claim: InclusionClaim): Promise<string> {
		return claim.kind === "legacy"
			? this.admitLegacy(claim)
			: this.admitSegwit(claim);
	}

	admitLegacy(claim: LegacyInclusionClaim): Promise<string> {
		return this.verifier.verifyLegacy(claim).then((r) => this.afterVerify(r));
	}

	admitSegwit(claim: SegwitInclusionClaim): Promise<string> {
		return this.verifier.verifySegwit(claim).then((r) => this.afterVerify(r));
	}

	private async afterVerify(result: InclusionResult): Promise<string> {
		if (!result.ok) {
			throw new EscrowError(
				"ProofInvalid",
				`Inclusion proof rejected: ${result.reason}`,
				{ reason: result.reason },
			);
		}
		if (await this.registry.isConsumed(result.txid)) {
			throw new EscrowError(
				"BtcTxAlreadyUsed",
				`Transaction ${result.txid} already settled a listing`,
				{ txid: result.txid },
			);
		}
		return result.txid;
	}
}
