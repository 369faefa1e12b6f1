import { EscrowError } from "../modules/listing/errors.js";
import { ProofGate } from "./proof-gate.js";
import {
	ConsumedTxRegistry,
	InclusionVerifier,
	LegacyInclusionClaim,
	SegwitInclusionClaim,
} from "./types.js";

const TXID = "ab".repeat(32);

const legacyClaim: LegacyInclusionClaim = {
	kind: "legacy",
	height: 10,
	tx: Uint8Array.from([1]),
	header: new Uint8Array(80),
	proof: { txIndex: 0, hashes: [], treeDepth: 0 },
};

const segwitClaim: SegwitInclusionClaim = {
	kind: "segwit",
	height: 10,
	tx: Uint8Array.from([2]),
	header: new Uint8Array(80),
	txIndex: 1,
	treeDepth: 1,
	witnessProof: [new Uint8Array(32)],
	witnessMerkleRoot: new Uint8Array(32),
	witnessReservedValue: new Uint8Array(32),
	coinbaseTx: Uint8Array.from([3]),
	coinbaseProof: [new Uint8Array(32)],
};

describe("ProofGate", () => {
	let verifier: jest.Mocked<InclusionVerifier>;
	let registry: jest.Mocked<ConsumedTxRegistry>;
	let gate: ProofGate;

	beforeEach(() => {
		verifier = {
			verifyLegacy: jest.fn().mockResolvedValue({ ok: true, txid: TXID }),
			verifySegwit: jest.fn().mockResolvedValue({ ok: true, txid: TXID }),
		};
		registry = { isConsumed: jest.fn().mockResolvedValue(false) };
		gate = new ProofGate(verifier, registry);
	});

	it("should return the txid derived by the verifier", async () => {
		await expect(gate.admitLegacy(legacyClaim)).resolves.toBe(TXID);
		expect(verifier.verifyLegacy).toHaveBeenCalledWith(legacyClaim);
		expect(registry.isConsumed).toHaveBeenCalledWith(TXID);
	});

	it("should dispatch claims by encoding", async () => {
		await gate.admit(segwitClaim);
		expect(verifier.verifySegwit).toHaveBeenCalledWith(segwitClaim);
		expect(verifier.verifyLegacy).not.toHaveBeenCalled();

		await gate.admit(legacyClaim);
		expect(verifier.verifyLegacy).toHaveBeenCalledWith(legacyClaim);
	});

	it("should fail with ProofInvalid carrying the verifier reason", async () => {
		verifier.verifySegwit.mockResolvedValue({
			ok: false,
			reason: "witness path does not lead to the witness merkle root",
		});

		const admitted = gate.admitSegwit(segwitClaim);

		await expect(admitted).rejects.toBeInstanceOf(EscrowError);
		await expect(admitted).rejects.toMatchObject({
			code: "ProofInvalid",
			details: {
				reason: "witness path does not lead to the witness merkle root",
			},
		});
		expect(registry.isConsumed).not.toHaveBeenCalled();
	});

	it("should fail with BtcTxAlreadyUsed for a consumed txid", async () => {
		registry.isConsumed.mockResolvedValue(true);

		await expect(gate.admitLegacy(legacyClaim)).rejects.toMatchObject({
			code: "BtcTxAlreadyUsed",
			details: { txid: TXID },
		});
	});
});
