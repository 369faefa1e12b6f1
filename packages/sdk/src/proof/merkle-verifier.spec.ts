import {
	SELLER_SCRIPT,
	blockHash,
	buildHeader,
	buildTx,
	coinbaseTx,
	deliveryTx,
	merkleTree,
	txidLeaf,
} from "../__fixtures__/bitcoin.js";
import { parseTransaction } from "../transactions/parse.js";
import {
	concatBytes,
	doubleSha256,
	hexToBytes,
	reverseBytes,
} from "../utils/encoding.js";
import { MerkleInclusionVerifier } from "./merkle-verifier.js";
import {
	HeaderSource,
	LegacyInclusionClaim,
	SegwitInclusionClaim,
} from "./types.js";

const HEIGHT = 800_000;

function headerSource(hash: string): HeaderSource {
	return {
		getBlockHash: async (height) => (height === HEIGHT ? hash : null),
	};
}

const filler = buildTx(
	[{ txid: "cd".repeat(32), vout: 3 }],
	[{ script: SELLER_SCRIPT, value: 20_000n }],
);

describe("MerkleInclusionVerifier", () => {
	describe("verifyLegacy", () => {
		const coinbase = buildTx(
			[{ txid: "00".repeat(32), vout: 0xffffffff, scriptSig: hexToBytes("0340420f") }],
			[{ script: SELLER_SCRIPT, value: 312_500_000n }],
		);
		const delivery = deliveryTx();
		const tree = merkleTree([coinbase, filler, delivery].map(txidLeaf));
		const header = buildHeader(tree.root);
		const verifier = new MerkleInclusionVerifier(headerSource(blockHash(header)));

		const claim = (
			overrides: Partial<LegacyInclusionClaim> = {},
		): LegacyInclusionClaim => ({
			kind: "legacy",
			height: HEIGHT,
			tx: delivery,
			header,
			proof: { txIndex: 2, hashes: tree.path(2), treeDepth: 2 },
			...overrides,
		});

		it("should return the txid of a transaction included in the block", async () => {
			await expect(verifier.verifyLegacy(claim())).resolves.toEqual({
				ok: true,
				txid: parseTransaction(delivery).txid,
			});
		});

		it("should verify any position in the tree", async () => {
			await expect(
				verifier.verifyLegacy(
					claim({
						tx: filler,
						proof: { txIndex: 1, hashes: tree.path(1), treeDepth: 2 },
					}),
				),
			).resolves.toEqual({ ok: true, txid: parseTransaction(filler).txid });
		});

		it("should accept block hashes reported in upper case", async () => {
			const upper = new MerkleInclusionVerifier(
				headerSource(blockHash(header).toUpperCase()),
			);
			await expect(upper.verifyLegacy(claim())).resolves.toMatchObject({
				ok: true,
			});
		});

		it("should reject a header that is not the block at that height", async () => {
			const other = buildHeader(new Uint8Array(32));
			await expect(verifier.verifyLegacy(claim({ header: other }))).resolves.toEqual({
				ok: false,
				reason: `header is not the block at height ${HEIGHT}`,
			});
		});

		it("should reject an unknown height", async () => {
			await expect(verifier.verifyLegacy(claim({ height: 1 }))).resolves.toEqual({
				ok: false,
				reason: "no block known at height 1",
			});
		});

		it("should reject a header of the wrong size", async () => {
			await expect(
				verifier.verifyLegacy(claim({ header: header.subarray(0, 79) })),
			).resolves.toEqual({ ok: false, reason: "block header is not 80 bytes" });
		});

		it("should reject a tampered merkle path", async () => {
			const hashes = tree.path(2);
			hashes[1] = new Uint8Array(32).fill(9);
			await expect(
				verifier.verifyLegacy(claim({ proof: { txIndex: 2, hashes, treeDepth: 2 } })),
			).resolves.toEqual({
				ok: false,
				reason: "merkle path does not lead to the header merkle root",
			});
		});

		it("should reject a tree depth that disagrees with the path", async () => {
			await expect(
				verifier.verifyLegacy(
					claim({ proof: { txIndex: 2, hashes: tree.path(2), treeDepth: 3 } }),
				),
			).resolves.toEqual({
				ok: false,
				reason: "merkle path length does not match tree depth",
			});
		});

		it("should reject an index beyond the tree", async () => {
			await expect(
				verifier.verifyLegacy(
					claim({ proof: { txIndex: 4, hashes: tree.path(2), treeDepth: 2 } }),
				),
			).resolves.toEqual({
				ok: false,
				reason: "transaction index exceeds tree size",
			});
		});

		it("should reject a witness serialization", async () => {
			await expect(
				verifier.verifyLegacy(claim({ tx: deliveryTx({ witness: true }) })),
			).resolves.toEqual({
				ok: false,
				reason: "witness serialization needs a segwit claim",
			});
		});

		it("should reject 64-byte transactions", async () => {
			await expect(
				verifier.verifyLegacy(claim({ tx: new Uint8Array(64) })),
			).resolves.toEqual({
				ok: false,
				reason: "64-byte transactions are not accepted",
			});
		});

		it("should reject malformed transaction bytes", async () => {
			await expect(
				verifier.verifyLegacy(claim({ tx: Uint8Array.from([1, 2, 3]) })),
			).resolves.toEqual({ ok: false, reason: "malformed transaction" });
		});
	});

	describe("verifySegwit", () => {
		const delivery = deliveryTx({ witness: true });
		const reserved = new Uint8Array(32);
		const witnessTree = merkleTree([
			new Uint8Array(32),
			doubleSha256(filler),
			doubleSha256(delivery),
		]);
		const coinbase = coinbaseTx(
			doubleSha256(concatBytes(witnessTree.root, reserved)),
		);
		const tree = merkleTree([coinbase, filler, delivery].map(txidLeaf));
		const header = buildHeader(tree.root);
		const verifier = new MerkleInclusionVerifier(headerSource(blockHash(header)));

		const claim = (
			overrides: Partial<SegwitInclusionClaim> = {},
		): SegwitInclusionClaim => ({
			kind: "segwit",
			height: HEIGHT,
			tx: delivery,
			header,
			txIndex: 2,
			treeDepth: 2,
			witnessProof: witnessTree.path(2),
			witnessMerkleRoot: reverseBytes(witnessTree.root),
			witnessReservedValue: reserved,
			coinbaseTx: coinbase,
			coinbaseProof: tree.path(0),
			...overrides,
		});

		it("should return the txid, not the wtxid, of a committed transaction", async () => {
			const result = await verifier.verifySegwit(claim());
			expect(result).toEqual({
				ok: true,
				txid: parseTransaction(deliveryTx()).txid,
			});
		});

		it("should reject a wrong witness reserved value", async () => {
			await expect(
				verifier.verifySegwit(
					claim({ witnessReservedValue: new Uint8Array(32).fill(1) }),
				),
			).resolves.toEqual({
				ok: false,
				reason: "witness commitment does not match the witness merkle root",
			});
		});

		it("should reject a witness path that does not reach the witness root", async () => {
			const witnessProof = witnessTree.path(2);
			witnessProof[0] = new Uint8Array(32).fill(5);
			await expect(verifier.verifySegwit(claim({ witnessProof }))).resolves.toEqual({
				ok: false,
				reason: "witness path does not lead to the witness merkle root",
			});
		});

		it("should reject a coinbase path that does not reach the header", async () => {
			await expect(
				verifier.verifySegwit(claim({ coinbaseProof: tree.path(1) })),
			).resolves.toEqual({
				ok: false,
				reason: "coinbase path does not lead to the header merkle root",
			});
		});

		it("should reject a coinbase stand-in that is not a coinbase", async () => {
			await expect(
				verifier.verifySegwit(claim({ coinbaseTx: filler })),
			).resolves.toEqual({
				ok: false,
				reason: "coinbase transaction is not a coinbase",
			});
		});

		it("should refuse the coinbase position", async () => {
			await expect(
				verifier.verifySegwit(claim({ txIndex: 0, witnessProof: witnessTree.path(0) })),
			).resolves.toEqual({
				ok: false,
				reason: "the coinbase cannot settle a listing",
			});
		});
	});
});
