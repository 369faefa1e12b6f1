import { Test, type TestingModule } from "@nestjs/testing";
import { ConfigModule } from "@nestjs/config";
import { EventEmitter2, EventEmitterModule } from "@nestjs/event-emitter";
import { TypeOrmModule } from "@nestjs/typeorm";
import type {
	InclusionResult,
	InclusionVerifier,
	LegacyInclusionClaim,
	SegwitInclusionClaim,
} from "@inscription-escrow/sdk";
import { BitcoinChain } from "../chain/bitcoin-chain";
import { INCLUSION_VERIFIER } from "../chain/chain.constants";
import { LedgerTransactions } from "../ledger/ledger-transactions.service";
import { SettlementTokenService } from "../ledger/settlement-token.service";
import { TokenBalance } from "../ledger/token-balance.entity";
import { LISTING_CREATED_ID, LISTING_SETTLED_ID } from "../common/listing.events";
import { Listing } from "./listing.entity";
import { UtxoReservation } from "./utxo-reservation.entity";
import { ConsumedSettlementTx } from "./consumed-settlement-tx.entity";
import { LedgerCounter } from "./ledger-counter.entity";
import { type CreateListingInput, ListingsService } from "./listings.service";
import {
	BUYER_DEST,
	FakeChain,
	INSCRIPTION,
	SELLER_DEST,
	START_HEIGHT,
	deliveryTx,
	txidOf,
} from "../../test/bitcoin";

const SELLER = "seller-key";
const BUYER = "buyer-key";
const STRANGER = "stranger-key";
const ESCROW = "escrow";

function legacyClaim(tx: Uint8Array): LegacyInclusionClaim {
	return {
		kind: "legacy",
		height: START_HEIGHT,
		tx,
		header: new Uint8Array(80),
		proof: { txIndex: 0, hashes: [], treeDepth: 0 },
	};
}

function segwitClaim(tx: Uint8Array): SegwitInclusionClaim {
	return {
		kind: "segwit",
		height: START_HEIGHT,
		tx,
		header: new Uint8Array(80),
		txIndex: 1,
		treeDepth: 1,
		witnessProof: [new Uint8Array(32)],
		witnessMerkleRoot: new Uint8Array(32),
		witnessReservedValue: new Uint8Array(32),
		coinbaseTx: new Uint8Array(60),
		coinbaseProof: [new Uint8Array(32)],
	};
}

describe("ListingsService", () => {
	let moduleRef: TestingModule;
	let service: ListingsService;
	let tokens: SettlementTokenService;
	let events: EventEmitter2;
	let chain: FakeChain;
	let verifier: jest.Mocked<InclusionVerifier>;

	const list = (overrides: Partial<CreateListingInput> = {}) =>
		service.createListing(SELLER, {
			foreignTxid: INSCRIPTION.txid,
			foreignVout: INSCRIPTION.vout,
			price: 100_000,
			premium: 5_000,
			sellerDest: SELLER_DEST,
			...overrides,
		});

	const status = async (id: number) => (await service.getListing(id))?.status;

	beforeEach(async () => {
		chain = new FakeChain();
		verifier = {
			verifyLegacy: jest.fn((claim: LegacyInclusionClaim) =>
				Promise.resolve<InclusionResult>({ ok: true, txid: txidOf(claim.tx) }),
			),
			verifySegwit: jest.fn((claim: SegwitInclusionClaim) =>
				Promise.resolve<InclusionResult>({ ok: true, txid: txidOf(claim.tx) }),
			),
		};

		moduleRef = await Test.createTestingModule({
			imports: [
				ConfigModule.forRoot({ isGlobal: true, ignoreEnvFile: true }),
				EventEmitterModule.forRoot(),
				TypeOrmModule.forRoot({
					type: "better-sqlite3",
					database: ":memory:",
					synchronize: true,
					entities: [
						Listing,
						UtxoReservation,
						ConsumedSettlementTx,
						LedgerCounter,
						TokenBalance,
					],
				}),
			],
			providers: [
				LedgerTransactions,
				SettlementTokenService,
				ListingsService,
				{ provide: BitcoinChain, useValue: chain },
				{ provide: INCLUSION_VERIFIER, useValue: verifier },
			],
		}).compile();

		service = moduleRef.get(ListingsService);
		tokens = moduleRef.get(SettlementTokenService);
		events = moduleRef.get(EventEmitter2);
	});

	afterEach(async () => {
		await moduleRef.close();
	});

	describe("createListing", () => {
		it("should open listings with sequential ids from 0", async () => {
			const first = await list();
			const second = await list({ foreignVout: 1 });

			expect(first).toEqual({
				id: 0,
				foreignTxid: INSCRIPTION.txid,
				foreignVout: 0,
				price: 100_000,
				premium: 5_000,
				seller: SELLER,
				buyer: null,
				sellerDest: SELLER_DEST,
				buyerDest: null,
				collateral: 0,
				status: "open",
				lastChangeHeight: START_HEIGHT,
				settlementTxid: null,
			});
			expect(second.id).toBe(1);
			await expect(service.getNextId()).resolves.toBe(2);
		});

		it.each([0, 999])(
			"should reject price %d below the minimum with DustAmount",
			async (price) => {
				await expect(list({ price })).rejects.toMatchObject({
					code: "DustAmount",
				});
				await expect(service.getNextId()).resolves.toBe(0);
				await expect(service.getListing(0)).resolves.toBeNull();
			},
		);

		it("should accept a price equal to the minimum", async () => {
			await expect(list({ price: 1_000 })).resolves.toMatchObject({
				price: 1_000,
				status: "open",
			});
		});

		it("should refuse an outpoint that is already listed", async () => {
			await list();
			await expect(list({ price: 50_000 })).rejects.toMatchObject({
				code: "ListingExists",
			});
			await expect(service.getNextId()).resolves.toBe(1);
		});

		it("should free the outpoint on cancel and never reuse the id", async () => {
			await list();
			await service.cancelListing(SELLER, 0);

			const relisted = await list();

			expect(relisted.id).toBe(1);
			await expect(status(0)).resolves.toBe("cancelled");
			await expect(service.getNextId()).resolves.toBe(2);
		});

		it("should normalize the txid to lowercase hex", async () => {
			const listing = await list({ foreignTxid: "AB".repeat(32) });

			expect(listing.foreignTxid).toBe("ab".repeat(32));
			await expect(list()).rejects.toMatchObject({ code: "ListingExists" });
		});

		it.each<[string, Partial<CreateListingInput>]>([
			["a non-hex txid", { foreignTxid: "zz".repeat(32) }],
			["a short txid", { foreignTxid: "ab".repeat(31) }],
			["a negative vout", { foreignVout: -1 }],
			["a vout above uint32", { foreignVout: 0x1_0000_0000 }],
			["an empty seller script", { sellerDest: "" }],
			["a seller script over 40 bytes", { sellerDest: "51".repeat(41) }],
			["a fractional price", { price: 1_000.5 }],
			["a negative premium", { premium: -1 }],
		])("should reject %s with OutOfBounds", async (_label, overrides) => {
			await expect(list(overrides)).rejects.toMatchObject({
				code: "OutOfBounds",
			});
			await expect(service.getNextId()).resolves.toBe(0);
		});

		it("should emit a created event", async () => {
			const emit = jest.spyOn(events, "emit");

			await list();

			expect(emit).toHaveBeenCalledWith(
				LISTING_CREATED_ID,
				expect.objectContaining({ listingId: 0, seller: SELLER, price: 100_000 }),
			);
		});
	});

	describe("acceptListing", () => {
		beforeEach(async () => {
			await tokens.mint(200_000, BUYER);
			await list();
		});

		it("should escrow price and premium from the buyer", async () => {
			chain.height = START_HEIGHT + 10;

			const listing = await service.acceptListing(BUYER, 0, BUYER_DEST);

			expect(listing).toMatchObject({
				status: "escrowed",
				buyer: BUYER,
				buyerDest: BUYER_DEST,
				lastChangeHeight: START_HEIGHT + 10,
			});
			await expect(tokens.balanceOf(BUYER)).resolves.toBe(95_000);
			await expect(tokens.balanceOf(ESCROW)).resolves.toBe(105_000);
			await expect(tokens.balanceOf(SELLER)).resolves.toBe(0);
		});

		it("should refuse the seller with SelfTrade and stay open", async () => {
			await expect(
				service.acceptListing(SELLER, 0, BUYER_DEST),
			).rejects.toMatchObject({ code: "SelfTrade" });
			await expect(status(0)).resolves.toBe("open");
		});

		it("should fail with InvalidId for an unknown listing", async () => {
			await expect(
				service.acceptListing(BUYER, 42, BUYER_DEST),
			).rejects.toMatchObject({ code: "InvalidId" });
		});

		it("should let only the first buyer in", async () => {
			await tokens.mint(200_000, STRANGER);
			await service.acceptListing(BUYER, 0, BUYER_DEST);

			await expect(
				service.acceptListing(STRANGER, 0, BUYER_DEST),
			).rejects.toMatchObject({ code: "AlreadyDone" });
			await expect(tokens.balanceOf(STRANGER)).resolves.toBe(200_000);
		});

		it("should change nothing when the buyer cannot pay", async () => {
			await tokens.mint(1_000, STRANGER);

			await expect(
				service.acceptListing(STRANGER, 0, BUYER_DEST),
			).rejects.toMatchObject({
				code: "TransferFailed",
				details: expect.objectContaining({ reason: "InsufficientBalance" }),
			});
			await expect(service.getListing(0)).resolves.toMatchObject({
				status: "open",
				buyer: null,
				buyerDest: null,
			});
			await expect(tokens.balanceOf(STRANGER)).resolves.toBe(1_000);
			await expect(tokens.balanceOf(ESCROW)).resolves.toBe(0);
		});

		it("should reject a malformed destination with OutOfBounds", async () => {
			await expect(
				service.acceptListing(BUYER, 0, "0014xyz"),
			).rejects.toMatchObject({ code: "OutOfBounds" });
		});
	});

	describe("commitListing", () => {
		beforeEach(async () => {
			await tokens.mint(200_000, BUYER);
			await tokens.mint(20_000, SELLER);
			await list();
			await service.acceptListing(BUYER, 0, BUYER_DEST);
		});

		it("should reject collateral below the premium with DustAmount", async () => {
			await expect(
				service.commitListing(SELLER, 0, 4_999),
			).rejects.toMatchObject({ code: "DustAmount" });
			await expect(status(0)).resolves.toBe("escrowed");
			await expect(tokens.balanceOf(SELLER)).resolves.toBe(20_000);
		});

		it("should take exactly the collateral from the seller", async () => {
			chain.height = START_HEIGHT + 5;

			const listing = await service.commitListing(SELLER, 0, 5_000);

			expect(listing).toMatchObject({
				status: "committed",
				collateral: 5_000,
				lastChangeHeight: START_HEIGHT + 5,
			});
			await expect(tokens.balanceOf(SELLER)).resolves.toBe(15_000);
			await expect(tokens.balanceOf(ESCROW)).resolves.toBe(110_000);
		});

		it("should refuse anyone but the seller", async () => {
			await expect(
				service.commitListing(BUYER, 0, 5_000),
			).rejects.toMatchObject({ code: "Forbidden" });
		});

		it("should refuse a listing that is not escrowed", async () => {
			await list({ foreignVout: 7 });

			await expect(
				service.commitListing(SELLER, 1, 5_000),
			).rejects.toMatchObject({ code: "AlreadyDone" });
		});

		it("should accept a commit one block before the window closes", async () => {
			chain.height = START_HEIGHT + 99;

			await expect(
				service.commitListing(SELLER, 0, 5_000),
			).resolves.toMatchObject({ status: "committed" });
		});

		it("should fail with Expired once the commit window has closed", async () => {
			chain.height = START_HEIGHT + 100;

			await expect(
				service.commitListing(SELLER, 0, 5_000),
			).rejects.toMatchObject({ code: "Expired" });
			await expect(tokens.balanceOf(SELLER)).resolves.toBe(20_000);
		});

		it("should not fail a second commit silently", async () => {
			await service.commitListing(SELLER, 0, 5_000);

			await expect(
				service.commitListing(SELLER, 0, 5_000),
			).rejects.toMatchObject({ code: "AlreadyDone" });
			await expect(tokens.balanceOf(SELLER)).resolves.toBe(15_000);
		});

		it("should skip the transfer for zero collateral on a zero premium", async () => {
			await list({ foreignVout: 2, price: 50_000, premium: 0 });
			await service.acceptListing(BUYER, 1, BUYER_DEST);

			await expect(
				service.commitListing(SELLER, 1, 0),
			).resolves.toMatchObject({ status: "committed", collateral: 0 });
			await expect(tokens.balanceOf(SELLER)).resolves.toBe(20_000);
		});
	});

	describe("cancelListing", () => {
		beforeEach(async () => {
			await tokens.mint(200_000, BUYER);
			await tokens.mint(20_000, SELLER);
			await list();
		});

		it("should let only the seller cancel an open listing", async () => {
			await expect(
				service.cancelListing(STRANGER, 0),
			).rejects.toMatchObject({ code: "Forbidden" });

			const result = await service.cancelListing(SELLER, 0);

			expect(result.previousStatus).toBe("open");
			expect(result.refunded).toBe(0);
			expect(result.listing.status).toBe("cancelled");
		});

		it("should hold an escrowed listing until the commit window closes", async () => {
			await service.acceptListing(BUYER, 0, BUYER_DEST);
			chain.height = START_HEIGHT + 99;

			await expect(
				service.cancelListing(STRANGER, 0),
			).rejects.toMatchObject({ code: "NotExpired" });

			chain.height = START_HEIGHT + 100;
			const result = await service.cancelListing(STRANGER, 0);

			expect(result.refunded).toBe(105_000);
			await expect(tokens.balanceOf(BUYER)).resolves.toBe(200_000);
			await expect(tokens.balanceOf(ESCROW)).resolves.toBe(0);
		});

		it("should refund collateral to the buyer once delivery has expired", async () => {
			await service.acceptListing(BUYER, 0, BUYER_DEST);
			await service.commitListing(SELLER, 0, 5_000);
			chain.height = START_HEIGHT + 1_007;

			await expect(
				service.cancelListing(BUYER, 0),
			).rejects.toMatchObject({ code: "NotExpired" });

			chain.height = START_HEIGHT + 1_008;
			const result = await service.cancelListing(STRANGER, 0);

			expect(result).toMatchObject({
				previousStatus: "committed",
				refunded: 110_000,
			});
			await expect(tokens.balanceOf(BUYER)).resolves.toBe(205_000);
			await expect(tokens.balanceOf(SELLER)).resolves.toBe(15_000);
			await expect(tokens.balanceOf(ESCROW)).resolves.toBe(0);
		});

		it("should fail with AlreadyDone on a cancelled listing", async () => {
			await service.cancelListing(SELLER, 0);

			await expect(
				service.cancelListing(SELLER, 0),
			).rejects.toMatchObject({ code: "AlreadyDone" });
		});
	});

	describe("submitSettlementProof", () => {
		beforeEach(async () => {
			await tokens.mint(200_000, BUYER);
			await tokens.mint(20_000, SELLER);
			await list();
			await service.acceptListing(BUYER, 0, BUYER_DEST);
		});

		it("should require a committed listing before checking the proof", async () => {
			const tx = deliveryTx(INSCRIPTION, BUYER_DEST);

			await expect(
				service.submitSettlementProof(STRANGER, 0, legacyClaim(tx)),
			).rejects.toMatchObject({ code: "NotCommitted" });
			expect(verifier.verifyLegacy).not.toHaveBeenCalled();
		});

		describe("on a committed listing", () => {
			beforeEach(async () => {
				await service.commitListing(SELLER, 0, 5_000);
			});

			it("should pay the seller and return the collateral", async () => {
				const tx = deliveryTx(INSCRIPTION, BUYER_DEST);

				const listing = await service.submitSettlementProof(
					STRANGER,
					0,
					legacyClaim(tx),
				);

				expect(listing).toMatchObject({
					status: "done",
					settlementTxid: txidOf(tx),
				});
				await expect(tokens.balanceOf(SELLER)).resolves.toBe(125_000);
				await expect(tokens.balanceOf(BUYER)).resolves.toBe(95_000);
				await expect(tokens.balanceOf(ESCROW)).resolves.toBe(0);
			});

			it("should route witness claims to the segwit check", async () => {
				const tx = deliveryTx(INSCRIPTION, BUYER_DEST);

				await service.submitSettlementProof(STRANGER, 0, segwitClaim(tx));

				expect(verifier.verifySegwit).toHaveBeenCalledTimes(1);
				expect(verifier.verifyLegacy).not.toHaveBeenCalled();
				await expect(status(0)).resolves.toBe("done");
			});

			it("should refuse a transaction that already settled a listing", async () => {
				const tx = deliveryTx(INSCRIPTION, BUYER_DEST);
				await service.submitSettlementProof(STRANGER, 0, legacyClaim(tx));

				await tokens.mint(105_000, BUYER);
				await list({ foreignVout: 1 });
				await service.acceptListing(BUYER, 1, BUYER_DEST);
				await service.commitListing(SELLER, 1, 5_000);

				await expect(
					service.submitSettlementProof(STRANGER, 1, legacyClaim(tx)),
				).rejects.toMatchObject({
					code: "BtcTxAlreadyUsed",
					details: { txid: txidOf(tx) },
				});
				await expect(status(1)).resolves.toBe("committed");
			});

			it("should surface a rejected proof as ProofInvalid", async () => {
				verifier.verifyLegacy.mockResolvedValueOnce({
					ok: false,
					reason: "merkle path does not lead to the header merkle root",
				});

				await expect(
					service.submitSettlementProof(
						STRANGER,
						0,
						legacyClaim(deliveryTx(INSCRIPTION, BUYER_DEST)),
					),
				).rejects.toMatchObject({
					code: "ProofInvalid",
					details: {
						reason: "merkle path does not lead to the header merkle root",
					},
				});
				await expect(status(0)).resolves.toBe("committed");
			});

			it.each<[string, Uint8Array]>([
				[
					"InscriptionMismatch",
					deliveryTx({ txid: INSCRIPTION.txid, vout: 9 }, BUYER_DEST),
				],
				["TxNotForReceiver", deliveryTx(INSCRIPTION, SELLER_DEST)],
				["ValueTooSmall", deliveryTx(INSCRIPTION, BUYER_DEST, 545n)],
			])("should fail with %s and keep funds in escrow", async (code, tx) => {
				await expect(
					service.submitSettlementProof(STRANGER, 0, legacyClaim(tx)),
				).rejects.toMatchObject({ code });

				await expect(status(0)).resolves.toBe("committed");
				await expect(tokens.balanceOf(ESCROW)).resolves.toBe(110_000);
				await expect(tokens.balanceOf(SELLER)).resolves.toBe(15_000);
			});

			it("should accept an output worth exactly the dust floor", async () => {
				const tx = deliveryTx(INSCRIPTION, BUYER_DEST, 546n);

				await expect(
					service.submitSettlementProof(STRANGER, 0, legacyClaim(tx)),
				).resolves.toMatchObject({ status: "done" });
			});

			it("should not consume a transaction that failed to match", async () => {
				const short = deliveryTx(INSCRIPTION, BUYER_DEST, 545n);
				await expect(
					service.submitSettlementProof(STRANGER, 0, legacyClaim(short)),
				).rejects.toMatchObject({ code: "ValueTooSmall" });

				const tx = deliveryTx(INSCRIPTION, BUYER_DEST);
				await expect(
					service.submitSettlementProof(STRANGER, 0, legacyClaim(tx)),
				).resolves.toMatchObject({ status: "done" });
			});

			it("should keep the outpoint reserved after settlement", async () => {
				await service.submitSettlementProof(
					STRANGER,
					0,
					legacyClaim(deliveryTx(INSCRIPTION, BUYER_DEST)),
				);

				await expect(list()).rejects.toMatchObject({ code: "ListingExists" });
				await expect(
					service.cancelListing(SELLER, 0),
				).rejects.toMatchObject({ code: "AlreadyDone" });
			});

			it("should emit a settled event after commit", async () => {
				const emit = jest.spyOn(events, "emit");
				const tx = deliveryTx(INSCRIPTION, BUYER_DEST);

				await service.submitSettlementProof(STRANGER, 0, legacyClaim(tx));

				expect(emit).toHaveBeenCalledWith(
					LISTING_SETTLED_ID,
					expect.objectContaining({
						listingId: 0,
						seller: SELLER,
						buyer: BUYER,
						settlementTxid: txidOf(tx),
						collateral: 5_000,
					}),
				);
			});
		});
	});

	describe("end to end", () => {
		it("should settle a delivered trade", async () => {
			await tokens.mint(105_000, BUYER);
			await tokens.mint(5_000, SELLER);

			const { id } = await list();
			await service.acceptListing(BUYER, id, BUYER_DEST);
			await expect(tokens.balanceOf(BUYER)).resolves.toBe(0);
			await service.commitListing(SELLER, id, 5_000);
			chain.height = START_HEIGHT + 6;
			await service.submitSettlementProof(
				BUYER,
				id,
				legacyClaim(deliveryTx(INSCRIPTION, BUYER_DEST)),
			);

			await expect(status(id)).resolves.toBe("done");
			await expect(tokens.balanceOf(SELLER)).resolves.toBe(110_000);
			await expect(tokens.balanceOf(BUYER)).resolves.toBe(0);
		});

		it("should refund the buyer when the seller never commits", async () => {
			await tokens.mint(105_000, BUYER);

			const { id } = await list();
			await service.acceptListing(BUYER, id, BUYER_DEST);
			chain.height = START_HEIGHT + 100;
			await service.cancelListing(STRANGER, id);

			await expect(tokens.balanceOf(BUYER)).resolves.toBe(105_000);
			await expect(tokens.balanceOf(SELLER)).resolves.toBe(0);
			await expect(status(id)).resolves.toBe("cancelled");
		});

		it("should hand the collateral to the buyer when delivery never happens", async () => {
			await tokens.mint(105_000, BUYER);
			await tokens.mint(10_000, SELLER);

			const { id } = await list();
			await service.acceptListing(BUYER, id, BUYER_DEST);
			await service.commitListing(SELLER, id, 10_000);
			chain.height = START_HEIGHT + 1_008;
			await service.cancelListing(STRANGER, id);

			await expect(tokens.balanceOf(BUYER)).resolves.toBe(115_000);
			await expect(tokens.balanceOf(SELLER)).resolves.toBe(0);
			await expect(tokens.balanceOf(ESCROW)).resolves.toBe(0);
		});
	});
});
