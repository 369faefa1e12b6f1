import { Inject, Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { EventEmitter2 } from "@nestjs/event-emitter";
import { nanoid } from "nanoid";
import type { EntityManager } from "typeorm";
import {
	EscrowError,
	MAX_DESTINATION_SCRIPT_BYTES,
	ProofGate,
	bytesToHex,
	hexToBytes,
	matchDelivery,
	nextStatus,
	parseTransaction,
	tryHexToBytes,
	type InclusionClaim,
	type InclusionVerifier,
	type ListingData,
	type ListingStatus,
} from "@inscription-escrow/sdk";

import { BitcoinChain } from "../chain/bitcoin-chain";
import { INCLUSION_VERIFIER } from "../chain/chain.constants";
import { LedgerTransactions } from "../ledger/ledger-transactions.service";
import { SettlementTokenService } from "../ledger/settlement-token.service";
import { TokenTransferError } from "../ledger/token-transfer.error";
import {
	LISTING_ACCEPTED_ID,
	LISTING_CANCELLED_ID,
	LISTING_COMMITTED_ID,
	LISTING_CREATED_ID,
	LISTING_SETTLED_ID,
	ListingAccepted,
	ListingCancelled,
	ListingCommitted,
	ListingCreated,
	ListingSettled,
} from "../common/listing.events";
import { Listing } from "./listing.entity";
import { UtxoReservation } from "./utxo-reservation.entity";
import { ConsumedSettlementTx } from "./consumed-settlement-tx.entity";
import { LedgerCounter } from "./ledger-counter.entity";
import { type EscrowSettings, readEscrowSettings } from "./listings.config";

const LISTING_COUNTER = "listing";
const MAX_VOUT = 0xffffffff;

export type CreateListingInput = {
	foreignTxid: string;
	foreignVout: number;
	price: number;
	premium: number;
	sellerDest: string;
};

export type CancelledListing = {
	listing: ListingData;
	previousStatus: ListingStatus;
	refunded: number;
};

/**
 * Listing lifecycle: create, accept, commit, cancel and settle.
 *
 * Each operation runs as one `LedgerTransactions` unit: guards, token
 * movements and row changes commit together, and any thrown `EscrowError`
 * leaves no trace. Events are emitted once the unit has committed.
 */
@Injectable()
export class ListingsService {
	private readonly logger = new Logger(ListingsService.name);
	private readonly settings: EscrowSettings;

	constructor(
		configService: ConfigService,
		private readonly tx: LedgerTransactions,
		private readonly tokens: SettlementTokenService,
		private readonly chain: BitcoinChain,
		@Inject(INCLUSION_VERIFIER) private readonly verifier: InclusionVerifier,
		private readonly events: EventEmitter2,
	) {
		this.settings = readEscrowSettings(configService);
		this.logger.log(
			`MIN_PRICE=${this.settings.minPrice} COMMIT_EXPIRY=${this.settings.commitExpiry} EXPIRY=${this.settings.expiry} DUST_FLOOR=${this.settings.dustFloor} ESCROW_ACCOUNT=${this.settings.escrowAccount}`,
		);
	}

	async createListing(
		caller: string,
		input: CreateListingInput,
	): Promise<ListingData> {
		const foreignTxid = parseTxid(input.foreignTxid);
		const foreignVout = input.foreignVout;
		if (!Number.isSafeInteger(foreignVout) || foreignVout < 0 || foreignVout > MAX_VOUT) {
			throw new EscrowError("OutOfBounds", "foreignVout must be a uint32", {
				foreignVout,
			});
		}
		const sellerDest = parseScript(input.sellerDest, "sellerDest");
		assertAmount(input.price, "price");
		assertAmount(input.premium, "premium");
		assertAmount(input.price + input.premium, "price + premium");
		if (input.price < this.settings.minPrice) {
			throw new EscrowError(
				"DustAmount",
				`Price ${input.price} is below the minimum of ${this.settings.minPrice}`,
				{ price: input.price, minPrice: this.settings.minPrice },
			);
		}

		const listing = await this.tx.run(async (manager) => {
			const reservations = manager.getRepository(UtxoReservation);
			const reserved = await reservations.findOne({
				where: { foreignTxid, foreignVout },
			});
			if (reserved) {
				throw new EscrowError(
					"ListingExists",
					`${foreignTxid}:${foreignVout} is reserved by listing ${reserved.listingId}`,
					{ listingId: reserved.listingId },
				);
			}

			const height = await this.chain.getTipHeight();
			const id = await this.allocateId(manager);
			const listings = manager.getRepository(Listing);
			const entity = listings.create({
				id,
				foreignTxid,
				foreignVout,
				price: input.price,
				premium: input.premium,
				seller: caller,
				buyer: null,
				sellerDest,
				buyerDest: null,
				collateral: 0,
				status: "open",
				lastChangeHeight: height,
				settlementTxid: null,
			});
			await listings.insert(entity);
			await reservations.insert({ foreignTxid, foreignVout, listingId: id });
			return entity;
		});

		this.logger.log(`Listing ${listing.id} created by ${caller}`);
		this.events.emit(LISTING_CREATED_ID, {
			eventId: nanoid(4),
			listingId: listing.id,
			seller: listing.seller,
			foreignTxid: listing.foreignTxid,
			foreignVout: listing.foreignVout,
			price: listing.price,
			premium: listing.premium,
			createdAt: new Date().toISOString(),
		} satisfies ListingCreated);
		return toListingData(listing);
	}

	async acceptListing(
		caller: string,
		id: number,
		buyerDestRaw: string,
	): Promise<ListingData> {
		const buyerDest = parseScript(buyerDestRaw, "buyerDest");

		const listing = await this.tx.run(async (manager) => {
			const listing = await this.load(manager, id);
			const status = nextStatus(listing.status, "accept");
			if (listing.buyer !== null) {
				throw new EscrowError("AlreadyDone", `Listing ${id} already has a buyer`);
			}
			if (caller === listing.seller) {
				throw new EscrowError("SelfTrade", "The seller cannot buy their own listing");
			}

			const height = await this.chain.getTipHeight();
			await this.move(
				manager,
				listing.price + listing.premium,
				caller,
				this.settings.escrowAccount,
			);
			listing.buyer = caller;
			listing.buyerDest = buyerDest;
			listing.status = status;
			listing.lastChangeHeight = height;
			return manager.save(listing);
		});

		this.logger.log(`Listing ${id} accepted by ${caller}`);
		this.events.emit(LISTING_ACCEPTED_ID, {
			eventId: nanoid(4),
			listingId: id,
			buyer: caller,
			escrowed: listing.price + listing.premium,
			acceptedAt: new Date().toISOString(),
		} satisfies ListingAccepted);
		return toListingData(listing);
	}

	async commitListing(
		caller: string,
		id: number,
		collateral: number,
	): Promise<ListingData> {
		assertAmount(collateral, "collateral");

		const listing = await this.tx.run(async (manager) => {
			const listing = await this.load(manager, id);
			assertAmount(
				listing.price + listing.premium + collateral,
				"price + premium + collateral",
			);
			if (caller !== listing.seller) {
				throw new EscrowError("Forbidden", "Only the seller can commit");
			}
			const status = nextStatus(listing.status, "commit");
			const height = await this.chain.getTipHeight();
			const deadline = listing.lastChangeHeight + this.settings.commitExpiry;
			if (height >= deadline) {
				throw new EscrowError(
					"Expired",
					`Commit window closed at height ${deadline}`,
					{ height, deadline },
				);
			}
			if (collateral < listing.premium) {
				throw new EscrowError(
					"DustAmount",
					`Collateral ${collateral} is below the premium ${listing.premium}`,
					{ collateral, premium: listing.premium },
				);
			}

			await this.move(manager, collateral, caller, this.settings.escrowAccount);
			listing.collateral = collateral;
			listing.status = status;
			listing.lastChangeHeight = height;
			return manager.save(listing);
		});

		this.logger.log(`Listing ${id} committed with collateral ${collateral}`);
		this.events.emit(LISTING_COMMITTED_ID, {
			eventId: nanoid(4),
			listingId: id,
			collateral,
			committedAt: new Date().toISOString(),
		} satisfies ListingCommitted);
		return toListingData(listing);
	}

	async cancelListing(caller: string, id: number): Promise<CancelledListing> {
		const result = await this.tx.run(async (manager) => {
			const listing = await this.load(manager, id);
			const previousStatus = listing.status;
			const status = nextStatus(previousStatus, "cancel");
			const height = await this.chain.getTipHeight();

			let refunded = 0;
			switch (previousStatus) {
				case "open":
					if (caller !== listing.seller) {
						throw new EscrowError(
							"Forbidden",
							"Only the seller can cancel an open listing",
						);
					}
					break;
				case "escrowed":
					this.assertExpired(listing, height, this.settings.commitExpiry);
					refunded = listing.price + listing.premium;
					break;
				case "committed":
					this.assertExpired(listing, height, this.settings.expiry);
					refunded = listing.price + listing.premium + listing.collateral;
					break;
				default:
					throw new EscrowError("AlreadyDone", `Listing ${id} is ${previousStatus}`);
			}

			if (refunded > 0) {
				await this.move(
					manager,
					refunded,
					this.settings.escrowAccount,
					requireBuyer(listing),
				);
			}
			listing.status = status;
			listing.lastChangeHeight = height;
			const saved = await manager.save(listing);
			await manager.getRepository(UtxoReservation).delete({
				foreignTxid: listing.foreignTxid,
				foreignVout: listing.foreignVout,
				listingId: id,
			});
			return { listing: saved, previousStatus, refunded };
		});

		this.logger.log(
			`Listing ${id} cancelled from ${result.previousStatus} by ${caller}, refunded ${result.refunded}`,
		);
		this.events.emit(LISTING_CANCELLED_ID, {
			eventId: nanoid(4),
			listingId: id,
			cancelledBy: caller,
			previousStatus: result.previousStatus,
			refunded: result.refunded,
			refundedTo: result.refunded > 0 ? result.listing.buyer : null,
			cancelledAt: new Date().toISOString(),
		} satisfies ListingCancelled);
		return {
			listing: toListingData(result.listing),
			previousStatus: result.previousStatus,
			refunded: result.refunded,
		};
	}

	/**
	 * Release escrowed funds to the seller once a mined transaction delivers
	 * the inscription outpoint to the buyer's destination.
	 */
	async submitSettlementProof(
		caller: string,
		id: number,
		claim: InclusionClaim,
	): Promise<ListingData> {
		const { listing, txid } = await this.tx.run(async (manager) => {
			const listing = await this.load(manager, id);
			if (listing.status !== "committed") {
				throw new EscrowError(
					"NotCommitted",
					`Listing ${id} is ${listing.status}, settlement needs committed`,
				);
			}

			const consumed = manager.getRepository(ConsumedSettlementTx);
			const gate = new ProofGate(this.verifier, {
				isConsumed: (txid) => consumed.exists({ where: { txid } }),
			});
			const txid = await gate.admit(claim);
			const delivery = parseTransaction(claim.tx);
			if (listing.buyer === null || listing.buyerDest === null) {
				throw new EscrowError("NoBuyer", `Listing ${id} has no buyer destination`);
			}
			const match = matchDelivery(delivery, {
				outpoint: { txid: listing.foreignTxid, vout: listing.foreignVout },
				destination: hexToBytes(listing.buyerDest),
				dustFloor: this.settings.dustFloor,
			});
			if (!match.ok) {
				throw new EscrowError(match.reason, match.message, { txid });
			}

			const height = await this.chain.getTipHeight();
			await consumed.insert({ txid, listingId: id, consumedAtHeight: height });
			listing.status = nextStatus(listing.status, "settle");
			listing.settlementTxid = txid;
			listing.lastChangeHeight = height;
			const saved = await manager.save(listing);

			await this.move(
				manager,
				listing.price + listing.premium,
				this.settings.escrowAccount,
				listing.seller,
			);
			if (listing.collateral > 0) {
				await this.move(
					manager,
					listing.collateral,
					this.settings.escrowAccount,
					listing.seller,
				);
			}
			return { listing: saved, txid };
		});

		this.logger.log(`Listing ${id} settled by ${txid} (submitted by ${caller})`);
		this.events.emit(LISTING_SETTLED_ID, {
			eventId: nanoid(4),
			listingId: id,
			seller: listing.seller,
			buyer: requireBuyer(listing),
			foreignTxid: listing.foreignTxid,
			foreignVout: listing.foreignVout,
			price: listing.price,
			premium: listing.premium,
			collateral: listing.collateral,
			settlementTxid: txid,
			settledAt: new Date().toISOString(),
		} satisfies ListingSettled);
		return toListingData(listing);
	}

	getListing(id: number): Promise<ListingData | null> {
		return this.tx.run(async (manager) => {
			const listing = await manager.getRepository(Listing).findOne({
				where: { id },
			});
			return listing ? toListingData(listing) : null;
		});
	}

	getNextId(): Promise<number> {
		return this.tx.run(async (manager) => {
			const counter = await manager
				.getRepository(LedgerCounter)
				.findOne({ where: { name: LISTING_COUNTER } });
			return counter?.value ?? 0;
		});
	}

	private async load(manager: EntityManager, id: number): Promise<Listing> {
		const listing = await manager.getRepository(Listing).findOne({
			where: { id },
		});
		if (!listing) {
			throw new EscrowError("InvalidId", `Listing ${id} not found`, { id });
		}
		return listing;
	}

	private async allocateId(manager: EntityManager): Promise<number> {
		const counters = manager.getRepository(LedgerCounter);
		const counter = await counters.findOne({ where: { name: LISTING_COUNTER } });
		const id = counter?.value ?? 0;
		await counters.save({ name: LISTING_COUNTER, value: id + 1 });
		return id;
	}

	private assertExpired(listing: Listing, height: number, window: number) {
		const expiresAt = listing.lastChangeHeight + window;
		if (height < expiresAt) {
			this.logger.debug(
				`Listing ${listing.id} cancel refused at ${height}, expires at ${expiresAt}`,
			);
			throw new EscrowError(
				"NotExpired",
				`Listing ${listing.id} cannot be cancelled before height ${expiresAt}`,
				{ height, expiresAt },
			);
		}
	}

	private async move(
		manager: EntityManager,
		amount: number,
		from: string,
		to: string,
	): Promise<void> {
		if (amount === 0) return;
		try {
			await this.tokens.transfer(manager, amount, from, to);
		} catch (e) {
			if (e instanceof TokenTransferError) {
				this.logger.warn(`Transfer of ${amount} ${from} -> ${to} refused: ${e.message}`);
				throw new EscrowError("TransferFailed", e.message, {
					reason: e.code,
					amount,
					from,
					to,
				});
			}
			throw e;
		}
	}
}

export function toListingData(listing: Listing): ListingData {
	return {
		id: listing.id,
		foreignTxid: listing.foreignTxid,
		foreignVout: listing.foreignVout,
		price: listing.price,
		premium: listing.premium,
		seller: listing.seller,
		buyer: listing.buyer,
		sellerDest: listing.sellerDest,
		buyerDest: listing.buyerDest,
		collateral: listing.collateral,
		status: listing.status,
		lastChangeHeight: listing.lastChangeHeight,
		settlementTxid: listing.settlementTxid,
	};
}

function requireBuyer(listing: Listing): string {
	if (listing.buyer === null) {
		throw new EscrowError("NoBuyer", `Listing ${listing.id} has no buyer`);
	}
	return listing.buyer;
}

function assertAmount(value: number, field: string) {
	if (!Number.isSafeInteger(value) || value < 0) {
		throw new EscrowError(
			"OutOfBounds",
			`${field} must be a non-negative safe integer`,
			{ [field]: value },
		);
	}
}

function parseTxid(raw: string): string {
	const bytes = tryHexToBytes(raw);
	if (!bytes || bytes.length !== 32) {
		throw new EscrowError("OutOfBounds", "foreignTxid must be 32 bytes of hex");
	}
	return bytesToHex(bytes);
}

function parseScript(raw: string, field: string): string {
	const bytes = tryHexToBytes(raw);
	if (!bytes || bytes.length === 0 || bytes.length > MAX_DESTINATION_SCRIPT_BYTES) {
		throw new EscrowError(
			"OutOfBounds",
			`${field} must be 1 to ${MAX_DESTINATION_SCRIPT_BYTES} bytes of hex`,
		);
	}
	return bytesToHex(bytes);
}
