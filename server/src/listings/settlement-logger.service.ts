import { Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { OnEvent } from "@nestjs/event-emitter";
import { LISTING_SETTLED_ID, type ListingSettled } from "../common/listing.events";
import { toError } from "../common/errors";

export type SettlementRecord = {
	type: "swap";
	seller: string;
	buyer: string;
	inscription: string;
	price: number;
	txid: string;
	timestamp: string;
};

/**
 * Forwards settled listings to an external settlement log. Delivery is best
 * effort: failures are logged and never reach the listing.
 */
@Injectable()
export class SettlementLoggerService {
	private readonly logger = new Logger(SettlementLoggerService.name);
	private readonly url: string | undefined;

	constructor(configService: ConfigService) {
		this.url = configService.get<string>("SETTLEMENT_LOG_URL") || undefined;
	}

	@OnEvent(LISTING_SETTLED_ID)
	async onSettled(event: ListingSettled): Promise<void> {
		if (!this.url) return;
		const record: SettlementRecord = {
			type: "swap",
			seller: event.seller,
			buyer: event.buyer,
			inscription: `${event.foreignTxid}:${event.foreignVout}`,
			price: event.price,
			txid: event.settlementTxid,
			timestamp: event.settledAt,
		};
		try {
			const res = await fetch(this.url, {
				method: "POST",
				headers: { "content-type": "application/json" },
				body: JSON.stringify(record),
			});
			if (!res.ok) {
				this.logger.warn(
					`Settlement log rejected listing ${event.listingId}: HTTP ${res.status}`,
				);
				return;
			}
			this.logger.debug(`Settlement of listing ${event.listingId} logged`);
		} catch (e) {
			this.logger.warn(
				`Settlement log unreachable for listing ${event.listingId}: ${toError(e).message}`,
			);
		}
	}
}
