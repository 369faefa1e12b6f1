import { ConfigService } from "@nestjs/config";
import {
	DEFAULT_LISTING_PARAMETERS,
	type ListingParameters,
} from "@inscription-escrow/sdk";

export type EscrowSettings = ListingParameters & {
	/** Account holding escrowed tokens and collateral */
	escrowAccount: string;
};

function readCount(config: ConfigService, key: string, fallback: number) {
	const raw = config.get<string>(key);
	if (raw === undefined || raw === "") return fallback;
	const value = Number(raw);
	if (!Number.isSafeInteger(value) || value < 0) {
		throw new Error(`${key} must be a non-negative integer, got "${raw}"`);
	}
	return value;
}

export function readEscrowSettings(config: ConfigService): EscrowSettings {
	return {
		minPrice: readCount(config, "MIN_PRICE", DEFAULT_LISTING_PARAMETERS.minPrice),
		commitExpiry: readCount(
			config,
			"COMMIT_EXPIRY",
			DEFAULT_LISTING_PARAMETERS.commitExpiry,
		),
		expiry: readCount(config, "EXPIRY", DEFAULT_LISTING_PARAMETERS.expiry),
		dustFloor: readCount(
			config,
			"DUST_FLOOR",
			DEFAULT_LISTING_PARAMETERS.dustFloor,
		),
		escrowAccount: config.get<string>("ESCROW_ACCOUNT", "escrow"),
	};
}
