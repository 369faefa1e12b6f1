import { ApiProperty } from "@nestjs/swagger";
import {
	LISTING_STATUSES,
	type ListingData,
	type ListingStatus,
} from "@inscription-escrow/sdk";

export class ListingOutDto implements ListingData {
	@ApiProperty({ example: 0 })
	id!: number;

	@ApiProperty()
	foreignTxid!: string;

	@ApiProperty({ example: 0 })
	foreignVout!: number;

	@ApiProperty({ example: 100_000 })
	price!: number;

	@ApiProperty({ example: 5_000 })
	premium!: number;

	@ApiProperty({ description: "Seller public key" })
	seller!: string;

	@ApiProperty({ type: String, nullable: true })
	buyer!: string | null;

	@ApiProperty()
	sellerDest!: string;

	@ApiProperty({ type: String, nullable: true })
	buyerDest!: string | null;

	@ApiProperty({ example: 0 })
	collateral!: number;

	@ApiProperty({ enum: [...LISTING_STATUSES] })
	status!: ListingStatus;

	@ApiProperty({ description: "Bitcoin height of the last status change" })
	lastChangeHeight!: number;

	@ApiProperty({ type: String, nullable: true })
	settlementTxid!: string | null;
}

export class CancelListingOutDto {
	@ApiProperty({ type: ListingOutDto })
	listing!: ListingOutDto;

	@ApiProperty({ enum: [...LISTING_STATUSES] })
	previousStatus!: ListingStatus;

	@ApiProperty({ description: "Token units returned to the buyer" })
	refunded!: number;
}

export class NextListingIdOutDto {
	@ApiProperty({ example: 3 })
	nextId!: number;
}
