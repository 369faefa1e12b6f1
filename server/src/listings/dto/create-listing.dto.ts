import { ApiProperty } from "@nestjs/swagger";
import { IsInt, IsString, MaxLength, Min } from "class-validator";

export class CreateListingInDto {
	@ApiProperty({
		description: "Txid of the inscription UTXO, display order hex",
		example: "5b9e1d0c3a4f7e2b8c6d9a0e1f2b3c4d5e6f7a8b9c0d1e2f3a4b5c6d7e8f9a0b",
	})
	@IsString()
	@MaxLength(64)
	foreignTxid!: string;

	@ApiProperty({ example: 0, description: "Output index of the inscription UTXO" })
	@IsInt()
	@Min(0)
	foreignVout!: number;

	@ApiProperty({ example: 100_000, description: "Asking price in token units" })
	@IsInt()
	@Min(0)
	price!: number;

	@ApiProperty({
		example: 5_000,
		description: "Paid to the seller on settlement, forfeited on expiry",
	})
	@IsInt()
	@Min(0)
	premium!: number;

	@ApiProperty({
		description: "Seller's Bitcoin script, hex (kept for reference)",
		example: "5120" + "22".repeat(32),
	})
	@IsString()
	@MaxLength(80)
	sellerDest!: string;
}
