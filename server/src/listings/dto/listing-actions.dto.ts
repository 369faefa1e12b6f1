import { ApiProperty } from "@nestjs/swagger";
import { IsInt, IsString, MaxLength, Min } from "class-validator";

export class AcceptListingInDto {
	@ApiProperty({
		description: "Script the inscription must be delivered to, hex",
		example: "0014" + "11".repeat(20),
	})
	@IsString()
	@MaxLength(80)
	buyerDest!: string;
}

export class CommitListingInDto {
	@ApiProperty({
		example: 5_000,
		description: "Seller collateral, at least the listing premium",
	})
	@IsInt()
	@Min(0)
	collateral!: number;
}
