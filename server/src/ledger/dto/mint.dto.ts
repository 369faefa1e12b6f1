import { ApiProperty } from "@nestjs/swagger";
import { IsInt, IsNotEmpty, IsString, Max, Min } from "class-validator";

export class MintInDto {
	@ApiProperty({ example: 200_000, description: "Token units to create" })
	@IsInt()
	@Min(1)
	@Max(Number.MAX_SAFE_INTEGER)
	amount!: number;

	@ApiProperty({ description: "Receiving account id (x-only public key hex)" })
	@IsString()
	@IsNotEmpty()
	to!: string;
}

export class BalanceOutDto {
	@ApiProperty()
	account!: string;

	@ApiProperty({ example: 95_000 })
	balance!: number;
}
