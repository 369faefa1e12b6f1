import { IsString, Matches } from "class-validator";
import { ApiProperty } from "@nestjs/swagger";

export const XONLY_PUBKEY_HEX = /^[0-9a-f]{64}$/i;

export class RequestChallengeDto {
	@ApiProperty({ type: "string", description: "x-only public key, hex" })
	@IsString()
	@Matches(XONLY_PUBKEY_HEX, {
		message: "publicKey must be 64 hex chars (x-only)",
	})
	publicKey!: string;
}
