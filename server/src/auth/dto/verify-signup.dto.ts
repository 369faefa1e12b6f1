import { IsNotEmpty, IsString, Matches } from "class-validator";
import { ApiProperty } from "@nestjs/swagger";
import { XONLY_PUBKEY_HEX } from "./request-challenge.dto";

export class VerifySignupDto {
	@ApiProperty({ type: "string", description: "x-only public key, hex" })
	@IsString()
	@Matches(XONLY_PUBKEY_HEX, {
		message: "publicKey must be 64 hex chars (x-only)",
	})
	publicKey!: string;

	@ApiProperty({ description: "BIP340 signature of hashToSignHex, hex" })
	@IsString()
	@Matches(/^[0-9a-f]{128}$/i, { message: "signature must be 128 hex chars" })
	signature!: string;

	@ApiProperty({ description: "Challenge id returned by signup/challenge" })
	@IsString()
	@IsNotEmpty()
	challengeId!: string;
}
