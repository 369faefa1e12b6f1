import { Body, Controller, Headers, Post } from "@nestjs/common";
import {
	ApiBadRequestResponse,
	ApiBody,
	ApiExtraModels,
	ApiOkResponse,
	ApiOperation,
	ApiTags,
	ApiUnauthorizedResponse,
} from "@nestjs/swagger";
import { ConfigService } from "@nestjs/config";
import { AuthService } from "./auth.service";
import { RequestChallengeDto } from "./dto/request-challenge.dto";
import { VerifySignupDto } from "./dto/verify-signup.dto";

@ApiTags("1 - Authentication")
@ApiExtraModels(RequestChallengeDto, VerifySignupDto)
@Controller("api/v1/auth")
export class AuthController {
	constructor(
		private readonly configService: ConfigService,
		private readonly auth: AuthService,
	) {}

	@Post("signup/challenge")
	@ApiBody({ type: RequestChallengeDto })
	@ApiOkResponse({
		schema: {
			type: "object",
			properties: {
				challenge: { type: "object" },
				challengeId: { type: "string" },
				hashToSignHex: { type: "string" },
				expiresAt: { type: "string", format: "date-time" },
			},
		},
	})
	@ApiOperation({
		summary: "Start signup by requesting a challenge for a given public key",
	})
	async challenge(
		@Body() dto: RequestChallengeDto,
		@Headers("origin") origin?: string,
	) {
		return this.auth.createSignupChallenge(
			dto.publicKey,
			origin ?? this.defaultOrigin(),
		);
	}

	@Post("signup/verify")
	@ApiBody({ type: VerifySignupDto })
	@ApiOkResponse({
		schema: {
			type: "object",
			properties: {
				accessToken: { type: "string" },
				publicKey: { type: "string" },
			},
		},
	})
	@ApiBadRequestResponse()
	@ApiUnauthorizedResponse()
	@ApiOperation({ summary: "Verify the signed challenge and receive a JWT" })
	async verify(
		@Body() dto: VerifySignupDto,
		@Headers("origin") origin?: string,
	) {
		return this.auth.verifySignup(
			dto.publicKey,
			dto.signature,
			dto.challengeId,
			origin ?? this.defaultOrigin(),
		);
	}

	private defaultOrigin(): string {
		return this.configService.get<string>(
			"AUTH_CHALLENGE_ORIGIN",
			"https://api.local",
		);
	}
}
