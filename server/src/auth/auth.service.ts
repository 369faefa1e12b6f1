import {
	BadRequestException,
	Injectable,
	InternalServerErrorException,
	Logger,
	UnauthorizedException,
} from "@nestjs/common";
import { JwtService } from "@nestjs/jwt";
import { InjectRepository } from "@nestjs/typeorm";
import { hexToBytes } from "@noble/hashes/utils";
import { schnorr } from "@noble/secp256k1";
import type { Repository } from "typeorm";
import {
	createSignupChallenge,
	hashSignupPayload,
	parseChallengePayload,
} from "../crypto/challenge";
import { Account } from "../accounts/account.entity";

const CHALLENGE_TTL_MS = 5 * 60 * 1000; // 5 minutes

export type AuthenticatedAccount = {
	publicKey: string;
};

@Injectable()
export class AuthService {
	private readonly logger = new Logger(AuthService.name);

	constructor(
		@InjectRepository(Account) private readonly accounts: Repository<Account>,
		private readonly jwt: JwtService,
	) {}

	async createSignupChallenge(publicKeyRaw: string, origin: string) {
		const publicKey = publicKeyRaw.toLowerCase();
		const now = new Date();

		const account =
			(await this.accounts.findOne({ where: { publicKey } })) ??
			this.accounts.create({ publicKey });

		const { id, payload, hashHex } = createSignupChallenge(origin);
		const expiresAt = new Date(now.getTime() + CHALLENGE_TTL_MS);
		account.pendingChallenge = JSON.stringify(payload);
		account.challengeId = id;
		account.challengeExpiresAt = expiresAt;

		try {
			await this.accounts.save(account);
		} catch (e) {
			this.logger.error("Failed to save account", e);
			throw new InternalServerErrorException("Failed to save account");
		}
		return {
			challenge: payload,
			challengeId: id,
			hashToSignHex: hashHex,
			expiresAt: expiresAt.toISOString(),
		};
	}

	async verifySignup(
		publicKeyRaw: string,
		signatureHex: string,
		challengeId: string,
		origin: string,
	) {
		const publicKey = publicKeyRaw.toLowerCase();
		const account = await this.accounts.findOne({ where: { publicKey } });
		if (!account || !account.pendingChallenge || !account.challengeId) {
			throw new UnauthorizedException("No pending challenge");
		}
		if (account.challengeId !== challengeId) {
			throw new UnauthorizedException("Challenge mismatch");
		}
		if (!account.challengeExpiresAt || account.challengeExpiresAt < new Date()) {
			throw new UnauthorizedException("Challenge expired");
		}

		const payload = parseChallengePayload(account.pendingChallenge);
		if (!payload) {
			throw new InternalServerErrorException("Corrupted challenge");
		}
		if (payload.origin !== origin) {
			throw new UnauthorizedException("Invalid challenge scope or origin");
		}

		let ok = false;
		try {
			ok = await schnorr.verify(
				hexToBytes(signatureHex),
				hexToBytes(hashSignupPayload(payload)),
				hexToBytes(publicKey),
			);
		} catch (cause) {
			throw new BadRequestException("Invalid signature input", { cause });
		}
		if (!ok) {
			throw new UnauthorizedException("Invalid signature");
		}

		account.pendingChallenge = null;
		account.challengeId = null;
		account.challengeExpiresAt = null;
		account.lastLoginAt = new Date();
		try {
			await this.accounts.save(account);
		} catch (e) {
			this.logger.error("Failed to save account", e);
			throw new InternalServerErrorException("Failed to save account");
		}
		this.logger.debug(`Account ${publicKey} logged in`);

		const accessToken = await this.jwt.signAsync({ sub: publicKey });
		return { accessToken, publicKey };
	}

	async getSession(token: string): Promise<AuthenticatedAccount> {
		let sub: unknown;
		try {
			({ sub } = await this.jwt.verifyAsync<{ sub: unknown }>(token));
		} catch (e) {
			this.logger.debug(`Invalid token: ${e instanceof Error ? e.message : e}`);
			throw new UnauthorizedException("Invalid token");
		}
		if (typeof sub !== "string") {
			throw new UnauthorizedException("Invalid token");
		}
		const account = await this.accounts.findOne({ where: { publicKey: sub } });
		if (!account) {
			throw new UnauthorizedException("Session not found");
		}
		return { publicKey: account.publicKey };
	}
}
