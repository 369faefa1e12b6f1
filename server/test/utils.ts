import request from "supertest";
import type { INestApplication } from "@nestjs/common";
import { schnorr, utils as secpUtils } from "@noble/secp256k1";
import { bytesToHex, hexToBytes } from "@noble/hashes/utils";

export const LEDGER_ADMIN_USER = "ledger-admin";
export const LEDGER_ADMIN_PASS = "test-secret";

export interface TestAccount {
	privateKey: Uint8Array;
	publicKey: string;
}

export function createTestAccount(): TestAccount {
	const privateKey = secpUtils.randomPrivateKey();
	return { privateKey, publicKey: bytesToHex(schnorr.getPublicKey(privateKey)) };
}

export async function signupAndGetJwt(
	app: INestApplication,
	account: TestAccount,
): Promise<string> {
	const chalRes = await request(app.getHttpServer())
		.post("/api/v1/auth/signup/challenge")
		.set("Origin", "http://localhost:test")
		.send({ publicKey: account.publicKey })
		.expect(201);

	const signature = await schnorr.sign(
		hexToBytes(chalRes.body.hashToSignHex),
		account.privateKey,
	);

	const verifyRes = await request(app.getHttpServer())
		.post("/api/v1/auth/signup/verify")
		.set("Origin", "http://localhost:test")
		.send({
			publicKey: account.publicKey,
			signature: bytesToHex(signature),
			challengeId: chalRes.body.challengeId,
		})
		.expect(201);

	return verifyRes.body.accessToken;
}

export async function mintTokens(
	app: INestApplication,
	to: string,
	amount: number,
): Promise<void> {
	await request(app.getHttpServer())
		.post("/api/v1/ledger/mint")
		.auth(LEDGER_ADMIN_USER, LEDGER_ADMIN_PASS)
		.send({ amount, to })
		.expect(200);
}

export async function balanceOf(
	app: INestApplication,
	account: string,
): Promise<number> {
	const res = await request(app.getHttpServer())
		.get(`/api/v1/ledger/balances/${account}`)
		.expect(200);
	return res.body.data.balance;
}
