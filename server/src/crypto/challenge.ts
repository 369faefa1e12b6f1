import { sha256 } from "@noble/hashes/sha2";
import { bytesToHex, utf8ToBytes } from "@noble/hashes/utils";
import { nanoid } from "nanoid";

export type ChallengePayload = {
	scope: "signup";
	origin: string;
	nonce: string;
	issuedAt: string; // ISO timestamp
};

export function createSignupChallenge(origin: string) {
	const payload: ChallengePayload = {
		scope: "signup",
		origin,
		nonce: nanoid(32),
		issuedAt: new Date().toISOString(),
	};
	return { id: nanoid(16), payload, hashHex: hashSignupPayload(payload) };
}

/**
 * Hash the client signs: sha256 over the payload fields in a fixed order.
 */
export function hashSignupPayload(payload: ChallengePayload): string {
	const canonical = JSON.stringify([
		payload.scope,
		payload.origin,
		payload.nonce,
		payload.issuedAt,
	]);
	return bytesToHex(sha256(utf8ToBytes(canonical)));
}

export function parseChallengePayload(raw: string): ChallengePayload | null {
	let value: unknown;
	try {
		value = JSON.parse(raw);
	} catch {
		return null;
	}
	if (
		typeof value === "object" &&
		value !== null &&
		"scope" in value &&
		value.scope === "signup" &&
		"origin" in value &&
		typeof value.origin === "string" &&
		"nonce" in value &&
		typeof value.nonce === "string" &&
		"issuedAt" in value &&
		typeof value.issuedAt === "string"
	) {
		return {
			scope: "signup",
			origin: value.origin,
			nonce: value.nonce,
			issuedAt: value.issuedAt,
		};
	}
	return null;
}
