/**
 * Encoding utilities for the SDK
 */

import { hex } from "@scure/base";
import { sha256 } from "@noble/hashes/sha2";

/**
 * Convert bytes to hex string
 */
export function bytesToHex(bytes: Uint8Array): string {
	return hex.encode(bytes);
}

/**
 * Convert hex string to bytes
 */
export function hexToBytes(hexString: string): Uint8Array {
	return hex.decode(hexString);
}

/**
 * Decode a hex string, returning null instead of throwing when it is not
 * valid (odd length, non-hex characters).
 */
export function tryHexToBytes(hexString: string): Uint8Array | null {
	try {
		return hex.decode(hexString.toLowerCase());
	} catch {
		return null;
	}
}

/**
 * Concatenate multiple byte arrays
 */
export function concatBytes(...arrays: Uint8Array[]): Uint8Array {
	const totalLength = arrays.reduce((sum, arr) => sum + arr.length, 0);
	const result = new Uint8Array(totalLength);
	let offset = 0;
	for (const arr of arrays) {
		result.set(arr, offset);
		offset += arr.length;
	}
	return result;
}

/**
 * Check if two byte arrays are equal
 */
export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
	if (a.length !== b.length) return false;
	for (let i = 0; i < a.length; i++) {
		if (a[i] !== b[i]) return false;
	}
	return true;
}

/**
 * Copy of `bytes` in reverse order.
 *
 * Bitcoin hashes are serialized little-endian; explorers and RPCs print them
 * reversed ("display order").
 */
export function reverseBytes(bytes: Uint8Array): Uint8Array {
	return Uint8Array.from(bytes).reverse();
}

/**
 * SHA256(SHA256(data)), the hash used for txids, block hashes and merkle nodes.
 */
export function doubleSha256(data: Uint8Array): Uint8Array {
	return sha256(sha256(data));
}
