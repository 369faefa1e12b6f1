/**
 * Utils module - Encoding and hashing helpers
 */

export {
	bytesToHex,
	hexToBytes,
	tryHexToBytes,
	concatBytes,
	bytesEqual,
	reverseBytes,
	doubleSha256,
} from "./encoding.js";
