/**
 * Encoding utilities for the SDK
 *
 * Values are hashed as a sequence of 32-byte words, the layout used for
 * proposal hashes and state fingerprints.
 */

import { hex } from "@scure/base";
import { keccak_256 } from "@noble/hashes/sha3";

const WORD_BYTES = 32;
const MAX_UINT256 = (1n << 256n) - 1n;

/**
 * Convert bytes to a 0x-prefixed hex string
 */
export function bytesToHex(bytes: Uint8Array): string {
	return `0x${hex.encode(bytes)}`;
}

/**
 * Convert a hex string (with or without 0x prefix) to bytes
 */
export function hexToBytes(hexString: string): Uint8Array {
	const body = hexString.startsWith("0x") ? hexString.slice(2) : hexString;
	return hex.decode(body.toLowerCase());
}

/**
 * Convert a string to bytes using UTF-8 encoding
 */
export function stringToBytes(str: string): Uint8Array {
	return new TextEncoder().encode(str);
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
 * Encode an unsigned integer as a big-endian 32-byte word.
 */
export function encodeUint(value: bigint | number): Uint8Array {
	const n = BigInt(value);
	if (n < 0n || n > MAX_UINT256) {
		throw new RangeError(`Value out of uint256 range: ${n}`);
	}
	const word = new Uint8Array(WORD_BYTES);
	let rest = n;
	for (let i = WORD_BYTES - 1; i >= 0 && rest > 0n; i--) {
		word[i] = Number(rest & 0xffn);
		rest >>= 8n;
	}
	return word;
}

/**
 * Encode a string as the keccak-256 hash of its UTF-8 bytes.
 */
export function encodeString(value: string): Uint8Array {
	return keccak_256(stringToBytes(value));
}

export type EncodableValue = bigint | number | string | boolean;

/**
 * Encode values as consecutive 32-byte words.
 *
 * Strings are hashed, booleans become 0/1 and integers are stored
 * big-endian.
 */
export function encodeWords(values: readonly EncodableValue[]): Uint8Array {
	return concatBytes(
		...values.map((value) => {
			if (typeof value === "string") return encodeString(value);
			if (typeof value === "boolean") return encodeUint(value ? 1 : 0);
			return encodeUint(value);
		}),
	);
}

/**
 * keccak-256 over the word encoding of `values`, as 0x-prefixed hex.
 */
export function hashWords(values: readonly EncodableValue[]): string {
	return bytesToHex(keccak_256(encodeWords(values)));
}

/**
 * The all-zero 32-byte hash.
 */
export const ZERO_HASH = bytesToHex(new Uint8Array(WORD_BYTES));
