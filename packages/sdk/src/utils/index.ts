/**
 * Utility functions for the SDK
 */

export {
	type EncodableValue,
	bytesToHex,
	hexToBytes,
	stringToBytes,
	concatBytes,
	encodeUint,
	encodeString,
	encodeWords,
	hashWords,
	ZERO_HASH,
} from "./encoding.js";

export { Mutex } from "./mutex.js";
