/**
 * BIP-340 Schnorr signature verification.
 *
 * Signers are identified by their 32-byte x-only public key in hex, so an
 * address doubles as the verification key.
 */

import { schnorr } from "@noble/curves/secp256k1";
import { hexToBytes } from "../utils/encoding.js";
import { SignatureVerifier } from "./types.js";

const HEX_32 = /^(0x)?[0-9a-fA-F]{64}$/;
const HEX_64 = /^(0x)?[0-9a-fA-F]{128}$/;

export class SchnorrSignatureVerifier implements SignatureVerifier {
	async isValidSignature(
		signer: string,
		hash: string,
		signature: string,
	): Promise<boolean> {
		if (!HEX_32.test(signer) || !HEX_32.test(hash) || !HEX_64.test(signature)) {
			return false;
		}
		return schnorr.verify(
			hexToBytes(signature),
			hexToBytes(hash),
			hexToBytes(signer),
		);
	}
}
