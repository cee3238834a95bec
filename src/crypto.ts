import { ed25519 } from "@noble/curves/ed25519";
import { blake2s } from "@noble/hashes/blake2s";
import { bytesToHex } from "@noble/hashes/utils";
import type { Hash, PublicKey, SecretKey, Signature } from "./types";

export interface Keypair {
  secretKey: SecretKey;
  publicKey: PublicKey;
}

export const PUBLIC_KEY_LENGTH = 32;
export const SIGNATURE_LENGTH = 64;

export function generateKeypair(): Keypair {
  const secretKey = ed25519.utils.randomPrivateKey();
  return { secretKey, publicKey: ed25519.getPublicKey(secretKey) };
}

export function publicKeyOf(secretKey: SecretKey): PublicKey {
  return ed25519.getPublicKey(secretKey);
}

export function sign(msg: Uint8Array, secretKey: SecretKey): Signature {
  return ed25519.sign(msg, secretKey);
}

/** False for a bad signature and for malformed key or signature bytes. */
export function verify(
  msg: Uint8Array,
  sig: Signature,
  publicKey: PublicKey,
): boolean {
  if (sig.length !== SIGNATURE_LENGTH || publicKey.length !== PUBLIC_KEY_LENGTH)
    return false;
  try {
    return ed25519.verify(sig, msg, publicKey);
  } catch {
    // not a point on the curve
    return false;
  }
}

export const digest = (data: Uint8Array): Uint8Array => blake2s(data);
export const digestHex = (data: Uint8Array): Hash => bytesToHex(blake2s(data));

/** Streams `parts` through one BLAKE2s instance, in order. */
export const digestPartsHex = (parts: Iterable<Uint8Array>): Hash => {
  const h = blake2s.create({});
  for (const p of parts) h.update(p);
  return bytesToHex(h.digest());
};
