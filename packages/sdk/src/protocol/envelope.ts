// packages/sdk/src/protocol/envelope.ts
import nacl from "tweetnacl";
import bs58 from "bs58";
import { createHash } from "node:crypto";
import { stableCanonicalize } from "./canonical";
import type { ReplyMessage } from "./types";

export const ENVELOPE_VERSION = "decay-envelope/1.0";

export type Keypair = {
  publicKey: Uint8Array;
  secretKey: Uint8Array;
};

export type SignedEnvelope<T = ReplyMessage> = {
  envelope_version: typeof ENVELOPE_VERSION;
  message: T;
  message_hash_hex: string;
  envelope_hash_hex: string;
  signer_public_key_b58: string;
  signature_b58: string;
  signed_at_ms: number;
};

export function generateKeypair(): Keypair {
  return nacl.sign.keyPair();
}

/**
 * Encode a public key to base58 string (used for seller IDs).
 */
export function publicKeyToB58(publicKey: Uint8Array): string {
  return bs58.encode(Buffer.from(publicKey));
}

function toUtf8Bytes(s: string): Uint8Array {
  return new TextEncoder().encode(s);
}

function sha256Hex(input: Uint8Array): string {
  return createHash("sha256").update(input).digest("hex");
}

/**
 * Hashes the message ONLY (not the envelope), using stable canonical JSON.
 */
export function hashMessage(message: unknown): string {
  return sha256Hex(toUtf8Bytes(stableCanonicalize(message)));
}

function hashEnvelope(message: unknown, messageHashHex: string): string {
  const envelopeForHash = {
    envelope_version: ENVELOPE_VERSION,
    message,
    message_hash_hex: messageHashHex,
  };
  return sha256Hex(toUtf8Bytes(stableCanonicalize(envelopeForHash)));
}

/**
 * Signs the envelope hash with Ed25519 (tweetnacl).
 *
 * The envelope hash covers {envelope_version, message, message_hash_hex};
 * the signature is over the raw bytes of that hash.
 */
export function signEnvelope<T = ReplyMessage>(
  message: T,
  keypair: Keypair,
  signedAtMs: number = Date.now()
): SignedEnvelope<T> {
  const messageHashHex = hashMessage(message);
  const envelopeHashHex = hashEnvelope(message, messageHashHex);
  const sigBytes = nacl.sign.detached(Buffer.from(envelopeHashHex, "hex"), keypair.secretKey);

  return {
    envelope_version: ENVELOPE_VERSION,
    message,
    message_hash_hex: messageHashHex,
    envelope_hash_hex: envelopeHashHex,
    signer_public_key_b58: publicKeyToB58(keypair.publicKey),
    signature_b58: bs58.encode(Buffer.from(sigBytes)),
    signed_at_ms: signedAtMs,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Verifies:
 * 1) envelope shape
 * 2) message_hash_hex matches recomputed hash(message)
 * 3) envelope_hash_hex matches recomputed hash(envelope structure)
 * 4) signature verifies over envelope_hash_hex bytes using signer_public_key_b58
 */
export function verifyEnvelope(envelope: unknown): boolean {
  if (!isRecord(envelope) || envelope.envelope_version !== ENVELOPE_VERSION) return false;
  if (!isRecord(envelope.message)) return false;

  const msgHashHex = envelope.message_hash_hex;
  const envHashHex = envelope.envelope_hash_hex;
  const pubB58 = envelope.signer_public_key_b58;
  const sigB58 = envelope.signature_b58;
  if (typeof msgHashHex !== "string" || msgHashHex.length !== 64) return false;
  if (typeof envHashHex !== "string" || envHashHex.length !== 64) return false;
  if (typeof pubB58 !== "string" || typeof sigB58 !== "string") return false;

  if (hashMessage(envelope.message) !== msgHashHex.toLowerCase()) return false;
  if (hashEnvelope(envelope.message, msgHashHex) !== envHashHex.toLowerCase()) return false;

  try {
    const pubBytes = bs58.decode(pubB58);
    const sigBytes = bs58.decode(sigB58);
    return nacl.sign.detached.verify(Buffer.from(envHashHex, "hex"), sigBytes, pubBytes);
  } catch {
    // bad base58 or wrong key/signature length
    return false;
  }
}
