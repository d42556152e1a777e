/**
 * Seller Keypair Loading Utility
 *
 * Loads the seller's signing keypair with the following precedence:
 * 1. DECAY_SELLER_SECRET_KEY_B58 (env var - base58 encoded 64-byte ed25519 secret key)
 * 2. DECAY_SELLER_KEYPAIR_FILE (env var - path to JSON file with {secretKeyB58, publicKeyB58?})
 * 3. DECAY_DEV_IDENTITY_SEED (env var - explicit opt-in for deterministic dev identity)
 * 4. Random ephemeral keypair (fallback)
 */

import { readFileSync } from "node:fs";
import { createHash } from "node:crypto";
import nacl from "tweetnacl";
import bs58 from "bs58";
import { z } from "zod";
import { ProtocolError, publicKeyToB58 } from "@decay-market/sdk";
import type { Keypair } from "@decay-market/sdk";

export type IdentityMode = "env-secret-key" | "keypair-file" | "dev-seed" | "ephemeral";

export interface KeypairLoadResult {
  keypair: Keypair;
  sellerId: string; // pubkey b58
  mode: IdentityMode;
  warning?: string; // Only set for dev-seed mode
}

const keypairFileSchema = z.object({
  secretKeyB58: z.string().min(1),
  publicKeyB58: z.string().optional(),
});

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function keypairFromSecret(secretKeyB58: string): Keypair {
  const secretKey = bs58.decode(secretKeyB58);
  if (secretKey.length !== 64) {
    throw new Error(`Invalid secret key length: expected 64 bytes, got ${secretKey.length}`);
  }
  return nacl.sign.keyPair.fromSecretKey(secretKey);
}

export function loadSellerKeypair(env: NodeJS.ProcessEnv = process.env): KeypairLoadResult {
  // Precedence 1: DECAY_SELLER_SECRET_KEY_B58
  const secretKeyB58 = env.DECAY_SELLER_SECRET_KEY_B58;
  if (secretKeyB58) {
    try {
      const keypair = keypairFromSecret(secretKeyB58);
      return { keypair, sellerId: publicKeyToB58(keypair.publicKey), mode: "env-secret-key" };
    } catch (err) {
      throw new ProtocolError(
        `Failed to load keypair from DECAY_SELLER_SECRET_KEY_B58: ${errorMessage(err)}`,
        "INVALID_CONFIG"
      );
    }
  }

  // Precedence 2: DECAY_SELLER_KEYPAIR_FILE
  const keypairFile = env.DECAY_SELLER_KEYPAIR_FILE;
  if (keypairFile) {
    try {
      const data = keypairFileSchema.parse(JSON.parse(readFileSync(keypairFile, "utf-8")));
      const keypair = keypairFromSecret(data.secretKeyB58);
      const sellerId = publicKeyToB58(keypair.publicKey);

      if (data.publicKeyB58 !== undefined && data.publicKeyB58 !== sellerId) {
        throw new Error("Public key in file does not match secret key");
      }
      return { keypair, sellerId, mode: "keypair-file" };
    } catch (err) {
      throw new ProtocolError(`Failed to load keypair from ${keypairFile}: ${errorMessage(err)}`, "INVALID_CONFIG");
    }
  }

  // Precedence 3: DECAY_DEV_IDENTITY_SEED (explicit opt-in)
  const devSeed = env.DECAY_DEV_IDENTITY_SEED;
  if (devSeed) {
    const seedHash = createHash("sha256").update(devSeed).digest(); // 32 bytes
    const keypair = nacl.sign.keyPair.fromSeed(seedHash);
    return {
      keypair,
      sellerId: publicKeyToB58(keypair.publicKey),
      mode: "dev-seed",
      warning: "DEV-ONLY: Using deterministic identity from seed (NOT for production)",
    };
  }

  // Precedence 4: Random ephemeral keypair
  const keypair = nacl.sign.keyPair();
  return { keypair, sellerId: publicKeyToB58(keypair.publicKey), mode: "ephemeral" };
}
