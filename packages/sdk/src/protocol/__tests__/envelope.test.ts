import { describe, it, expect } from "vitest";
import nacl from "tweetnacl";
import {
  signEnvelope,
  verifyEnvelope,
  generateKeypair,
  publicKeyToB58,
  hashMessage,
} from "../envelope";
import { stableCanonicalize } from "../canonical";
import { createCfp, createReply } from "../messages";

function proposeReply(price: number) {
  const cfp = createCfp("Dune", "buyer-1", 1000, "conv-1");
  return createReply(cfp, { type: "PROPOSE", title: "Dune", price }, 2000);
}

describe("stableCanonicalize", () => {
  it("sorts keys at every depth and drops undefined fields", () => {
    expect(stableCanonicalize({ b: 1, a: { d: [2, { z: 1, y: 2 }], c: undefined } })).toBe(
      '{"a":{"d":[2,{"y":2,"z":1}]},"b":1}'
    );
  });

  it("hashes key-order variants identically", () => {
    expect(hashMessage({ a: 1, b: 2 })).toBe(hashMessage({ b: 2, a: 1 }));
  });
});

describe("signed envelopes", () => {
  it("signs and verifies a reply", () => {
    const keypair = generateKeypair();
    const envelope = signEnvelope(proposeReply(90), keypair, 5000);

    expect(envelope.envelope_version).toBe("decay-envelope/1.0");
    expect(envelope.signed_at_ms).toBe(5000);
    expect(envelope.signer_public_key_b58).toBe(publicKeyToB58(keypair.publicKey));
    expect(envelope.message_hash_hex).toHaveLength(64);
    expect(verifyEnvelope(envelope)).toBe(true);
  });

  it("rejects a tampered message", () => {
    const envelope = signEnvelope(proposeReply(90), generateKeypair(), 5000);
    const tampered = { ...envelope, message: { ...envelope.message, price: 10 } };
    expect(verifyEnvelope(tampered)).toBe(false);
  });

  it("rejects a signature from another key", () => {
    const envelope = signEnvelope(proposeReply(90), generateKeypair(), 5000);
    const other = nacl.sign.keyPair();
    const forged = { ...envelope, signer_public_key_b58: publicKeyToB58(other.publicKey) };
    expect(verifyEnvelope(forged)).toBe(false);
  });

  it("rejects non-envelopes", () => {
    expect(verifyEnvelope(null)).toBe(false);
    expect(verifyEnvelope({ envelope_version: "other" })).toBe(false);
    expect(verifyEnvelope("decay-envelope/1.0")).toBe(false);
  });

  it("rejects garbage base58 without throwing", () => {
    const envelope = signEnvelope(proposeReply(90), generateKeypair(), 5000);
    expect(verifyEnvelope({ ...envelope, signature_b58: "0OIl" })).toBe(false);
  });
});
