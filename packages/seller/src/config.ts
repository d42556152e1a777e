/**
 * Seller configuration from environment variables.
 *
 *   DECAY_TICK_INTERVAL_MS  decay tick interval (default 60000)
 *   DECAY_PRICE_MODE        linear | legacy_truncated (default linear)
 *   DECAY_PORT              HTTP port (default 7777, 0 for random)
 *   DECAY_REPLY_TIMEOUT_MS  HTTP wait for a seller reply (default 5000)
 */

import { z } from "zod";
import { ProtocolError } from "@decay-market/sdk";
import type { DecayMode, ListingTerms } from "./types";

const sellerEnvSchema = z.object({
  DECAY_TICK_INTERVAL_MS: z.coerce.number().int().positive().default(60_000),
  DECAY_PRICE_MODE: z.enum(["linear", "legacy_truncated"]).default("linear"),
  DECAY_PORT: z.coerce.number().int().min(0).max(65535).default(7777),
  DECAY_REPLY_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
});

export interface SellerConfig {
  tickIntervalMs: number;
  decayMode: DecayMode;
  port: number;
  replyTimeoutMs: number;
}

export function loadSellerConfig(env: NodeJS.ProcessEnv = process.env): SellerConfig {
  const result = sellerEnvSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ProtocolError(`Invalid seller configuration: ${details.join("; ")}`, "INVALID_CONFIG", {
      issues: details,
    });
  }

  return {
    tickIntervalMs: result.data.DECAY_TICK_INTERVAL_MS,
    decayMode: result.data.DECAY_PRICE_MODE,
    port: result.data.DECAY_PORT,
    replyTimeoutMs: result.data.DECAY_REPLY_TIMEOUT_MS,
  };
}

/**
 * Parse a command-line item spec "title,initialPrice,floorPrice,secondsToDeadline".
 * The title may itself contain commas; the last three fields are numeric.
 */
export function parseItemSpec(spec: string, nowMs: number): ListingTerms {
  const parts = spec.split(",");
  if (parts.length < 4) {
    throw new ProtocolError(
      `Invalid item spec "${spec}": expected title,initialPrice,floorPrice,seconds`,
      "INVALID_LISTING"
    );
  }

  const numeric = parts.slice(-3).map((part) => Number(part.trim()));
  const title = parts.slice(0, -3).join(",").trim();
  const [initialPrice, floorPrice, seconds] = numeric;
  if (!numeric.every((n) => Number.isFinite(n))) {
    throw new ProtocolError(`Invalid item spec "${spec}": prices and seconds must be numbers`, "INVALID_LISTING");
  }

  return {
    title,
    initialPrice,
    floorPrice,
    deadline: nowMs + seconds * 1000,
  };
}
