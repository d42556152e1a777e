import { z } from "zod";
import { ProtocolError } from "@decay-market/sdk";
import type { DecayMode, ListingTerms } from "./types";

const listingTermsSchema = z
  .object({
    title: z.string().trim().min(1, "title must not be empty"),
    initialPrice: z.number().int().nonnegative(),
    floorPrice: z.number().int().nonnegative(),
    deadline: z.number().int(),
  })
  .refine((terms) => terms.floorPrice <= terms.initialPrice, {
    message: "floorPrice must not exceed initialPrice",
    path: ["floorPrice"],
  });

/**
 * Validate sale terms at listing time. The deadline must lie strictly after `nowMs`.
 */
export function validateListingTerms(input: unknown, nowMs: number): ListingTerms {
  const result = listingTermsSchema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    throw new ProtocolError(`Invalid listing: ${where}${issue?.message ?? "unknown error"}`, "INVALID_LISTING", {
      issues: result.error.issues.map((i) => i.message),
    });
  }
  if (result.data.deadline <= nowMs) {
    throw new ProtocolError("Invalid listing: deadline must be in the future", "INVALID_LISTING", {
      deadline_ms: result.data.deadline,
      now_ms: nowMs,
    });
  }
  return result.data;
}

/**
 * Asking price at `nowMs` for a listing that started at `startMs`.
 *
 * Always an integer in [floorPrice, initialPrice]; non-increasing in `nowMs`;
 * equal to floorPrice at the deadline in linear mode.
 */
export function decayedPrice(
  terms: ListingTerms,
  startMs: number,
  nowMs: number,
  mode: DecayMode = "linear"
): number {
  const priceRange = terms.initialPrice - terms.floorPrice;
  const timeRange = terms.deadline - startMs;
  if (timeRange <= 0) {
    return terms.floorPrice;
  }

  const elapsed = Math.max(0, nowMs - startMs);
  const raw =
    mode === "legacy_truncated"
      ? terms.initialPrice - priceRange * Math.trunc(elapsed / timeRange)
      : terms.initialPrice - (priceRange * elapsed) / timeRange;

  return Math.min(terms.initialPrice, Math.max(terms.floorPrice, Math.round(raw)));
}
