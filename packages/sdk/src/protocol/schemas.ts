import { z } from "zod";
import { ProtocolError } from "./errors";
import type { InboundMessage, Proposal, ReplyMessage } from "./types";

const protocolVersion = z.literal("decay/1.0");

const messageBase = {
  protocol_version: protocolVersion,
  conversation_id: z.string().min(1),
  sent_at_ms: z.number().int().nonnegative(),
};

const replyBase = {
  ...messageBase,
  in_reply_to: z.string().min(1),
  receiver: z.string(),
};

export const cfpSchema = z.object({
  ...messageBase,
  type: z.literal("CFP"),
  sender: z.string(),
  title: z.string().min(1),
});

export const acceptProposalSchema = z.object({
  ...messageBase,
  type: z.literal("ACCEPT_PROPOSAL"),
  sender: z.string(),
  // decoded later, see decodeProposal()
  content: z.unknown(),
});

export const inboundMessageSchema = z.discriminatedUnion("type", [
  cfpSchema,
  acceptProposalSchema,
]);

export const proposeSchema = z.object({
  ...replyBase,
  type: z.literal("PROPOSE"),
  title: z.string(),
  price: z.number().int().nonnegative(),
});

export const refuseSchema = z.object({
  ...replyBase,
  type: z.literal("REFUSE"),
  title: z.string(),
  reason: z.string(),
});

export const confirmSchema = z.object({
  ...replyBase,
  type: z.literal("CONFIRM"),
  title: z.string(),
  price: z.number().int().nonnegative(),
});

export const disconfirmSchema = z.object({
  ...replyBase,
  type: z.literal("DISCONFIRM"),
  title: z.string().optional(),
  reason: z.string(),
});

export const notUnderstoodSchema = z.object({
  ...replyBase,
  type: z.literal("NOT_UNDERSTOOD"),
  reason: z.string(),
});

export const replyMessageSchema = z.discriminatedUnion("type", [
  proposeSchema,
  refuseSchema,
  confirmSchema,
  disconfirmSchema,
  notUnderstoodSchema,
]);

export const proposalSchema = z
  .object({
    title: z.string().min(1),
    offered_price: z.number().int().nonnegative(),
  })
  .strict();

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/**
 * Validate an inbound message from untrusted input.
 * Throws ProtocolError(MALFORMED_MESSAGE) when the shape is wrong.
 */
export function parseInboundMessage(input: unknown): InboundMessage {
  const result = inboundMessageSchema.safeParse(input);
  if (!result.success) {
    throw new ProtocolError(
      `Malformed inbound message: ${describeIssues(result.error)}`,
      "MALFORMED_MESSAGE"
    );
  }
  const message = result.data;
  if (message.type === "CFP") {
    return message;
  }
  // zod marks unknown-typed keys optional; the key is always present on the wire
  return { ...message, content: message.content };
}

export function parseReplyMessage(input: unknown): ReplyMessage {
  const result = replyMessageSchema.safeParse(input);
  if (!result.success) {
    throw new ProtocolError(
      `Malformed reply message: ${describeIssues(result.error)}`,
      "MALFORMED_MESSAGE"
    );
  }
  return result.data;
}

export type ProposalDecodeResult =
  | { ok: true; proposal: Proposal }
  | { ok: false; reason: string };

/**
 * Decode the content of an ACCEPT_PROPOSAL message.
 * Never throws: an unreadable proposal is a protocol outcome, not a fault.
 */
export function decodeProposal(content: unknown): ProposalDecodeResult {
  const result = proposalSchema.safeParse(content);
  if (!result.success) {
    return { ok: false, reason: describeIssues(result.error) };
  }
  return { ok: true, proposal: result.data };
}
