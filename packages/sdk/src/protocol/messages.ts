import { randomUUID } from "node:crypto";
import type {
  AcceptProposalMessage,
  CfpMessage,
  InboundMessage,
  ReplyMessage,
} from "./types";

export const PROTOCOL_VERSION = "decay/1.0" as const;

export function createCfp(
  title: string,
  sender: string,
  sentAtMs: number = Date.now(),
  conversationId: string = randomUUID()
): CfpMessage {
  return {
    protocol_version: PROTOCOL_VERSION,
    type: "CFP",
    conversation_id: conversationId,
    sender,
    title,
    sent_at_ms: sentAtMs,
  };
}

export function createAcceptProposal(
  content: unknown,
  sender: string,
  sentAtMs: number = Date.now(),
  conversationId: string = randomUUID()
): AcceptProposalMessage {
  return {
    protocol_version: PROTOCOL_VERSION,
    type: "ACCEPT_PROPOSAL",
    conversation_id: conversationId,
    sender,
    content,
    sent_at_ms: sentAtMs,
  };
}

// Distributes over the reply union so each variant keeps its own fields
type ReplyBody<T extends ReplyMessage = ReplyMessage> = T extends ReplyMessage
  ? Omit<T, "protocol_version" | "conversation_id" | "in_reply_to" | "receiver" | "sent_at_ms">
  : never;

/**
 * Build a reply addressed to the sender of `request`, in the same conversation.
 */
export function createReply(
  request: InboundMessage,
  body: ReplyBody,
  sentAtMs: number = Date.now()
): ReplyMessage {
  return {
    ...body,
    protocol_version: PROTOCOL_VERSION,
    conversation_id: request.conversation_id,
    in_reply_to: request.conversation_id,
    receiver: request.sender,
    sent_at_ms: sentAtMs,
  };
}
