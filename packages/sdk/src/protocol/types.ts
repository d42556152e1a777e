
export type ProtocolVersion = "decay/1.0";

/**
 * Performatives a seller accepts. Anything else is dropped at the transport.
 */
export type InboundPerformative = "CFP" | "ACCEPT_PROPOSAL";

interface MessageBase {
  protocol_version: ProtocolVersion;
  conversation_id: string;
  sent_at_ms: number;
}

/**
 * Call for proposal: "what is your current price for this title?"
 */
export interface CfpMessage extends MessageBase {
  type: "CFP";
  sender: string;
  title: string;
}

/**
 * Buyer accepts a previously proposed price. `content` is decoded by the
 * seller; an undecodable payload earns a NOT_UNDERSTOOD reply.
 */
export interface AcceptProposalMessage extends MessageBase {
  type: "ACCEPT_PROPOSAL";
  sender: string;
  content: unknown;
}

export type InboundMessage = CfpMessage | AcceptProposalMessage;

interface ReplyBase extends MessageBase {
  in_reply_to: string;
  receiver: string;
}

export interface ProposeMessage extends ReplyBase {
  type: "PROPOSE";
  title: string;
  price: number;
}

export interface RefuseMessage extends ReplyBase {
  type: "REFUSE";
  title: string;
  reason: string;
}

export interface ConfirmMessage extends ReplyBase {
  type: "CONFIRM";
  title: string;
  price: number;
}

export interface DisconfirmMessage extends ReplyBase {
  type: "DISCONFIRM";
  title?: string;
  reason: string;
}

export interface NotUnderstoodMessage extends ReplyBase {
  type: "NOT_UNDERSTOOD";
  reason: string;
}

export type ReplyMessage =
  | ProposeMessage
  | RefuseMessage
  | ConfirmMessage
  | DisconfirmMessage
  | NotUnderstoodMessage;

export interface Proposal {
  title: string;
  offered_price: number;
}
