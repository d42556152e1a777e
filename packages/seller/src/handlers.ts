/**
 * Protocol handlers for the seller.
 *
 * Both handlers are synchronous. The read-check-commit of a sale must not
 * contain an await, or a second acceptance could interleave with it.
 */

import type { AcceptProposalMessage, CfpMessage, ReplyMessage } from "@decay-market/sdk";
import { createReply, decodeProposal, log } from "@decay-market/sdk";
import type { Catalogue } from "./catalogue";
import type { Clock, UserNotifier } from "./types";

export interface HandlerContext {
  catalogue: Catalogue;
  notifier: UserNotifier;
  now: Clock;
}

export function saleNotice(title: string, price: number): string {
  return `Item "${title}" has been sold for ${price}.`;
}

/**
 * CFP: propose the live price if the item is listed, refuse otherwise.
 */
export function handleInquiry(msg: CfpMessage, ctx: HandlerContext): ReplyMessage {
  const listing = ctx.catalogue.lookup(msg.title);

  if (!listing) {
    return createReply(
      msg,
      { type: "REFUSE", title: msg.title, reason: "Item not available" },
      ctx.now()
    );
  }

  return createReply(
    msg,
    { type: "PROPOSE", title: msg.title, price: listing.currentPrice() },
    ctx.now()
  );
}

/**
 * ACCEPT_PROPOSAL: confirm and close the sale when the offer still covers the
 * live price; disconfirm stale or unlisted offers; NOT_UNDERSTOOD on bad content.
 */
export function handleAcceptance(msg: AcceptProposalMessage, ctx: HandlerContext): ReplyMessage {
  const decoded = decodeProposal(msg.content);
  if (!decoded.ok) {
    log("warn", "Unreadable proposal", { conversation_id: msg.conversation_id, reason: decoded.reason });
    return createReply(
      msg,
      { type: "NOT_UNDERSTOOD", reason: `Unreadable proposal: ${decoded.reason}` },
      ctx.now()
    );
  }

  const { title, offered_price } = decoded.proposal;
  const listing = ctx.catalogue.lookup(title);

  if (!listing) {
    return createReply(
      msg,
      { type: "DISCONFIRM", title, reason: "Item not available" },
      ctx.now()
    );
  }

  const askingPrice = listing.currentPrice();
  if (offered_price < askingPrice) {
    return createReply(
      msg,
      { type: "DISCONFIRM", title, reason: `Offer ${offered_price} is below the asking price ${askingPrice}` },
      ctx.now()
    );
  }

  // Commit point: stop decay, delist, tell the user.
  listing.stop();
  ctx.catalogue.remove(title);
  ctx.notifier.notifyUser(saleNotice(title, offered_price));
  log("info", "Item sold", { title, price: offered_price, buyer: msg.sender });

  return createReply(msg, { type: "CONFIRM", title, price: offered_price }, ctx.now());
}
