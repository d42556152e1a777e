/**
 * Seller Server
 *
 * HTTP front for a SellerAgent. Each request becomes an inbound protocol
 * message on the agent's MemoryTransport; the agent's reply comes back
 * as a signed envelope.
 *
 *   GET  /health     liveness, seller id and identity mode
 *   GET  /listings   items currently on sale with their live prices
 *   POST /listings   { title, initial_price, floor_price, deadline_ms }
 *   POST /cfp        { title, sender? }            -> PROPOSE | REFUSE
 *   POST /accept     { content, sender? }          -> CONFIRM | DISCONFIRM | NOT_UNDERSTOOD
 *   POST /messages   a complete CFP or ACCEPT_PROPOSAL message
 */

import http from "node:http";
import type { IncomingMessage, ServerResponse } from "node:http";
import { z } from "zod";
import {
  createAcceptProposal,
  createCfp,
  isProtocolError,
  log,
  parseInboundMessage,
  signEnvelope,
} from "@decay-market/sdk";
import type { InboundMessage, Keypair, ProtocolErrorCode } from "@decay-market/sdk";
import type { SellerAgent } from "./agent";
import type { IdentityMode } from "./keypair";
import type { MemoryTransport } from "./transport";

export interface SellerServerOptions {
  port?: number; // 0 for random port
  host?: string;
  agent: SellerAgent;
  transport: MemoryTransport;
  sellerKeyPair: Keypair;
  sellerId: string; // pubkey b58
  mode?: IdentityMode;
  replyTimeoutMs?: number;
}

export interface SellerServer {
  url: string;
  close(): Promise<void>;
}

const listingRequestSchema = z.object({
  title: z.string(),
  initial_price: z.number(),
  floor_price: z.number(),
  deadline_ms: z.number(),
});

const cfpRequestSchema = z.object({
  title: z.string().min(1),
  sender: z.string().optional(),
});

const acceptRequestSchema = z.object({
  content: z.unknown(),
  sender: z.string().optional(),
});

const STATUS_BY_CODE: Record<ProtocolErrorCode, number> = {
  MALFORMED_MESSAGE: 400,
  INVALID_LISTING: 400,
  INVALID_CONFIG: 500,
  ALREADY_LISTED: 409,
  TRANSPORT_CLOSED: 503,
  REPLY_TIMEOUT: 504,
};

class HttpError extends Error {
  constructor(
    public readonly status: number,
    message: string
  ) {
    super(message);
    this.name = "HttpError";
  }
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

function readBody(req: IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    let body = "";
    req.on("data", (chunk: Buffer) => {
      body += chunk.toString();
    });
    req.on("end", () => resolve(body));
    req.on("error", reject);
  });
}

async function readJson<T>(req: IncomingMessage, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
  const raw = await readBody(req);
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new HttpError(400, "Request body must be JSON");
  }
  const result = schema.safeParse(parsed);
  if (!result.success) {
    throw new HttpError(400, result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; "));
  }
  return result.data;
}

export async function startSellerServer(opts: SellerServerOptions): Promise<SellerServer> {
  const {
    port = 0,
    host = "127.0.0.1",
    agent,
    transport,
    sellerKeyPair,
    sellerId,
    mode = "ephemeral",
    replyTimeoutMs = 5000,
  } = opts;

  const exchange = async (res: ServerResponse, message: InboundMessage): Promise<void> => {
    const reply = await transport.request(message, replyTimeoutMs);
    sendJson(res, 200, { envelope: signEnvelope(reply, sellerKeyPair, reply.sent_at_ms) });
  };

  const route = async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
    const path = new URL(req.url ?? "/", "http://localhost").pathname;

    if (req.method === "GET" && path === "/health") {
      sendJson(res, 200, {
        ok: agent.isRunning,
        seller_id: sellerId,
        mode,
        listings: agent.catalogue.size,
      });
      return;
    }

    if (req.method === "GET" && path === "/listings") {
      sendJson(res, 200, { listings: agent.listings() });
      return;
    }

    // All other routes require POST
    if (req.method !== "POST") {
      throw new HttpError(405, "Method not allowed");
    }

    if (path === "/listings") {
      const body = await readJson(req, listingRequestSchema);
      const timer = agent.putForSale(body.title, body.initial_price, body.floor_price, body.deadline_ms);
      sendJson(res, 201, { listing: timer.snapshot() });
    } else if (path === "/cfp") {
      const body = await readJson(req, cfpRequestSchema);
      await exchange(res, createCfp(body.title, body.sender ?? "anonymous"));
    } else if (path === "/accept") {
      const body = await readJson(req, acceptRequestSchema);
      await exchange(res, createAcceptProposal(body.content, body.sender ?? "anonymous"));
    } else if (path === "/messages") {
      await exchange(res, parseInboundMessage(await readJson(req, z.unknown())));
    } else {
      throw new HttpError(404, "Not found");
    }
  };

  const server = http.createServer((req, res) => {
    route(req, res).catch((err: unknown) => {
      if (err instanceof HttpError) {
        sendJson(res, err.status, { error: err.message });
        return;
      }
      if (isProtocolError(err)) {
        sendJson(res, STATUS_BY_CODE[err.code], { error: err.message, code: err.code });
        return;
      }
      log("error", "Seller server request failed", { error: err instanceof Error ? err.message : String(err) });
      if (!res.headersSent) {
        sendJson(res, 500, { error: "Internal error" });
      }
    });
  });

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, host, () => {
      server.off("error", reject);
      resolve();
    });
  });

  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("Failed to get server port");
  }

  return {
    url: `http://${host}:${address.port}`,
    close() {
      return new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      });
    },
  };
}
