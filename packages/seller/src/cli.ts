/**
 * Seller CLI
 *
 *   tsx packages/seller/src/cli.ts --port 7777 --item "Dune,100,40,600" --item "Emma,30,10,120"
 *
 * Each --item is title,initialPrice,floorPrice,secondsToDeadline.
 */

import minimist from "minimist";
import { log } from "@decay-market/sdk";
import { SellerAgent } from "./agent";
import { loadSellerConfig, parseItemSpec } from "./config";
import { loadSellerKeypair } from "./keypair";
import { ConsoleNotifier } from "./notifier";
import { startSellerServer } from "./server";
import { MemoryTransport } from "./transport";

const raw = process.argv.slice(2).filter((x) => x !== "--");
const args = minimist(raw, {
  alias: { p: "port", i: "item" },
  string: ["item"],
});

const config = loadSellerConfig();
const port = args.port !== undefined ? parseInt(String(args.port), 10) : config.port;

// Load keypair using precedence: env secret > keypair file > dev seed (opt-in) > ephemeral
const { keypair, sellerId, mode, warning } = loadSellerKeypair();

const transport = new MemoryTransport();
const agent = new SellerAgent({
  transport,
  name: sellerId,
  notifier: new ConsoleNotifier(),
  tickIntervalMs: config.tickIntervalMs,
  decayMode: config.decayMode,
});
agent.start();

const itemArgs: unknown = args.item;
const items = Array.isArray(itemArgs) ? itemArgs.map(String) : typeof itemArgs === "string" ? [itemArgs] : [];
for (const spec of items) {
  const terms = parseItemSpec(spec, Date.now());
  agent.putForSale(terms.title, terms.initialPrice, terms.floorPrice, terms.deadline);
}

const server = await startSellerServer({
  port,
  agent,
  transport,
  sellerKeyPair: keypair,
  sellerId,
  mode,
  replyTimeoutMs: config.replyTimeoutMs,
});

log("info", `[Seller Server] sellerId: ${sellerId}`);
log("info", `[Seller Server] Started on ${server.url}`);
log("info", `[Seller Server] Identity mode: ${mode}`);
if (warning) {
  log("warn", `[Seller Server] ${warning}`);
}
log("info", "[Seller Server] Press Ctrl+C to stop");

process.once("SIGINT", () => {
  Promise.all([agent.shutdown(), server.close()])
    .then(() => process.exit(0))
    .catch((err: unknown) => {
      log("error", "Shutdown failed", { error: err instanceof Error ? err.message : String(err) });
      process.exit(1);
    });
});
