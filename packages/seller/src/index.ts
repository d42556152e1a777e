// packages/seller/src/index.ts

export * from "./types";
export { Catalogue } from "./catalogue";
export { validateListingTerms, decayedPrice } from "./listing";
export {
  PriceDecayTimer,
  DEFAULT_TICK_INTERVAL_MS,
  expiryNotice,
  type TimerState,
  type PriceDecayTimerDeps,
} from "./price_decay_timer";
export { handleInquiry, handleAcceptance, saleNotice, type HandlerContext } from "./handlers";
export { MemoryTransport, matchPerformative, type SendListener } from "./transport";
export { IntervalScheduler } from "./scheduler";
export { ConsoleNotifier } from "./notifier";
export { SellerAgent, type SellerAgentOptions } from "./agent";
export { loadSellerConfig, parseItemSpec, type SellerConfig } from "./config";
export { loadSellerKeypair, type KeypairLoadResult, type IdentityMode } from "./keypair";
export { startSellerServer, type SellerServer, type SellerServerOptions } from "./server";
