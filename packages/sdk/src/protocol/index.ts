export * from "./types";
export * from "./errors";
export * from "./schemas";
export * from "./canonical";
export * from "./envelope";
export * from "./messages";
