export * from "./errors";
export * from "./history";
export * from "./matcher";
export * from "./query";
export * from "./searchEngine";
