export * from "./errors";
export * from "./note";
export * from "./notebook";
export * from "./seed";
export * from "./storage";
export * from "./transfer";
export * from "./tree";
export type * from "./types";
