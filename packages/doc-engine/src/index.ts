export * from "./autocomplete";
export * from "./markdown";
export * from "./preview";
export * from "./text";
