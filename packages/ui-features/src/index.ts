export * from "./appState";
export * from "./commands";
export * from "./editor";
export * from "./feedback";
export * from "./help";
export * from "./keymap";
export * from "./layout";
export * from "./modes";
export type * from "./services";
