export * from "./element.js";
export type * from "./events.js";
export * from "./scanner.js";
export * from "./tree-builder.js";
