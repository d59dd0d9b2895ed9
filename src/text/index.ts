export * from "./position-index.js";
export * from "./normalizer.js";
export * from "./mappings.js";
