export const XML_TEXTMAP_VERSION = "0.1.0";

export * from "./core/errors.js";
export * from "./core/logger.js";
export * from "./core/options.js";
export type * from "./core/types.js";
export * from "./text/index.js";
export * from "./builder/index.js";
export * from "./api.js";
