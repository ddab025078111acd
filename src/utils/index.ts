export * from "./ai/json.js";
export * from "./ai/llms.js";
export * from "./core/config.js";
export * from "./core/logger.js";
export * from "./core/misc.js";
export * from "./core/result.js";
export * from "./core/retry.js";
export * from "./io/export.js";
export * from "./io/file.js";
