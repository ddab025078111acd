export type * from "./schema.js";
export * as steps from "./steps/index.js";
export * as coding from "./coding/index.js";
export * as consolidating from "./consolidating/index.js";
export * as utils from "./utils/index.js";

export * from "./job.js";
export * from "./export.js";
