export { parseQABlocks } from "./segmenter.js";
export * from "./open-coding.js";
export * from "./normalizer.js";
export { BatchClassifier } from "./batch-classifier.js";
export type { BatchClassifierConfig, BatchTask } from "./batch-classifier.js";
export * from "./identity.js";
export * from "./filtering.js";
