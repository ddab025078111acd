export { BaseStep } from "./base-step.js";
export type { OpenCodeStepConfig } from "./open-code-step.js";
export { OpenCodeStep } from "./open-code-step.js";
export type { FilterStepConfig } from "./filter-step.js";
export { FilterStep } from "./filter-step.js";
export type { AxialResult, AxialStepConfig } from "./axial-step.js";
export { AxialStep } from "./axial-step.js";
export type { SelectiveStepConfig } from "./selective-step.js";
export { SelectiveStep } from "./selective-step.js";
export type { StorylineStepConfig } from "./storyline-step.js";
export { StorylineStep } from "./storyline-step.js";
