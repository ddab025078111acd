export * from "./axial-coding.js";
export * from "./axial-summary.js";
export * from "./coverage.js";
export * from "./selective-coding.js";
export * from "./storyline.js";
