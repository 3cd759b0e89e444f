export * from "./types.js";
export * from "./logger.js";
export * from "./rules/issue-classifier.js";
export * from "./rules/end-time.js";
export * from "./hierarchy.js";
export * from "./components.js";
export * from "./report.js";
export * from "./metrics.js";
export * from "./collect.js";
export * from "./pipeline.js";
