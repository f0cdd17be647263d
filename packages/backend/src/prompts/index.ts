export * from "./clarification.js";
export * from "./classification.js";
export * from "./relevance.js";
