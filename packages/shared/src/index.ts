export * from "./types/api.js";
export * from "./types/conversation.js";
export * from "./types/graph.js";
export * from "./types/taxonomy.js";
export type * from "./store.js";
