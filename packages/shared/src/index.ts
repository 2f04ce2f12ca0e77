// @topicwire/shared: shared types, persistence, logging, and configuration
export * from "./types.js";
export * from "./schemas.js";
export * from "./config.js";
export * from "./logger.js";
export * from "./dedup.js";
export * from "./memory.js";
export * from "./neo4j/index.js";
