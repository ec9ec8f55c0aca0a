export * from "./log.js";
export * from "./types.js";
export * from "./config.js";
export * from "./db.js";
export * from "./system.js";

