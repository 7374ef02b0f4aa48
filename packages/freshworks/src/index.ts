export * from "./client.js";
export * from "./enrich.js";
export * from "./errors.js";
export * from "./pagination.js";
export * from "./stages.js";
export type * from "./types.js";
