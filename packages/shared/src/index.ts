export * from "./types.js";
export * from "./mood.js";
export * from "./challenges.js";
