export * from "./types.js";
export * from "./windows.js";
export * from "./tiers.js";
