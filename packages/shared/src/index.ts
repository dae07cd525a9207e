export * from "./types.js";
export * from "./money.js";
export * from "./timezone.js";
