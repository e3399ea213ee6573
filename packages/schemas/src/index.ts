export * from "./limit-policy.js";
export * from "./decision.js";
export * from "./rate.js";
