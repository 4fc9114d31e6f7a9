export * from "./market.js";
export * from "./benchmark.js";
