export * from "./snapshot.js";
export * from "./commodities.js";
