export * from "./strategy.interface.js";
export * from "./indicators.js";
export * from "./trend.strategy.js";
export * from "./weighted.strategy.js";
export * from "./grid.strategy.js";
export * from "./directional.strategy.js";
export * from "./registry.js";
