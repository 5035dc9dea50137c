export * from "./risk-manager.js";
