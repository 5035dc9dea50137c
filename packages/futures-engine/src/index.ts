export * from "./exits.js";
export * from "./position-tracker.js";
export * from "./engine.js";
export * from "./supervisor.js";
