export * from "./core/index.js";
export * from "./issues/index.js";
export * from "./orchestrator/index.js";
export * from "./repo/index.js";
