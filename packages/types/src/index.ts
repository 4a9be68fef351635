export * from "./document.js";
export * from "./chunk.js";
export * from "./pipeline.js";
export * from "./connector.js";
export * from "./config.js";
export * from "./job.js";
