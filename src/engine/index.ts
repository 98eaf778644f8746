export { type Engine, type EngineOptions, createEngine } from "./engine.js";
export { defaultEngine, schema } from "./default.js";
