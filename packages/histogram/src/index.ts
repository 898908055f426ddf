export * from "./accumulator";
export * from "./errors";
export * from "./orchestrator";
export * from "./pipeline";
export * from "./source";
export * from "./tokenizer";
