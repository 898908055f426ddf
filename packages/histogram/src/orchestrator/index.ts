export * from "./orchestrator";
export type * from "./orchestrator.domain";
