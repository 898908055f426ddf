export * from "./buffer-pipeline";
export type * from "./buffer-pipeline.domain";
