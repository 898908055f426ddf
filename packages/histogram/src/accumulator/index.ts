export * from "./accumulator";
export type * from "./accumulator.domain";
