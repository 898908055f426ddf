export * from "./byte-source";
export * from "./pump-source";
export type * from "./source.domain";
