export * from "./ascii";
export * from "./monitor";
export * from "./tokenizer";
export type * from "./monitor.domain";
export type * from "./tokenizer.domain";
