export * from "./environment";
export * from "./errors";
export * from "./logs";
export * from "./metrics";
