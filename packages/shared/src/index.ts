export * from "./events";
export * from "./workflow";
export * from "./keys";
export * from "./errors";
export * from "./serialize";
export * from "./logger";
