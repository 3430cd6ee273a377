export * from "./config";
export * from "./converter";
export * from "./converters";
export * from "./errors";
export * from "./ref";
export * from "./stack-check";
export * from "./state";
export * from "./table-view";
export * from "./thread";
export * from "./value";
