export * as lua from "./lua";
// Handles and views (also available via lua namespace)
export { FieldAccessor, TableConverter, TableView } from "./lua/table-view";
export { EMPTY_SLOT, Ref, RefConverter } from "./lua/ref";
export type { Converter, StackPushable } from "./lua/converter";
export { ConverterRegistry, converters, pushAny } from "./lua/converter";
export { BridgeAssertionError, LuaRuntimeError, TypeMismatchError } from "./lua/errors";
export { closeLuaState, execute, type LuaState, newLuaState } from "./lua/state";
export { type BridgeConfig, configureBridge, getBridgeConfig, resetBridgeConfig } from "./lua/config";
// Platform utilities
export type { LogEntry, Logger, LogSink } from "./platform/logger";
export { createLogger, LogLevel, logger, setLogSink } from "./platform/logger";
