export * from "./types";
export * from "./errors";
export { SpannedText } from "./spanned";
export { DEFAULT_SEPARATOR, SingleCharTokenizer, assertSeparator } from "./tokenizer";
export { activeTokenRange, decideFilter, enoughToFilter } from "./policy";
export { performValidation } from "./validation";
export { canRevertReplacement, revertReplacement } from "./undo";
export { applyReplace, clampRange, moveCursor, normalizeState } from "./state";
export type { BufferState } from "./state";
export { MemoryBuffer } from "./buffer";
export { ListEngine } from "./engine";
export type { EngineOptions } from "./engine";
export { EngineConfigSchema, loadConfig } from "./config";
export type { EngineConfig, EngineConfigInput } from "./config";
export { isLogLevel, logger, setLogLevel } from "./logger";
export type { LogLevel, Logger } from "./logger";
