export type {
  ContractType,
  KnownAddress,
  CallType,
  CallTraceNode,
  EventRecord,
  StorageLogType,
  StorageLogEntry,
  ExecutionSummary,
  DisplayMode,
  StorageLogFilter,
  TransactionTrace,
} from "./types.js";

export {
  AddressDirectory,
  AddressDatasetError,
  parseAddressDataset,
  loadAddressDirectory,
} from "./address-directory.js";
export {
  OpenChainResolver,
  nullResolver,
  DEFAULT_SELECTOR_URL,
  DEFAULT_SELECTOR_TIMEOUT_MS,
} from "./selector-resolver.js";
export type { SelectorResolver, OpenChainResolverOptions } from "./selector-resolver.js";
export { shouldShowCall, renderCall, renderCallTree } from "./call-trace.js";
export type { RenderContext, CallTreeOptions } from "./call-trace.js";
export { renderEvent, renderEvents } from "./events.js";
export {
  renderStorageLog,
  renderStorageLogs,
  matchesStorageLogFilter,
  STORAGE_LOG_SEPARATOR,
} from "./storage-logs.js";
export type { StorageLogOptions } from "./storage-logs.js";
export { renderExecutionSummary } from "./summary.js";
export { TraceFormatter } from "./formatter.js";
export type { TraceFormatterOptions, TraceFormatterDeps } from "./formatter.js";
export { loadFormatterConfig, ConfigError } from "./config.js";
export type { FormatterConfig } from "./config.js";
export { consoleLogger } from "./logger.js";
export type { Logger } from "./logger.js";
export {
  createColors,
  defaultColors,
  stripAnsi,
  padVisible,
  formatWord,
  decodeHex,
  tryDecodeHex,
  hexDigits,
} from "./format.js";
export type { Colors } from "./format.js";
