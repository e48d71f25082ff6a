import { loadAddressDirectory, type AddressDirectory } from "./address-directory.js";
import { OpenChainResolver, type SelectorResolver } from "./selector-resolver.js";
import { consoleLogger, type Logger } from "./logger.js";
import { createColors, defaultColors, type Colors } from "./format.js";
import { renderCallTree, type RenderContext } from "./call-trace.js";
import { renderEvents } from "./events.js";
import { renderStorageLogs } from "./storage-logs.js";
import { renderExecutionSummary } from "./summary.js";
import type { FormatterConfig } from "./config.js";
import type {
  CallTraceNode,
  DisplayMode,
  EventRecord,
  ExecutionSummary,
  StorageLogEntry,
  StorageLogFilter,
  TransactionTrace,
} from "./types.js";

export interface TraceFormatterOptions {
  directory: AddressDirectory;
  resolver: SelectorResolver;
  logger?: Logger;
  colors?: Colors;
  showCalls?: DisplayMode;
  showStorageLogs?: StorageLogFilter;
  showVmDetails?: boolean;
  showEvents?: boolean;
  resolveHashes?: boolean;
}

/** Overrides for the collaborators `fromConfig` would otherwise create. */
export interface TraceFormatterDeps {
  directory?: AddressDirectory;
  resolver?: SelectorResolver;
  logger?: Logger;
}

/**
 * Prints traces to a line-oriented logger. Holds only read-only state, so one
 * instance can serve concurrent renders.
 */
export class TraceFormatter {
  readonly showCalls: DisplayMode;
  readonly showStorageLogs: StorageLogFilter;
  readonly showVmDetails: boolean;
  readonly showEvents: boolean;

  private readonly logger: Logger;
  private readonly context: RenderContext;

  constructor(options: TraceFormatterOptions) {
    this.logger = options.logger ?? consoleLogger;
    this.showCalls = options.showCalls ?? "none";
    this.showStorageLogs = options.showStorageLogs ?? "none";
    this.showVmDetails = options.showVmDetails ?? false;
    this.showEvents = options.showEvents ?? true;
    this.context = {
      directory: options.directory,
      resolver: options.resolver,
      resolveHashes: options.resolveHashes ?? false,
      colors: options.colors ?? defaultColors,
    };
  }

  static fromConfig(config: FormatterConfig, deps: TraceFormatterDeps = {}): TraceFormatter {
    const logger = deps.logger ?? consoleLogger;
    return new TraceFormatter({
      directory: deps.directory ?? loadAddressDirectory(),
      resolver:
        deps.resolver ??
        new OpenChainResolver({
          baseUrl: config.resolver.baseUrl,
          timeoutMs: config.resolver.timeoutMs,
          logger,
        }),
      logger,
      colors: createColors(config.color),
      showCalls: config.showCalls,
      showStorageLogs: config.showStorageLogs,
      showVmDetails: config.showVmDetails,
      showEvents: config.showEvents,
      resolveHashes: config.resolveHashes,
    });
  }

  async printCallTree(root: CallTraceNode, mode: DisplayMode = this.showCalls): Promise<void> {
    this.emit(await renderCallTree(root, { ...this.context, mode }));
  }

  async printEvents(events: readonly EventRecord[]): Promise<void> {
    this.emit(await renderEvents(events, this.context));
  }

  printStorageLogs(
    entries: readonly StorageLogEntry[],
    filter: StorageLogFilter = this.showStorageLogs
  ): void {
    this.emit(renderStorageLogs(entries, filter, this.context));
  }

  printExecutionSummary(summary: ExecutionSummary): void {
    this.emit(renderExecutionSummary(summary, this.context.colors));
  }

  /** Print every enabled section of a transaction's trace. */
  async printTransaction(trace: TransactionTrace): Promise<void> {
    if (this.showVmDetails) {
      this.printExecutionSummary(trace.summary);
    }
    if (this.showStorageLogs !== "none") {
      this.logger.info("");
      this.logger.info("==== Storage Logs ====");
      this.printStorageLogs(trace.storageLogs);
    }
    if (this.showCalls !== "none") {
      this.logger.info("");
      this.logger.info("==== Calls ====");
      await this.printCallTree(trace.root);
    }
    if (this.showEvents && trace.events.length > 0) {
      this.logger.info("");
      this.logger.info("==== Events ====");
      await this.printEvents(trace.events);
    }
  }

  private emit(lines: readonly string[]): void {
    for (const line of lines) {
      this.logger.info(line);
    }
  }
}
