import { describe, it, expect, vi } from "vitest";
import { TraceFormatter } from "../src/formatter.js";
import { createColors } from "../src/format.js";
import { nullResolver } from "../src/selector-resolver.js";
import { STORAGE_LOG_SEPARATOR } from "../src/storage-logs.js";
import type { TransactionTrace } from "../src/types.js";
import { loadFormatterConfig } from "../src/config.js";
import { DEPLOYER, FOO, UNKNOWN, collectingLogger, makeCall, makeDirectory } from "./helpers.js";

const TOPIC = "0x" + "11".repeat(32);

function makeTrace(): TransactionTrace {
  return {
    root: makeCall(UNKNOWN, { children: [makeCall(FOO, { input: "0x", gasUsed: 700n })] }),
    events: [{ address: FOO, indexedTopics: [TOPIC] }],
    storageLogs: [
      { logType: "read", address: DEPLOYER, key: 1n, readValue: 0n, writtenValue: 0n },
      { logType: "initialWrite", address: UNKNOWN, key: 1n, readValue: 0n, writtenValue: 5n },
    ],
    summary: { cyclesUsed: 12, computationalGasUsed: 3400n, contractsUsed: 2 },
  };
}

describe("TraceFormatter", () => {
  it("prints every enabled section in order", async () => {
    const { logger, lines } = collectingLogger();
    const formatter = new TraceFormatter({
      directory: makeDirectory(),
      resolver: nullResolver,
      logger,
      colors: createColors(false),
      showCalls: "all",
      showStorageLogs: "write",
      showVmDetails: true,
    });

    await formatter.printTransaction(makeTrace());

    expect(lines).toEqual([
      "",
      "┌──────────────────────────┐",
      "│   VM EXECUTION RESULTS   │",
      "└──────────────────────────┘",
      "Cycles Used:          12",
      "Computation Gas Used: 3400",
      "Contracts Used:       2",
      "════════════════════════════",
      "",
      "==== Storage Logs ====",
      "Type:           InitialWrite",
      `Address:        ${UNKNOWN}`,
      "Key:            0x" + "0".repeat(63) + "1",
      "Read Value:     0x" + "0".repeat(64),
      "Written Value:  0x" + "0".repeat(63) + "5",
      STORAGE_LOG_SEPARATOR,
      "",
      "==== Calls ====",
      "CALL " + UNKNOWN.padEnd(52) + "         12345678 21000",
      "  CALL " + "Foo".padEnd(52) + " 0x 700",
      "",
      "==== Events ====",
      "Foo" + " ".repeat(39) + " " + TOPIC,
    ]);
  });

  it("prints only events by default", async () => {
    const { logger, lines } = collectingLogger();
    const formatter = new TraceFormatter({
      directory: makeDirectory(),
      resolver: nullResolver,
      logger,
      colors: createColors(false),
    });

    await formatter.printTransaction(makeTrace());

    expect(lines).toEqual(["", "==== Events ====", "Foo" + " ".repeat(39) + " " + TOPIC]);
  });

  it("lets callers override the display mode per call", async () => {
    const { logger, lines } = collectingLogger();
    const formatter = new TraceFormatter({
      directory: makeDirectory(),
      resolver: nullResolver,
      logger,
      colors: createColors(false),
      showCalls: "none",
    });

    await formatter.printCallTree(makeCall(DEPLOYER), "system");

    expect(lines).toEqual(["CALL " + "ContractDeployer".padEnd(52) + "         12345678 21000"]);
  });

  it("builds from configuration with the injected collaborators", async () => {
    const { logger, lines } = collectingLogger();
    const resolveFunctionSelector = vi.fn(async (_selector: string) => "run()");
    const formatter = TraceFormatter.fromConfig(
      loadFormatterConfig({
        VMTRACE_SHOW_CALLS: "user",
        VMTRACE_RESOLVE_HASHES: "true",
        VMTRACE_SHOW_EVENTS: "false",
        VMTRACE_COLOR: "false",
      }),
      {
        directory: makeDirectory(),
        resolver: { resolveFunctionSelector, resolveEventSelector: async () => undefined },
        logger,
      }
    );

    expect(formatter.showCalls).toBe("user");
    await formatter.printTransaction(makeTrace());

    expect(lines).toEqual([
      "",
      "==== Calls ====",
      "CALL " + UNKNOWN.padEnd(52) + " run() 21000",
      "  CALL " + "Foo".padEnd(52) + " 0x 700",
    ]);
    expect(resolveFunctionSelector).toHaveBeenCalledTimes(1);
  });
});
