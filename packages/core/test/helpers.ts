import { AddressDirectory } from "../src/address-directory.js";
import type { Logger } from "../src/logger.js";
import type { CallTraceNode } from "../src/types.js";

export const DEPLOYER = "0x0000000000000000000000000000000000008006";
export const ECRECOVER = "0x0000000000000000000000000000000000000001";
export const FOO = "0x00000000000000000000000000000000000000f0";
export const UNKNOWN = "0x000000000000000000000000000000000000dead";

export function makeDirectory(): AddressDirectory {
  return AddressDirectory.fromEntries([
    { address: DEPLOYER, name: "ContractDeployer", contractType: "system" },
    { address: ECRECOVER, name: "EcRecover", contractType: "precompile" },
    { address: FOO, name: "Foo", contractType: "popular" },
  ]);
}

export function makeCall(
  to: string,
  overrides: Partial<CallTraceNode> = {}
): CallTraceNode {
  return {
    type: "CALL",
    to,
    input: "0x12345678aabbccdd",
    gasUsed: 21000n,
    children: [],
    ...overrides,
  };
}

export function collectingLogger(): { logger: Logger; lines: string[]; warnings: string[] } {
  const lines: string[] = [];
  const warnings: string[] = [];
  return {
    lines,
    warnings,
    logger: {
      info: (line) => lines.push(line),
      warn: (line) => warnings.push(line),
    },
  };
}
