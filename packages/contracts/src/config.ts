import { ConfigError } from "@vmtrace/core";
import type { BytecodeSource } from "./system-contracts.js";

/**
 * Read the bytecode source from `VMTRACE_SYSTEM_CONTRACTS`
 * (built-in | built-in-without-security | local). Local artifacts are read
 * below `VMTRACE_CONTRACTS_HOME`.
 */
export function bytecodeSourceFromEnv(
  env: Record<string, string | undefined> = process.env
): BytecodeSource {
  const raw = env.VMTRACE_SYSTEM_CONTRACTS?.trim().toLowerCase() || "built-in";
  switch (raw) {
    case "built-in":
      return { kind: "builtIn" };
    case "built-in-without-security":
      return { kind: "builtInWithoutSecurity" };
    case "local": {
      const root = env.VMTRACE_CONTRACTS_HOME;
      if (!root) {
        throw new ConfigError("VMTRACE_CONTRACTS_HOME must be set to load local system contracts");
      }
      return { kind: "local", root };
    }
    default:
      throw new ConfigError(
        `VMTRACE_SYSTEM_CONTRACTS must be one of built-in, built-in-without-security, local (got "${raw}")`
      );
  }
}
