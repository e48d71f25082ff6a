import pc from "picocolors";
import type { DisplayMode, StorageLogFilter } from "./types.js";
import { DEFAULT_SELECTOR_TIMEOUT_MS, DEFAULT_SELECTOR_URL } from "./selector-resolver.js";

/** An environment variable holds a value the formatter cannot use. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export interface FormatterConfig {
  showCalls: DisplayMode;
  showStorageLogs: StorageLogFilter;
  showVmDetails: boolean;
  showEvents: boolean;
  /** Look up function and event names over the network. */
  resolveHashes: boolean;
  color: boolean;
  resolver: {
    baseUrl: string;
    timeoutMs: number;
  };
}

type Env = Record<string, string | undefined>;

function parseChoice<T extends string>(
  env: Env,
  name: string,
  choices: readonly T[],
  fallback: T
): T {
  const raw = env[name];
  if (raw === undefined || raw === "") return fallback;
  const value = raw.trim().toLowerCase();
  const match = choices.find((choice) => choice === value);
  if (match === undefined) {
    throw new ConfigError(`${name} must be one of ${choices.join(", ")} (got "${raw}")`);
  }
  return match;
}

function parseBoolean(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (raw === undefined || raw === "") return fallback;
  switch (raw.trim().toLowerCase()) {
    case "1":
    case "true":
    case "yes":
      return true;
    case "0":
    case "false":
    case "no":
      return false;
    default:
      throw new ConfigError(`${name} must be a boolean (got "${raw}")`);
  }
}

function parsePositiveInt(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive integer (got "${raw}")`);
  }
  return value;
}

export function loadFormatterConfig(env: Env = process.env): FormatterConfig {
  return {
    showCalls: parseChoice(env, "VMTRACE_SHOW_CALLS", ["none", "user", "system", "all"], "none"),
    showStorageLogs: parseChoice(
      env,
      "VMTRACE_SHOW_STORAGE_LOGS",
      ["none", "read", "write", "all"],
      "none"
    ),
    showVmDetails: parseChoice(env, "VMTRACE_SHOW_VM_DETAILS", ["none", "all"], "none") === "all",
    showEvents: parseBoolean(env, "VMTRACE_SHOW_EVENTS", true),
    resolveHashes: parseBoolean(env, "VMTRACE_RESOLVE_HASHES", false),
    color: parseBoolean(env, "VMTRACE_COLOR", pc.isColorSupported),
    resolver: {
      baseUrl: env.VMTRACE_SELECTOR_URL || DEFAULT_SELECTOR_URL,
      timeoutMs: parsePositiveInt(env, "VMTRACE_SELECTOR_TIMEOUT_MS", DEFAULT_SELECTOR_TIMEOUT_MS),
    },
  };
}
