import type { AddressDirectory } from "./address-directory.js";
import type { StorageLogEntry, StorageLogFilter, StorageLogType } from "./types.js";
import { formatWord, defaultColors, type Colors } from "./format.js";

const LABEL_WIDTH = 15;
export const STORAGE_LOG_SEPARATOR = "─".repeat(82);

const LOG_TYPE_NAMES: Record<StorageLogType, string> = {
  read: "Read",
  initialWrite: "InitialWrite",
  repeatedWrite: "RepeatedWrite",
};

export interface StorageLogOptions {
  directory: AddressDirectory;
  colors?: Colors;
}

function field(label: string, value: string): string {
  return `${label.padEnd(LABEL_WIDTH)} ${value}`;
}

export function matchesStorageLogFilter(
  entry: StorageLogEntry,
  filter: StorageLogFilter
): boolean {
  switch (filter) {
    case "none":
      return false;
    case "read":
      return entry.logType === "read";
    case "write":
      return entry.logType !== "read";
    case "all":
      return true;
  }
}

/** Labeled lines for one entry, followed by a separator. */
export function renderStorageLog(
  entry: StorageLogEntry,
  options: StorageLogOptions
): string[] {
  const colors = options.colors ?? defaultColors;
  const lines = [
    field("Type:", LOG_TYPE_NAMES[entry.logType]),
    field("Address:", options.directory.displayName(entry.address, colors)),
    field("Key:", formatWord(entry.key)),
    field("Read Value:", formatWord(entry.readValue)),
  ];
  if (entry.logType !== "read") {
    lines.push(field("Written Value:", formatWord(entry.writtenValue)));
  }
  lines.push(STORAGE_LOG_SEPARATOR);
  return lines;
}

export function renderStorageLogs(
  entries: readonly StorageLogEntry[],
  filter: StorageLogFilter,
  options: StorageLogOptions
): string[] {
  return entries
    .filter((entry) => matchesStorageLogFilter(entry, filter))
    .flatMap((entry) => renderStorageLog(entry, options));
}
