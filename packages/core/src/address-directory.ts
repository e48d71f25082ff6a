import { readFileSync } from "node:fs";
import type { ContractType, KnownAddress } from "./types.js";
import { defaultColors, type Colors } from "./format.js";

const CONTRACT_TYPES: ReadonlySet<string> = new Set<ContractType>([
  "system",
  "precompile",
  "popular",
  "unknown",
]);

const ADDRESS_REGEX = /^0x[0-9a-fA-F]{40}$/;

const DATASET_URL = new URL("../data/address-map.json", import.meta.url);

/** The embedded address dataset is malformed. */
export class AddressDatasetError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AddressDatasetError";
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function isContractType(value: unknown): value is ContractType {
  return typeof value === "string" && CONTRACT_TYPES.has(value);
}

/**
 * Validate a parsed dataset: an array of `{ address, name, contractType }`.
 * Throws `AddressDatasetError` on the first malformed or duplicate entry.
 */
export function parseAddressDataset(json: unknown): KnownAddress[] {
  if (!Array.isArray(json)) {
    throw new AddressDatasetError("Address dataset must be an array");
  }

  const seen = new Set<string>();
  return json.map((entry: unknown, index) => {
    if (!isRecord(entry)) {
      throw new AddressDatasetError(`Entry ${index} is not an object`);
    }
    const { address, name, contractType } = entry;
    if (typeof address !== "string" || !ADDRESS_REGEX.test(address)) {
      throw new AddressDatasetError(`Entry ${index} has an invalid address`);
    }
    if (typeof name !== "string" || name.length === 0) {
      throw new AddressDatasetError(`Entry ${index} (${address}) has no name`);
    }
    if (!isContractType(contractType)) {
      throw new AddressDatasetError(
        `Entry ${index} (${address}) has unknown contract type ${String(contractType)}`
      );
    }
    const normalized = address.toLowerCase();
    if (seen.has(normalized)) {
      throw new AddressDatasetError(`Duplicate address ${normalized} in dataset`);
    }
    seen.add(normalized);
    return { address: normalized, name, contractType };
  });
}

/** Read-only lookup from address to its display name and classification. */
export class AddressDirectory {
  private readonly entries: ReadonlyMap<string, Readonly<KnownAddress>>;

  private constructor(entries: Map<string, Readonly<KnownAddress>>) {
    this.entries = entries;
  }

  static fromEntries(entries: readonly KnownAddress[]): AddressDirectory {
    const map = new Map<string, Readonly<KnownAddress>>();
    for (const entry of entries) {
      const address = entry.address.toLowerCase();
      map.set(address, Object.freeze({ ...entry, address }));
    }
    return new AddressDirectory(map);
  }

  get size(): number {
    return this.entries.size;
  }

  lookup(address: string): Readonly<KnownAddress> | undefined {
    return this.entries.get(address.toLowerCase());
  }

  classify(address: string): ContractType {
    return this.lookup(address)?.contractType ?? "unknown";
  }

  /** The known name emphasised by contract type, or `undefined` when absent. */
  knownName(address: string, colors: Colors = defaultColors): string | undefined {
    const known = this.lookup(address);
    if (!known) return undefined;
    switch (known.contractType) {
      case "precompile":
        return colors.dim(known.name);
      case "popular":
        return colors.green(known.name);
      case "system":
      case "unknown":
        return known.name;
    }
  }

  /** The known name when present, else the raw address. */
  displayName(address: string, colors: Colors = defaultColors): string {
    return this.knownName(address, colors) ?? address;
  }
}

let shared: AddressDirectory | null = null;

/**
 * The process-wide directory built from the embedded dataset. Loaded on first
 * call; a malformed dataset throws and nothing is cached.
 */
export function loadAddressDirectory(): AddressDirectory {
  if (!shared) {
    let json: unknown;
    try {
      json = JSON.parse(readFileSync(DATASET_URL, "utf8"));
    } catch (e) {
      const reason = e instanceof Error ? e.message : String(e);
      throw new AddressDatasetError(`Cannot read address dataset: ${reason}`);
    }
    shared = AddressDirectory.fromEntries(parseAddressDataset(json));
  }
  return shared;
}
