import { readFileSync } from "node:fs";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { hexToBytes, isHexString } from "@ethereumjs/util";

export type BootloaderName = "proved_block" | "playground_block" | "fee_estimate";
export type DefaultAccountName = "DefaultAccount" | "DefaultAccountNoSecurity";

const BUILT_IN_DIR = fileURLToPath(new URL("../artifacts/", import.meta.url));

const LOCAL_BOOTLOADER_DIR = "etc/system-contracts/bootloader/build/artifacts";
const LOCAL_CONTRACTS_DIR = "etc/system-contracts/artifacts-zk/cache-zk/solpp-generated-contracts";

/** A local artifact is missing or unreadable. */
export class MissingArtifactError extends Error {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Missing system contract artifact ${path}: ${reason}`, { cause });
    this.name = "MissingArtifactError";
    this.path = path;
  }
}

/** An artifact was read but its content is unusable. */
export class CorruptArtifactError extends Error {
  readonly path: string;

  constructor(path: string, reason: string) {
    super(`Corrupt system contract artifact ${path}: ${reason}`);
    this.name = "CorruptArtifactError";
    this.path = path;
  }
}

export interface Artifact {
  path: string;
  bytecode: Uint8Array;
}

/** Where artifacts are read from, and how. */
export interface ArtifactReader {
  bootloader(name: BootloaderName): Artifact;
  defaultAccount(name: DefaultAccountName): Artifact;
}

function readBytes(path: string): Uint8Array {
  try {
    return new Uint8Array(readFileSync(path));
  } catch (e) {
    throw new MissingArtifactError(path, e);
  }
}

/** Extract `bytecode` from a compiler JSON artifact. */
export function parseContractArtifact(path: string, contents: string): Uint8Array {
  let json: unknown;
  try {
    json = JSON.parse(contents);
  } catch (e) {
    throw new CorruptArtifactError(path, e instanceof Error ? e.message : String(e));
  }
  if (typeof json !== "object" || json === null || !("bytecode" in json)) {
    throw new CorruptArtifactError(path, "no bytecode field");
  }
  const { bytecode } = json;
  if (typeof bytecode !== "string" || !isHexString(bytecode)) {
    throw new CorruptArtifactError(path, "bytecode is not a hex string");
  }
  return hexToBytes(bytecode);
}

function readBinaryArtifact(path: string): Artifact {
  return { path, bytecode: readBytes(path) };
}

function readContractArtifact(path: string): Artifact {
  const contents = new TextDecoder().decode(readBytes(path));
  return { path, bytecode: parseContractArtifact(path, contents) };
}

/** Artifacts shipped inside this package, or a copy of them laid out the same way in `dir`. */
export function builtInArtifacts(dir: string = BUILT_IN_DIR): ArtifactReader {
  return {
    bootloader: (name) => readBinaryArtifact(join(dir, `${name}.yul.zbin`)),
    defaultAccount: (name) => readContractArtifact(join(dir, `${name}.json`)),
  };
}

/** Artifacts from a local system-contracts checkout rooted at `root`. */
export function localArtifacts(root: string): ArtifactReader {
  return {
    bootloader: (name) =>
      readBinaryArtifact(join(root, LOCAL_BOOTLOADER_DIR, `${name}.yul`, `${name}.yul.zbin`)),
    defaultAccount: (name) =>
      readContractArtifact(join(root, LOCAL_CONTRACTS_DIR, `${name}.sol`, `${name}.json`)),
  };
}
