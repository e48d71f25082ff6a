import type { PrefixedHexString } from "@ethereumjs/util";
import { hashBytecode, bytesToBeWords, BytecodeError } from "./bytecode.js";
import {
  builtInArtifacts,
  localArtifacts,
  CorruptArtifactError,
  MissingArtifactError,
  type Artifact,
  type ArtifactReader,
  type BootloaderName,
  type DefaultAccountName,
} from "./artifacts.js";

/** Where the system contract bytecode comes from. */
export type BytecodeSource =
  /** Artifacts shipped with this package. */
  | { kind: "builtIn" }
  /** Shipped artifacts with a default account that skips signature checks (tests only). */
  | { kind: "builtInWithoutSecurity" }
  /** Artifacts compiled in a local system-contracts checkout. */
  | { kind: "local"; root: string };

export interface SystemContractsOptions {
  /** Directory holding the built-in artifacts; defaults to the one shipped with this package. */
  builtInDir?: string;
}

/** The purpose a transaction is executed for. */
export type ExecutionIntent =
  | { kind: "verifyExecute" }
  | { kind: "estimateFee"; missedStorageInvocationLimit: number }
  | { kind: "ethCall"; missedStorageInvocationLimit: number };

export interface ContractCode {
  /** Bytecode as big-endian 256-bit words. */
  readonly code: readonly bigint[];
  readonly hash: PrefixedHexString;
}

/** A bootloader paired with the default account implementation. */
export interface ContractBundle {
  readonly bootloader: ContractCode;
  readonly defaultAccount: ContractCode;
}

function toContractCode({ path, bytecode }: Artifact): ContractCode {
  try {
    return Object.freeze({
      code: Object.freeze(bytesToBeWords(bytecode)),
      hash: hashBytecode(bytecode),
    });
  } catch (e) {
    if (e instanceof BytecodeError) {
      throw new CorruptArtifactError(path, e.message);
    }
    throw e;
  }
}

/**
 * The three bundles a node executes with. Built once at startup; the source is
 * never consulted again afterwards.
 */
export class SystemContracts {
  /** Full verification and execution. */
  readonly baseline: ContractBundle;
  /** Read-only calls: no signature checks, fixed gas limit. */
  readonly playground: ContractBundle;
  /** Fee estimation: unsigned transactions with changing gas limits. */
  readonly feeEstimate: ContractBundle;

  private constructor(reader: ArtifactReader, defaultAccountName: DefaultAccountName) {
    const defaultAccount = toContractCode(reader.defaultAccount(defaultAccountName));
    const bundle = (name: BootloaderName): ContractBundle =>
      Object.freeze({ bootloader: toContractCode(reader.bootloader(name)), defaultAccount });

    this.baseline = bundle("proved_block");
    this.playground = bundle("playground_block");
    this.feeEstimate = bundle("fee_estimate");
  }

  /**
   * Load every bundle from `source`. A local checkout that is incomplete throws
   * `MissingArtifactError` or `CorruptArtifactError`; damaged built-in artifacts
   * throw a plain `Error` wrapping either. The node must not start without them.
   */
  static fromSource(
    source: BytecodeSource = { kind: "builtIn" },
    options: SystemContractsOptions = {}
  ): SystemContracts {
    switch (source.kind) {
      case "builtIn":
        return SystemContracts.fromBuiltIn(builtInArtifacts(options.builtInDir), "DefaultAccount");
      case "builtInWithoutSecurity":
        return SystemContracts.fromBuiltIn(
          builtInArtifacts(options.builtInDir),
          "DefaultAccountNoSecurity"
        );
      case "local":
        return SystemContracts.fromReader(localArtifacts(source.root), "DefaultAccount");
    }
  }

  static fromReader(reader: ArtifactReader, defaultAccountName: DefaultAccountName): SystemContracts {
    return new SystemContracts(reader, defaultAccountName);
  }

  private static fromBuiltIn(
    reader: ArtifactReader,
    defaultAccountName: DefaultAccountName
  ): SystemContracts {
    try {
      return SystemContracts.fromReader(reader, defaultAccountName);
    } catch (e) {
      if (e instanceof MissingArtifactError || e instanceof CorruptArtifactError) {
        throw new Error(`Built-in system contracts are damaged: ${e.message}`, { cause: e });
      }
      throw e;
    }
  }

  select(intent: ExecutionIntent): ContractBundle {
    switch (intent.kind) {
      case "verifyExecute":
        return this.baseline;
      case "estimateFee":
        return this.feeEstimate;
      case "ethCall":
        return this.playground;
    }
  }

  forEthCall(): ContractBundle {
    return this.select({ kind: "ethCall", missedStorageInvocationLimit: 1 });
  }

  forFeeEstimate(): ContractBundle {
    return this.select({ kind: "estimateFee", missedStorageInvocationLimit: 1 });
  }
}
