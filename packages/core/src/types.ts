/** Classification of a known address. */
export type ContractType = "system" | "precompile" | "popular" | "unknown";

/** An entry of the embedded address dataset. */
export interface KnownAddress {
  /** Lowercased, 0x-prefixed 20-byte address. */
  address: string;
  name: string;
  contractType: ContractType;
}

/** The kind of call that created a frame. */
export type CallType =
  | "CALL"
  | "STATICCALL"
  | "DELEGATECALL"
  | "CALLCODE"
  | "CREATE"
  | "CREATE2";

/** A single call in a transaction's call tree. */
export interface CallTraceNode {
  type: CallType;
  /** Address of the callee (or of the created contract). */
  to: string;
  /** Calldata (or initcode for creates) as 0x-prefixed hex. */
  input: string;
  gasUsed: bigint;
  /** Set when the call ended with REVERT. */
  revertReason?: string;
  /** Set when the call halted exceptionally (out of gas, invalid opcode, ...). */
  error?: string;
  /** Sub-calls, in the order they were made. */
  children: CallTraceNode[];
}

export interface EventRecord {
  /** The emitting contract. */
  address: string;
  /** 32-byte topics as 0x-prefixed hex, in emission order. */
  indexedTopics: string[];
}

export type StorageLogType = "read" | "initialWrite" | "repeatedWrite";

export interface StorageLogEntry {
  logType: StorageLogType;
  address: string;
  key: bigint;
  readValue: bigint;
  /** Only meaningful for writes; equals `readValue` for reads. */
  writtenValue: bigint;
}

export interface ExecutionSummary {
  cyclesUsed: number;
  computationalGasUsed: bigint;
  contractsUsed: number;
  revertReason?: string;
}

/** Which calls of a call tree get printed. */
export type DisplayMode = "none" | "user" | "system" | "all";

/** Which storage log entries get printed. */
export type StorageLogFilter = "none" | "read" | "write" | "all";

/** Everything the VM reports about one executed transaction. */
export interface TransactionTrace {
  root: CallTraceNode;
  events: EventRecord[];
  storageLogs: StorageLogEntry[];
  summary: ExecutionSummary;
}
