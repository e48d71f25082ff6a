import type { TransactionTrace } from "@vmtrace/core";

export interface TraceEngine {
  /** Execute bytecode and collect its trace. */
  execute(params: ExecutionParams): Promise<TransactionTrace>;
  /** Reset the world state to its initial (empty) state. */
  resetState(): Promise<void>;
}

export interface ExecutionParams {
  /** The bytecode to execute (hex string). */
  bytecode: string;
  /** "call" = treat as runtime code; "deploy" = treat as initcode. */
  mode: "call" | "deploy";
  /** Calldata (hex string). Only relevant in "call" mode. */
  calldata?: string;
  /** Value sent with the transaction (in wei). Defaults to 0. */
  value?: bigint;
  /** Sender address. Defaults to a well-known default address. */
  from?: string;
  /** Target address (where the runtime code lives). Only relevant in "call" mode. */
  to?: string;
  /** Gas limit. Defaults to 30_000_000. */
  gasLimit?: bigint;
}
