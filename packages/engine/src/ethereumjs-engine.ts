import { createEVM } from "@ethereumjs/evm";
import type { EVM, InterpreterStep, EVMResult, Message } from "@ethereumjs/evm";
import {
  Account,
  bigIntToBytes,
  bytesToBigInt,
  bytesToHex,
  createAddressFromString,
  setLengthLeft,
} from "@ethereumjs/util";
import { decodeHex } from "@vmtrace/core";
import type {
  CallTraceNode,
  CallType,
  EventRecord,
  StorageLogEntry,
  TransactionTrace,
} from "@vmtrace/core";
import type { TraceEngine, ExecutionParams } from "./engine-types.js";
import { decodeRevertReason } from "./revert-reason.js";

const DEFAULT_CALLER = "0xd8da6bf26964af9d7eed9e03e53415d37aa96045";
const DEFAULT_TO = "0x1000000000000000000000000000000000000001";
const DEFAULT_GAS_LIMIT = 30_000_000n;
const ZERO_ADDRESS = "0x0000000000000000000000000000000000000000";

const SLOAD = 0x54;
const SSTORE = 0x55;
const LOG0 = 0xa0;
const LOG4 = 0xa4;

// Opcodes that spawn a child frame, by mnemonic
const CALL_TYPES: Record<string, CallType> = {
  CALL: "CALL",
  STATICCALL: "STATICCALL",
  DELEGATECALL: "DELEGATECALL",
  CALLCODE: "CALLCODE",
  CREATE: "CREATE",
  CREATE2: "CREATE2",
};

/** A frame whose execution has not finished yet. */
interface OpenFrame {
  node: CallTraceNode;
  /** Events emitted by this frame and its finished children. */
  events: EventRecord[];
  /** Mnemonic of the last opcode executed in this frame. */
  lastOpcode?: string;
}

function toWord(value: bigint): Uint8Array {
  return setLengthLeft(bigIntToBytes(value), 32);
}

function describeException(error: unknown): string {
  if (typeof error === "object" && error !== null) {
    if ("error" in error && typeof error.error === "string") return error.error;
    if ("message" in error && typeof error.message === "string") return error.message;
  }
  return String(error);
}

/**
 * Record gas and outcome on a finished frame. Returns whether the frame
 * succeeded.
 */
function finishFrame(node: CallTraceNode, result: EVMResult["execResult"]): boolean {
  node.gasUsed = result.executionGasUsed;
  if (!result.exceptionError) return true;

  const reason = describeException(result.exceptionError);
  if (reason.toLowerCase().includes("revert")) {
    node.revertReason = decodeRevertReason(result.returnValue);
  } else {
    node.error = reason;
  }
  return false;
}

function collectAddresses(node: CallTraceNode, into: Set<string>): Set<string> {
  into.add(node.to.toLowerCase());
  for (const child of node.children) {
    collectAddresses(child, into);
  }
  return into;
}

export class EthereumjsEngine implements TraceEngine {
  private evmPromise: Promise<EVM> | null = null;

  private getEvm(): Promise<EVM> {
    if (!this.evmPromise) {
      this.evmPromise = createEVM({ allowUnlimitedContractSize: true });
    }
    return this.evmPromise;
  }

  async execute(params: ExecutionParams): Promise<TransactionTrace> {
    const evm = await this.getEvm();

    const frameStack: OpenFrame[] = [];
    let root: OpenFrame | null = null;
    let rootEvents: EventRecord[] = [];
    const storageLogs: StorageLogEntry[] = [];
    // Slots written so far in this transaction, keyed by `${address}:${slot}`
    const writtenSlots = new Set<string>();
    let cyclesUsed = 0;
    let handlerError: unknown;

    const recordStep = async (data: InterpreterStep, frame: OpenFrame): Promise<void> => {
      cyclesUsed++;
      frame.lastOpcode = data.opcode.name;

      // Top of stack first
      const stack = [...data.stack].reverse();
      const opcode = data.opcode.code;
      const address = data.address.toString();

      if ((opcode === SLOAD && stack.length >= 1) || (opcode === SSTORE && stack.length >= 2)) {
        const key = stack[0];
        const current = bytesToBigInt(await evm.stateManager.getStorage(data.address, toWord(key)));
        if (opcode === SLOAD) {
          storageLogs.push({ logType: "read", address, key, readValue: current, writtenValue: current });
        } else {
          const slotId = `${address}:${key}`;
          storageLogs.push({
            logType: writtenSlots.has(slotId) ? "repeatedWrite" : "initialWrite",
            address,
            key,
            readValue: current,
            writtenValue: stack[1],
          });
          writtenSlots.add(slotId);
        }
      } else if (opcode >= LOG0 && opcode <= LOG4) {
        const topicCount = opcode - LOG0;
        if (stack.length >= 2 + topicCount) {
          frame.events.push({
            address,
            indexedTopics: stack.slice(2, 2 + topicCount).map((topic) => bytesToHex(toWord(topic))),
          });
        }
      }
    };

    const stepHandler = async (data: InterpreterStep, resolve?: () => void) => {
      const currentFrame = frameStack[frameStack.length - 1];
      try {
        if (currentFrame) {
          await recordStep(data, currentFrame);
        }
      } catch (e) {
        handlerError ??= e;
      } finally {
        resolve?.();
      }
    };

    const beforeMessageHandler = (data: Message, resolve?: (result?: unknown) => void) => {
      const parentFrame = frameStack[frameStack.length - 1];

      // The parent's last opcode tells us how this frame was created
      let type: CallType = data.to ? "CALL" : "CREATE";
      if (parentFrame?.lastOpcode !== undefined) {
        type = CALL_TYPES[parentFrame.lastOpcode] ?? type;
      }

      const frame: OpenFrame = {
        node: {
          type,
          // DELEGATECALL and CALLCODE run the callee's code in the caller's context
          to: data.to === undefined ? ZERO_ADDRESS : data.codeAddress.toString(),
          input: data.data ? bytesToHex(data.data) : "0x",
          gasUsed: 0n,
          children: [],
        },
        events: [],
      };

      if (!parentFrame) {
        // Keep the original bytecode as the root's input for display
        frame.node.input = params.bytecode;
        root = frame;
      } else {
        parentFrame.node.children.push(frame.node);
      }

      frameStack.push(frame);
      resolve?.();
    };

    const afterMessageHandler = (result: EVMResult, resolve?: (result?: unknown) => void) => {
      const finished = frameStack.pop();
      if (finished) {
        const succeeded = finishFrame(finished.node, result.execResult);
        if (result.createdAddress) {
          finished.node.to = result.createdAddress.toString();
        }
        // Events of a reverted frame never happened
        if (succeeded) {
          const parent = frameStack[frameStack.length - 1];
          if (parent) {
            parent.events.push(...finished.events);
          } else {
            rootEvents = finished.events;
          }
        }
      }
      resolve?.();
    };

    evm.events!.on("step", stepHandler);
    evm.events!.on("beforeMessage", beforeMessageHandler);
    evm.events!.on("afterMessage", afterMessageHandler);

    try {
      const gasLimit = params.gasLimit ?? DEFAULT_GAS_LIMIT;
      const caller = createAddressFromString(params.from ?? DEFAULT_CALLER);

      if (params.mode === "deploy") {
        // Deploy: runCall with no `to` triggers CREATE semantics
        await evm.runCall({
          data: decodeHex(params.bytecode),
          gasLimit,
          value: params.value ?? 0n,
          caller,
          origin: caller,
          skipBalance: true,
        });
      } else {
        // Call: runCode doesn't fire beforeMessage, so create root frame manually
        const to = params.to ?? DEFAULT_TO;
        const callRoot: OpenFrame = {
          node: {
            type: "CALL",
            to,
            input: params.calldata ?? "0x",
            gasUsed: 0n,
            children: [],
          },
          events: [],
        };
        root = callRoot;

        // DELEGATECALL and CALLCODE read the executing account from state
        const code = decodeHex(params.bytecode);
        const toAddress = createAddressFromString(to);
        if (!(await evm.stateManager.getAccount(toAddress))) {
          await evm.stateManager.putAccount(toAddress, new Account());
        }
        await evm.stateManager.putCode(toAddress, code);

        frameStack.push(callRoot);
        const execResult = await evm.runCode({
          code,
          data: params.calldata ? decodeHex(params.calldata) : undefined,
          gasLimit,
          value: params.value ?? 0n,
          caller,
          to: toAddress,
        });

        frameStack.pop();
        if (finishFrame(callRoot.node, execResult)) {
          rootEvents = callRoot.events;
        }
      }

      if (handlerError !== undefined) {
        throw handlerError;
      }

      // Sanity check: root should be set by now
      const finalRoot: OpenFrame | null = root;
      if (!finalRoot) {
        throw new Error("Internal error: root frame not initialized");
      }

      const rootNode = finalRoot.node;
      return {
        root: rootNode,
        events: rootEvents,
        storageLogs,
        summary: {
          cyclesUsed,
          computationalGasUsed: rootNode.gasUsed,
          contractsUsed: collectAddresses(rootNode, new Set()).size,
          revertReason: rootNode.revertReason ?? rootNode.error,
        },
      };
    } finally {
      evm.events!.removeListener("step", stepHandler);
      evm.events!.removeListener("beforeMessage", beforeMessageHandler);
      evm.events!.removeListener("afterMessage", afterMessageHandler);
    }
  }

  async resetState(): Promise<void> {
    this.evmPromise = null;
  }
}
