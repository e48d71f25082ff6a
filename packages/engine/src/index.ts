export type { TraceEngine, ExecutionParams } from "./engine-types.js";

export { EthereumjsEngine } from "./ethereumjs-engine.js";
export { decodeRevertReason } from "./revert-reason.js";
