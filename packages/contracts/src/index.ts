export { SystemContracts } from "./system-contracts.js";
export type {
  BytecodeSource,
  ExecutionIntent,
  ContractCode,
  ContractBundle,
  SystemContractsOptions,
} from "./system-contracts.js";
export { hashBytecode, bytesToBeWords, bytecodeLengthInWords, BytecodeError } from "./bytecode.js";
export {
  builtInArtifacts,
  localArtifacts,
  parseContractArtifact,
  MissingArtifactError,
  CorruptArtifactError,
} from "./artifacts.js";
export type {
  Artifact,
  ArtifactReader,
  BootloaderName,
  DefaultAccountName,
} from "./artifacts.js";
export { bytecodeSourceFromEnv } from "./config.js";
