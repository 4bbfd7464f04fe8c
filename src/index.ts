export * from "./core/types";
export * from "./core/builder";
export { Engine, ZERO_ADDRESS, type EngineOptions, type DeployOptions } from "./core/engine";
export {
  Runtime,
  type Block,
  type DeployOutcome,
  type Receipt,
  type Transaction,
} from "./core/runtime";
export {
  ConfigError,
  DeploymentError,
  EngineError,
  EventFilterError,
  ExecutionFailure,
} from "./core/errors";
export { GAS, GasMeter, failurePolicy, type FailurePolicy } from "./core/gas";
export { StorageModel, type StateDelta, type AccountDump } from "./core/storage";
export { EventLog, MAX_INDEXED_FIELDS } from "./core/events";
export { ReentrancyGuard, type GuardToken } from "./core/guard";
export { CallFrame, type FrameState, type FrameOutcome } from "./core/frame";
export { ContractRegistry, flatten } from "./core/registry";
export { StateJournal, replay } from "./core/journal";
export { computeStateRoot, deriveAddress } from "./core/hash";
export { Mutex } from "./core/lock";
export { asAddress, isAddress } from "./types/brands";
export { loadConfig, resolveConfig, type EngineConfig } from "./config";
export { makeLogger, type ILogger } from "./logging";
