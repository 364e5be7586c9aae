/**
 * @fsfault/server - filesystem fault injection engine
 */

export {
  FaultEngine,
  type FaultEngineOptions,
  type FaultSession,
  type OpenSessionOptions,
} from "./engine/fault-engine.js";
export {
  FaultTable,
  dumpTable,
  type FaultTableView,
} from "./faults/table.js";
export {
  applyFaultInject,
  applyFaultInjectArgs,
  parseEngineFlag,
} from "./faults/validator.js";
export {
  isSupportedOperation,
  listOperations,
  toOperationName,
} from "./faults/catalog.js";
export {
  codeToName,
  describeErrno,
  errnoMessage,
  findErrorCode,
  findErrorName,
  listErrorDescriptors,
  nameToCode,
  UnknownErrorNameError,
  UnrepresentableErrorCode,
} from "./errors/registry.js";
export { FaultConfigError } from "./errors/config-error.js";
export {
  errnoFailure,
  fromNodeError,
  toErrnoException,
  type FailureTarget,
} from "./errors/failure.js";
export {
  NodeFilesystemProvider,
  type NodeProviderOptions,
  type PlatformCapabilities,
  type SessionState,
} from "./vfs/node-provider.js";
export {
  FaultingFilesystemProvider,
  type FaultingProviderOptions,
} from "./vfs/faulting-provider.js";
export { MountTable, type Mount } from "./vfs/mount-table.js";
export {
  DirectiveSyntaxError,
  loadDirectiveFile,
  parseDirectives,
} from "./config/directives.js";
export { createLogger, type LoggerOptions } from "./logger.js";
