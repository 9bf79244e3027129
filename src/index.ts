export { BUILTIN_CATALOG, BUILTIN_FACTORIES, taskId } from "./catalog";
export { Command, COMMAND_PREFIX, parseCommand } from "./command";
export { CommandDispatcher } from "./dispatcher";
export {
  HelperMissingError,
  InvocationCancelledError,
  LogicalFailureError,
  ProcessExitCodeError,
  RegistrationError,
  UnsupportedPluginError,
} from "./errors";
export {
  type CommandInvocation,
  type InvocationOutcome,
  type InvocationRequest,
  PluginExecutor,
  type PluginExecutorOptions,
  type TaskInvocation,
} from "./executor";
export {
  Job,
  type JobContext,
  type JobOptions,
  type JobOutput,
  JobResult,
} from "./job";
export {
  AsyncCommandHandle,
  AsyncCommandLedger,
  type AsyncCommandResult,
  type JoinedLedger,
} from "./ledger";
export { PluginManager, type PluginManagerOptions } from "./manager";
export {
  ChildProcessInvoker,
  LineChannel,
  type ProcessInvoker,
  type ProcessLine,
  type ProcessRequest,
  type ProcessRun,
} from "./process";
export {
  type PluginCatalog,
  PluginRegistry,
  populateRegistry,
} from "./registry";
export {
  type PluginFactory,
  type ResolutionContext,
  TypeResolver,
} from "./resolver";
export { JobRunner, type TaskStep } from "./runner";
export type * from "./types";
export { Variables, type VariableMap, type VariableValue } from "./variables";
