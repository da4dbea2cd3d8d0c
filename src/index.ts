// Values
export {
  VARIABLE_TYPES,
  INVALID_ENTITY_ID,
  isVariableType,
  isInt32,
  boolValue,
  intValue,
  floatValue,
  vectorValue,
  entityValue,
  stringValue,
  zeroValue,
  asBool,
  asInt,
  asFloat,
  asVector,
  asEntityId,
  asString,
  valuesEqual,
  formatValue,
  toPlainValue,
} from "./values/task-value.js";
export type { TaskValue, VariableType, EntityId, ValueOf, PlainValue } from "./values/task-value.js";
export { ZERO_VECTOR, vec3, add, subtract, scale, length, distance, vectorsEqual, formatVector } from "./values/vector.js";
export type { Vector3 } from "./values/vector.js";

// Blackboard
export { LocalBlackboard } from "./blackboard/local-blackboard.js";
export type { BlackboardSchema, RestoreReport, SkippedEntry } from "./blackboard/local-blackboard.js";
export { TYPE_TAGS, encodeEntries, decodeEntries } from "./blackboard/codec.js";
export type { EncodedEntry, DecodedEntry } from "./blackboard/codec.js";

// Graph
export { NODE_NONE, literal, fromVariable } from "./graph/types.js";
export type {
  NodeId,
  TaskNodeKind,
  ParameterBinding,
  VariableDefinition,
  TaskNodeDefinition,
  TaskGraphTemplateInit,
} from "./graph/types.js";
export { TaskGraphTemplate, createTaskGraphTemplate } from "./graph/template.js";
export { loadTemplateFromJson, loadTemplateFromFile, loadTemplateFromObject, buildTemplate } from "./graph/loader.js";
export type { LoadResult } from "./graph/loader.js";
export { TaskGraphAssetManager, INVALID_ASSET_ID } from "./graph/asset-manager.js";
export type { AssetId } from "./graph/asset-manager.js";

// Tasks
export { AtomicTaskRegistry, normalizeTaskId } from "./tasks/registry.js";
export type { AtomicTask, AtomicTaskContext, AtomicTaskFactory, ParameterMap, TaskStatus } from "./tasks/task.js";
export {
  registerBuiltinTasks,
  BUILTIN_TASK_IDS,
  CompareTask,
  compareValues,
  COMPARE_OPERATORS,
  LogMessageTask,
  MoveToLocationTask,
  POSITION_VARIABLE,
  PATH_VARIABLE,
  RequestPathfindingTask,
  SetVariableTask,
  WaitTask,
} from "./tasks/builtin/index.js";
export type { BuiltinTaskDeps, CompareOperator, MovementSettings } from "./tasks/builtin/index.js";
export { PathfindingManager, INVALID_REQUEST_ID } from "./pathfinding/manager.js";
export type { RequestId } from "./pathfinding/manager.js";

// Runtime
export { TaskRunner, RUNNER_STATUSES } from "./runtime/runner.js";
export type { ActiveTask, RunnerSnapshot, RunnerStatus } from "./runtime/runner.js";
export type { TaskWorldFacade, PositionComponent, MovementComponent } from "./runtime/world.js";
export { TaskExecutor, resolveParameters } from "./executor/executor.js";
export type { ExecutorObserver, ExecutorOptions, ExecutorStep, StepOutcome, StepResult } from "./executor/types.js";
export { TaskSystem } from "./task-system.js";
export type { TaskSystemOptions, SpawnOptions, RunOptions, RunSummary } from "./task-system.js";

// Persistence & debug
export { SnapshotStore } from "./persistence/store.js";
export type { StoredSnapshot } from "./persistence/store.js";
export { DebugServer, describeRunner } from "./debug/server.js";
export type { DebugFrame, DebugServerOptions, RunnerState } from "./debug/server.js";

// Config
export { configure, resetConfig, getConfig, defaults } from "./config.js";
export type { TaskSystemConfig } from "./config.js";

// Errors
export {
  TaskSystemError,
  ValueTypeError,
  BlackboardError,
  ValidationError,
  ParseError,
  ConfigError,
  errorMessage,
} from "./errors.js";
export type { ErrorCode } from "./errors.js";

// Schemas
export { parseOrThrow, TaskGraphDocumentSchema, TaskSystemConfigSchema, DebugClientMessageSchema } from "./schemas.js";
export type { TaskGraphDocument, DebugClientMessage } from "./schemas.js";

// Logger
export { log, createLogger, setLogLevel, getLogLevel, setLogSink } from "./utils/logger.js";
export type { LogLevel, LogSink, Logger } from "./utils/logger.js";
