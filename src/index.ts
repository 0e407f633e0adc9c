// Config
export { getConfig, configure, resetConfig, defaults } from "./config.js";
export type { RunConfig, TaskTreeConfig, DeepPartial } from "./config.js";

// Errors
export {
  TaskTreeError,
  SubtaskError,
  ValidationError,
  ParseError,
  ConfigError,
} from "./errors.js";
export type { ErrorCode } from "./errors.js";

// Schemas
export { parseOrThrow, RunConfigSchema, TaskDefinitionSchema, TaskFileSchema, TaskResultSchema } from "./schemas.js";
export type { RunConfigOverrides, TaskDefinition, TaskFile } from "./schemas.js";

// Tasks
export { newTask, TaskSpec } from "./planner/task-spec.js";
export { flattenChain, planBatches, describePlan, countTasks } from "./planner/task-graph.js";
export type { PlannedBatch, PlannedTask } from "./planner/task-graph.js";
export type { TaskAction, TaskCallback, TaskOptions, TaskResult, TaskStatus } from "./planner/types.js";

// Execution
export { run, resolveRunConfig } from "./run.js";
export type { RunOptions } from "./run.js";
export { Executor } from "./executor/executor.js";
export type { ExecutorOptions } from "./executor/executor.js";
export { RuntimeTask, OutputWindow } from "./executor/runtime-task.js";
export type { BatchDisplay, DisplayFactory, ExecutionOptions } from "./executor/types.js";

// Task files
export { parseTaskFile, loadTaskFile, buildSpecs } from "./loader/task-file.js";

// Persistence
export { RunStore } from "./persistence/store.js";
export type { RunRecord } from "./persistence/store.js";

// UI
export { renderTree, SPINNER_FRAMES } from "./ui/renderer.js";
export type { RenderOptions } from "./ui/renderer.js";
export { LiveDisplay, liveDisplay } from "./ui/display.js";
export type { DisplayStream, LiveDisplayOptions } from "./ui/display.js";

// Utils
export { log, setLogLevel } from "./utils/logger.js";
export type { LogLevel } from "./utils/logger.js";
export { StopToken } from "./utils/stop-token.js";
