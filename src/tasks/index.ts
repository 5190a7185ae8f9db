export { EXECUTION_TIMEOUT_ERROR, TaskScheduler, compareReadyTasks } from "./scheduler.js";
export type { AssignmentPassResult, TaskSchedulerOptions } from "./scheduler.js";
export { TaskStore, canTransition, genTaskId } from "./store.js";
export { startAssignmentTicker } from "./ticker.js";
export type { AssignmentTicker } from "./ticker.js";
export {
  PRIORITY_RANK,
  TASK_STATES,
  TERMINAL_TASK_STATES,
  TaskDescriptorSchema,
  isTaskState,
  isTerminalState,
} from "./types.js";
export type {
  Task,
  TaskDescriptor,
  TaskEvent,
  TaskFilter,
  TaskLog,
  TaskLogType,
  TaskPriority,
  TaskState,
  TaskSummary,
} from "./types.js";
