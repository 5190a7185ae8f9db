import { Type, type Static } from "@sinclair/typebox";

export type TaskState =
  | "pending"
  | "assigned"
  | "running"
  | "completed"
  | "failed"
  | "expired"
  | "cancelled";

export type TaskPriority = "critical" | "high" | "medium" | "low";

export const TASK_STATES: readonly TaskState[] = [
  "pending",
  "assigned",
  "running",
  "completed",
  "failed",
  "expired",
  "cancelled",
];

export const TERMINAL_TASK_STATES: ReadonlySet<TaskState> = new Set<TaskState>([
  "completed",
  "failed",
  "expired",
  "cancelled",
]);

/** Dependents of a task that ends in one of these states can never run. */
export const UNSATISFIABLE_TASK_STATES: ReadonlySet<TaskState> = new Set<TaskState>([
  "failed",
  "expired",
  "cancelled",
]);

export const PRIORITY_RANK: Record<TaskPriority, number> = {
  low: 1,
  medium: 2,
  high: 3,
  critical: 4,
};

export function isTaskState(value: unknown): value is TaskState {
  return TASK_STATES.some((state) => state === value);
}

export function isTerminalState(state: TaskState): boolean {
  return TERMINAL_TASK_STATES.has(state);
}

export type TaskLogType =
  | "submitted"
  | "assigned"
  | "started"
  | "completed"
  | "failed"
  | "expired"
  | "cancelled"
  | "overdue";

export interface Task {
  id: string;
  description: string;
  requiredCapabilities: string[];
  priority: TaskPriority;
  /** Task IDs that must be completed before this one becomes ready */
  dependencies: string[];
  /** Absolute deadline (epoch ms); the task expires if it has not started by then */
  deadline: number | null;
  /** Running tasks that take longer than this are failed and aborted */
  executionTimeoutMs: number | null;
  state: TaskState;
  assignedAgent: string | null;
  /** Result payload; only set once the task is completed */
  result: unknown;
  /** Execution failure reason; only set once the task has failed */
  error: string | null;
  /** Why the task expired or was cancelled */
  reason: string | null;
  parameters: Record<string, unknown>;
  metadata: Record<string, unknown> | null;
  /** Monotonic submission counter, FIFO tie-break within a priority */
  sequence: number;
  createdAt: number;
  updatedAt: number;
  assignedAt: number | null;
  startedAt: number | null;
  completedAt: number | null;
}

const PrioritySchema = Type.Union([
  Type.Literal("critical"),
  Type.Literal("high"),
  Type.Literal("medium"),
  Type.Literal("low"),
]);

export const TaskDescriptorSchema = Type.Object({
  id: Type.Optional(Type.String({ minLength: 1 })),
  description: Type.String({ minLength: 1 }),
  requiredCapabilities: Type.Optional(Type.Array(Type.String({ minLength: 1 }))),
  priority: Type.Optional(PrioritySchema),
  dependencies: Type.Optional(Type.Array(Type.String({ minLength: 1 }))),
  deadline: Type.Optional(Type.Union([Type.Number(), Type.Null()])),
  /** Relative alternative to `deadline`, counted from submission */
  timeoutMs: Type.Optional(Type.Number({ minimum: 0 })),
  executionTimeoutMs: Type.Optional(Type.Integer({ minimum: 1 })),
  parameters: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
  metadata: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
});

/** What a caller submits; everything else on a Task is assigned by the coordinator. */
export type TaskDescriptor = Static<typeof TaskDescriptorSchema>;

export interface NewTask {
  id: string;
  description: string;
  requiredCapabilities: string[];
  priority: TaskPriority;
  dependencies: string[];
  deadline: number | null;
  executionTimeoutMs?: number | null;
  parameters: Record<string, unknown>;
  metadata: Record<string, unknown> | null;
}

export interface TaskTransitionPatch {
  assignedAgent?: string;
  result?: unknown;
  error?: string;
  reason?: string;
}

export interface TaskLog {
  id: string;
  taskId: string;
  agent: string | null;
  type: TaskLogType;
  message: string;
  timestamp: number;
}

export type TaskEvent =
  | { type: "task.submitted"; task: Task }
  | { type: "task.updated"; task: Task; from: TaskState }
  | { type: "task.completed"; task: Task }
  | { type: "task.failed"; task: Task; reason: string }
  | { type: "task.expired"; task: Task }
  | { type: "task.cancelled"; task: Task; reason: string }
  | { type: "task.overdue"; task: Task; overdueMs: number }
  | { type: "task.evicted"; taskId: string };

export type TaskSummary = Record<TaskState, number> & { total: number };

export interface TaskFilter {
  state?: TaskState | readonly TaskState[];
  agent?: string;
  limit?: number;
}
