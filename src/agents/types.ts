import type { BusStats, Message, MessageHandler, MessageType } from "../messaging/types.js";
import type { Task, TaskSummary } from "../tasks/types.js";

export type AgentStatus = "idle" | "busy" | "stopped";

export interface AgentMetrics {
  tasksCompleted: number;
  tasksFailed: number;
  tasksCancelled: number;
  totalExecutionMs: number;
  lastActivityAt: number | null;
}

export interface AgentSnapshot {
  name: string;
  capabilities: string[];
  maxConcurrentTasks: number;
  load: number;
  status: AgentStatus;
  /** IDs of the tasks currently executing on this agent */
  inFlight: string[];
  metrics: AgentMetrics;
}

export interface TaskExecutionContext {
  agent: string;
  /** Aborted when the task is cancelled or the agent stops */
  signal: AbortSignal;
  send(recipient: string, type: MessageType, content: unknown): Message | null;
}

/** The pluggable work an agent performs for a task. */
export type TaskExecutor = (task: Task, context: TaskExecutionContext) => unknown;

export interface AgentOptions {
  name: string;
  capabilities?: Iterable<string>;
  maxConcurrentTasks?: number;
  executor?: TaskExecutor;
  /** Receives every message delivered to this agent's mailbox */
  onMessage?: MessageHandler;
}

export interface SystemStatus {
  timestamp: number;
  running: boolean;
  agents: AgentSnapshot[];
  totals: {
    total: number;
    idle: number;
    busy: number;
    stopped: number;
  };
  tasks: TaskSummary;
  /** Pending tasks no registered agent has the capabilities for */
  starvedTasks: string[];
  /** Running tasks past their deadline */
  overdueTasks: string[];
  bus: BusStats;
}
