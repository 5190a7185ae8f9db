import crypto from "node:crypto";
import { EventEmitter } from "node:events";
import { InvariantError, NotFoundError, SubmissionError } from "../errors.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import {
  isTerminalState,
  type NewTask,
  type Task,
  type TaskEvent,
  type TaskFilter,
  type TaskLog,
  type TaskLogType,
  type TaskState,
  type TaskSummary,
  type TaskTransitionPatch,
} from "./types.js";

const log = createSubsystemLogger("task-store");

const TRANSITIONS: Record<TaskState, readonly TaskState[]> = {
  pending: ["assigned", "expired", "cancelled"],
  assigned: ["running", "expired", "cancelled"],
  running: ["completed", "failed", "cancelled"],
  completed: [],
  failed: [],
  expired: [],
  cancelled: [],
};

export function genTaskId(): string {
  return "task_" + crypto.randomBytes(8).toString("hex");
}

function genLogId(): string {
  return "tlog_" + Date.now().toString(36) + crypto.randomBytes(4).toString("hex");
}

export function canTransition(from: TaskState, to: TaskState): boolean {
  return TRANSITIONS[from].includes(to);
}

function cloneTask(task: Task): Task {
  return {
    ...task,
    requiredCapabilities: [...task.requiredCapabilities],
    dependencies: [...task.dependencies],
    parameters: { ...task.parameters },
    metadata: task.metadata ? { ...task.metadata } : null,
  };
}

/**
 * In-memory task registry. The single source of truth for task state: every
 * mutation goes through this class, every read returns a copy.
 */
export class TaskStore extends EventEmitter<{ event: [TaskEvent] }> {
  private readonly tasks = new Map<string, Task>();
  private readonly dependents = new Map<string, Set<string>>();
  private readonly logs = new Map<string, TaskLog[]>();
  private readonly waiters = new Map<string, number>();
  private sequence = 0;
  private readonly logLimit: number;
  private readonly now: () => number;

  constructor(opts?: { logLimit?: number; now?: () => number }) {
    super();
    this.logLimit = opts?.logLimit ?? 100;
    this.now = opts?.now ?? Date.now;
  }

  createTask(input: NewTask): Task {
    if (this.tasks.has(input.id)) {
      throw new SubmissionError("DUPLICATE_TASK", `Task already exists: ${input.id}`, {
        taskId: input.id,
      });
    }
    const deps = [...new Set(input.dependencies)];
    for (const depId of deps) {
      if (depId === input.id) {
        throw new SubmissionError("DEPENDENCY_CYCLE", `Task ${input.id} cannot depend on itself`, {
          taskId: input.id,
        });
      }
      if (!this.tasks.has(depId)) {
        throw new SubmissionError("UNKNOWN_DEPENDENCY", `Unknown dependency: ${depId}`, {
          taskId: input.id,
          dependency: depId,
        });
      }
    }
    if (this.reaches(deps, input.id)) {
      throw new SubmissionError(
        "DEPENDENCY_CYCLE",
        `Dependencies of ${input.id} would form a cycle`,
        { taskId: input.id },
      );
    }

    const now = this.now();
    const task: Task = {
      id: input.id,
      description: input.description,
      requiredCapabilities: [...new Set(input.requiredCapabilities)],
      priority: input.priority,
      dependencies: deps,
      deadline: input.deadline,
      executionTimeoutMs: input.executionTimeoutMs ?? null,
      state: "pending",
      assignedAgent: null,
      result: null,
      error: null,
      reason: null,
      parameters: { ...input.parameters },
      metadata: input.metadata ? { ...input.metadata } : null,
      sequence: ++this.sequence,
      createdAt: now,
      updatedAt: now,
      assignedAt: null,
      startedAt: null,
      completedAt: null,
    };
    this.tasks.set(task.id, task);
    for (const depId of deps) {
      let set = this.dependents.get(depId);
      if (!set) {
        set = new Set();
        this.dependents.set(depId, set);
      }
      set.add(task.id);
    }

    this.appendLog({
      taskId: task.id,
      agent: null,
      type: "submitted",
      message: `Task submitted: ${task.description}`,
    });

    const snapshot = cloneTask(task);
    this.emit("event", { type: "task.submitted", task: snapshot });
    return snapshot;
  }

  getTask(id: string): Task | null {
    const task = this.tasks.get(id);
    return task ? cloneTask(task) : null;
  }

  hasTask(id: string): boolean {
    return this.tasks.has(id);
  }

  getState(id: string): TaskState | null {
    return this.tasks.get(id)?.state ?? null;
  }

  /** Tasks in submission order. */
  listTasks(opts?: TaskFilter): Task[] {
    const states =
      opts?.state === undefined
        ? null
        : new Set<TaskState>(typeof opts.state === "string" ? [opts.state] : opts.state);
    const limit = opts?.limit ?? Number.POSITIVE_INFINITY;

    const out: Task[] = [];
    for (const task of this.tasks.values()) {
      if (out.length >= limit) {
        break;
      }
      if (states && !states.has(task.state)) {
        continue;
      }
      if (opts?.agent && task.assignedAgent !== opts.agent) {
        continue;
      }
      out.push(cloneTask(task));
    }
    return out;
  }

  getDependents(id: string): string[] {
    return [...(this.dependents.get(id) ?? [])];
  }

  transition(id: string, to: TaskState, patch?: TaskTransitionPatch): Task {
    const task = this.tasks.get(id);
    if (!task) {
      throw new NotFoundError("TASK_NOT_FOUND", `Task not found: ${id}`, { taskId: id });
    }
    const from = task.state;
    if (!canTransition(from, to)) {
      throw new InvariantError("INVALID_TRANSITION", `Task ${id} cannot move from ${from} to ${to}`, {
        taskId: id,
        from,
        to,
      });
    }

    const now = this.now();
    task.state = to;
    task.updatedAt = now;
    if (patch?.assignedAgent !== undefined) {
      task.assignedAgent = patch.assignedAgent;
    }

    switch (to) {
      case "assigned":
        task.assignedAt = now;
        break;
      case "running":
        task.startedAt = now;
        break;
      case "completed":
        task.result = patch?.result ?? null;
        break;
      case "failed":
        task.error = patch?.error ?? "unknown error";
        break;
      case "expired":
        task.reason = patch?.reason ?? "deadline passed";
        break;
      case "cancelled":
        task.reason = patch?.reason ?? "cancelled";
        break;
      case "pending":
        break;
    }
    if (isTerminalState(to)) {
      task.completedAt = now;
    }

    const agent = task.assignedAgent;
    const message =
      to === "failed"
        ? `Task failed: ${task.error ?? ""}`
        : to === "expired" || to === "cancelled"
          ? `Task ${to}: ${task.reason ?? ""}`
          : `Task ${to}${agent ? ` (agent=${agent})` : ""}`;
    this.appendLog({ taskId: id, agent, type: logTypeFor(to), message });

    const snapshot = cloneTask(task);
    this.emit("event", { type: "task.updated", task: snapshot, from });
    if (to === "completed") {
      this.emit("event", { type: "task.completed", task: snapshot });
    } else if (to === "failed") {
      this.emit("event", { type: "task.failed", task: snapshot, reason: snapshot.error ?? "" });
    } else if (to === "expired") {
      this.emit("event", { type: "task.expired", task: snapshot });
    } else if (to === "cancelled") {
      this.emit("event", { type: "task.cancelled", task: snapshot, reason: snapshot.reason ?? "" });
    }
    return snapshot;
  }

  appendLog(opts: {
    taskId: string;
    agent: string | null;
    type: TaskLogType;
    message: string;
  }): TaskLog {
    const entry: TaskLog = {
      id: genLogId(),
      taskId: opts.taskId,
      agent: opts.agent,
      type: opts.type,
      message: opts.message,
      timestamp: this.now(),
    };
    if (this.logLimit === 0) {
      return entry;
    }
    let entries = this.logs.get(opts.taskId);
    if (!entries) {
      entries = [];
      this.logs.set(opts.taskId, entries);
    }
    entries.push(entry);
    if (entries.length > this.logLimit) {
      entries.splice(0, entries.length - this.logLimit);
    }
    return entry;
  }

  getLogs(taskId: string, opts?: { limit?: number }): TaskLog[] {
    const entries = this.logs.get(taskId) ?? [];
    const limit = opts?.limit ?? entries.length;
    return entries.slice(Math.max(0, entries.length - limit));
  }

  /** Mark a result waiter on a task so eviction leaves it alone. */
  retain(id: string): void {
    this.waiters.set(id, (this.waiters.get(id) ?? 0) + 1);
  }

  release(id: string): void {
    const count = (this.waiters.get(id) ?? 0) - 1;
    if (count > 0) {
      this.waiters.set(id, count);
    } else {
      this.waiters.delete(id);
    }
  }

  /**
   * Remove a terminal task from the registry. Refused while a result waiter
   * holds it or while a non-terminal task still depends on it.
   */
  evictTask(id: string): boolean {
    const task = this.tasks.get(id);
    if (!task) {
      return false;
    }
    if (!isTerminalState(task.state)) {
      throw new InvariantError("TASK_IN_USE", `Task ${id} is still ${task.state}`, { taskId: id });
    }
    if (this.waiters.has(id)) {
      throw new InvariantError("TASK_IN_USE", `Task ${id} has pending result waiters`, {
        taskId: id,
      });
    }
    const liveDependent = this.getDependents(id).find((depId) => {
      const dependent = this.tasks.get(depId);
      return dependent !== undefined && !isTerminalState(dependent.state);
    });
    if (liveDependent) {
      throw new InvariantError("TASK_IN_USE", `Task ${liveDependent} still depends on ${id}`, {
        taskId: id,
        dependent: liveDependent,
      });
    }

    this.tasks.delete(id);
    this.logs.delete(id);
    this.dependents.delete(id);
    for (const depId of task.dependencies) {
      this.dependents.get(depId)?.delete(id);
    }
    log.debug(`evicted task ${id}`);
    this.emit("event", { type: "task.evicted", taskId: id });
    return true;
  }

  getSummary(): TaskSummary {
    const summary: TaskSummary = {
      total: 0,
      pending: 0,
      assigned: 0,
      running: 0,
      completed: 0,
      failed: 0,
      expired: 0,
      cancelled: 0,
    };
    for (const task of this.tasks.values()) {
      summary[task.state] += 1;
      summary.total += 1;
    }
    return summary;
  }

  private reaches(from: readonly string[], target: string): boolean {
    const seen = new Set<string>();
    const stack = [...from];
    while (stack.length > 0) {
      const id = stack.pop();
      if (id === undefined || seen.has(id)) {
        continue;
      }
      if (id === target) {
        return true;
      }
      seen.add(id);
      stack.push(...(this.tasks.get(id)?.dependencies ?? []));
    }
    return false;
  }
}

function logTypeFor(state: TaskState): TaskLogType {
  switch (state) {
    case "running":
      return "started";
    case "pending":
      return "submitted";
    default:
      return state;
  }
}
