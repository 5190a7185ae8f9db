import { Value } from "@sinclair/typebox/value";
import type { Agent } from "../agents/agent.js";
import type { AgentRegistry } from "../agents/registry.js";
import { SubmissionError, formatError } from "../errors.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import type { MessageBus } from "../messaging/bus.js";
import type { TaskAssignmentContent } from "../messaging/types.js";
import { genTaskId, type TaskStore } from "./store.js";
import {
  PRIORITY_RANK,
  TaskDescriptorSchema,
  UNSATISFIABLE_TASK_STATES,
  isTerminalState,
  type Task,
  type TaskDescriptor,
  type TaskState,
} from "./types.js";

const log = createSubsystemLogger("task-scheduler");

export interface AssignmentPassResult {
  assigned: Array<{ taskId: string; agent: string }>;
  /** Running tasks failed for exceeding their execution timeout */
  timedOut: string[];
  expired: string[];
  cancelled: string[];
}

/** Error recorded on a running task that outlived its execution timeout. */
export const EXECUTION_TIMEOUT_ERROR = "Task timeout exceeded";

export interface TaskSchedulerOptions {
  store: TaskStore;
  agents: AgentRegistry;
  bus: MessageBus;
  /** Bus address assignment notices are sent from */
  senderId: string;
  now?: () => number;
}

/** Higher priority first, then earlier submission. */
export function compareReadyTasks(a: Task, b: Task): number {
  const byPriority = PRIORITY_RANK[b.priority] - PRIORITY_RANK[a.priority];
  return byPriority !== 0 ? byPriority : a.sequence - b.sequence;
}

/**
 * Owns the assignment pass: expiry, dependency gating, priority ordering and
 * agent matching. Every method runs to completion without awaiting, which is
 * what keeps the task registry single-writer.
 */
export class TaskScheduler {
  private readonly store: TaskStore;
  private readonly agents: AgentRegistry;
  private readonly bus: MessageBus;
  private readonly senderId: string;
  private readonly now: () => number;
  private passing = false;
  private passRequested = false;

  constructor(opts: TaskSchedulerOptions) {
    this.store = opts.store;
    this.agents = opts.agents;
    this.bus = opts.bus;
    this.senderId = opts.senderId;
    this.now = opts.now ?? Date.now;
  }

  submit(descriptor: TaskDescriptor): Task {
    if (!Value.Check(TaskDescriptorSchema, descriptor)) {
      const first = Value.Errors(TaskDescriptorSchema, descriptor).First();
      throw new SubmissionError(
        "INVALID_TASK",
        `Invalid task${first ? ` at ${first.path || "/"}: ${first.message}` : ""}`,
      );
    }
    const now = this.now();
    const deadline =
      descriptor.deadline ??
      (descriptor.timeoutMs !== undefined ? now + descriptor.timeoutMs : null);

    const task = this.store.createTask({
      id: descriptor.id ?? genTaskId(),
      description: descriptor.description,
      requiredCapabilities: descriptor.requiredCapabilities ?? [],
      priority: descriptor.priority ?? "medium",
      dependencies: descriptor.dependencies ?? [],
      deadline,
      executionTimeoutMs: descriptor.executionTimeoutMs ?? null,
      parameters: descriptor.parameters ?? {},
      metadata: descriptor.metadata ?? null,
    });
    log.debug(`submitted ${task.id} (${task.priority}): ${task.description}`);
    return task;
  }

  /**
   * One pass over the registry. Requests made while a pass is running (for
   * instance from inside an agent's `assignTask`) are folded into a re-run of
   * the same pass rather than nesting.
   */
  runAssignmentPass(): AssignmentPassResult {
    const total: AssignmentPassResult = { assigned: [], timedOut: [], expired: [], cancelled: [] };
    if (this.passing) {
      this.passRequested = true;
      return total;
    }
    this.passing = true;
    try {
      do {
        this.passRequested = false;
        const result = this.pass();
        total.assigned.push(...result.assigned);
        total.timedOut.push(...result.timedOut);
        total.expired.push(...result.expired);
        total.cancelled.push(...result.cancelled);
      } while (this.passRequested);
    } finally {
      this.passing = false;
    }
    if (
      total.assigned.length ||
      total.timedOut.length ||
      total.expired.length ||
      total.cancelled.length
    ) {
      log.debug(
        `pass: assigned=${total.assigned.length} timedOut=${total.timedOut.length} expired=${total.expired.length} cancelled=${total.cancelled.length}`,
      );
    }
    return total;
  }

  completeTask(taskId: string, agent: string, result: unknown): boolean {
    if (!this.acceptsReport(taskId, agent, "task_result")) {
      return false;
    }
    this.store.transition(taskId, "completed", { result });
    log.debug(`task ${taskId} completed by ${agent}`);
    return true;
  }

  /**
   * Apply a failure report. Failures marked `cancelled` (agent stopped or
   * task aborted) end as cancelled; anything else is terminal FAILED, with no
   * automatic retry.
   */
  failTask(taskId: string, agent: string, error: string, cancelled: boolean): string[] {
    if (!this.acceptsReport(taskId, agent, "task_failure")) {
      return [];
    }
    if (cancelled) {
      this.store.transition(taskId, "cancelled", { reason: error });
    } else {
      this.store.transition(taskId, "failed", { error });
      log.info(`task ${taskId} failed on ${agent}: ${error}`);
    }
    return this.cancelDependents(taskId);
  }

  /**
   * Cancel a non-terminal task. A running task's agent is asked to abort; the
   * task is marked cancelled without waiting for it.
   */
  cancelTask(taskId: string, reason = "cancelled by request"): string[] {
    const task = this.store.getTask(taskId);
    if (!task || isTerminalState(task.state)) {
      return [];
    }
    this.store.transition(taskId, "cancelled", { reason });
    if (task.state === "running" && task.assignedAgent) {
      this.agents.get(task.assignedAgent)?.cancelTask(taskId, reason);
    }
    return [taskId, ...this.cancelDependents(taskId)];
  }

  cancelWhere(states: readonly TaskState[], reason: string): string[] {
    const cancelled: string[] = [];
    for (const task of this.store.listTasks({ state: states })) {
      // Earlier cascades in this loop may already have finished it.
      const current = this.store.getState(task.id);
      if (current === null || isTerminalState(current)) {
        continue;
      }
      cancelled.push(...this.cancelTask(task.id, reason));
    }
    return cancelled;
  }

  /** Ready-but-unmatchable tasks: no registered agent has the capabilities. */
  findStarvedTasks(): string[] {
    const agents = this.agents.list();
    return this.store
      .listTasks({ state: "pending" })
      .filter((task) => this.dependenciesCompleted(task))
      .filter((task) => !agents.some((agent) => agent.canHandle(task.requiredCapabilities)))
      .map((task) => task.id);
  }

  findOverdueTasks(): Task[] {
    const now = this.now();
    return this.store
      .listTasks({ state: "running" })
      .filter((task) => task.deadline !== null && task.deadline <= now);
  }

  private pass(): AssignmentPassResult {
    const result: AssignmentPassResult = { assigned: [], timedOut: [], expired: [], cancelled: [] };
    const now = this.now();

    for (const task of this.store.listTasks({ state: "running" })) {
      if (task.executionTimeoutMs === null || task.startedAt === null) {
        continue;
      }
      if (now - task.startedAt <= task.executionTimeoutMs) {
        continue;
      }
      this.store.transition(task.id, "failed", {
        error: `${EXECUTION_TIMEOUT_ERROR} (${task.executionTimeoutMs}ms)`,
      });
      log.info(`task ${task.id} timed out on ${task.assignedAgent ?? "no agent"}`);
      if (task.assignedAgent) {
        this.agents.get(task.assignedAgent)?.cancelTask(task.id, "execution timeout");
      }
      result.timedOut.push(task.id);
      result.cancelled.push(...this.cancelDependents(task.id));
    }

    for (const task of this.store.listTasks({ state: ["pending", "assigned"] })) {
      if (task.deadline === null || task.deadline > now) {
        continue;
      }
      const current = this.store.getState(task.id);
      if (current !== "pending" && current !== "assigned") {
        continue;
      }
      this.store.transition(task.id, "expired", {
        reason: `deadline passed ${now - task.deadline}ms ago`,
      });
      result.expired.push(task.id);
      result.cancelled.push(...this.cancelDependents(task.id));
    }

    for (const task of this.store.listTasks({ state: "pending" })) {
      const blocker = task.dependencies.find((depId) => {
        const state = this.store.getState(depId);
        return state !== null && UNSATISFIABLE_TASK_STATES.has(state);
      });
      if (!blocker || this.store.getState(task.id) !== "pending") {
        continue;
      }
      result.cancelled.push(
        ...this.cancelTask(task.id, `dependency ${blocker} ${this.store.getState(blocker) ?? ""}`),
      );
    }

    const ready = this.store
      .listTasks({ state: "pending" })
      .filter((task) => this.dependenciesCompleted(task))
      .sort(compareReadyTasks);

    for (const task of ready) {
      try {
        const agent = this.pickAgent(task);
        if (!agent) {
          continue;
        }
        if (this.assign(task, agent)) {
          result.assigned.push({ taskId: task.id, agent: agent.name });
        }
      } catch (err) {
        log.error(`assignment of ${task.id} abandoned: ${formatError(err)}`);
      }
    }
    return result;
  }

  private dependenciesCompleted(task: Task): boolean {
    return task.dependencies.every((depId) => this.store.getState(depId) === "completed");
  }

  /**
   * Slots in use as far as the registry knows. An agent frees its own counter
   * when the execution settles, before its report has been applied, so the
   * larger of the two counts is the one that holds.
   */
  private occupiedSlots(agent: Agent, load: number): number {
    const held = this.store.listTasks({ state: ["assigned", "running"], agent: agent.name }).length;
    return Math.max(load, held);
  }

  /**
   * Eligible: not stopped, spare capacity, every required capability. Most
   * spare capacity wins; ties go to the earliest registered agent.
   */
  private pickAgent(task: Task): Agent | null {
    let best: { agent: Agent; spare: number } | null = null;
    for (const agent of this.agents.list()) {
      const status = agent.getStatus();
      const spare = status.maxConcurrentTasks - this.occupiedSlots(agent, status.load);
      if (status.status === "stopped" || spare <= 0) {
        continue;
      }
      if (!agent.canHandle(task.requiredCapabilities)) {
        continue;
      }
      if (!best || spare > best.spare) {
        best = { agent, spare };
      }
    }
    return best?.agent ?? null;
  }

  private assign(task: Task, agent: Agent): boolean {
    const handoff: Task = {
      ...task,
      state: "running",
      assignedAgent: agent.name,
      assignedAt: this.now(),
      startedAt: this.now(),
    };
    if (!agent.assignTask(handoff)) {
      log.debug(`agent ${agent.name} declined ${task.id}`);
      return false;
    }
    this.store.transition(task.id, "assigned", { assignedAgent: agent.name });
    this.store.transition(task.id, "running");

    const notice: TaskAssignmentContent = {
      taskId: task.id,
      description: task.description,
      priority: task.priority,
    };
    this.bus.send({
      sender: this.senderId,
      recipient: agent.name,
      type: "task_assignment",
      content: notice,
    });
    log.debug(`assigned ${task.id} to ${agent.name}`);
    return true;
  }

  private acceptsReport(taskId: string, agent: string, kind: string): boolean {
    const task = this.store.getTask(taskId);
    if (!task) {
      log.warn(`${kind} from ${agent} for unknown task ${taskId} ignored`);
      return false;
    }
    if (task.state !== "running" || task.assignedAgent !== agent) {
      log.warn(
        `${kind} from ${agent} for task ${taskId} ignored (state=${task.state}, agent=${task.assignedAgent ?? "none"})`,
      );
      return false;
    }
    return true;
  }

  private cancelDependents(taskId: string): string[] {
    const cancelled: string[] = [];
    const queue = this.store.getDependents(taskId);
    while (queue.length > 0) {
      const id = queue.shift();
      if (id === undefined) {
        break;
      }
      const state = this.store.getState(id);
      if (state === null || isTerminalState(state)) {
        continue;
      }
      this.store.transition(id, "cancelled", { reason: `dependency ${taskId} did not complete` });
      cancelled.push(id);
      queue.push(...this.store.getDependents(id));
    }
    return cancelled;
  }
}
