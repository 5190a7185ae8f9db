import { Value } from "@sinclair/typebox/value";
import { Agent } from "../agents/agent.js";
import { AgentRegistry } from "../agents/registry.js";
import { resolveSystemStatus } from "../agents/status.js";
import type { AgentOptions, SystemStatus } from "../agents/types.js";
import { MAX_TIMER_DELAY_MS, resolveConfig, type CoordinatorConfig } from "../config/config.js";
import { NotFoundError, SubmissionError } from "../errors.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { MessageBus } from "../messaging/bus.js";
import {
  BROADCAST,
  TaskFailureContentSchema,
  TaskResultContentSchema,
  type Message,
  type MessageType,
} from "../messaging/types.js";
import { TaskScheduler } from "../tasks/scheduler.js";
import { TaskStore } from "../tasks/store.js";
import { startAssignmentTicker, type AssignmentTicker } from "../tasks/ticker.js";
import {
  isTerminalState,
  type Task,
  type TaskDescriptor,
  type TaskEvent,
  type TaskFilter,
  type TaskLog,
} from "../tasks/types.js";

const log = createSubsystemLogger("agent-system");

export interface AgentSystemOptions {
  config?: Partial<CoordinatorConfig>;
  now?: () => number;
}

/**
 * The orchestrator: one task registry, one bus, one set of agents, and the
 * start/stop lifecycle around them. Agents report back by messaging
 * `config.systemId`; those reports are the only way a running task finishes.
 */
export class AgentSystem {
  readonly config: CoordinatorConfig;
  private readonly now: () => number;
  private readonly store: TaskStore;
  private readonly bus: MessageBus;
  private readonly agents = new AgentRegistry();
  private readonly scheduler: TaskScheduler;
  /** Result waiters per task, woken from the one store listener below */
  private readonly resultWaiters = new Map<string, Set<(task: Task) => void>>();
  private ticker: AssignmentTicker | null = null;
  private running = false;
  private stopping: Promise<void> | null = null;

  constructor(opts?: AgentSystemOptions) {
    this.config = resolveConfig(opts?.config);
    this.now = opts?.now ?? Date.now;
    this.store = new TaskStore({ logLimit: this.config.taskLogLimit, now: this.now });
    this.bus = new MessageBus({ historyLimit: this.config.messageHistoryLimit, now: this.now });
    this.scheduler = new TaskScheduler({
      store: this.store,
      agents: this.agents,
      bus: this.bus,
      senderId: this.config.systemId,
      now: this.now,
    });
    this.bus.register(this.config.systemId, (message) => this.handleReport(message), {
      kind: "system",
    });
    this.store.on("event", (event) => this.wakeResultWaiters(event));
  }

  /** Task lifecycle events, for observers. */
  get tasks(): TaskStore {
    return this.store;
  }

  get messages(): MessageBus {
    return this.bus;
  }

  get isRunning(): boolean {
    return this.running;
  }

  registerAgent(agent: Agent): void {
    if (agent.name === this.config.systemId) {
      throw new SubmissionError("INVALID_AGENT", `Agent name is reserved: ${agent.name}`, {
        agent: agent.name,
      });
    }
    if (this.agents.has(agent.name)) {
      throw new SubmissionError("DUPLICATE_AGENT", `Agent already registered: ${agent.name}`, {
        agent: agent.name,
      });
    }
    agent.attach(this.bus, this.config.systemId);
    this.agents.add(agent);
    log.info(`agent registered: ${agent.name}`);
    if (this.running) {
      agent.start();
      this.scheduler.runAssignmentPass();
    }
  }

  createAgent(options: AgentOptions): Agent {
    const agent = new Agent({
      ...options,
      maxConcurrentTasks: options.maxConcurrentTasks ?? this.config.defaultMaxConcurrentTasks,
    });
    this.registerAgent(agent);
    return agent;
  }

  /**
   * Stop and remove an agent. Tasks it still holds once the grace period is
   * over are cancelled.
   */
  async unregisterAgent(name: string): Promise<boolean> {
    const agent = this.agents.get(name);
    if (!agent) {
      return false;
    }
    await agent.stop(this.config.stopGracePeriodMs);
    await this.bus.flush();
    this.agents.remove(name);
    agent.detach();
    for (const task of this.store.listTasks({ state: "running", agent: name })) {
      this.scheduler.cancelTask(task.id, `agent ${name} unregistered`);
    }
    log.info(`agent unregistered: ${name}`);
    if (this.running) {
      this.scheduler.runAssignmentPass();
    }
    return true;
  }

  getAgent(name: string): Agent | null {
    return this.agents.get(name);
  }

  findAgentsByCapability(capability: string): string[] {
    return this.agents.findByCapability(capability);
  }

  /** Returns the new task's id; assignment happens in the pass that follows. */
  submitTask(descriptor: TaskDescriptor): string {
    const task = this.scheduler.submit(descriptor);
    if (this.running) {
      this.scheduler.runAssignmentPass();
    }
    return task.id;
  }

  /**
   * Wait for a task to reach a terminal state. Resolves null on timeout; the
   * task itself is left alone.
   */
  async getTaskResult(taskId: string, timeoutMs?: number): Promise<Task | null> {
    const waitMs = timeoutMs ?? this.config.defaultResultTimeoutMs;
    if (!Number.isFinite(waitMs) || waitMs < 0 || waitMs > MAX_TIMER_DELAY_MS) {
      throw new SubmissionError(
        "INVALID_TIMEOUT",
        `Result timeout must be between 0 and ${MAX_TIMER_DELAY_MS}ms, got ${waitMs}`,
        { taskId, timeoutMs: waitMs },
      );
    }
    const task = this.store.getTask(taskId);
    if (!task) {
      throw new NotFoundError("TASK_NOT_FOUND", `Task not found: ${taskId}`, { taskId });
    }
    if (isTerminalState(task.state)) {
      return task;
    }

    this.store.retain(taskId);
    return await new Promise<Task | null>((resolve) => {
      let waiters = this.resultWaiters.get(taskId);
      if (!waiters) {
        waiters = new Set();
        this.resultWaiters.set(taskId, waiters);
      }
      const registered = waiters;
      const finish = (value: Task | null) => {
        clearTimeout(timer);
        registered.delete(finish);
        if (registered.size === 0 && this.resultWaiters.get(taskId) === registered) {
          this.resultWaiters.delete(taskId);
        }
        this.store.release(taskId);
        resolve(value);
      };
      registered.add(finish);
      const timer = setTimeout(() => finish(null), waitMs);
    });
  }

  /** False when the task had already finished. */
  cancelTask(taskId: string, reason?: string): boolean {
    if (!this.store.hasTask(taskId)) {
      throw new NotFoundError("TASK_NOT_FOUND", `Task not found: ${taskId}`, { taskId });
    }
    const cancelled = this.scheduler.cancelTask(taskId, reason);
    if (cancelled.length > 0 && this.running) {
      this.scheduler.runAssignmentPass();
    }
    return cancelled.length > 0;
  }

  evictTask(taskId: string): boolean {
    return this.store.evictTask(taskId);
  }

  getTask(taskId: string): Task | null {
    return this.store.getTask(taskId);
  }

  listTasks(filter?: TaskFilter): Task[] {
    return this.store.listTasks(filter);
  }

  getTaskLogs(taskId: string, opts?: { limit?: number }): TaskLog[] {
    return this.store.getLogs(taskId, opts);
  }

  sendMessage(recipient: string, type: MessageType, content: unknown): Message {
    return this.bus.send({ sender: this.config.systemId, recipient, type, content });
  }

  broadcast(type: MessageType, content: unknown): Message {
    return this.bus.send({ sender: this.config.systemId, recipient: BROADCAST, type, content });
  }

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    for (const agent of this.agents.list()) {
      agent.start();
    }
    this.ticker = startAssignmentTicker(this.scheduler, this.store, {
      intervalMs: this.config.tickIntervalMs,
      now: this.now,
    });
    log.info(`agent system started (${this.agents.size} agents)`);
    this.scheduler.runAssignmentPass();
  }

  /**
   * Halt the tick, cancel queued work, and give running tasks the grace
   * period to wind down. Whatever is still running afterwards is cancelled.
   */
  async stop(): Promise<void> {
    if (this.stopping) {
      return await this.stopping;
    }
    if (!this.running) {
      return;
    }
    this.stopping = this.shutdown();
    try {
      await this.stopping;
    } finally {
      this.stopping = null;
    }
  }

  getSystemStatus(): SystemStatus {
    return resolveSystemStatus({
      agents: this.agents,
      store: this.store,
      scheduler: this.scheduler,
      bus: this.bus,
      running: this.running,
      now: this.now,
    });
  }

  private async shutdown(): Promise<void> {
    this.running = false;
    this.ticker?.stop();
    this.ticker = null;

    const queued = this.scheduler.cancelWhere(["pending", "assigned"], "system stopped");
    await Promise.all(
      this.agents.list().map((agent) => agent.stop(this.config.stopGracePeriodMs)),
    );
    await this.bus.flush();
    const forced = this.scheduler.cancelWhere(["running"], "system stopped");
    if (forced.length > 0) {
      log.warn(`force-cancelled ${forced.length} running task(s) on stop`);
    }
    log.info(`agent system stopped (${queued.length} queued task(s) cancelled)`);
  }

  private wakeResultWaiters(event: TaskEvent): void {
    if (event.type !== "task.updated" || !isTerminalState(event.task.state)) {
      return;
    }
    const waiters = this.resultWaiters.get(event.task.id);
    if (!waiters) {
      return;
    }
    for (const finish of [...waiters]) {
      finish(event.task);
    }
  }

  private handleReport(message: Message): void {
    const content = message.content;
    switch (message.type) {
      case "task_result":
        if (!Value.Check(TaskResultContentSchema, content)) {
          log.warn(`malformed task_result ${message.id} from ${message.sender}`);
          return;
        }
        this.scheduler.completeTask(content.taskId, message.sender, content.result);
        break;
      case "task_failure":
        if (!Value.Check(TaskFailureContentSchema, content)) {
          log.warn(`malformed task_failure ${message.id} from ${message.sender}`);
          return;
        }
        this.scheduler.failTask(content.taskId, message.sender, content.error, content.cancelled);
        break;
      default:
        log.debug(`${message.type} ${message.id} from ${message.sender}`);
        return;
    }
    if (this.running) {
      this.scheduler.runAssignmentPass();
    }
  }
}
