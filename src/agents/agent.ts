import { SubmissionError, formatError } from "../errors.js";
import { createSubsystemLogger, type SubsystemLogger } from "../logging/subsystem.js";
import type { MessageBus } from "../messaging/bus.js";
import type { Message, MessageType } from "../messaging/types.js";
import type { Task } from "../tasks/types.js";
import type {
  AgentMetrics,
  AgentOptions,
  AgentSnapshot,
  AgentStatus,
  TaskExecutionContext,
  TaskExecutor,
} from "./types.js";

interface InFlightTask {
  task: Task;
  controller: AbortController;
  startedAt: number;
  /** Set once the single result/failure report for this task has been sent */
  reported: boolean;
  cancelReason: string | null;
  /** Slot given back; happens once, when the run settles or is abandoned on stop */
  released: boolean;
  done: Promise<void>;
}

interface BusAttachment {
  bus: MessageBus;
  reportTo: string;
}

/**
 * A worker with a fixed capability set and a concurrency limit.
 *
 * The agent owns its load counter: it goes up when `assignTask` accepts and
 * down when the execution settles. Every accepted task produces exactly one
 * `task_result` or `task_failure` message to the orchestrator.
 */
export class Agent {
  readonly name: string;
  readonly maxConcurrentTasks: number;
  private readonly capabilities = new Set<string>();
  private readonly executor: TaskExecutor | null;
  private readonly onMessage: AgentOptions["onMessage"];
  private readonly inFlight = new Map<string, InFlightTask>();
  private readonly metrics: AgentMetrics = {
    tasksCompleted: 0,
    tasksFailed: 0,
    tasksCancelled: 0,
    totalExecutionMs: 0,
    lastActivityAt: null,
  };
  private status: AgentStatus = "stopped";
  private load = 0;
  private attachment: BusAttachment | null = null;
  protected readonly log: SubsystemLogger;

  constructor(opts: AgentOptions) {
    const name = opts.name.trim();
    if (!name) {
      throw new SubmissionError("INVALID_AGENT", "Agent name is required");
    }
    const max = opts.maxConcurrentTasks ?? 1;
    if (!Number.isInteger(max) || max < 1) {
      throw new SubmissionError(
        "INVALID_AGENT",
        `maxConcurrentTasks must be a positive integer, got ${max}`,
        { agent: name },
      );
    }
    this.name = name;
    this.maxConcurrentTasks = max;
    for (const capability of opts.capabilities ?? []) {
      this.addCapability(capability);
    }
    this.executor = opts.executor ?? null;
    this.onMessage = opts.onMessage;
    this.log = createSubsystemLogger(`agent/${name}`);
  }

  addCapability(capability: string): void {
    const tag = capability.trim();
    if (tag) {
      this.capabilities.add(tag);
    }
  }

  hasCapability(capability: string): boolean {
    return this.capabilities.has(capability);
  }

  canHandle(requiredCapabilities: Iterable<string>): boolean {
    for (const capability of requiredCapabilities) {
      if (!this.capabilities.has(capability)) {
        return false;
      }
    }
    return true;
  }

  /**
   * Connect to the bus. Results are reported to `reportTo`; inbound messages
   * go to `onMessage`.
   */
  attach(bus: MessageBus, reportTo: string): void {
    if (this.attachment) {
      this.detach();
    }
    bus.register(this.name, (message) => this.receive(message), { kind: "agent" });
    this.attachment = { bus, reportTo };
  }

  detach(): void {
    if (!this.attachment) {
      return;
    }
    this.attachment.bus.unregister(this.name);
    this.attachment = null;
  }

  start(): void {
    if (this.status !== "stopped") {
      return;
    }
    this.status = this.load > 0 ? "busy" : "idle";
    this.log.info(`agent started (capabilities: ${[...this.capabilities].join(", ") || "none"})`);
  }

  /**
   * Stop taking work, abort everything in flight, and wait up to
   * `gracePeriodMs` for executions to settle. Stragglers are reported as
   * cancelled when the grace period runs out.
   */
  async stop(gracePeriodMs = 0): Promise<void> {
    const wasStopped = this.status === "stopped";
    this.status = "stopped";
    const pending = [...this.inFlight.values()];
    if (pending.length === 0) {
      if (!wasStopped) {
        this.log.info("agent stopped");
      }
      return;
    }

    for (const entry of pending) {
      this.abort(entry, "agent stopped");
    }

    let timer: NodeJS.Timeout | undefined;
    const graceElapsed = new Promise<void>((resolve) => {
      timer = setTimeout(resolve, gracePeriodMs);
    });
    await Promise.race([Promise.all(pending.map((entry) => entry.done)), graceElapsed]);
    clearTimeout(timer);

    for (const entry of pending) {
      if (!entry.reported) {
        this.log.warn(`task ${entry.task.id} did not stop within ${gracePeriodMs}ms`);
        this.reportFailure(entry, "cancelled: agent stopped before the task finished", true);
        this.release(entry);
      }
    }
    this.log.info("agent stopped");
  }

  /**
   * Accept a task if not stopped, below the concurrency limit, and holding
   * every required capability. Execution starts asynchronously.
   */
  assignTask(task: Task): boolean {
    if (this.status === "stopped") {
      return false;
    }
    if (this.load >= this.maxConcurrentTasks) {
      return false;
    }
    if (this.inFlight.has(task.id) || !this.canHandle(task.requiredCapabilities)) {
      return false;
    }

    this.load += 1;
    this.status = "busy";
    this.metrics.lastActivityAt = Date.now();

    const entry: InFlightTask = {
      task: { ...task, requiredCapabilities: [...task.requiredCapabilities] },
      controller: new AbortController(),
      startedAt: Date.now(),
      reported: false,
      cancelReason: null,
      released: false,
      done: Promise.resolve(),
    };
    this.inFlight.set(task.id, entry);
    entry.done = this.run(entry);
    this.log.debug(`accepted task ${task.id} (load ${this.load}/${this.maxConcurrentTasks})`);
    return true;
  }

  /** Abort one in-flight execution. */
  cancelTask(taskId: string, reason = "cancelled"): boolean {
    const entry = this.inFlight.get(taskId);
    if (!entry) {
      return false;
    }
    this.abort(entry, reason);
    return true;
  }

  /** Message another endpoint on the bus; null when the agent is not attached. */
  send(recipient: string, type: MessageType, content: unknown): Message | null {
    if (!this.attachment) {
      return null;
    }
    return this.attachment.bus.send({ sender: this.name, recipient, type, content });
  }

  getStatus(): AgentSnapshot {
    return {
      name: this.name,
      capabilities: [...this.capabilities],
      maxConcurrentTasks: this.maxConcurrentTasks,
      load: this.load,
      status: this.status,
      inFlight: [...this.inFlight.keys()],
      metrics: { ...this.metrics },
    };
  }

  /**
   * The work itself. Subclasses override this; by default the configured
   * executor runs, or a placeholder result is produced.
   */
  protected async perform(task: Task, context: TaskExecutionContext): Promise<unknown> {
    if (this.executor) {
      return await this.executor(task, context);
    }
    return `Task '${task.description}' completed by ${this.name}`;
  }

  private async receive(message: Message): Promise<void> {
    if (message.type === "task_assignment") {
      this.log.debug(`assignment notice ${message.id} from ${message.sender}`);
    }
    if (this.onMessage) {
      await this.onMessage(message);
    }
  }

  private async run(entry: InFlightTask): Promise<void> {
    const { task, controller } = entry;
    const context: TaskExecutionContext = {
      agent: this.name,
      signal: controller.signal,
      send: (recipient, type, content) => this.send(recipient, type, content),
    };
    try {
      const result = await this.perform(task, context);
      if (controller.signal.aborted) {
        this.reportFailure(entry, entry.cancelReason ?? "cancelled", true);
      } else {
        this.reportResult(entry, result);
      }
    } catch (err) {
      if (controller.signal.aborted) {
        this.reportFailure(entry, entry.cancelReason ?? "cancelled", true);
      } else {
        this.reportFailure(entry, formatError(err), false);
      }
    } finally {
      this.release(entry);
    }
  }

  private release(entry: InFlightTask): void {
    if (entry.released) {
      return;
    }
    entry.released = true;
    this.inFlight.delete(entry.task.id);
    this.load -= 1;
    this.metrics.totalExecutionMs += Date.now() - entry.startedAt;
    this.metrics.lastActivityAt = Date.now();
    if (this.status !== "stopped") {
      this.status = this.load > 0 ? "busy" : "idle";
    }
  }

  private abort(entry: InFlightTask, reason: string): void {
    if (entry.controller.signal.aborted) {
      return;
    }
    entry.cancelReason = reason;
    entry.controller.abort(reason);
  }

  private reportResult(entry: InFlightTask, result: unknown): void {
    if (entry.reported) {
      return;
    }
    entry.reported = true;
    this.metrics.tasksCompleted += 1;
    this.report("task_result", { taskId: entry.task.id, result: result ?? null });
  }

  private reportFailure(entry: InFlightTask, error: string, cancelled: boolean): void {
    if (entry.reported) {
      return;
    }
    entry.reported = true;
    if (cancelled) {
      this.metrics.tasksCancelled += 1;
    } else {
      this.metrics.tasksFailed += 1;
    }
    this.report("task_failure", { taskId: entry.task.id, error, cancelled });
  }

  private report(type: "task_result" | "task_failure", content: Record<string, unknown>): void {
    if (!this.attachment) {
      this.log.warn(`no bus attached, ${type} for ${String(content.taskId)} not delivered`);
      return;
    }
    this.attachment.bus.send({
      sender: this.name,
      recipient: this.attachment.reportTo,
      type,
      content,
    });
  }
}
