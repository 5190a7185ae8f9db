import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { Agent } from "../agents/agent.js";
import type { TaskExecutionContext, TaskExecutor } from "../agents/types.js";
import { NotFoundError, SubmissionError } from "../errors.js";
import type { Message } from "../messaging/types.js";
import type { Task } from "../tasks/types.js";
import { createDeferred, settle, type Deferred } from "../test-helpers/async.js";
import { AgentSystem } from "./agent-system.js";

function waitForAbort(_task: Task, context: TaskExecutionContext): Promise<never> {
  return new Promise((_resolve, reject) => {
    context.signal.addEventListener("abort", () => reject(new Error("aborted")));
  });
}

describe("AgentSystem", () => {
  let system: AgentSystem;
  let gates: Map<string, Deferred<unknown>>;

  /** Each task runs until the test resolves its gate. */
  const gated: TaskExecutor = (task) => {
    const gate = createDeferred();
    gates.set(task.id, gate);
    return gate.promise;
  };

  function release(taskId: string, value: unknown = `result of ${taskId}`): void {
    const gate = gates.get(taskId);
    if (!gate) {
      throw new Error(`task ${taskId} never started`);
    }
    gate.resolve(value);
  }

  beforeEach(() => {
    gates = new Map();
    system = new AgentSystem({ config: { tickIntervalMs: 60_000, stopGracePeriodMs: 20 } });
  });

  afterEach(async () => {
    await system.stop();
  });

  it("should run a task at once and hold a higher priority one until the agent frees", async () => {
    system.createAgent({ name: "a1", capabilities: ["x"], executor: gated });
    system.start();

    system.submitTask({ id: "t1", description: "a", requiredCapabilities: ["x"], priority: "medium" });
    expect(system.getTask("t1")?.state).toBe("running");

    system.submitTask({ id: "t2", description: "b", requiredCapabilities: ["x"], priority: "high" });
    system.submitTask({ id: "t3", description: "c", requiredCapabilities: ["x"], priority: "high" });
    expect(system.getTask("t2")?.state).toBe("pending");

    release("t1");
    await settle(system.messages);

    expect(system.getTask("t1")).toMatchObject({ state: "completed", result: "result of t1" });
    expect(system.getTask("t2")?.state).toBe("running");
    expect(system.getTask("t3")?.state).toBe("pending");
  });

  it("should not start new work on an agent whose last report is still in flight", async () => {
    system.createAgent({ name: "a1", executor: gated });
    system.start();
    system.submitTask({ id: "t1", description: "a" });

    release("t1");
    // The agent settles and frees its counter before the bus delivers its report.
    await new Promise<void>((resolve) => setImmediate(resolve));
    expect(system.getAgent("a1")?.getStatus().load).toBe(0);

    system.submitTask({ id: "t2", description: "b", priority: "high" });

    expect(system.listTasks({ state: "running", agent: "a1" }).map((task) => task.id)).toEqual([
      "t1",
    ]);
    expect(system.getTask("t2")?.state).toBe("pending");

    await settle(system.messages);

    expect(system.getTask("t1")?.state).toBe("completed");
    expect(system.getTask("t2")?.state).toBe("running");
  });

  it("should reject a dependency on a task that does not exist yet", async () => {
    system.createAgent({ name: "a1", maxConcurrentTasks: 2, executor: gated });
    system.start();

    expect(() => system.submitTask({ id: "t2", description: "b", dependencies: ["t1"] })).toThrow(
      SubmissionError,
    );
    expect(system.listTasks()).toEqual([]);

    system.submitTask({ id: "t1", description: "a" });
    system.submitTask({ id: "t2", description: "b", dependencies: ["t1"] });
    expect(system.getTask("t2")?.state).toBe("pending");

    release("t1");
    await settle(system.messages);

    expect(system.getTask("t2")?.state).toBe("running");
  });

  it("should return null when a result wait times out and leave the task alone", async () => {
    system.createAgent({ name: "a1", capabilities: ["x"] });
    system.start();
    const id = system.submitTask({ description: "needs y", requiredCapabilities: ["y"] });

    const startedAt = Date.now();
    const result = await system.getTaskResult(id, 100);

    expect(result).toBeNull();
    expect(Date.now() - startedAt).toBeGreaterThanOrEqual(90);
    expect(system.getTask(id)?.state).toBe("pending");
  });

  it("should resolve a result wait with the terminal snapshot", async () => {
    system.createAgent({ name: "a1", executor: gated });
    system.start();
    const id = system.submitTask({ id: "t1", description: "a" });

    const waiting = system.getTaskResult(id, 5_000);
    release("t1", { rows: 3 });

    await expect(waiting).resolves.toMatchObject({ id: "t1", state: "completed", result: { rows: 3 } });
  });

  it("should answer a result wait on a finished task at once", async () => {
    const id = system.submitTask({ description: "a" });
    system.cancelTask(id);

    await expect(system.getTaskResult(id, 0)).resolves.toMatchObject({ state: "cancelled" });
  });

  it("should refuse a result wait longer than a timer can hold", async () => {
    const id = system.submitTask({ description: "a" });

    await expect(system.getTaskResult(id, 3_000_000_000)).rejects.toThrow(
      "Result timeout must be between 0 and 2147483647ms, got 3000000000",
    );
    system.cancelTask(id);
    expect(system.evictTask(id)).toBe(true);
  });

  it("should serve many result waiters from a single store listener", async () => {
    const id = system.submitTask({ description: "a" });

    const waiting = Array.from({ length: 15 }, () => system.getTaskResult(id, 5_000));
    expect(system.tasks.listenerCount("event")).toBe(1);

    system.cancelTask(id);
    const results = await Promise.all(waiting);

    expect(results.map((task) => task?.state)).toEqual(Array(15).fill("cancelled"));
    expect(system.evictTask(id)).toBe(true);
  });

  it("should fail a task that outruns its execution timeout on the next tick", async () => {
    const ticking = new AgentSystem({ config: { tickIntervalMs: 10, stopGracePeriodMs: 20 } });
    ticking.createAgent({ name: "a1", executor: waitForAbort });
    ticking.start();
    try {
      const id = ticking.submitTask({ description: "a", executionTimeoutMs: 20 });

      const task = await ticking.getTaskResult(id, 2_000);

      expect(task).toMatchObject({ state: "failed", error: "Task timeout exceeded (20ms)" });
    } finally {
      await ticking.stop();
    }
  });

  it("should reject a result wait on an unknown task", async () => {
    await expect(system.getTaskResult("missing", 10)).rejects.toBeInstanceOf(NotFoundError);
  });

  it("should fail a task and cancel its dependents without running them", async () => {
    system.createAgent({
      name: "a1",
      maxConcurrentTasks: 2,
      executor: () => {
        throw new Error("out of memory");
      },
    });
    system.start();
    system.submitTask({ id: "t1", description: "a" });
    system.submitTask({ id: "t2", description: "b", dependencies: ["t1"] });

    await settle(system.messages);

    expect(system.getTask("t1")).toMatchObject({ state: "failed", error: "out of memory" });
    expect(system.getTask("t2")).toMatchObject({ state: "cancelled", startedAt: null });
  });

  it("should never exceed any agent's concurrency limit", async () => {
    const active = new Map<string, number>();
    const peaks = new Map<string, number>();
    const executor: TaskExecutor = async (_task, context) => {
      const now = (active.get(context.agent) ?? 0) + 1;
      active.set(context.agent, now);
      peaks.set(context.agent, Math.max(peaks.get(context.agent) ?? 0, now));
      await new Promise<void>((resolve) => setImmediate(resolve));
      active.set(context.agent, (active.get(context.agent) ?? 1) - 1);
      return context.agent;
    };
    system.createAgent({ name: "a1", maxConcurrentTasks: 2, executor });
    system.createAgent({ name: "a2", maxConcurrentTasks: 1, executor });
    system.start();

    const ids = Array.from({ length: 10 }, (_, i) => system.submitTask({ description: `job ${i}` }));
    const results = await Promise.all(ids.map((id) => system.getTaskResult(id, 5_000)));

    expect(results.map((task) => task?.state)).toEqual(Array(10).fill("completed"));
    expect(peaks.get("a1")).toBeLessThanOrEqual(2);
    expect(peaks.get("a2")).toBe(1);
  });

  describe("agents", () => {
    it("should reject duplicate and reserved names", () => {
      system.createAgent({ name: "a1" });

      expect(() => system.registerAgent(new Agent({ name: "a1" }))).toThrow(
        "Agent already registered: a1",
      );
      expect(() => system.registerAgent(new Agent({ name: "orchestrator" }))).toThrow(
        "Agent name is reserved: orchestrator",
      );
    });

    it("should apply the configured default concurrency", () => {
      const custom = new AgentSystem({ config: { defaultMaxConcurrentTasks: 3 } });

      expect(custom.createAgent({ name: "a1" }).maxConcurrentTasks).toBe(3);
      expect(custom.createAgent({ name: "a2", maxConcurrentTasks: 1 }).maxConcurrentTasks).toBe(1);
    });

    it("should start an agent registered while running and give it waiting work", () => {
      system.start();
      const id = system.submitTask({ description: "a", requiredCapabilities: ["x"] });

      system.registerAgent(new Agent({ name: "late", capabilities: ["x"], executor: gated }));

      expect(system.getTask(id)).toMatchObject({ state: "running", assignedAgent: "late" });
    });

    it("should cancel the work of an unregistered agent", async () => {
      system.createAgent({ name: "a1", executor: waitForAbort });
      system.start();
      const id = system.submitTask({ description: "a" });

      expect(await system.unregisterAgent("a1")).toBe(true);
      expect(await system.unregisterAgent("a1")).toBe(false);

      expect(system.getTask(id)).toMatchObject({ state: "cancelled", reason: "agent stopped" });
      expect(system.getSystemStatus().agents).toEqual([]);
      expect(system.messages.isRegistered("a1")).toBe(false);
    });

    it("should find agents by capability", () => {
      system.createAgent({ name: "a1", capabilities: ["x"] });
      system.createAgent({ name: "a2", capabilities: ["y"] });

      expect(system.findAgentsByCapability("y")).toEqual(["a2"]);
    });
  });

  describe("messaging", () => {
    it("should broadcast to the agents registered at send time", async () => {
      const inbox: Message[] = [];
      const collect = (message: Message) => void inbox.push(message);
      system.createAgent({ name: "a1", onMessage: collect });
      system.createAgent({ name: "a2", onMessage: collect });

      system.broadcast("status", { phase: "drain" });
      system.createAgent({ name: "a3", onMessage: collect });
      await system.messages.flush();

      expect(inbox.map((m) => m.recipient)).toEqual(["*", "*"]);
      expect(inbox.map((m) => m.sender)).toEqual(["orchestrator", "orchestrator"]);
      expect(inbox).toHaveLength(2);
    });

    it("should drop messages for unknown agents", () => {
      system.sendMessage("ghost", "coordination", null);

      expect(system.messages.getStats().dropped).toBe(1);
    });

    it("should ignore malformed reports", async () => {
      system.createAgent({ name: "a1", executor: gated });
      system.start();
      const id = system.submitTask({ description: "a" });

      system.messages.send({
        sender: "a1",
        recipient: "orchestrator",
        type: "task_result",
        content: { result: "no task id" },
      });
      await system.messages.flush();

      expect(system.getTask(id)?.state).toBe("running");
    });
  });

  describe("lifecycle", () => {
    it("should cancel queued work and stop running work on stop", async () => {
      system.createAgent({ name: "a1", capabilities: ["x"], executor: waitForAbort });
      system.start();
      const running = system.submitTask({ description: "a", requiredCapabilities: ["x"] });
      const queued = system.submitTask({ description: "b", requiredCapabilities: ["gpu"] });

      await system.stop();

      expect(system.isRunning).toBe(false);
      expect(system.getTask(queued)).toMatchObject({ state: "cancelled", reason: "system stopped" });
      expect(system.getTask(running)).toMatchObject({ state: "cancelled", reason: "agent stopped" });
      expect(system.getSystemStatus().totals).toMatchObject({ stopped: 1, busy: 0 });
    });

    it("should cancel work that outlives the grace period", async () => {
      system.createAgent({ name: "a1", executor: () => new Promise(() => {}) });
      system.start();
      const id = system.submitTask({ description: "a" });

      await system.stop();

      expect(system.getTask(id)).toMatchObject({
        state: "cancelled",
        reason: "cancelled: agent stopped before the task finished",
      });
      expect(system.getSystemStatus().agents[0]?.load).toBe(0);
    });

    it("should not assign anything until started", () => {
      system.createAgent({ name: "a1", executor: gated });
      const id = system.submitTask({ description: "a" });

      expect(system.getTask(id)?.state).toBe("pending");
      system.start();
      system.start();
      expect(system.getTask(id)?.state).toBe("running");
    });

    it("should take work again after a restart", async () => {
      system.createAgent({ name: "a1", executor: gated });
      system.start();
      await system.stop();
      await system.stop();

      system.start();
      const id = system.submitTask({ description: "a" });

      expect(system.getTask(id)?.state).toBe("running");
    });
  });

  describe("tasks", () => {
    it("should cancel on request and report whether anything changed", () => {
      const id = system.submitTask({ description: "a" });

      expect(system.cancelTask(id, "changed plans")).toBe(true);
      expect(system.cancelTask(id)).toBe(false);
      expect(() => system.cancelTask("missing")).toThrow(NotFoundError);
      expect(system.getTaskLogs(id).map((entry) => entry.message)).toEqual([
        "Task submitted: a",
        "Task cancelled: changed plans",
      ]);
    });

    it("should evict finished tasks", async () => {
      system.createAgent({ name: "a1" });
      system.start();
      const id = system.submitTask({ description: "a" });
      await system.getTaskResult(id, 5_000);

      expect(system.evictTask(id)).toBe(true);
      expect(system.getTask(id)).toBeNull();
      expect(system.getSystemStatus().tasks.total).toBe(0);
    });

    it("should emit lifecycle events to observers", async () => {
      const seen: string[] = [];
      system.tasks.on("event", (event) => {
        if (event.type !== "task.updated" && event.type !== "task.evicted") {
          seen.push(event.type);
        }
      });
      system.createAgent({ name: "a1" });
      system.start();
      const id = system.submitTask({ description: "a" });
      await system.getTaskResult(id, 5_000);

      expect(seen).toEqual(["task.submitted", "task.completed"]);
    });
  });
});
