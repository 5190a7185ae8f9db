import { describe, expect, it } from "vitest";
import { MessageBus } from "../messaging/bus.js";
import { TaskScheduler } from "../tasks/scheduler.js";
import { TaskStore } from "../tasks/store.js";
import { Agent } from "./agent.js";
import { AgentRegistry } from "./registry.js";
import { resolveSystemStatus } from "./status.js";

describe("resolveSystemStatus", () => {
  it("should aggregate agents, task counts and liveness signals", () => {
    let clock = 5_000;
    const store = new TaskStore({ now: () => clock });
    const agents = new AgentRegistry();
    const bus = new MessageBus({ now: () => clock });
    const scheduler = new TaskScheduler({ store, agents, bus, senderId: "orchestrator", now: () => clock });

    const worker = new Agent({ name: "worker", capabilities: ["x"], executor: () => new Promise(() => {}) });
    worker.attach(bus, "orchestrator");
    worker.start();
    agents.add(worker);
    agents.add(new Agent({ name: "spare", capabilities: ["x"] }));

    scheduler.submit({ id: "t1", description: "a", requiredCapabilities: ["x"], timeoutMs: 10 });
    scheduler.submit({ id: "t2", description: "b", requiredCapabilities: ["gpu"] });
    scheduler.runAssignmentPass();
    clock = 6_000;

    const status = resolveSystemStatus({ agents, store, scheduler, bus, running: true, now: () => clock });

    expect(status.timestamp).toBe(6_000);
    expect(status.running).toBe(true);
    expect(status.agents.map((a) => [a.name, a.status, a.load])).toEqual([
      ["worker", "busy", 1],
      ["spare", "stopped", 0],
    ]);
    expect(status.totals).toEqual({ total: 2, idle: 0, busy: 1, stopped: 1 });
    expect(status.tasks).toMatchObject({ total: 2, running: 1, pending: 1 });
    expect(status.starvedTasks).toEqual(["t2"]);
    expect(status.overdueTasks).toEqual(["t1"]);
    expect(status.bus).toMatchObject({ sent: 1, endpoints: 1 });
  });
});
