import type { MessageBus } from "../messaging/bus.js";
import type { TaskScheduler } from "../tasks/scheduler.js";
import type { TaskStore } from "../tasks/store.js";
import type { AgentRegistry } from "./registry.js";
import type { SystemStatus } from "./types.js";

export function resolveSystemStatus(opts: {
  agents: AgentRegistry;
  store: TaskStore;
  scheduler: TaskScheduler;
  bus: MessageBus;
  running: boolean;
  now?: () => number;
}): SystemStatus {
  const { agents: registry, store, scheduler, bus } = opts;
  const agents = registry.list().map((agent) => agent.getStatus());

  const totals = {
    total: agents.length,
    idle: agents.filter((a) => a.status === "idle").length,
    busy: agents.filter((a) => a.status === "busy").length,
    stopped: agents.filter((a) => a.status === "stopped").length,
  };

  return {
    timestamp: (opts.now ?? Date.now)(),
    running: opts.running,
    agents,
    totals,
    tasks: store.getSummary(),
    starvedTasks: scheduler.findStarvedTasks(),
    overdueTasks: scheduler.findOverdueTasks().map((task) => task.id),
    bus: bus.getStats(),
  };
}
