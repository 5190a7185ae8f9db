import { formatError } from "../errors.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import type { TaskScheduler } from "./scheduler.js";
import type { TaskStore } from "./store.js";

const log = createSubsystemLogger("task-ticker");

const DEFAULT_TICK_INTERVAL_MS = 1_000;

export interface AssignmentTicker {
  stop(): void;
}

/**
 * Runs an assignment pass on a fixed interval so deadlines and execution
 * timeouts are enforced and waiting tasks are retried even when nothing else
 * happens. Each running task
 * found past its deadline is reported once.
 */
export function startAssignmentTicker(
  scheduler: TaskScheduler,
  store: TaskStore,
  opts?: { intervalMs?: number; now?: () => number },
): AssignmentTicker {
  const intervalMs = opts?.intervalMs ?? DEFAULT_TICK_INTERVAL_MS;
  const now = opts?.now ?? Date.now;
  const alerted = new Set<string>();

  function tick(): void {
    try {
      scheduler.runAssignmentPass();

      const overdue = scheduler.findOverdueTasks();
      for (const task of overdue) {
        if (alerted.has(task.id) || task.deadline === null) {
          continue;
        }
        alerted.add(task.id);
        const overdueMs = now() - task.deadline;
        log.warn(
          `task overdue: ${task.id} (agent=${task.assignedAgent ?? "none"}, "${task.description.slice(0, 80)}", ${overdueMs}ms past deadline)`,
        );
        store.appendLog({
          taskId: task.id,
          agent: task.assignedAgent,
          type: "overdue",
          message: `Task still running ${overdueMs}ms past its deadline`,
        });
        store.emit("event", { type: "task.overdue", task, overdueMs });
      }

      // Forget tasks that have since finished
      const overdueIds = new Set(overdue.map((t) => t.id));
      for (const id of alerted) {
        if (!overdueIds.has(id)) {
          alerted.delete(id);
        }
      }
    } catch (err) {
      log.warn(`tick failed: ${formatError(err)}`);
    }
  }

  const interval = setInterval(tick, intervalMs);
  interval.unref();

  log.debug(`assignment ticker started (interval: ${intervalMs}ms)`);

  return {
    stop() {
      clearInterval(interval);
      log.debug("assignment ticker stopped");
    },
  };
}
