import { Value } from "@sinclair/typebox/value";
import { MAX_TIMER_DELAY_MS } from "../../config/config.js";
import { TaskDescriptorSchema, isTaskState, type TaskState } from "../../tasks/types.js";
import { ErrorCodes, errorShape } from "../protocol/index.js";
import { readNumber, readString, toErrorShape } from "./shared.js";
import type { GatewayRequestHandlers } from "./types.js";

function readStates(params: Record<string, unknown>): TaskState[] | undefined | null {
  const raw = params.state;
  if (raw === undefined) {
    return undefined;
  }
  const values: unknown[] = Array.isArray(raw) ? raw : [raw];
  const states = values.filter(isTaskState);
  return states.length === values.length ? states : null;
}

export const taskHandlers: GatewayRequestHandlers = {
  "tasks.submit": ({ params, respond, context }) => {
    if (!Value.Check(TaskDescriptorSchema, params)) {
      const first = Value.Errors(TaskDescriptorSchema, params).First();
      respond(
        false,
        undefined,
        errorShape(
          ErrorCodes.INVALID_REQUEST,
          `invalid task${first ? ` at ${first.path || "/"}: ${first.message}` : ""}`,
        ),
      );
      return;
    }
    try {
      const taskId = context.system.submitTask(params);
      respond(true, { taskId, task: context.system.getTask(taskId) });
    } catch (err) {
      respond(false, undefined, toErrorShape(err));
    }
  },

  "tasks.get": ({ params, respond, context }) => {
    const taskId = readString(params, "taskId");
    if (!taskId) {
      respond(false, undefined, errorShape(ErrorCodes.INVALID_REQUEST, "taskId is required"));
      return;
    }
    const task = context.system.getTask(taskId);
    if (!task) {
      respond(false, undefined, errorShape(ErrorCodes.NOT_FOUND, `Task not found: ${taskId}`));
      return;
    }
    const logs = context.system.getTaskLogs(taskId, { limit: 20 });
    respond(true, { task, logs });
  },

  "tasks.list": ({ params, respond, context }) => {
    const state = readStates(params);
    if (state === null) {
      respond(false, undefined, errorShape(ErrorCodes.INVALID_REQUEST, "invalid state filter"));
      return;
    }
    const tasks = context.system.listTasks({
      state,
      agent: readString(params, "agent"),
      limit: readNumber(params, "limit"),
    });
    respond(true, { tasks, count: tasks.length });
  },

  "tasks.result": async ({ params, respond, context }) => {
    const taskId = readString(params, "taskId");
    if (!taskId) {
      respond(false, undefined, errorShape(ErrorCodes.INVALID_REQUEST, "taskId is required"));
      return;
    }
    const timeoutMs = readNumber(params, "timeoutMs");
    if (
      timeoutMs !== undefined &&
      (!Number.isFinite(timeoutMs) || timeoutMs < 0 || timeoutMs > MAX_TIMER_DELAY_MS)
    ) {
      respond(
        false,
        undefined,
        errorShape(ErrorCodes.INVALID_REQUEST, `invalid timeoutMs: ${timeoutMs}`),
      );
      return;
    }
    try {
      const task = await context.system.getTaskResult(taskId, timeoutMs);
      respond(true, { task, timedOut: task === null });
    } catch (err) {
      respond(false, undefined, toErrorShape(err));
    }
  },

  "tasks.cancel": ({ params, respond, context }) => {
    const taskId = readString(params, "taskId");
    if (!taskId) {
      respond(false, undefined, errorShape(ErrorCodes.INVALID_REQUEST, "taskId is required"));
      return;
    }
    try {
      const cancelled = context.system.cancelTask(taskId, readString(params, "reason"));
      respond(true, { cancelled, task: context.system.getTask(taskId) });
    } catch (err) {
      respond(false, undefined, toErrorShape(err));
    }
  },

  "tasks.logs": ({ params, respond, context }) => {
    const taskId = readString(params, "taskId");
    if (!taskId) {
      respond(false, undefined, errorShape(ErrorCodes.INVALID_REQUEST, "taskId is required"));
      return;
    }
    if (!context.system.getTask(taskId)) {
      respond(false, undefined, errorShape(ErrorCodes.NOT_FOUND, `Task not found: ${taskId}`));
      return;
    }
    const logs = context.system.getTaskLogs(taskId, { limit: readNumber(params, "limit") });
    respond(true, { logs });
  },

  "tasks.evict": ({ params, respond, context }) => {
    const taskId = readString(params, "taskId");
    if (!taskId) {
      respond(false, undefined, errorShape(ErrorCodes.INVALID_REQUEST, "taskId is required"));
      return;
    }
    try {
      if (!context.system.evictTask(taskId)) {
        respond(false, undefined, errorShape(ErrorCodes.NOT_FOUND, `Task not found: ${taskId}`));
        return;
      }
      respond(true, { evicted: taskId });
    } catch (err) {
      respond(false, undefined, toErrorShape(err));
    }
  },
};
