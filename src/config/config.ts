import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ConfigError } from "../errors.js";

/** Longest delay a Node timer honours; anything above fires after 1ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export const CoordinatorConfigSchema = Type.Object(
  {
    /** Bus address the orchestrator receives agent reports on */
    systemId: Type.String({ minLength: 1, default: "orchestrator" }),
    tickIntervalMs: Type.Integer({ minimum: 1, maximum: MAX_TIMER_DELAY_MS, default: 1_000 }),
    defaultResultTimeoutMs: Type.Integer({
      minimum: 0,
      maximum: MAX_TIMER_DELAY_MS,
      default: 30_000,
    }),
    /** How long stopping agents may keep running tasks before they are force-cancelled */
    stopGracePeriodMs: Type.Integer({ minimum: 0, maximum: MAX_TIMER_DELAY_MS, default: 5_000 }),
    defaultMaxConcurrentTasks: Type.Integer({ minimum: 1, default: 1 }),
    messageHistoryLimit: Type.Integer({ minimum: 0, default: 1_000 }),
    taskLogLimit: Type.Integer({ minimum: 0, default: 100 }),
  },
  { additionalProperties: false },
);

export type CoordinatorConfig = Static<typeof CoordinatorConfigSchema>;

const ENV_KEYS: Record<keyof CoordinatorConfig, string> = {
  systemId: "COORDINATOR_SYSTEM_ID",
  tickIntervalMs: "COORDINATOR_TICK_INTERVAL_MS",
  defaultResultTimeoutMs: "COORDINATOR_RESULT_TIMEOUT_MS",
  stopGracePeriodMs: "COORDINATOR_STOP_GRACE_MS",
  defaultMaxConcurrentTasks: "COORDINATOR_MAX_CONCURRENT_TASKS",
  messageHistoryLimit: "COORDINATOR_MESSAGE_HISTORY_LIMIT",
  taskLogLimit: "COORDINATOR_TASK_LOG_LIMIT",
};

export function resolveConfig(overrides?: Partial<CoordinatorConfig>): CoordinatorConfig {
  const candidate: unknown = Value.Default(CoordinatorConfigSchema, Value.Clone(overrides ?? {}));
  if (!Value.Check(CoordinatorConfigSchema, candidate)) {
    const first = Value.Errors(CoordinatorConfigSchema, candidate).First();
    const at = first?.path || "/";
    throw new ConfigError("INVALID_CONFIG", `invalid config at ${at}: ${first?.message ?? "unknown"}`, {
      path: at,
    });
  }
  return candidate;
}

export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): CoordinatorConfig {
  const overrides: Partial<CoordinatorConfig> = {};

  const systemId = env[ENV_KEYS.systemId]?.trim();
  if (systemId) {
    overrides.systemId = systemId;
  }

  const numericKeys = [
    "tickIntervalMs",
    "defaultResultTimeoutMs",
    "stopGracePeriodMs",
    "defaultMaxConcurrentTasks",
    "messageHistoryLimit",
    "taskLogLimit",
  ] as const;
  for (const key of numericKeys) {
    const raw = env[ENV_KEYS[key]]?.trim();
    if (!raw) {
      continue;
    }
    const value = Number(raw);
    if (!Number.isFinite(value)) {
      throw new ConfigError("INVALID_CONFIG", `${ENV_KEYS[key]} must be a number, got "${raw}"`, {
        variable: ENV_KEYS[key],
      });
    }
    overrides[key] = value;
  }

  return resolveConfig(overrides);
}
