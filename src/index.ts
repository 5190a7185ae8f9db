export { Agent } from "./agents/agent.js";
export { AgentRegistry } from "./agents/registry.js";
export { resolveSystemStatus } from "./agents/status.js";
export type {
  AgentMetrics,
  AgentOptions,
  AgentSnapshot,
  AgentStatus,
  SystemStatus,
  TaskExecutionContext,
  TaskExecutor,
} from "./agents/types.js";
export { CoordinatorConfigSchema, loadConfigFromEnv, resolveConfig } from "./config/config.js";
export type { CoordinatorConfig } from "./config/config.js";
export {
  ConfigError,
  CoordinatorError,
  InvariantError,
  NotFoundError,
  SubmissionError,
  formatError,
} from "./errors.js";
export type { CoordinatorErrorCode } from "./errors.js";
export * from "./gateway/index.js";
export { createSubsystemLogger } from "./logging/subsystem.js";
export * from "./messaging/index.js";
export * from "./system/index.js";
export * from "./tasks/index.js";
