export { AgentSystem } from "./agent-system.js";
export type { AgentSystemOptions } from "./agent-system.js";
