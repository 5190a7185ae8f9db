import type { AgentSystem } from "../../system/agent-system.js";
import type { ErrorShape } from "../protocol/index.js";

export type RespondFn = (ok: boolean, payload?: unknown, error?: ErrorShape) => void;

export interface GatewayRequestContext {
  system: AgentSystem;
}

export interface GatewayRequestOptions {
  params: Record<string, unknown>;
  respond: RespondFn;
  context: GatewayRequestContext;
}

export type GatewayRequestHandler = (opts: GatewayRequestOptions) => Promise<void> | void;

export type GatewayRequestHandlers = Record<string, GatewayRequestHandler>;

export interface GatewayResponse {
  ok: boolean;
  payload?: unknown;
  error?: ErrorShape;
}
