export { ErrorCodes, errorShape } from "./protocol/index.js";
export type { ErrorCode, ErrorShape } from "./protocol/index.js";
export { coordinatorHandlers, dispatchRequest } from "./server-methods/index.js";
export type {
  GatewayRequestContext,
  GatewayRequestHandler,
  GatewayRequestHandlers,
  GatewayResponse,
} from "./server-methods/types.js";
