import { formatError } from "../../errors.js";
import { createSubsystemLogger } from "../../logging/subsystem.js";
import { ErrorCodes, errorShape } from "../protocol/index.js";
import { systemHandlers } from "./system.js";
import { taskHandlers } from "./tasks.js";
import type {
  GatewayRequestContext,
  GatewayRequestHandlers,
  GatewayResponse,
} from "./types.js";

const log = createSubsystemLogger("gateway");

export const coordinatorHandlers: GatewayRequestHandlers = {
  ...taskHandlers,
  ...systemHandlers,
};

/**
 * Run one request through the handler table. The first `respond` call wins;
 * a handler that returns without responding is reported as unavailable.
 */
export async function dispatchRequest(
  context: GatewayRequestContext,
  method: string,
  params: Record<string, unknown> = {},
  handlers: GatewayRequestHandlers = coordinatorHandlers,
): Promise<GatewayResponse> {
  const handler = Object.hasOwn(handlers, method) ? handlers[method] : undefined;
  if (!handler) {
    return {
      ok: false,
      error: errorShape(ErrorCodes.INVALID_REQUEST, `unknown method: ${method}`),
    };
  }

  const outcome: { response: GatewayResponse | null } = { response: null };
  try {
    await handler({
      params,
      context,
      respond: (ok, payload, error) => {
        if (outcome.response) {
          log.warn(`${method} responded more than once`);
          return;
        }
        outcome.response = { ok, payload, error };
      },
    });
  } catch (err) {
    log.error(`${method} failed: ${formatError(err)}`);
    return { ok: false, error: errorShape(ErrorCodes.UNAVAILABLE, formatError(err)) };
  }
  return (
    outcome.response ?? {
      ok: false,
      error: errorShape(ErrorCodes.UNAVAILABLE, `${method} gave no response`),
    }
  );
}
