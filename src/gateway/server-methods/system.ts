import { BROADCAST, isMessageType } from "../../messaging/types.js";
import { ErrorCodes, errorShape } from "../protocol/index.js";
import { readString, toErrorShape } from "./shared.js";
import type { GatewayRequestHandlers } from "./types.js";

export const systemHandlers: GatewayRequestHandlers = {
  "agents.list": ({ params, respond, context }) => {
    const capability = readString(params, "capability");
    const { agents } = context.system.getSystemStatus();
    respond(true, {
      agents: capability ? agents.filter((a) => a.capabilities.includes(capability)) : agents,
    });
  },

  "system.status": ({ respond, context }) => {
    respond(true, context.system.getSystemStatus());
  },

  "messages.send": ({ params, respond, context }) => {
    const recipient = readString(params, "recipient");
    if (!recipient) {
      respond(false, undefined, errorShape(ErrorCodes.INVALID_REQUEST, "recipient is required"));
      return;
    }
    const type = params.type ?? "coordination";
    if (!isMessageType(type)) {
      respond(
        false,
        undefined,
        errorShape(ErrorCodes.INVALID_REQUEST, `invalid message type: ${String(type)}`),
      );
      return;
    }
    try {
      const message =
        recipient === BROADCAST
          ? context.system.broadcast(type, params.content ?? null)
          : context.system.sendMessage(recipient, type, params.content ?? null);
      respond(true, { message });
    } catch (err) {
      respond(false, undefined, toErrorShape(err));
    }
  },
};
