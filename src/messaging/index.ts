export { MessageBus } from "./bus.js";
export {
  BROADCAST,
  MESSAGE_TYPES,
  TaskFailureContentSchema,
  TaskResultContentSchema,
  isMessageType,
} from "./types.js";
export type {
  BusEvent,
  BusStats,
  EndpointKind,
  Message,
  MessageHandler,
  MessageType,
  RoutingRule,
  SendMessageInput,
  TaskAssignmentContent,
  TaskFailureContent,
  TaskResultContent,
} from "./types.js";
