import { Type, type Static } from "@sinclair/typebox";

export type MessageType =
  | "task_assignment"
  | "task_result"
  | "task_failure"
  | "coordination"
  | "status"
  | "broadcast";

export const MESSAGE_TYPES: readonly MessageType[] = [
  "task_assignment",
  "task_result",
  "task_failure",
  "coordination",
  "status",
  "broadcast",
];

export function isMessageType(value: unknown): value is MessageType {
  return MESSAGE_TYPES.some((type) => type === value);
}

/** Recipient marker that fans a message out to every registered agent. */
export const BROADCAST = "*";

export type EndpointKind = "agent" | "system";

export interface Message {
  id: string;
  sender: string;
  /** Endpoint id, or BROADCAST */
  recipient: string;
  type: MessageType;
  content: unknown;
  timestamp: number;
  replyTo: string | null;
  metadata: Record<string, unknown> | null;
}

export interface SendMessageInput {
  sender: string;
  recipient: string;
  type: MessageType;
  content: unknown;
  replyTo?: string;
  metadata?: Record<string, unknown>;
}

export type MessageHandler = (message: Message) => void | Promise<void>;

/**
 * Picks a recipient for a message before it is queued. Returning null or
 * undefined leaves the decision to the next rule.
 */
export type RoutingRule = (message: Readonly<Message>) => string | null | undefined;

export type BusEvent =
  | { type: "message.sent"; message: Message }
  | { type: "message.routed"; message: Message; from: string }
  | { type: "message.delivered"; message: Message; recipient: string }
  | { type: "message.dropped"; message: Message; recipient: string; reason: string }
  | { type: "message.failed"; message: Message; recipient: string; error: string }
  | { type: "endpoint.registered"; id: string; kind: EndpointKind }
  | { type: "endpoint.unregistered"; id: string };

export interface BusStats {
  sent: number;
  delivered: number;
  dropped: number;
  failed: number;
  /** Messages a routing rule sent somewhere other than their original recipient */
  routed: number;
  /** Messages enqueued but not yet handed to a handler */
  queued: number;
  endpoints: number;
}

export interface TaskAssignmentContent {
  taskId: string;
  description: string;
  priority: string;
}

export const TaskResultContentSchema = Type.Object({
  taskId: Type.String({ minLength: 1 }),
  result: Type.Unknown(),
});

export type TaskResultContent = Static<typeof TaskResultContentSchema>;

export const TaskFailureContentSchema = Type.Object({
  taskId: Type.String({ minLength: 1 }),
  error: Type.String(),
  cancelled: Type.Boolean(),
});

export type TaskFailureContent = Static<typeof TaskFailureContentSchema>;
