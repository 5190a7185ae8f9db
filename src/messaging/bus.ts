import crypto from "node:crypto";
import { EventEmitter } from "node:events";
import { SubmissionError, formatError } from "../errors.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import {
  BROADCAST,
  type BusEvent,
  type BusStats,
  type EndpointKind,
  type Message,
  type MessageHandler,
  type RoutingRule,
  type SendMessageInput,
} from "./types.js";

const log = createSubsystemLogger("message-bus");

function genMessageId(): string {
  return "msg_" + Date.now().toString(36) + crypto.randomBytes(4).toString("hex");
}

interface Mailbox {
  id: string;
  kind: EndpointKind;
  handler: MessageHandler;
  queue: Message[];
  draining: boolean;
  closed: boolean;
}

/**
 * Addressable message routing between agents and the orchestrator.
 *
 * `send` only enqueues. Each endpoint owns one mailbox that is drained on a
 * later turn of the event loop, one message at a time, so delivery is in send
 * order per sender/recipient pair and never duplicated. Messages to unknown
 * endpoints are dropped without an error.
 */
export class MessageBus extends EventEmitter<{ event: [BusEvent] }> {
  private readonly mailboxes = new Map<string, Mailbox>();
  private readonly history: Message[] = [];
  private readonly routingRules: RoutingRule[] = [];
  private readonly historyLimit: number;
  private readonly now: () => number;
  private readonly stats = { sent: 0, delivered: 0, dropped: 0, failed: 0, routed: 0 };

  constructor(opts?: { historyLimit?: number; now?: () => number }) {
    super();
    this.historyLimit = opts?.historyLimit ?? 1_000;
    this.now = opts?.now ?? Date.now;
  }

  register(id: string, handler: MessageHandler, opts?: { kind?: EndpointKind }): void {
    if (!id || id === BROADCAST) {
      throw new SubmissionError("INVALID_AGENT", `Invalid endpoint id: "${id}"`);
    }
    if (this.mailboxes.has(id)) {
      throw new SubmissionError("DUPLICATE_AGENT", `Endpoint already registered: ${id}`, { id });
    }
    const kind = opts?.kind ?? "agent";
    this.mailboxes.set(id, { id, kind, handler, queue: [], draining: false, closed: false });
    log.debug(`endpoint registered: ${id} (${kind})`);
    this.emit("event", { type: "endpoint.registered", id, kind });
  }

  unregister(id: string): boolean {
    const mailbox = this.mailboxes.get(id);
    if (!mailbox) {
      return false;
    }
    mailbox.closed = true;
    this.mailboxes.delete(id);
    for (const message of mailbox.queue.splice(0)) {
      this.drop(message, id, "endpoint unregistered");
    }
    log.debug(`endpoint unregistered: ${id}`);
    this.emit("event", { type: "endpoint.unregistered", id });
    return true;
  }

  isRegistered(id: string): boolean {
    return this.mailboxes.has(id);
  }

  listEndpoints(kind?: EndpointKind): string[] {
    const ids: string[] = [];
    for (const mailbox of this.mailboxes.values()) {
      if (!kind || mailbox.kind === kind) {
        ids.push(mailbox.id);
      }
    }
    return ids;
  }

  /**
   * Rules run in the order added; the first one to name a recipient wins.
   * Returns a function that removes the rule.
   */
  addRoutingRule(rule: RoutingRule): () => void {
    this.routingRules.push(rule);
    return () => {
      const index = this.routingRules.indexOf(rule);
      if (index !== -1) {
        this.routingRules.splice(index, 1);
      }
    };
  }

  send(input: SendMessageInput): Message {
    const message: Message = {
      id: genMessageId(),
      sender: input.sender,
      recipient: input.recipient,
      type: input.type,
      content: input.content,
      timestamp: this.now(),
      replyTo: input.replyTo ?? null,
      metadata: input.metadata ?? null,
    };
    const original = message.recipient;
    message.recipient = this.route(message);
    this.stats.sent += 1;
    this.remember(message);
    this.emit("event", { type: "message.sent", message });
    if (message.recipient !== original) {
      this.stats.routed += 1;
      log.debug(`routed ${message.type} ${message.id} from ${original} to ${message.recipient}`);
      this.emit("event", { type: "message.routed", message, from: original });
    }

    if (message.recipient === BROADCAST) {
      // Fan-out targets are fixed now; endpoints registered later never see it.
      for (const mailbox of this.mailboxes.values()) {
        if (mailbox.kind === "agent" && mailbox.id !== message.sender) {
          this.enqueue(mailbox, message);
        }
      }
      return message;
    }

    const mailbox = this.mailboxes.get(message.recipient);
    if (!mailbox) {
      this.drop(message, message.recipient, "no such endpoint");
      return message;
    }
    this.enqueue(mailbox, message);
    return message;
  }

  /** Resolves once every mailbox is empty and no handler is running. */
  async flush(): Promise<void> {
    while (this.hasPendingDeliveries()) {
      await new Promise<void>((resolve) => setImmediate(resolve));
    }
  }

  getHistory(opts?: {
    recipient?: string;
    sender?: string;
    since?: number;
    limit?: number;
  }): Message[] {
    let messages = this.history.filter((m) => {
      if (opts?.recipient && m.recipient !== opts.recipient) {
        return false;
      }
      if (opts?.sender && m.sender !== opts.sender) {
        return false;
      }
      if (opts?.since !== undefined && m.timestamp < opts.since) {
        return false;
      }
      return true;
    });
    if (opts?.limit !== undefined) {
      messages = messages.slice(Math.max(0, messages.length - opts.limit));
    }
    return messages;
  }

  getStats(): BusStats {
    let queued = 0;
    for (const mailbox of this.mailboxes.values()) {
      queued += mailbox.queue.length;
    }
    return { ...this.stats, queued, endpoints: this.mailboxes.size };
  }

  private route(message: Message): string {
    for (const rule of this.routingRules) {
      try {
        const target = rule(message);
        if (target) {
          return target;
        }
      } catch (err) {
        log.warn(`routing rule failed on ${message.type} ${message.id}: ${formatError(err)}`);
      }
    }
    return message.recipient;
  }

  private hasPendingDeliveries(): boolean {
    for (const mailbox of this.mailboxes.values()) {
      if (mailbox.draining || mailbox.queue.length > 0) {
        return true;
      }
    }
    return false;
  }

  private enqueue(mailbox: Mailbox, message: Message): void {
    mailbox.queue.push(message);
    if (mailbox.draining) {
      return;
    }
    mailbox.draining = true;
    setImmediate(() => {
      this.drain(mailbox).catch((err) => {
        log.error(`mailbox ${mailbox.id} stopped draining: ${formatError(err)}`);
      });
    });
  }

  private async drain(mailbox: Mailbox): Promise<void> {
    try {
      for (let message = mailbox.queue.shift(); message; message = mailbox.queue.shift()) {
        if (mailbox.closed) {
          this.drop(message, mailbox.id, "endpoint unregistered");
          continue;
        }
        try {
          await mailbox.handler(message);
          this.stats.delivered += 1;
          this.emit("event", { type: "message.delivered", message, recipient: mailbox.id });
        } catch (err) {
          const error = formatError(err);
          this.stats.failed += 1;
          log.warn(`handler for ${mailbox.id} failed on ${message.type} ${message.id}: ${error}`);
          this.emit("event", { type: "message.failed", message, recipient: mailbox.id, error });
        }
      }
    } finally {
      mailbox.draining = false;
    }
  }

  private drop(message: Message, recipient: string, reason: string): void {
    this.stats.dropped += 1;
    log.debug(`dropped ${message.type} ${message.id} for ${recipient}: ${reason}`);
    this.emit("event", { type: "message.dropped", message, recipient, reason });
  }

  private remember(message: Message): void {
    if (this.historyLimit === 0) {
      return;
    }
    this.history.push(message);
    if (this.history.length > this.historyLimit) {
      this.history.splice(0, this.history.length - this.historyLimit);
    }
  }
}
