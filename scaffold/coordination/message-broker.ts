import { randomUUID } from "crypto";

export type MessageType = "request" | "response" | "error" | "notification";

/**
 * A message addressed to one receiver. `conversationId` threads a request and
 * its reply; the broker never interprets it.
 */
export interface BrokerMessage {
  id: string;
  senderId: string;
  receiverId: string;
  type: MessageType;
  conversationId: string;
  content: Record<string, unknown>;
  timestamp: Date;
}

export interface PublishInput {
  senderId: string;
  receiverId: string;
  type: MessageType;
  content: Record<string, unknown>;
  conversationId?: string;
}

export type MessageHandler = (message: BrokerMessage) => void | Promise<void>;

export interface MessageBrokerOptions {
  /** Number of published messages kept for `history()`. Default 1000. */
  historyLimit?: number;
  verbose?: boolean;
}

const DEFAULT_HISTORY_LIMIT = 1000;

/**
 * In-memory publish/subscribe channel keyed by receiver id.
 *
 * One handler per receiver; subscribing again replaces it. Each receiver has
 * its own FIFO delivery queue, so messages to the same receiver are handled
 * one at a time in publish order while different receivers proceed
 * independently. Messages for a receiver with no handler are dropped.
 */
export class MessageBroker {
  private handlers = new Map<string, MessageHandler>();
  private queues = new Map<string, Promise<void>>();
  private messages: BrokerMessage[] = [];
  private readonly historyLimit: number;
  private readonly verbose: boolean;

  constructor(options: MessageBrokerOptions = {}) {
    const historyLimit = options.historyLimit ?? DEFAULT_HISTORY_LIMIT;
    if (!Number.isInteger(historyLimit) || historyLimit < 0) {
      throw new Error(
        `historyLimit must be a non-negative integer, got: ${historyLimit}`
      );
    }
    this.historyLimit = historyLimit;
    this.verbose = options.verbose ?? false;
  }

  subscribe(receiverId: string, handler: MessageHandler): () => void {
    this.handlers.set(receiverId, handler);
    if (this.verbose) {
      console.log(`[Broker] Subscribed: ${receiverId}`);
    }
    return () => {
      if (this.handlers.get(receiverId) === handler) {
        this.handlers.delete(receiverId);
      }
    };
  }

  unsubscribe(receiverId: string): boolean {
    return this.handlers.delete(receiverId);
  }

  isSubscribed(receiverId: string): boolean {
    return this.handlers.has(receiverId);
  }

  /**
   * Stamp and enqueue a message. Returns before the handler runs.
   */
  publish(input: PublishInput): BrokerMessage {
    const message: BrokerMessage = {
      id: randomUUID(),
      senderId: input.senderId,
      receiverId: input.receiverId,
      type: input.type,
      conversationId: input.conversationId ?? randomUUID(),
      content: structuredClone(input.content),
      timestamp: new Date(),
    };
    this.record(message);

    if (!this.handlers.has(message.receiverId)) {
      if (this.verbose) {
        console.log(
          `[Broker] No subscriber for ${message.receiverId}; dropped ${message.type} ${message.id}`
        );
      }
      return this.clone(message);
    }

    const receiverId = message.receiverId;
    const previous = this.queues.get(receiverId) ?? Promise.resolve();
    const delivery: Promise<void> = previous.then(async () => {
      try {
        const handler = this.handlers.get(receiverId);
        if (handler) {
          await handler(this.clone(message));
        }
      } catch (err) {
        console.error(
          `[Broker] Handler for ${receiverId} failed on message ${message.id}: ${
            err instanceof Error ? err.message : String(err)
          }`
        );
      } finally {
        if (this.queues.get(receiverId) === delivery) {
          this.queues.delete(receiverId);
        }
      }
    });
    this.queues.set(receiverId, delivery);

    return this.clone(message);
  }

  /**
   * Resolve once every receiver queue is empty, including messages published
   * by handlers while draining.
   */
  async drain(): Promise<void> {
    while (this.queues.size > 0) {
      await Promise.all(Array.from(this.queues.values()));
    }
  }

  history(conversationId?: string): BrokerMessage[] {
    return this.messages
      .filter(
        (message) =>
          conversationId === undefined ||
          message.conversationId === conversationId
      )
      .map((message) => this.clone(message));
  }

  private record(message: BrokerMessage): void {
    if (this.historyLimit === 0) return;
    this.messages.push(message);
    if (this.messages.length > this.historyLimit) {
      this.messages.splice(0, this.messages.length - this.historyLimit);
    }
  }

  private clone(message: BrokerMessage): BrokerMessage {
    return {
      ...message,
      content: structuredClone(message.content),
      timestamp: new Date(message.timestamp),
    };
  }
}
