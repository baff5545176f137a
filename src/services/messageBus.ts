import { randomUUID } from "node:crypto";
import { componentLogger, Logger } from "../logger";
import { JsonObject, Message, MessageHistoryFilters, MessageRecord, MessageType } from "../types";
import { toJsonObject, toJsonValue } from "../utils/serialize";
import { PersistenceStore } from "./persistenceStore";

export interface SendMessageInput {
  senderId: string;
  receiverId: string;
  content: unknown;
  messageType?: MessageType;
  taskId?: string;
  projectId?: string;
  metadata?: Record<string, unknown>;
}

export interface BroadcastOptions {
  messageType?: MessageType;
  taskId?: string;
  projectId?: string;
  metadata?: Record<string, unknown>;
}

export const createMessage = (input: SendMessageInput): Message => ({
  id: randomUUID(),
  senderId: input.senderId,
  receiverId: input.receiverId,
  content: input.content,
  messageType: input.messageType ?? "task",
  taskId: input.taskId,
  projectId: input.projectId,
  metadata: { ...(input.metadata ?? {}) },
  timestamp: new Date().toISOString(),
  read: false,
  processed: false
});

/** JSON projection of a message. Throws SerializationError when content or metadata cannot be reduced. */
export const toMessageRecord = (message: Message): MessageRecord => ({
  id: message.id,
  senderId: message.senderId,
  receiverId: message.receiverId,
  messageType: message.messageType,
  taskId: message.taskId ?? null,
  projectId: message.projectId ?? null,
  content: toJsonValue(message.content),
  metadata: toJsonObject(message.metadata),
  timestamp: message.timestamp,
  read: message.read,
  processed: message.processed
});

const snapshot = (message: Message): Message => ({ ...message, metadata: { ...message.metadata } });

const matchesFilters = (message: Message, filters: MessageHistoryFilters): boolean =>
  (filters.taskId === undefined || message.taskId === filters.taskId) &&
  (filters.projectId === undefined || message.projectId === filters.projectId) &&
  (filters.senderId === undefined || message.senderId === filters.senderId) &&
  (filters.receiverId === undefined || message.receiverId === filters.receiverId);

export class MessageBus {
  private readonly mailboxes = new Map<string, Message[]>();
  private readonly history: Message[] = [];

  constructor(
    private readonly persistence?: PersistenceStore,
    private readonly log: Logger = componentLogger("message-bus")
  ) {}

  send(input: SendMessageInput): Promise<string> {
    return this.deliver(createMessage(input));
  }

  async deliver(message: Message): Promise<string> {
    this.enqueue(message);
    this.history.push(message);

    if (this.persistence) {
      await this.persist(message);
    }

    return message.id;
  }

  async broadcast(senderId: string, receiverIds: string[], content: unknown, options: BroadcastOptions = {}): Promise<string[]> {
    const ids: string[] = [];
    for (const receiverId of receiverIds) {
      ids.push(
        await this.send({
          senderId,
          receiverId,
          content,
          messageType: options.messageType ?? "broadcast",
          taskId: options.taskId,
          projectId: options.projectId,
          metadata: options.metadata
        })
      );
    }
    return ids;
  }

  getMessages(receiverId: string, markRead = true): Message[] {
    const mailbox = this.mailboxes.get(receiverId) ?? [];
    const result = mailbox.map(snapshot);
    if (markRead) {
      for (const message of mailbox) message.read = true;
    }
    return result;
  }

  getUnreadMessages(receiverId: string, markRead = true): Message[] {
    const unread = (this.mailboxes.get(receiverId) ?? []).filter((message) => !message.read);
    const result = unread.map(snapshot);
    if (markRead) {
      for (const message of unread) message.read = true;
    }
    return result;
  }

  hasUnread(receiverId: string): boolean {
    return (this.mailboxes.get(receiverId) ?? []).some((message) => !message.read);
  }

  markProcessed(messageId: string): boolean {
    for (const mailbox of this.mailboxes.values()) {
      const message = mailbox.find((item) => item.id === messageId);
      if (message) {
        message.processed = true;
        return true;
      }
    }

    const archived = this.history.find((item) => item.id === messageId);
    if (!archived) return false;
    archived.processed = true;
    return true;
  }

  getMessageHistory(filters: MessageHistoryFilters = {}): Message[] {
    return this.history.filter((message) => matchesFilters(message, filters)).map(snapshot);
  }

  clearProcessedMessages(): void {
    for (const [receiverId, mailbox] of this.mailboxes) {
      this.mailboxes.set(
        receiverId,
        mailbox.filter((message) => !message.processed)
      );
    }
  }

  listPending(): Message[] {
    return [...this.mailboxes.values()]
      .flat()
      .filter((message) => !message.processed)
      .sort((a, b) => this.history.indexOf(a) - this.history.indexOf(b))
      .map(snapshot);
  }

  restore(message: Message): void {
    const restored = snapshot(message);
    this.enqueue(restored);
    this.history.push(restored);
  }

  private enqueue(message: Message): void {
    const mailbox = this.mailboxes.get(message.receiverId) ?? [];
    mailbox.push(message);
    this.mailboxes.set(message.receiverId, mailbox);
  }

  private async persist(message: Message): Promise<void> {
    if (!this.persistence) return;

    let content: JsonObject;
    try {
      const { id, senderId, receiverId, messageType, taskId, projectId, content: body, metadata, timestamp } =
        toMessageRecord(message);
      content = { id, senderId, receiverId, messageType, taskId, projectId, content: body, metadata, timestamp };
    } catch (error: unknown) {
      const reason = error instanceof Error ? error.message : String(error);
      this.log.warn({ messageId: message.id, messageType: message.messageType, reason }, "message content is not serializable");
      content = { messageId: message.id, error: reason };
    }

    try {
      await this.persistence.storeAgentOutput(message.taskId, message.senderId, `message_${message.messageType}`, content);
    } catch (error: unknown) {
      // Mailbox delivery stands even when the store is down.
      this.log.error(
        { messageId: message.id, messageType: message.messageType, error: error instanceof Error ? error.message : String(error) },
        "message could not be persisted"
      );
    }
  }
}
