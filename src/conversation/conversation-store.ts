/**
 * Conversation Store
 *
 * In-memory working copy of each execution's transcript, keyed by
 * workflow id. The durable copy lives in the resume state store; this
 * store tracks how many messages were appended since the last flush so
 * the orchestrator knows what a checkpoint still owes. Logs are never
 * trimmed here: the resume codec condenses old messages into insights
 * before it drops them.
 */

import { ChatHistory, ChatMessage } from '../types/chat';

interface ConversationLog {
  messages: ChatMessage[];
  pending: number;
}

export class ConversationStore {
  private readonly logs = new Map<string, ConversationLog>();

  /**
   * Start an empty log. A workflow id has at most one active execution.
   */
  create(workflowId: string): void {
    if (this.logs.has(workflowId)) {
      throw new Error(`Conversation already active for workflow: ${workflowId}`);
    }
    this.logs.set(workflowId, { messages: [], pending: 0 });
  }

  has(workflowId: string): boolean {
    return this.logs.has(workflowId);
  }

  append(workflowId: string, message: ChatMessage): void {
    this.appendAll(workflowId, [message]);
  }

  /**
   * Append messages in the given order
   */
  appendAll(workflowId: string, messages: readonly ChatMessage[]): void {
    const log = this.requireLog(workflowId);
    log.messages.push(...messages);
    log.pending += messages.length;
  }

  /**
   * Copy of the current transcript
   */
  get(workflowId: string): ChatHistory {
    return [...this.requireLog(workflowId).messages];
  }

  /**
   * Replace the transcript wholesale (rehydration); the new content
   * counts as already persisted
   */
  replace(workflowId: string, messages: readonly ChatMessage[]): void {
    const log = this.logs.get(workflowId) ?? { messages: [], pending: 0 };
    log.messages = [...messages];
    log.pending = 0;
    this.logs.set(workflowId, log);
  }

  /**
   * Messages appended since the last flush
   */
  pendingCount(workflowId: string): number {
    return this.requireLog(workflowId).pending;
  }

  markFlushed(workflowId: string): void {
    this.requireLog(workflowId).pending = 0;
  }

  remove(workflowId: string): boolean {
    return this.logs.delete(workflowId);
  }

  ids(): string[] {
    return Array.from(this.logs.keys());
  }

  private requireLog(workflowId: string): ConversationLog {
    const log = this.logs.get(workflowId);
    if (!log) {
      throw new Error(`No conversation for workflow: ${workflowId}`);
    }
    return log;
  }
}

export function createConversationStore(): ConversationStore {
  return new ConversationStore();
}
