/**
 * Chat transcript types
 */

import { JsonObject } from './json';

export type ChatRole = 'system' | 'user' | 'assistant' | 'tool';

/**
 * A tool call requested by the model
 */
export interface FunctionCall {
  /** Identifier correlating the call with its tool-role result */
  callId: string;
  functionName: string;
  parameters: JsonObject;
  /** Why the raw arguments could not be read; `parameters` is then empty */
  argumentsError?: string;
}

export interface ChatMessage {
  role: ChatRole;
  /** Null for assistant turns that only carry function calls */
  content: string | null;
  /** Present on assistant messages that requested tools */
  functionCalls?: FunctionCall[];
  /** Present on tool-role messages */
  toolCallId?: string;
  /** Tool that produced a tool-role message */
  functionName?: string;
  /** ISO 8601 */
  timestamp: string;
}

/**
 * Ordered transcript of one execution
 */
export type ChatHistory = ChatMessage[];

export function createMessage(
  role: ChatRole,
  content: string | null,
  timestamp: string,
  extra: Partial<Pick<ChatMessage, 'functionCalls' | 'toolCallId' | 'functionName'>> = {}
): ChatMessage {
  return { role, content, timestamp, ...extra };
}
