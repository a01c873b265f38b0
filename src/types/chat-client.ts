/**
 * Chat completion client contract
 * The orchestrator talks to any model backend through this interface
 */

import { ChatHistory, ChatMessage } from './chat';
import { Result } from './result';
import { ToolDefinition } from './tool';

export interface ExecutionSettings {
  model?: string;
  maxTokens: number;
  temperature: number;
}

export const DEFAULT_EXECUTION_SETTINGS: ExecutionSettings = {
  maxTokens: 4000,
  temperature: 0.7,
};

export interface ChatCompletionRequest {
  messages: ChatHistory;
  tools: ToolDefinition[];
  settings: ExecutionSettings;
  signal?: AbortSignal;
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface ChatCompletion {
  /** Assistant message, possibly carrying function calls */
  message: ChatMessage;
  usage?: TokenUsage;
  /** The backend allows the requested calls to run concurrently */
  parallelToolCalls: boolean;
  finishReason: 'stop' | 'tool_calls' | 'length' | 'other';
}

export type ModelErrorKind = 'rate_limit' | 'auth' | 'unavailable' | 'invalid_request' | 'cancelled';

export interface ModelInterfaceError {
  kind: ModelErrorKind;
  message: string;
  status?: number;
  cause?: Error;
}

export interface ChatCompletionClient {
  complete(request: ChatCompletionRequest): Promise<Result<ChatCompletion, ModelInterfaceError>>;
}
