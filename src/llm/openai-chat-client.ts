/**
 * OpenAI chat completion client
 *
 * Converts the transcript and tool definitions to the Chat Completions
 * format and maps SDK failures to ModelInterfaceError kinds.
 */

import OpenAI from 'openai';
import { ChatHistory, ChatMessage, FunctionCall } from '../types/chat';
import {
  ChatCompletion,
  ChatCompletionClient,
  ChatCompletionRequest,
  ModelErrorKind,
  ModelInterfaceError,
} from '../types/chat-client';
import { Clock, SystemClock } from '../types/clock';
import { Result, ok, err } from '../types/result';
import { ToolDefinition } from '../types/tool';
import { parseToolArguments } from './tool-arguments';

type OpenAIMessage = OpenAI.Chat.ChatCompletionMessageParam;
type OpenAITool = OpenAI.Chat.ChatCompletionTool;

/**
 * The slice of the SDK this client calls
 */
export interface ChatCompletionsApi {
  create(
    body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming,
    options?: { signal?: AbortSignal }
  ): Promise<OpenAI.Chat.ChatCompletion>;
}

export interface OpenAIChatClientOptions {
  /** Model used when the request settings name none */
  model: string;
  /** Defaults to OPENAI_API_KEY */
  apiKey?: string;
  baseUrl?: string;
  /** Let the model request several tools per turn and run them concurrently */
  parallelToolCalls?: boolean;
  /** Injected API, for tests */
  completions?: ChatCompletionsApi;
  clock?: Clock;
}

/**
 * Convert the transcript. Function calls without a tool result are
 * dropped, and tool results whose call is no longer in the transcript
 * become user messages, so pruned and interrupted transcripts stay valid.
 */
export function convertMessages(messages: ChatHistory): OpenAIMessage[] {
  const answered = new Set<string>();
  for (const message of messages) {
    if (message.role === 'tool' && message.toolCallId) {
      answered.add(message.toolCallId);
    }
  }

  const announced = new Set<string>();
  const converted: OpenAIMessage[] = [];

  for (const message of messages) {
    switch (message.role) {
      case 'system':
        converted.push({ role: 'system', content: message.content ?? '' });
        break;

      case 'user':
        converted.push({ role: 'user', content: message.content ?? '' });
        break;

      case 'assistant': {
        const calls = (message.functionCalls ?? []).filter((call) => answered.has(call.callId));
        if (calls.length === 0) {
          converted.push({ role: 'assistant', content: message.content ?? '' });
          break;
        }
        for (const call of calls) {
          announced.add(call.callId);
        }
        converted.push({
          role: 'assistant',
          content: message.content,
          tool_calls: calls.map((call) => ({
            id: call.callId,
            type: 'function' as const,
            function: { name: call.functionName, arguments: JSON.stringify(call.parameters) },
          })),
        });
        break;
      }

      case 'tool':
        if (message.toolCallId && announced.has(message.toolCallId)) {
          converted.push({ role: 'tool', tool_call_id: message.toolCallId, content: message.content ?? '' });
        } else {
          converted.push({
            role: 'user',
            content: `[${message.functionName ?? 'tool'} result] ${message.content ?? ''}`,
          });
        }
        break;
    }
  }

  return converted;
}

export function convertTools(tools: readonly ToolDefinition[]): OpenAITool[] {
  return tools.map((tool) => ({
    type: 'function' as const,
    function: {
      name: tool.name,
      description: tool.description,
      parameters: { ...tool.parameters },
    },
  }));
}

function parseToolCalls(toolCalls: OpenAI.Chat.ChatCompletionMessageToolCall[] | undefined): FunctionCall[] {
  return (toolCalls ?? [])
    .filter((call) => call.type === 'function')
    .map((call) => ({
      callId: call.id,
      functionName: call.function.name,
      ...parseToolArguments(call.function.name, call.function.arguments),
    }));
}

function mapFinishReason(reason: string | null | undefined): ChatCompletion['finishReason'] {
  switch (reason) {
    case 'stop':
    case 'tool_calls':
    case 'length':
      return reason;
    default:
      return 'other';
  }
}

export function errorKindForStatus(status: number | undefined): ModelErrorKind {
  if (status === 429) return 'rate_limit';
  if (status === 401 || status === 403) return 'auth';
  if (status === 400 || status === 404 || status === 422) return 'invalid_request';
  return 'unavailable';
}

export function toModelInterfaceError(error: unknown, signal?: AbortSignal): ModelInterfaceError {
  if (error instanceof OpenAI.APIUserAbortError || signal?.aborted) {
    return { kind: 'cancelled', message: 'Model request aborted' };
  }
  if (error instanceof OpenAI.APIError) {
    return {
      kind: errorKindForStatus(error.status),
      message: error.message,
      ...(error.status === undefined ? {} : { status: error.status }),
      cause: error,
    };
  }
  if (error instanceof Error) {
    return { kind: 'unavailable', message: error.message, cause: error };
  }
  return { kind: 'unavailable', message: String(error) };
}

export class OpenAIChatClient implements ChatCompletionClient {
  private readonly completions: ChatCompletionsApi;
  private readonly model: string;
  private readonly parallelToolCalls: boolean;
  private readonly clock: Clock;

  constructor(options: OpenAIChatClientOptions) {
    this.model = options.model;
    this.parallelToolCalls = options.parallelToolCalls ?? true;
    this.clock = options.clock ?? new SystemClock();

    if (options.completions) {
      this.completions = options.completions;
    } else {
      const client = new OpenAI({
        apiKey: options.apiKey ?? process.env.OPENAI_API_KEY,
        baseURL: options.baseUrl,
      });
      this.completions = {
        create: (body, requestOptions) => client.chat.completions.create(body, requestOptions),
      };
    }
  }

  async complete(request: ChatCompletionRequest): Promise<Result<ChatCompletion, ModelInterfaceError>> {
    const hasTools = request.tools.length > 0;
    const body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming = {
      model: request.settings.model ?? this.model,
      messages: convertMessages(request.messages),
      max_tokens: request.settings.maxTokens,
      temperature: request.settings.temperature,
      ...(hasTools
        ? { tools: convertTools(request.tools), parallel_tool_calls: this.parallelToolCalls }
        : {}),
    };

    let response: OpenAI.Chat.ChatCompletion;
    try {
      response = await this.completions.create(
        body,
        request.signal ? { signal: request.signal } : undefined
      );
    } catch (error) {
      return err(toModelInterfaceError(error, request.signal));
    }

    const choice = response.choices[0];
    if (!choice) {
      return err({ kind: 'unavailable', message: 'Model returned no choices' });
    }

    const functionCalls = parseToolCalls(choice.message.tool_calls);
    const message: ChatMessage = {
      role: 'assistant',
      content: choice.message.content,
      timestamp: this.clock.iso(),
      ...(functionCalls.length > 0 ? { functionCalls } : {}),
    };

    return ok({
      message,
      ...(response.usage
        ? {
            usage: {
              promptTokens: response.usage.prompt_tokens,
              completionTokens: response.usage.completion_tokens,
              totalTokens: response.usage.total_tokens,
            },
          }
        : {}),
      parallelToolCalls: this.parallelToolCalls && functionCalls.length > 1,
      finishReason: mapFinishReason(choice.finish_reason),
    });
  }
}

export function createOpenAIChatClient(options: OpenAIChatClientOptions): OpenAIChatClient {
  return new OpenAIChatClient(options);
}
