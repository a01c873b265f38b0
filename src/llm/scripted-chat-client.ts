/**
 * Scripted chat completion client
 * Replays a fixed list of turns; used by `--mock` runs and by tests
 */

import { ChatHistory, ChatMessage, FunctionCall } from '../types/chat';
import {
  ChatCompletion,
  ChatCompletionClient,
  ChatCompletionRequest,
  ModelInterfaceError,
} from '../types/chat-client';
import { Clock, SystemClock } from '../types/clock';
import { Result, ok, err } from '../types/result';
import { parseToolArguments } from './tool-arguments';
import { ScriptedTurn, ScriptedTurnInput, scriptedTurnSchema } from '../schemas/mock-script.schema';

export interface ScriptedChatClientOptions {
  clock?: Clock;
}

/**
 * What the client was asked, for assertions
 */
export interface RecordedRequest {
  messages: ChatHistory;
  toolNames: string[];
}

function abortableDelay(ms: number, signal?: AbortSignal): Promise<boolean> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve(false);
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export class ScriptedChatClient implements ChatCompletionClient {
  private readonly turns: ScriptedTurn[];
  private readonly clock: Clock;
  private position = 0;
  readonly requests: RecordedRequest[] = [];

  constructor(turns: readonly ScriptedTurnInput[], options: ScriptedChatClientOptions = {}) {
    this.turns = turns.map((turn) => scriptedTurnSchema.parse(turn));
    this.clock = options.clock ?? new SystemClock();
  }

  get callCount(): number {
    return this.position;
  }

  get remainingTurns(): number {
    return this.turns.length - this.position;
  }

  async complete(request: ChatCompletionRequest): Promise<Result<ChatCompletion, ModelInterfaceError>> {
    this.requests.push({
      messages: request.messages.map((message) => ({ ...message })),
      toolNames: request.tools.map((tool) => tool.name),
    });

    if (request.signal?.aborted) {
      return err({ kind: 'cancelled', message: 'Model request aborted' });
    }

    const index = this.position;
    const turn = this.turns[index];
    if (!turn) {
      return err({
        kind: 'invalid_request',
        message: `Script exhausted after ${this.turns.length} turn(s)`,
      });
    }
    this.position += 1;

    if (turn.delayMs > 0 && !(await abortableDelay(turn.delayMs, request.signal))) {
      return err({ kind: 'cancelled', message: 'Model request aborted' });
    }

    if (turn.error) {
      return err({ kind: turn.error.kind, message: turn.error.message });
    }

    const functionCalls: FunctionCall[] = turn.toolCalls.map((call, i) => ({
      callId: call.id ?? `call_${index + 1}_${i + 1}`,
      functionName: call.name,
      ...(typeof call.arguments === 'string'
        ? parseToolArguments(call.name, call.arguments)
        : { parameters: call.arguments }),
    }));

    const message: ChatMessage = {
      role: 'assistant',
      content: turn.content ?? null,
      timestamp: this.clock.iso(),
      ...(functionCalls.length > 0 ? { functionCalls } : {}),
    };

    return ok({
      message,
      parallelToolCalls: turn.parallel,
      finishReason: functionCalls.length > 0 ? 'tool_calls' : 'stop',
    });
  }
}

export function createScriptedChatClient(
  turns: readonly ScriptedTurnInput[],
  options?: ScriptedChatClientOptions
): ScriptedChatClient {
  return new ScriptedChatClient(turns, options);
}
