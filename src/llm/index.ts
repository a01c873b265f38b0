/**
 * Chat completion clients
 */

export {
  OpenAIChatClient,
  createOpenAIChatClient,
  convertMessages,
  convertTools,
  errorKindForStatus,
  toModelInterfaceError,
} from './openai-chat-client';
export type { OpenAIChatClientOptions, ChatCompletionsApi } from './openai-chat-client';
export { ScriptedChatClient, createScriptedChatClient } from './scripted-chat-client';
export { parseToolArguments } from './tool-arguments';
export type { ParsedArguments } from './tool-arguments';
export type { ScriptedChatClientOptions, RecordedRequest } from './scripted-chat-client';
