/**
 * Tool call arguments arrive as raw JSON text. A call whose arguments
 * cannot be read still reaches the orchestrator, carrying the reason,
 * so the model is told what was wrong with them.
 */

import { FunctionCall } from '../types/chat';
import { jsonObjectSchema } from '../schemas/json-value.schema';

export type ParsedArguments = Pick<FunctionCall, 'parameters' | 'argumentsError'>;

export function parseToolArguments(functionName: string, raw: string): ParsedArguments {
  let value: unknown;
  try {
    value = JSON.parse(raw.trim() === '' ? '{}' : raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return { parameters: {}, argumentsError: `Arguments for ${functionName} are not valid JSON: ${reason}` };
  }

  const parsed = jsonObjectSchema.safeParse(value);
  return parsed.success
    ? { parameters: parsed.data }
    : { parameters: {}, argumentsError: `Arguments for ${functionName} must be a JSON object` };
}
