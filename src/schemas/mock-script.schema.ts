/**
 * Scripted model conversation for --mock runs
 */

import { z } from 'zod';
import { jsonObjectSchema } from './json-value.schema';

const scriptedToolCallSchema = z.object({
  id: z.string().min(1).optional(),
  name: z.string().min(1),
  /** A string is sent as raw argument text, as the API would */
  arguments: z.union([jsonObjectSchema, z.string()]).default({}),
});

export const scriptedTurnSchema = z.object({
  content: z.string().nullable().optional(),
  toolCalls: z.array(scriptedToolCallSchema).default([]),
  /** Allow the calls of this turn to run concurrently */
  parallel: z.boolean().default(false),
  /** Simulated latency before the turn is returned */
  delayMs: z.number().int().nonnegative().default(0),
  error: z
    .object({
      kind: z.enum(['rate_limit', 'auth', 'unavailable', 'invalid_request']),
      message: z.string(),
    })
    .optional(),
});

export const mockScriptSchema = z.object({
  turns: z.array(scriptedTurnSchema).min(1, 'Script needs at least one turn'),
});

export type ScriptedTurn = z.infer<typeof scriptedTurnSchema>;
export type ScriptedTurnInput = z.input<typeof scriptedTurnSchema>;
export type MockScript = z.infer<typeof mockScriptSchema>;
