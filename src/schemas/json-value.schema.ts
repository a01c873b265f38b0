/**
 * Zod schema for arbitrary JSON values
 */

import { z } from 'zod';
import type { JsonValue } from '../types/json';

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ])
);

export const jsonObjectSchema = z.record(jsonValueSchema);
