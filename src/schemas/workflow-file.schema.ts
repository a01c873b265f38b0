/**
 * Workflow file frontmatter
 *
 * ---
 * name: summarize-repo
 * tools: [file-read, file-list]
 * config:
 *   maxIterations: 10
 * input:
 *   default:
 *     topic: tests
 *   schema:
 *     path:
 *       type: string
 *       required: true
 * ---
 */

import { z } from 'zod';
import { jsonObjectSchema, jsonValueSchema } from './json-value.schema';

const inputSchemaEntrySchema = z.object({
  type: z.string().optional(),
  description: z.string().optional(),
  required: z.boolean().optional(),
  default: jsonValueSchema.optional(),
});

export const workflowFrontmatterSchema = z.object({
  name: z.string().min(1).optional(),
  description: z.string().optional(),
  model: z.string().min(1).optional(),
  tools: z.array(z.string().min(1)).default([]),
  config: z
    .object({
      temperature: z.number().min(0).max(2).optional(),
      maxOutputTokens: z.number().int().positive().optional(),
      maxIterations: z.number().int().positive().optional(),
      timeoutMs: z.number().int().nonnegative().optional(),
    })
    .default({}),
  input: z
    .object({
      default: jsonObjectSchema.default({}),
      schema: z.record(inputSchemaEntrySchema).default({}),
    })
    .default({}),
});

export type WorkflowFrontmatter = z.infer<typeof workflowFrontmatterSchema>;
