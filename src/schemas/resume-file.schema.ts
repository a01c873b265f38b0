/**
 * On-disk snapshot format
 *
 * One JSON object per workflow execution with five top-level sections.
 * Keys are snake_case; the codec translates to and from ResumeSnapshot.
 */

import { z } from 'zod';
import { jsonObjectSchema, jsonValueSchema } from './json-value.schema';

export const RESUME_FILE_SCHEMA_VERSION = '1.0.0';

export const snapshotStatusSchema = z.enum(['in_progress', 'completed', 'failed', 'cancelled']);

export const workflowMetadataSchema = z.object({
  schema_version: z.literal(RESUME_FILE_SCHEMA_VERSION).default(RESUME_FILE_SCHEMA_VERSION),
  id: z.string().min(1, 'Workflow id cannot be empty'),
  file_path: z.string(),
  workflow_hash: z.string(),
  original_content: z.string(),
  started_at: z.string(),
  last_checkpoint: z.string(),
  status: snapshotStatusSchema,
  current_phase: z.string(),
  current_strategy: z.string(),
  available_tools: z.array(z.string()).default([]),
  iteration_count: z.number().int().nonnegative().default(0),
});

const completedToolSchema = z.object({
  function_name: z.string().min(1),
  parameters: jsonObjectSchema,
  result: z.string().nullable(),
  executed_at: z.string(),
  success: z.boolean(),
  ai_reasoning: z.string().nullable(),
});

const functionCallSchema = z.object({
  function_name: z.string().min(1),
  parameters: jsonObjectSchema,
  call_id: z.string().min(1),
});

const chatMessageSchema = z.object({
  role: z.enum(['system', 'user', 'assistant', 'tool']),
  content: z.string().nullable(),
  timestamp: z.string(),
  tool_call_id: z.string().optional(),
  function_name: z.string().optional(),
  function_calls: z.array(functionCallSchema).optional(),
});

const contextChangeSchema = z.object({
  timestamp: z.string(),
  key: z.string(),
  old_value: jsonValueSchema,
  new_value: jsonValueSchema,
  source: z.string(),
  reasoning: z.string(),
});

const contextEvolutionSchema = z.object({
  current_context: jsonObjectSchema,
  key_insights: z.array(z.string()),
  changes: z.array(contextChangeSchema),
});

export const resumeFileSchema = z.object({
  workflow_metadata: workflowMetadataSchema,
  completed_tools: z.array(completedToolSchema),
  chat_history: z.array(chatMessageSchema),
  context_evolution: contextEvolutionSchema,
  workflow_variables: jsonObjectSchema,
});

/**
 * Enough of a snapshot file to build a catalog entry without decoding
 * the whole transcript
 */
export const resumeFileHeaderSchema = z.object({
  workflow_metadata: workflowMetadataSchema,
  completed_tools: z.array(z.unknown()),
  chat_history: z.array(z.unknown()),
});

export type ResumeFile = z.infer<typeof resumeFileSchema>;
export type ResumeFileHeader = z.infer<typeof resumeFileHeaderSchema>;
export type ResumeFileMessage = z.infer<typeof chatMessageSchema>;
export type ResumeFileCompletedTool = z.infer<typeof completedToolSchema>;
export type ResumeFileContextChange = z.infer<typeof contextChangeSchema>;
