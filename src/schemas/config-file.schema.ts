/**
 * Repo and user config files (.promptloop/config.json)
 * Every field is optional; missing values fall through to lower layers
 */

import { z } from 'zod';

export const configFileSchema = z.object({
  limits: z
    .object({
      maxIterations: z.number().int().positive().optional(),
      timeoutMs: z.number().int().nonnegative().optional(),
    })
    .optional(),
  model: z
    .object({
      provider: z.enum(['openai', 'mock']).optional(),
      name: z.string().min(1).optional(),
      maxTokens: z.number().int().positive().optional(),
      temperature: z.number().min(0).max(2).optional(),
      baseUrl: z.string().url().optional(),
    })
    .optional(),
  resume: z
    .object({
      storageDirectory: z.string().min(1).optional(),
      retentionDays: z.number().nonnegative().optional(),
      enableCompression: z.boolean().optional(),
      compressionThresholdBytes: z.number().int().nonnegative().optional(),
      checkpointFrequency: z.number().int().positive().optional(),
      enableAtomicWrites: z.boolean().optional(),
      enableBackup: z.boolean().optional(),
    })
    .optional(),
  pruning: z
    .object({
      maxCompletedTools: z.number().int().positive().optional(),
      maxChatHistory: z.number().int().positive().optional(),
      maxContextVariables: z.number().int().positive().optional(),
      maxKeyInsights: z.number().int().positive().optional(),
      maxContextChanges: z.number().int().positive().optional(),
    })
    .optional(),
  compatibility: z
    .object({
      resumeThreshold: z.number().min(0).max(1).optional(),
      warningSimilarity: z.number().min(0).max(1).optional(),
      adaptationSimilarity: z.number().min(0).max(1).optional(),
      missingToolPenalty: z.number().min(0).max(1).optional(),
    })
    .optional(),
  verbosity: z
    .object({
      verbose: z.boolean().optional(),
      debug: z.boolean().optional(),
      jsonOutput: z.boolean().optional(),
    })
    .optional(),
  interactivity: z
    .object({
      interactive: z.boolean().optional(),
    })
    .optional(),
});

export type ConfigFile = z.infer<typeof configFileSchema>;
