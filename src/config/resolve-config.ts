/**
 * Configuration Resolution
 * Single-pass config resolution with explicit precedence
 * CLI flags > workflow frontmatter > repo config > user config > defaults
 */

import { existsSync, readFileSync } from 'fs';
import { join, resolve } from 'path';
import { homedir } from 'os';
import {
  EffectiveConfig,
  DEFAULT_CONFIG,
  ConfigSource,
  ModelProvider,
  RESUME_DIRECTORY,
} from '../types/effective-config';
import { WorkflowSettings } from '../types/workflow';
import { Clock, SystemClock } from '../types/clock';
import { ConfigFile } from '../schemas/config-file.schema';
import { parseConfigFile } from '../schemas/validators';

export const CONFIG_FILE_NAME = 'config.json';

/**
 * CLI flags that can override configuration
 */
export interface CliFlags {
  maxIterations?: number;
  timeoutMs?: number;
  model?: string;
  /** Scripted conversation; selects the mock provider */
  mockScriptPath?: string;
  storageDirectory?: string;
  retentionDays?: number;
  verbose?: boolean;
  debug?: boolean;
  jsonOutput?: boolean;
  noInteractive?: boolean;
  workingDirectory?: string;
}

/**
 * Values a workflow's frontmatter contributes
 */
export interface WorkflowConfigLayer extends WorkflowSettings {
  model?: string;
}

export interface ResolveConfigOptions {
  cliFlags?: CliFlags;
  workflow?: WorkflowConfigLayer;
  workingDirectory?: string;
  /** Home directory holding `.config/promptloop` (default: os.homedir()) */
  homeDirectory?: string;
  clock?: Clock;
}

export interface ResolvedConfig {
  config: EffectiveConfig;
  /** Problems with config files that were skipped */
  warnings: string[];
}

/**
 * Repo config path: <cwd>/.promptloop/config.json
 */
export function getRepoConfigPath(workingDirectory: string): string {
  return join(workingDirectory, '.promptloop', CONFIG_FILE_NAME);
}

/**
 * User config path: ~/.config/promptloop/config.json
 */
export function getUserConfigPath(homeDirectory: string = homedir()): string {
  return join(homeDirectory, '.config', 'promptloop', CONFIG_FILE_NAME);
}

/**
 * Load and validate a config file; missing files are not an error
 */
function loadConfigFile(path: string, warnings: string[]): ConfigFile | null {
  if (!existsSync(path)) {
    return null;
  }

  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (error) {
    warnings.push(`Ignoring unreadable config file ${path}: ${error instanceof Error ? error.message : String(error)}`);
    return null;
  }

  const parsed = parseConfigFile(content);
  if (!parsed.success || !parsed.data) {
    warnings.push(`Ignoring invalid config file ${path}: ${(parsed.errors ?? []).join('; ')}`);
    return null;
  }
  return parsed.data;
}

/**
 * Run id from the resolution time: 2025-01-01_12-00-00-000Z
 */
function generateRunId(now: Date): string {
  return now.toISOString().replace(/[:.]/g, '-').replace('T', '_');
}

/**
 * Resolve configuration from all sources with explicit precedence
 */
export function resolveConfig(options: ResolveConfigOptions = {}): ResolvedConfig {
  const cliFlags = options.cliFlags ?? {};
  const workflow = options.workflow ?? {};
  const cwd = options.workingDirectory ?? cliFlags.workingDirectory ?? process.cwd();
  const clock = options.clock ?? new SystemClock();
  const now = clock.now();
  const warnings: string[] = [];

  const repo = loadConfigFile(getRepoConfigPath(cwd), warnings) ?? {};
  const user = loadConfigFile(getUserConfigPath(options.homeDirectory), warnings) ?? {};

  // Track sources for debugging
  const sources: Record<string, ConfigSource> = {};

  // Helper to resolve a value with precedence
  function resolveValue<T>(
    key: string,
    layers: { cli?: T; workflow?: T; repo?: T; user?: T },
    defaultVal: T
  ): T {
    const order: Array<Exclude<ConfigSource, 'default'>> = ['cli', 'workflow', 'repo', 'user'];
    for (const source of order) {
      const value = layers[source];
      if (value !== undefined) {
        sources[key] = source;
        return value;
      }
    }
    sources[key] = 'default';
    return defaultVal;
  }

  const provider = resolveValue<ModelProvider>(
    'model.provider',
    {
      cli: cliFlags.mockScriptPath !== undefined ? 'mock' : undefined,
      repo: repo.model?.provider,
      user: user.model?.provider,
    },
    DEFAULT_CONFIG.model.provider
  );
  const baseUrl = resolveValue<string | undefined>(
    'model.baseUrl',
    { repo: repo.model?.baseUrl, user: user.model?.baseUrl },
    undefined
  );

  const storageDirectory = resolveValue(
    'resume.storageDirectory',
    {
      cli: cliFlags.storageDirectory,
      repo: repo.resume?.storageDirectory,
      user: user.resume?.storageDirectory,
    },
    RESUME_DIRECTORY
  );

  const config: EffectiveConfig = {
    schemaVersion: '1.0.0',
    runId: generateRunId(now),
    resolvedAt: now.toISOString(),

    limits: {
      maxIterations: resolveValue(
        'limits.maxIterations',
        {
          cli: cliFlags.maxIterations,
          workflow: workflow.maxIterations,
          repo: repo.limits?.maxIterations,
          user: user.limits?.maxIterations,
        },
        DEFAULT_CONFIG.limits.maxIterations
      ),
      timeoutMs: resolveValue(
        'limits.timeoutMs',
        {
          cli: cliFlags.timeoutMs,
          workflow: workflow.timeoutMs,
          repo: repo.limits?.timeoutMs,
          user: user.limits?.timeoutMs,
        },
        DEFAULT_CONFIG.limits.timeoutMs
      ),
    },

    model: {
      provider,
      name: resolveValue(
        'model.name',
        { cli: cliFlags.model, workflow: workflow.model, repo: repo.model?.name, user: user.model?.name },
        DEFAULT_CONFIG.model.name
      ),
      maxTokens: resolveValue(
        'model.maxTokens',
        { workflow: workflow.maxOutputTokens, repo: repo.model?.maxTokens, user: user.model?.maxTokens },
        DEFAULT_CONFIG.model.maxTokens
      ),
      temperature: resolveValue(
        'model.temperature',
        { workflow: workflow.temperature, repo: repo.model?.temperature, user: user.model?.temperature },
        DEFAULT_CONFIG.model.temperature
      ),
      ...(baseUrl !== undefined ? { baseUrl } : {}),
      ...(cliFlags.mockScriptPath !== undefined ? { mockScriptPath: resolve(cwd, cliFlags.mockScriptPath) } : {}),
    },

    resume: {
      storageDirectory: resolve(cwd, storageDirectory),
      retentionDays: resolveValue(
        'resume.retentionDays',
        { cli: cliFlags.retentionDays, repo: repo.resume?.retentionDays, user: user.resume?.retentionDays },
        DEFAULT_CONFIG.resume.retentionDays
      ),
      enableCompression: resolveValue(
        'resume.enableCompression',
        { repo: repo.resume?.enableCompression, user: user.resume?.enableCompression },
        DEFAULT_CONFIG.resume.enableCompression
      ),
      compressionThresholdBytes: resolveValue(
        'resume.compressionThresholdBytes',
        { repo: repo.resume?.compressionThresholdBytes, user: user.resume?.compressionThresholdBytes },
        DEFAULT_CONFIG.resume.compressionThresholdBytes
      ),
      checkpointFrequency: resolveValue(
        'resume.checkpointFrequency',
        { repo: repo.resume?.checkpointFrequency, user: user.resume?.checkpointFrequency },
        DEFAULT_CONFIG.resume.checkpointFrequency
      ),
      enableAtomicWrites: resolveValue(
        'resume.enableAtomicWrites',
        { repo: repo.resume?.enableAtomicWrites, user: user.resume?.enableAtomicWrites },
        DEFAULT_CONFIG.resume.enableAtomicWrites
      ),
      enableBackup: resolveValue(
        'resume.enableBackup',
        { repo: repo.resume?.enableBackup, user: user.resume?.enableBackup },
        DEFAULT_CONFIG.resume.enableBackup
      ),
    },

    pruning: {
      maxCompletedTools: resolveValue(
        'pruning.maxCompletedTools',
        { repo: repo.pruning?.maxCompletedTools, user: user.pruning?.maxCompletedTools },
        DEFAULT_CONFIG.pruning.maxCompletedTools
      ),
      maxChatHistory: resolveValue(
        'pruning.maxChatHistory',
        { repo: repo.pruning?.maxChatHistory, user: user.pruning?.maxChatHistory },
        DEFAULT_CONFIG.pruning.maxChatHistory
      ),
      maxContextVariables: resolveValue(
        'pruning.maxContextVariables',
        { repo: repo.pruning?.maxContextVariables, user: user.pruning?.maxContextVariables },
        DEFAULT_CONFIG.pruning.maxContextVariables
      ),
      maxKeyInsights: resolveValue(
        'pruning.maxKeyInsights',
        { repo: repo.pruning?.maxKeyInsights, user: user.pruning?.maxKeyInsights },
        DEFAULT_CONFIG.pruning.maxKeyInsights
      ),
      maxContextChanges: resolveValue(
        'pruning.maxContextChanges',
        { repo: repo.pruning?.maxContextChanges, user: user.pruning?.maxContextChanges },
        DEFAULT_CONFIG.pruning.maxContextChanges
      ),
    },

    compatibility: {
      resumeThreshold: resolveValue(
        'compatibility.resumeThreshold',
        { repo: repo.compatibility?.resumeThreshold, user: user.compatibility?.resumeThreshold },
        DEFAULT_CONFIG.compatibility.resumeThreshold
      ),
      warningSimilarity: resolveValue(
        'compatibility.warningSimilarity',
        { repo: repo.compatibility?.warningSimilarity, user: user.compatibility?.warningSimilarity },
        DEFAULT_CONFIG.compatibility.warningSimilarity
      ),
      adaptationSimilarity: resolveValue(
        'compatibility.adaptationSimilarity',
        { repo: repo.compatibility?.adaptationSimilarity, user: user.compatibility?.adaptationSimilarity },
        DEFAULT_CONFIG.compatibility.adaptationSimilarity
      ),
      missingToolPenalty: resolveValue(
        'compatibility.missingToolPenalty',
        { repo: repo.compatibility?.missingToolPenalty, user: user.compatibility?.missingToolPenalty },
        DEFAULT_CONFIG.compatibility.missingToolPenalty
      ),
    },

    verbosity: {
      verbose: resolveValue(
        'verbosity.verbose',
        { cli: cliFlags.verbose, repo: repo.verbosity?.verbose, user: user.verbosity?.verbose },
        DEFAULT_CONFIG.verbosity.verbose
      ),
      debug: resolveValue(
        'verbosity.debug',
        { cli: cliFlags.debug, repo: repo.verbosity?.debug, user: user.verbosity?.debug },
        DEFAULT_CONFIG.verbosity.debug
      ),
      jsonOutput: resolveValue(
        'verbosity.jsonOutput',
        { cli: cliFlags.jsonOutput, repo: repo.verbosity?.jsonOutput, user: user.verbosity?.jsonOutput },
        DEFAULT_CONFIG.verbosity.jsonOutput
      ),
    },

    interactivity: {
      interactive: resolveValue(
        'interactivity.interactive',
        {
          cli: cliFlags.noInteractive ? false : undefined,
          repo: repo.interactivity?.interactive,
          user: user.interactivity?.interactive,
        },
        DEFAULT_CONFIG.interactivity.interactive
      ),
    },

    paths: {
      workingDirectory: cwd,
    },

    sources,
  };

  return { config, warnings };
}
