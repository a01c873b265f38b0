/**
 * EffectiveConfig type
 * Centralized configuration object passed through the system
 */

export type ModelProvider = 'openai' | 'mock';

/**
 * Loop limits
 */
export interface ExecutionLimits {
  /** Maximum model turns per execute/resume call */
  maxIterations: number;
  /** Overall wall-clock timeout in milliseconds (0 = none) */
  timeoutMs: number;
}

export interface ModelConfig {
  provider: ModelProvider;
  name: string;
  maxTokens: number;
  temperature: number;
  /** Override for OpenAI-compatible endpoints */
  baseUrl?: string;
  /** Scripted conversation used by the mock provider */
  mockScriptPath?: string;
}

/**
 * Snapshot persistence settings
 */
export interface ResumeConfig {
  storageDirectory: string;
  retentionDays: number;
  enableCompression: boolean;
  /** Payloads larger than this are gzipped */
  compressionThresholdBytes: number;
  /** Checkpoint every N tool iterations */
  checkpointFrequency: number;
  enableAtomicWrites: boolean;
  enableBackup: boolean;
}

/**
 * Bounds applied when a context is turned into a snapshot
 */
export interface PruningConfig {
  maxCompletedTools: number;
  maxChatHistory: number;
  maxContextVariables: number;
  maxKeyInsights: number;
  maxContextChanges: number;
}

/**
 * Thresholds used by the compatibility validator
 */
export interface CompatibilityConfig {
  resumeThreshold: number;
  /** Similarity below which a warning is added */
  warningSimilarity: number;
  /** Similarity below which adaptation is required */
  adaptationSimilarity: number;
  /** Score multiplier per missing tool */
  missingToolPenalty: number;
}

export interface VerbosityConfig {
  verbose: boolean;
  debug: boolean;
  jsonOutput: boolean;
}

export interface InteractivityConfig {
  interactive: boolean;
}

export interface PathConfig {
  workingDirectory: string;
}

/**
 * Source of a configuration value (for debugging/logging)
 */
export type ConfigSource = 'cli' | 'workflow' | 'repo' | 'user' | 'default';

/**
 * The complete effective configuration for a command
 */
export interface EffectiveConfig {
  schemaVersion: '1.0.0';
  limits: ExecutionLimits;
  model: ModelConfig;
  resume: ResumeConfig;
  pruning: PruningConfig;
  compatibility: CompatibilityConfig;
  verbosity: VerbosityConfig;
  interactivity: InteractivityConfig;
  paths: PathConfig;
  /** Unique id of this CLI invocation */
  runId: string;
  /** ISO 8601 */
  resolvedAt: string;
  /** Where each value came from, keyed by dotted path */
  sources: Record<string, ConfigSource>;
}

export const DEFAULT_PRUNING: PruningConfig = {
  maxCompletedTools: 50,
  maxChatHistory: 20,
  maxContextVariables: 30,
  maxKeyInsights: 10,
  maxContextChanges: 20,
};

export const DEFAULT_COMPATIBILITY: CompatibilityConfig = {
  resumeThreshold: 0.6,
  warningSimilarity: 0.8,
  adaptationSimilarity: 0.5,
  missingToolPenalty: 0.7,
};

export const RESUME_DIRECTORY = '.promptloop/resume';

export const DEFAULT_CONFIG: Omit<EffectiveConfig, 'runId' | 'resolvedAt' | 'paths' | 'sources'> = {
  schemaVersion: '1.0.0',
  limits: {
    maxIterations: 25,
    timeoutMs: 0,
  },
  model: {
    provider: 'openai',
    name: 'gpt-4o-mini',
    maxTokens: 4000,
    temperature: 0.7,
  },
  resume: {
    storageDirectory: RESUME_DIRECTORY,
    retentionDays: 7,
    enableCompression: true,
    compressionThresholdBytes: 1024 * 1024,
    checkpointFrequency: 1,
    enableAtomicWrites: true,
    enableBackup: true,
  },
  pruning: DEFAULT_PRUNING,
  compatibility: DEFAULT_COMPATIBILITY,
  verbosity: {
    verbose: false,
    debug: false,
    jsonOutput: false,
  },
  interactivity: {
    interactive: true,
  },
};
