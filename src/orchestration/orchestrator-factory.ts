/**
 * Orchestrator Factory
 * Creates Orchestrator instances with real dependencies, or with the
 * overrides tests pass in
 */

import { Orchestrator, OrchestratorDependencies, createOrchestrator } from '../core/orchestrator';
import { EffectiveConfig, VerbosityConfig } from '../types/effective-config';
import { ChatCompletionClient } from '../types/chat-client';
import { Clock, SystemClock } from '../types/clock';
import { FileSystem } from '../types/file-system';
import { Logger } from '../types/logger';
import { Result, ok, err } from '../types/result';
import { createConsoleLogger } from '../logging/console-logger';
import { createRealFileSystem } from '../io/real-file-system';
import { ResumeStateStore, createResumeStateStore } from '../resume/resume-state-store';
import { ToolRegistry, createToolRegistry } from '../tools/tool-registry';
import { createFileTools } from '../tools/file-tools';
import { OpenAIChatClient } from '../llm/openai-chat-client';
import { ScriptedChatClient } from '../llm/scripted-chat-client';
import { parseMockScript } from '../schemas/validators';

/**
 * Options for creating a runtime; anything omitted gets the production
 * implementation
 */
export interface RuntimeOptions {
  config: EffectiveConfig;
  clock?: Clock;
  logger?: Logger;
  /** Reads workflow files and stores snapshots */
  fileSystem?: FileSystem;
  /** The model's file tools are confined to this (default: the working directory) */
  toolFileSystem?: FileSystem;
  chatClient?: ChatCompletionClient;
  /** Source of OPENAI_API_KEY */
  env?: Record<string, string | undefined>;
}

export interface Runtime {
  orchestrator: Orchestrator;
  deps: OrchestratorDependencies;
  config: EffectiveConfig;
  store: ResumeStateStore;
  tools: ToolRegistry;
  fileSystem: FileSystem;
  logger: Logger;
}

/**
 * Console logger at the level the verbosity flags ask for; --json keeps
 * stdout for the summary unless more output was requested
 */
export function createCliLogger(verbosity: VerbosityConfig): Logger {
  const quietLevel = verbosity.jsonOutput ? 'error' : 'warn';
  return createConsoleLogger({
    minLevel: verbosity.debug ? 'debug' : verbosity.verbose ? 'info' : quietLevel,
    jsonOutput: verbosity.jsonOutput,
  });
}

/**
 * Registry of the built-in tools, working on the given filesystem
 */
export function createBuiltinTools(fileSystem: FileSystem): ToolRegistry {
  return createToolRegistry(createFileTools(fileSystem));
}

export function createSnapshotStore(
  config: EffectiveConfig,
  fileSystem: FileSystem,
  logger: Logger,
  clock: Clock
): ResumeStateStore {
  return createResumeStateStore({
    directory: config.resume.storageDirectory,
    fileSystem,
    logger,
    clock,
    enableCompression: config.resume.enableCompression,
    compressionThresholdBytes: config.resume.compressionThresholdBytes,
    enableAtomicWrites: config.resume.enableAtomicWrites,
    enableBackup: config.resume.enableBackup,
  });
}

/**
 * Chat client for the configured provider: a scripted conversation for
 * `mock`, the OpenAI API otherwise
 */
export async function createChatClient(
  config: EffectiveConfig,
  fileSystem: FileSystem,
  clock: Clock,
  env: Record<string, string | undefined> = process.env
): Promise<Result<ChatCompletionClient, string>> {
  if (config.model.provider === 'mock') {
    const scriptPath = config.model.mockScriptPath;
    if (!scriptPath) {
      return err('The mock provider needs a script; pass --mock <script.json>');
    }
    const content = await fileSystem.readFile(scriptPath);
    if (!content.ok) {
      return err(`Cannot read mock script ${scriptPath}: ${content.error.message}`);
    }
    const script = parseMockScript(content.value);
    if (!script.success || !script.data) {
      return err(`Invalid mock script ${scriptPath}: ${(script.errors ?? []).join('; ')}`);
    }
    return ok(new ScriptedChatClient(script.data.turns, { clock }));
  }

  const apiKey = env.OPENAI_API_KEY;
  if (!apiKey) {
    return err('OPENAI_API_KEY is not set; export it or pass --mock <script.json>');
  }
  return ok(
    new OpenAIChatClient({
      model: config.model.name,
      apiKey,
      baseUrl: config.model.baseUrl,
      clock,
    })
  );
}

/**
 * Create an Orchestrator and everything it runs against
 */
export async function createRuntime(options: RuntimeOptions): Promise<Result<Runtime, string>> {
  const { config } = options;
  const clock = options.clock ?? new SystemClock();
  const logger = options.logger ?? createCliLogger(config.verbosity);
  const fileSystem = options.fileSystem ?? createRealFileSystem();
  const toolFileSystem = options.toolFileSystem ?? createRealFileSystem(config.paths.workingDirectory);

  let chatClient = options.chatClient;
  if (!chatClient) {
    const created = await createChatClient(config, fileSystem, clock, options.env);
    if (!created.ok) {
      return created;
    }
    chatClient = created.value;
  }

  const tools = createBuiltinTools(toolFileSystem);
  const store = createSnapshotStore(config, fileSystem, logger, clock);
  const deps: OrchestratorDependencies = { logger, clock, chatClient, tools, store };

  return ok({
    orchestrator: createOrchestrator(config, deps),
    deps,
    config,
    store,
    tools,
    fileSystem,
    logger,
  });
}
