/**
 * Tests for the Orchestrator
 * Runs workflows against a scripted model, the built-in file tools and an
 * in-memory snapshot store
 */

import { describe, it, expect } from 'vitest';
import { Orchestrator, createOrchestrator } from './orchestrator';
import { EffectiveConfig, DEFAULT_CONFIG } from '../types/effective-config';
import { MockClock } from '../types/clock';
import { JsonObject } from '../types/json';
import { ResumeSnapshot } from '../types/resume-snapshot';
import { Tool, ToolResult } from '../types/tool';
import { BufferLogger } from '../logging/buffer-logger';
import { MemoryFileSystem } from '../io/memory-file-system';
import { ResumeStateStore } from '../resume/resume-state-store';
import { RESUME_MESSAGE_HEADER } from '../resume/resume-message';
import { ScriptedChatClient } from '../llm/scripted-chat-client';
import { ScriptedTurnInput } from '../schemas/mock-script.schema';
import { ToolRegistry, createToolRegistry } from '../tools/tool-registry';
import { createFileTools } from '../tools/file-tools';
import { BASE_TIME, buildConfig, buildSnapshot, buildWorkflow } from '../../tests/utils/builders';

const DIRECTORY = '/work/.promptloop/resume';
const ID = 'workflow_notes_test';
const STARTED_AT = BASE_TIME.toISOString();

interface Harness {
  clock: MockClock;
  fs: MemoryFileSystem;
  logger: BufferLogger;
  store: ResumeStateStore;
  tools: ToolRegistry;
  client: ScriptedChatClient;
  orchestrator: Orchestrator;
}

async function createHarness(
  turns: ScriptedTurnInput[],
  config: Partial<EffectiveConfig> = {},
  extraTools: (clock: MockClock) => Tool[] = () => []
): Promise<Harness> {
  const clock = new MockClock(BASE_TIME);
  const fs = new MemoryFileSystem('/work', clock);
  await fs.writeFile('notes.txt', 'alpha');
  await fs.writeFile('b.txt', 'beta');

  const logger = new BufferLogger();
  const store = new ResumeStateStore({ directory: DIRECTORY, fileSystem: fs, logger, clock });
  const tools = createToolRegistry([...createFileTools(fs), ...extraTools(clock)]);
  const client = new ScriptedChatClient(turns, { clock });
  const orchestrator = createOrchestrator(buildConfig(config), {
    logger,
    clock,
    chatClient: client,
    tools,
    store,
  });
  return { clock, fs, logger, store, tools, client, orchestrator };
}

async function loadSnapshot(store: ResumeStateStore, workflowId = ID): Promise<ResumeSnapshot> {
  const loaded = await store.load(workflowId);
  if (!loaded.ok || !loaded.value) {
    throw new Error(`No snapshot for ${workflowId}`);
  }
  return loaded.value;
}

function customTool(name: string, execute: (params: JsonObject) => Promise<ToolResult>): Tool {
  return {
    name,
    description: `Test tool ${name}`,
    parameters: { type: 'object', properties: {} },
    execute,
  };
}

const READ_NOTES: ScriptedTurnInput = {
  content: 'I will read the notes first.',
  toolCalls: [{ name: 'file-read', arguments: { path: 'notes.txt' } }],
};
const READ_B: ScriptedTurnInput = { toolCalls: [{ name: 'file-read', arguments: { path: 'b.txt' } }] };

describe('Orchestrator', () => {
  describe('execute', () => {
    it('should run the tool loop to a final answer', async () => {
      const { orchestrator, client, store } = await createHarness([READ_NOTES, { content: 'Summary: alpha' }]);

      const result = await orchestrator.execute(buildWorkflow(), { path: 'notes.txt' }, { workflowId: ID });

      expect(result).toMatchObject({
        success: true,
        workflowId: ID,
        finalOutput: 'Summary: alpha',
        iterations: 2,
        status: 'COMPLETED',
      });
      expect(result.error).toBeUndefined();

      expect(client.requests[0].messages).toEqual([
        { role: 'user', content: 'Summarize tests in notes.txt', timestamp: STARTED_AT },
      ]);
      expect(client.requests[0].toolNames).toEqual(['file-read', 'file-list']);
      expect(client.requests[1].messages.map((m) => m.role)).toEqual(['user', 'assistant', 'tool']);
      expect(client.requests[1].messages[2]).toMatchObject({
        role: 'tool',
        content: 'alpha',
        toolCallId: 'call_1_1',
        functionName: 'file-read',
      });

      const snapshot = await loadSnapshot(store);
      expect(snapshot.status).toBe('completed');
      expect(snapshot.iterationCount).toBe(2);
      expect(snapshot.chatHistory).toHaveLength(4);
      expect(snapshot.variables).toEqual({ topic: 'tests', path: 'notes.txt', file_path: 'notes.txt' });
      expect(snapshot.completedTools).toEqual([
        {
          functionName: 'file-read',
          parameters: { path: 'notes.txt' },
          result: 'alpha',
          executedAt: STARTED_AT,
          success: true,
          reasoning: 'I will read the notes first.',
        },
      ]);
    });

    it('should log every state transition and checkpoint', async () => {
      const { orchestrator, logger } = await createHarness([READ_NOTES, { content: 'Done' }]);

      await orchestrator.execute(buildWorkflow(), { path: 'notes.txt' }, { workflowId: ID });

      expect(logger.getEventsByType('state_changed').map((e) => e.metadata.toState)).toEqual([
        'RENDERING',
        'AWAITING_MODEL',
        'EXECUTING_TOOL',
        'AWAITING_MODEL',
        'COMPLETED',
      ]);
      // initial, after the tool iteration, final
      expect(logger.getEventsByType('checkpoint_saved')).toHaveLength(3);
      expect(logger.getEventsByType('run_completed')[0].metadata.workflowId).toBe(ID);
    });

    it('should notify the observer', async () => {
      const { orchestrator } = await createHarness([READ_NOTES, { content: 'Done' }]);
      const states: string[] = [];
      const iterations: string[] = [];
      const toolCalls: string[] = [];

      await orchestrator.execute(buildWorkflow(), { path: 'notes.txt' }, {
        workflowId: ID,
        observer: {
          onStateChange: (state) => states.push(state),
          onIteration: (iteration, max) => iterations.push(`${iteration}/${max}`),
          onToolCall: (name) => toolCalls.push(name),
        },
      });

      expect(states).toHaveLength(5);
      expect(iterations).toEqual(['1/25', '2/25']);
      expect(toolCalls).toEqual(['file-read']);
    });

    it('should let CLI variables override workflow defaults', async () => {
      const { orchestrator, client } = await createHarness([{ content: 'Done' }]);
      const workflow = buildWorkflow({ schemaDefaults: { topic: 'schema', path: 'a.txt' } });

      await orchestrator.execute(workflow, { topic: 'cli' }, { workflowId: ID });

      expect(client.requests[0].messages[0].content).toBe('Summarize cli in a.txt');
    });

    it('should record one workflow_start change per initial variable', async () => {
      const { orchestrator, store } = await createHarness([{ content: 'Done' }]);

      await orchestrator.execute(buildWorkflow(), { path: 'notes.txt' }, { workflowId: ID });

      const snapshot = await loadSnapshot(store);
      expect(snapshot.contextEvolution.changes.map((c) => [c.key, c.source])).toEqual([
        ['topic', 'workflow_start'],
        ['path', 'workflow_start'],
      ]);
    });

    it('should generate a workflow id from the workflow name', async () => {
      const { orchestrator } = await createHarness([{ content: 'Done' }]);

      const result = await orchestrator.execute(buildWorkflow(), { path: 'notes.txt' });

      expect(result.workflowId).toMatch(/^workflow_notes_20250101_000000_[0-9a-f]{8}$/);
    });

    it('should fail on a template error without calling the model', async () => {
      const { orchestrator, client, store } = await createHarness([{ content: 'Done' }]);

      const result = await orchestrator.execute(
        buildWorkflow({ template: 'Hello {{name}}', defaults: {} }),
        {},
        { workflowId: ID }
      );

      expect(result.success).toBe(false);
      expect(result.status).toBe('FAILED');
      expect(result.error).toMatchObject({
        code: 'TEMPLATE_ERROR',
        message: 'Missing required variables: name',
        resumable: false,
        workflowId: ID,
      });
      expect(client.callCount).toBe(0);
      const loaded = await store.load(ID);
      expect(loaded.ok && loaded.value).toBeNull();
    });
  });

  describe('tool calls', () => {
    it('should reject tools outside the allow-list without running them', async () => {
      const { orchestrator, client, fs, logger, store } = await createHarness([
        { toolCalls: [{ name: 'file-write', arguments: { path: 'out.txt', content: 'x' } }] },
        { content: 'Done' },
      ]);

      const result = await orchestrator.execute(buildWorkflow(), { path: 'notes.txt' }, { workflowId: ID });

      expect(result.success).toBe(true);
      expect(await fs.exists('out.txt')).toBe(false);
      expect(logger.getEventsByType('tool_rejected')).toHaveLength(1);
      expect(client.requests[1].messages[2].content).toBe('Error: Tool "file-write" is not allowed by this workflow');

      const snapshot = await loadSnapshot(store);
      expect(snapshot.completedTools[0]).toMatchObject({
        functionName: 'file-write',
        success: false,
        result: 'Tool "file-write" is not allowed by this workflow',
      });
    });

    it('should report unreadable arguments to the model without running the tool', async () => {
      const { orchestrator, client, logger, store } = await createHarness([
        { toolCalls: [{ name: 'file-read', arguments: '{"path": ' }] },
        { content: 'Retrying later' },
      ]);

      const result = await orchestrator.execute(buildWorkflow(), { path: 'notes.txt' }, { workflowId: ID });

      expect(result.success).toBe(true);
      expect(logger.hasEventType('tool_invocation_started')).toBe(false);
      expect(logger.getEventsByType('tool_rejected')).toHaveLength(1);
      expect(client.requests[1].messages[2].content).toMatch(/^Error: Arguments for file-read are not valid JSON: /);

      const snapshot = await loadSnapshot(store);
      expect(snapshot.completedTools[0]).toMatchObject({ functionName: 'file-read', parameters: {}, success: false });
    });

    it('should fold a failed tool into history and keep going', async () => {
      const { orchestrator, client, store } = await createHarness([
        { toolCalls: [{ name: 'file-read', arguments: { path: 'missing.txt' } }] },
        { content: 'The file is missing' },
      ]);

      const result = await orchestrator.execute(buildWorkflow(), { path: 'notes.txt' }, { workflowId: ID });

      expect(result.success).toBe(true);
      expect(result.finalOutput).toBe('The file is missing');
      expect(client.requests[1].messages[2].content).toBe('Error: No such file or directory: missing.txt');
      expect((await loadSnapshot(store)).completedTools[0].success).toBe(false);
    });

    it('should fold a thrown tool error into history', async () => {
      const { orchestrator, client } = await createHarness(
        [{ toolCalls: [{ name: 'explode' }] }, { content: 'Recovered' }],
        {},
        () => [
          customTool('explode', async () => {
            throw new Error('boom');
          }),
        ]
      );

      const result = await orchestrator.execute(
        buildWorkflow({ declaredTools: ['explode'] }),
        { path: 'notes.txt' },
        { workflowId: ID }
      );

      expect(result.success).toBe(true);
      expect(client.requests[1].messages[2].content).toBe('Error: boom');
    });

    it('should run parallel calls concurrently and append results in request order', async () => {
      const finished: number[] = [];
      const wait = customTool('wait', async (params) => {
        const ms = typeof params.ms === 'number' ? params.ms : 0;
        await new Promise((resolve) => setTimeout(resolve, ms));
        finished.push(ms);
        return { success: true, output: `waited ${ms}` };
      });
      const { orchestrator, client } = await createHarness(
        [
          {
            parallel: true,
            toolCalls: [
              { name: 'wait', arguments: { ms: 30 } },
              { name: 'wait', arguments: { ms: 1 } },
            ],
          },
          { content: 'Done' },
        ],
        {},
        () => [wait]
      );

      await orchestrator.execute(buildWorkflow({ declaredTools: ['wait'] }), { path: 'notes.txt' }, { workflowId: ID });

      expect(finished).toEqual([1, 30]);
      expect(client.requests[1].messages.slice(2).map((m) => m.content)).toEqual(['waited 30', 'waited 1']);
    });

    it('should run calls one at a time unless the client allows parallel calls', async () => {
      const finished: number[] = [];
      const wait = customTool('wait', async (params) => {
        const ms = typeof params.ms === 'number' ? params.ms : 0;
        await new Promise((resolve) => setTimeout(resolve, ms));
        finished.push(ms);
        return { success: true, output: `waited ${ms}` };
      });
      const { orchestrator } = await createHarness(
        [
          {
            toolCalls: [
              { name: 'wait', arguments: { ms: 30 } },
              { name: 'wait', arguments: { ms: 1 } },
            ],
          },
          { content: 'Done' },
        ],
        {},
        () => [wait]
      );

      await orchestrator.execute(buildWorkflow({ declaredTools: ['wait'] }), { path: 'notes.txt' }, { workflowId: ID });

      expect(finished).toEqual([30, 1]);
    });

    it('should apply context returned by tools as variable changes', async () => {
      const { orchestrator, store } = await createHarness([
        { toolCalls: [{ name: 'file-write', arguments: { path: 'out/result.txt', content: 'done' } }] },
        { content: 'Written' },
      ]);

      await orchestrator.execute(
        buildWorkflow({ declaredTools: ['file-write'] }),
        { path: 'notes.txt' },
        { workflowId: ID }
      );

      const snapshot = await loadSnapshot(store);
      expect(snapshot.variables.last_written_file).toBe('out/result.txt');
      expect(snapshot.contextEvolution.changes.find((c) => c.key === 'last_written_file')).toEqual({
        timestamp: STARTED_AT,
        key: 'last_written_file',
        oldValue: null,
        newValue: 'out/result.txt',
        source: 'file-write',
        reasoning: 'Set by file-write',
      });
    });
  });

  describe('checkpoints', () => {
    it('should checkpoint every N tool iterations', async () => {
      const { orchestrator, logger } = await createHarness([READ_NOTES, READ_B, READ_NOTES, { content: 'Done' }], {
        resume: { ...DEFAULT_CONFIG.resume, checkpointFrequency: 2 },
      });

      await orchestrator.execute(buildWorkflow(), { path: 'notes.txt' }, { workflowId: ID });

      // initial, after the second tool iteration, final
      expect(logger.getEventsByType('checkpoint_saved')).toHaveLength(3);
    });

    it('should keep running when a checkpoint cannot be written', async () => {
      const { orchestrator, fs, logger } = await createHarness([READ_NOTES, { content: 'Done' }]);
      fs.injectFault({ operation: 'writeFile', pathIncludes: '.promptloop', persistent: true });

      const result = await orchestrator.execute(buildWorkflow(), { path: 'notes.txt' }, { workflowId: ID });

      expect(result.success).toBe(true);
      expect(logger.getEventsByType('checkpoint_failed')).toHaveLength(3);
      expect(logger.hasEventType('checkpoint_saved')).toBe(false);
    });
  });

  describe('stop conditions', () => {
    it('should fail resumably when the iteration limit is reached', async () => {
      const { orchestrator, store, logger } = await createHarness([READ_NOTES, READ_B, { content: 'Done' }], {
        limits: { maxIterations: 2, timeoutMs: 0 },
      });

      const result = await orchestrator.execute(buildWorkflow(), { path: 'notes.txt' }, { workflowId: ID });

      expect(result.success).toBe(false);
      expect(result.status).toBe('FAILED');
      expect(result.iterations).toBe(2);
      expect(result.error).toMatchObject({
        code: 'MAX_ITERATIONS_EXCEEDED',
        message: 'Reached maximum iterations (2)',
        resumable: true,
        workflowId: ID,
        iteration: 2,
        lastCheckpointAt: STARTED_AT,
      });
      expect(logger.hasEventType('limit_exceeded')).toBe(true);

      const snapshot = await loadSnapshot(store);
      expect(snapshot.status).toBe('failed');
      expect(snapshot.completedTools).toHaveLength(2);
    });

    it('should fail resumably on a model error', async () => {
      const { orchestrator, store } = await createHarness([
        { error: { kind: 'rate_limit', message: 'slow down' } },
      ]);

      const result = await orchestrator.execute(buildWorkflow(), { path: 'notes.txt' }, { workflowId: ID });

      expect(result.iterations).toBe(1);
      expect(result.error).toMatchObject({
        code: 'MODEL_INTERFACE_ERROR',
        message: 'Model request failed (rate_limit): slow down',
        modelErrorKind: 'rate_limit',
        resumable: true,
      });
      expect((await loadSnapshot(store)).status).toBe('failed');
    });

    it('should abort the in-flight model call on timeout', async () => {
      const { orchestrator, store } = await createHarness([{ content: 'Too late', delayMs: 5000 }], {
        limits: { maxIterations: 25, timeoutMs: 20 },
      });

      const result = await orchestrator.execute(buildWorkflow(), { path: 'notes.txt' }, { workflowId: ID });

      expect(result.status).toBe('FAILED');
      expect(result.error).toMatchObject({ code: 'TIMEOUT', message: 'Timed out after 20ms', resumable: true });
      const snapshot = await loadSnapshot(store);
      expect(snapshot.status).toBe('failed');
      expect(snapshot.chatHistory.map((m) => m.role)).toEqual(['user']);
    });

    it('should stop between iterations once the clock passes the timeout', async () => {
      const { orchestrator, store } = await createHarness(
        [{ toolCalls: [{ name: 'tick' }] }, { content: 'Never reached' }],
        { limits: { maxIterations: 25, timeoutMs: 60_000 } },
        (clock) => [
          customTool('tick', async () => {
            clock.advance(61_000);
            return { success: true, output: 'ticked' };
          }),
        ]
      );

      const result = await orchestrator.execute(buildWorkflow({ declaredTools: ['tick'] }), { path: 'notes.txt' }, {
        workflowId: ID,
      });

      expect(result.error?.code).toBe('TIMEOUT');
      expect(result.iterations).toBe(1);
      expect((await loadSnapshot(store)).completedTools.map((t) => t.functionName)).toEqual(['tick']);
    });
  });

  describe('cancellation', () => {
    it('should cancel before the first model call', async () => {
      const { orchestrator, client, store } = await createHarness([{ content: 'Done' }]);
      const controller = new AbortController();
      controller.abort();

      const result = await orchestrator.execute(buildWorkflow(), { path: 'notes.txt' }, {
        workflowId: ID,
        signal: controller.signal,
      });

      expect(result.status).toBe('CANCELLED');
      expect(result.error).toMatchObject({ code: 'CANCELLED', resumable: true, lastCheckpointAt: STARTED_AT });
      expect(client.callCount).toBe(0);
      expect((await loadSnapshot(store)).status).toBe('cancelled');
    });

    it('should discard tool results that arrive after an abort', async () => {
      const controller = new AbortController();
      const { orchestrator, store, logger } = await createHarness(
        [{ toolCalls: [{ name: 'interrupt' }] }, { content: 'Never reached' }],
        {},
        () => [
          customTool('interrupt', async () => {
            controller.abort();
            return { success: true, output: 'late', context: { late: true } };
          }),
        ]
      );

      const result = await orchestrator.execute(
        buildWorkflow({ declaredTools: ['interrupt'] }),
        { path: 'notes.txt' },
        { workflowId: ID, signal: controller.signal }
      );

      expect(result.status).toBe('CANCELLED');
      expect(result.iterations).toBe(1);
      expect(logger.hasEventType('run_cancelled')).toBe(true);

      const snapshot = await loadSnapshot(store);
      expect(snapshot.status).toBe('cancelled');
      expect(snapshot.chatHistory.map((m) => m.role)).toEqual(['user']);
      expect(snapshot.completedTools).toEqual([]);
      expect(snapshot.variables.late).toBeUndefined();
    });
  });

  describe('resume', () => {
    it('should continue an interrupted run with a fresh iteration budget', async () => {
      const { orchestrator, client, store, logger } = await createHarness(
        [READ_NOTES, READ_B, { content: 'Done' }],
        { limits: { maxIterations: 2, timeoutMs: 0 } }
      );
      const workflow = buildWorkflow();
      await orchestrator.execute(workflow, { path: 'notes.txt' }, { workflowId: ID });

      const result = await orchestrator.resume(ID, workflow);

      expect(result).toMatchObject({ success: true, finalOutput: 'Done', iterations: 1, status: 'COMPLETED' });
      expect(result.compatibility).toMatchObject({ canResume: true, score: 1, missingTools: [] });
      expect(logger.hasEventType('run_resumed')).toBe(true);

      const resumedRequest = client.requests[2].messages;
      expect(resumedRequest.map((m) => m.role)).toEqual(['user', 'assistant', 'tool', 'assistant', 'tool', 'system']);
      expect(resumedRequest[5].content?.startsWith(RESUME_MESSAGE_HEADER)).toBe(true);

      const snapshot = await loadSnapshot(store);
      expect(snapshot.status).toBe('completed');
      expect(snapshot.iterationCount).toBe(3);
      expect(snapshot.completedTools).toHaveLength(2);
    });

    it('should report a missing snapshot', async () => {
      const { orchestrator } = await createHarness([]);

      const result = await orchestrator.resume('workflow_missing', buildWorkflow());

      expect(result).toMatchObject({ success: false, status: 'FAILED', iterations: 0 });
      expect(result.error).toMatchObject({
        code: 'NO_RESUME_STATE',
        message: 'No resume state found for workflow: workflow_missing',
      });
    });

    it('should report a corrupt snapshot instead of starting over', async () => {
      const { orchestrator, fs, client } = await createHarness([{ content: 'Done' }]);
      await fs.writeFile(`${DIRECTORY}/${ID}.json`, 'not json', { createParents: true });

      const result = await orchestrator.resume(ID, buildWorkflow());

      expect(result.error?.code).toBe('SNAPSHOT_CORRUPT');
      expect(client.callCount).toBe(0);
    });

    it('should refuse a completed run unless forced', async () => {
      const { orchestrator } = await createHarness([{ content: 'Done' }, { content: 'Again' }]);
      const workflow = buildWorkflow();
      await orchestrator.execute(workflow, { path: 'notes.txt' }, { workflowId: ID });

      const refused = await orchestrator.resume(ID, workflow);
      const forced = await orchestrator.resume(ID, workflow, { force: true });

      expect(refused.error).toMatchObject({
        code: 'NO_RESUME_STATE',
        message: `Workflow ${ID} already completed; use --force to run it again`,
      });
      expect(forced.success).toBe(true);
      expect(forced.finalOutput).toBe('Again');
    });

    it('should refuse an incompatible snapshot unless forced', async () => {
      const { orchestrator, store, client } = await createHarness([{ content: 'Recovered' }]);
      await store.save(buildSnapshot({ workflowId: ID }));
      const changed = buildWorkflow({ content: 'qqqqqqqqqqqqqqqqqqqq' });

      const refused = await orchestrator.resume(ID, changed);

      expect(refused.error).toMatchObject({
        code: 'RESUME_INCOMPATIBLE',
        message: `Workflow ${ID} cannot be resumed: compatibility score 0.00 is below 0.6`,
      });
      expect(refused.compatibility?.canResume).toBe(false);
      expect(client.callCount).toBe(0);

      const forced = await orchestrator.resume(ID, changed, { force: true });

      expect(forced.success).toBe(true);
      expect(forced.finalOutput).toBe('Recovered');
      expect(forced.compatibility?.canResume).toBe(false);
    });
  });

  describe('validate', () => {
    it('should accept a consistent workflow', async () => {
      const { orchestrator, client } = await createHarness([]);

      const result = orchestrator.validate(
        buildWorkflow({ template: 'Use `file-read` to summarize {{topic}}', declaredTools: ['file-read'] })
      );

      expect(result).toEqual({ valid: true, errors: [], warnings: [] });
      expect(client.callCount).toBe(0);
    });

    it('should report template syntax errors', async () => {
      const { orchestrator } = await createHarness([]);

      const result = orchestrator.validate(buildWorkflow({ template: 'Hello {{name' }));

      expect(result.valid).toBe(false);
      expect(result.errors).toEqual(['Unterminated placeholder at line 1']);
    });

    it('should report declared tools that are not registered', async () => {
      const { orchestrator } = await createHarness([]);

      const result = orchestrator.validate(
        buildWorkflow({ template: 'Search {{topic}}', declaredTools: ['file-read', 'web-search'] })
      );

      expect(result.errors).toEqual(['Declared tool is not registered: web-search']);
    });

    it('should warn about undeclared tool mentions, missing tools and undefaulted variables', async () => {
      const { orchestrator } = await createHarness([]);

      const result = orchestrator.validate(
        buildWorkflow({ template: 'Use `file-write` to save {{topic}} to {{path}}', declaredTools: [] })
      );

      expect(result.valid).toBe(true);
      expect(result.warnings).toEqual([
        'Template variable "path" has no default; pass it with --var path=...',
        'Template mentions tool "file-write" but the workflow does not declare it',
        'Workflow declares no tools; the model can only answer directly',
      ]);
    });

    it('should not warn about required variables without a default', async () => {
      const { orchestrator } = await createHarness([]);

      const result = orchestrator.validate(
        buildWorkflow({ template: 'Read `file-read` {{path}}', declaredTools: ['file-read'], requiredVariables: ['path'] })
      );

      expect(result).toEqual({ valid: true, errors: [], warnings: [] });
    });
  });
});
