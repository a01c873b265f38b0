/**
 * End-to-end scenarios
 *
 * Each "process" is a fresh Orchestrator over the same snapshot directory,
 * so nothing survives between them except what was checkpointed.
 */

import { describe, it, expect } from 'vitest';
import { createOrchestrator } from '../../src/core/orchestrator';
import { MemoryFileSystem } from '../../src/io/memory-file-system';
import { ScriptedChatClient } from '../../src/llm/scripted-chat-client';
import { BufferLogger } from '../../src/logging/buffer-logger';
import { RESUME_MESSAGE_HEADER } from '../../src/resume/resume-message';
import { ResumeStateStore } from '../../src/resume/resume-state-store';
import { ScriptedTurnInput } from '../../src/schemas/mock-script.schema';
import { createFileTools } from '../../src/tools/file-tools';
import { createToolRegistry } from '../../src/tools/tool-registry';
import { MockClock } from '../../src/types/clock';
import { EffectiveConfig } from '../../src/types/effective-config';
import { BASE_TIME, buildConfig, buildWorkflow } from '../utils/builders';

const DIRECTORY = '/work/.promptloop/resume';

function startProcess(
  fs: MemoryFileSystem,
  clock: MockClock,
  turns: ScriptedTurnInput[],
  config: Partial<EffectiveConfig> = {}
) {
  const logger = new BufferLogger();
  const client = new ScriptedChatClient(turns, { clock });
  const store = new ResumeStateStore({ directory: DIRECTORY, fileSystem: fs, logger, clock });
  const orchestrator = createOrchestrator(buildConfig(config), {
    logger,
    clock,
    chatClient: client,
    tools: createToolRegistry(createFileTools(fs)),
    store,
  });
  return { logger, client, store, orchestrator };
}

function readTurn(path: string): ScriptedTurnInput {
  return { content: `Reading ${path}`, toolCalls: [{ name: 'file-read', arguments: { path } }] };
}

describe('end-to-end scenarios', () => {
  it('should write a file through a tool call and finish with a final answer', async () => {
    const clock = new MockClock(BASE_TIME);
    const fs = new MemoryFileSystem('/work', clock);
    const { orchestrator, store } = startProcess(fs, clock, [
      { toolCalls: [{ name: 'file-write', arguments: { path: 'hello.txt', content: 'hi' } }] },
      { content: 'Wrote hello.txt' },
    ]);
    const workflow = buildWorkflow({
      content: '---\ntools: [file-write]\n---\nGreet the user in hello.txt\n',
      template: 'Greet the user in hello.txt',
      declaredTools: ['file-write'],
      defaults: {},
    });

    const result = await orchestrator.execute(workflow, {}, { workflowId: 'wf-hello' });

    expect(result.success).toBe(true);
    expect(result.finalOutput).toBe('Wrote hello.txt');

    const content = await fs.readFile('hello.txt');
    expect(content.ok && content.value).toBe('hi');

    const loaded = await store.load('wf-hello');
    const snapshot = loaded.ok ? loaded.value : null;
    expect(snapshot?.completedTools).toEqual([
      {
        functionName: 'file-write',
        parameters: { path: 'hello.txt', content: 'hi' },
        result: 'Wrote 2 bytes to hello.txt',
        executedAt: BASE_TIME.toISOString(),
        success: true,
        reasoning: null,
      },
    ]);
  });

  it('should pick up after iteration 3 in a new process without repeating earlier tools', async () => {
    const clock = new MockClock(BASE_TIME);
    const fs = new MemoryFileSystem('/work', clock);
    for (const name of ['a.txt', 'b.txt', 'c.txt', 'd.txt']) {
      await fs.writeFile(name, `contents of ${name}`);
    }
    const workflow = buildWorkflow();

    // First process stops once three turns are spent
    const first = startProcess(fs, clock, [readTurn('a.txt'), readTurn('b.txt'), readTurn('c.txt')], {
      limits: { maxIterations: 3, timeoutMs: 0 },
    });
    const interrupted = await first.orchestrator.execute(workflow, { path: 'a.txt' }, { workflowId: 'wf-five' });
    expect(interrupted.error?.code).toBe('MAX_ITERATIONS_EXCEEDED');
    expect(interrupted.error?.resumable).toBe(true);

    clock.advance(60_000);
    const second = startProcess(fs, clock, [readTurn('d.txt'), { content: 'Read all four files' }]);
    const resumed = await second.orchestrator.resume('wf-five', workflow);

    expect(resumed.success).toBe(true);
    expect(resumed.finalOutput).toBe('Read all four files');
    expect(resumed.iterations).toBe(2);
    expect(resumed.compatibility?.score).toBe(1);

    const rehydrated = second.client.requests[0].messages;
    expect(rehydrated.map((m) => m.role)).toEqual([
      'user',
      'assistant',
      'tool',
      'assistant',
      'tool',
      'assistant',
      'tool',
      'system',
    ]);
    expect(rehydrated.filter((m) => m.role === 'tool').map((m) => m.content)).toEqual([
      'contents of a.txt',
      'contents of b.txt',
      'contents of c.txt',
    ]);
    expect(rehydrated[7].content?.startsWith(RESUME_MESSAGE_HEADER)).toBe(true);

    const invoked = second.logger.getEventsByType('tool_invocation_started').map((event) => event.metadata.callId);
    expect(invoked).toEqual(['call_1_1']);

    const loaded = await second.store.load('wf-five');
    const snapshot = loaded.ok ? loaded.value : null;
    expect(snapshot?.status).toBe('completed');
    expect(snapshot?.iterationCount).toBe(5);
    expect(snapshot?.completedTools.map((tool) => tool.parameters)).toEqual([
      { path: 'a.txt' },
      { path: 'b.txt' },
      { path: 'c.txt' },
      { path: 'd.txt' },
    ]);
  });

  it('should refuse to resume a workflow edited down to 0.4 similarity', async () => {
    const clock = new MockClock(BASE_TIME);
    const fs = new MemoryFileSystem('/work', clock);
    await fs.writeFile('a.txt', 'alpha');
    const original = 'abcdefghij'.repeat(10);
    const edited = original.slice(0, 40) + 'z'.repeat(60);

    const first = startProcess(fs, clock, [readTurn('a.txt')], { limits: { maxIterations: 1, timeoutMs: 0 } });
    await first.orchestrator.execute(buildWorkflow({ content: original }), { path: 'a.txt' }, { workflowId: 'wf-edit' });

    const second = startProcess(fs, clock, [{ content: 'unused' }]);
    const result = await second.orchestrator.resume('wf-edit', buildWorkflow({ content: edited }));

    expect(result.success).toBe(false);
    expect(result.compatibility?.similarity).toBeCloseTo(0.4, 10);
    expect(result.compatibility?.canResume).toBe(false);
    expect(result.error).toMatchObject({
      code: 'RESUME_INCOMPATIBLE',
      message: 'Workflow wf-edit cannot be resumed: compatibility score 0.40 is below 0.6',
      resumable: false,
    });
    expect(second.client.callCount).toBe(0);
  });
});
