/**
 * Integration Tests for the CLI commands
 *
 * Drives run/resume/validate end to end against real temp directories,
 * with a scripted model standing in for the API.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import { createTempDirContext, TempDirContext } from '../utils/temp-directory';
import { parseArgs } from '../../src/cli/arg-parser';
import { CommandContext } from '../../src/commands/command-context';
import { runWorkflowCommand } from '../../src/commands/run-workflow';
import { resumeWorkflowCommand } from '../../src/commands/resume-workflow';
import { validateWorkflowCommand } from '../../src/commands/validate-workflow';
import { BufferLogger } from '../../src/logging/buffer-logger';
import { ScriptedChatClient } from '../../src/llm/scripted-chat-client';
import { RESUME_MESSAGE_HEADER } from '../../src/resume/resume-message';
import { MockClock } from '../../src/types/clock';
import { ExitCode } from '../../src/types/exit-codes';
import {
  ConfirmOptions,
  Prompter,
  PrompterError,
  SelectOptions,
  createPrompterError,
} from '../../src/types/prompter';
import { Result, ok, err } from '../../src/types/result';
import { createSpinnerService } from '../../src/ui/spinner-service';

const DAY_MS = 24 * 60 * 60 * 1000;

const NOTES_WORKFLOW = `---
tools: [file-read]
input:
  default:
    path: notes.txt
---
Summarize the notes in {{path}}.
`;

const REWRITTEN_WORKFLOW = `---
name: notes
---
Write a short poem about autumn leaves drifting across a quiet pond at dusk, then stop.
`;

const READ_NOTES_TURN = { toolCalls: [{ name: 'file-read', arguments: { path: 'notes.txt' } }] };

/**
 * Prompter that always answers the same way and remembers what it was asked
 */
class AnsweringPrompter implements Prompter {
  readonly asked: string[] = [];

  constructor(private readonly answer: boolean) {}

  async confirm(options: ConfirmOptions): Promise<Result<boolean, PrompterError>> {
    this.asked.push(options.message);
    return ok(this.answer);
  }

  async select<T = string>(options: SelectOptions<T>): Promise<Result<T, PrompterError>> {
    this.asked.push(options.message);
    const first = options.choices[0];
    return first ? ok(first.value) : err(createPrompterError('CANCELLED', 'No choices'));
  }

  isInteractive(): boolean {
    return true;
  }

  setNonInteractive(): void {
    // Always interactive
  }
}

describe('CLI commands', () => {
  let tempDir: TempDirContext;
  let workflowPath: string;
  let storeDir: string;
  let out: string[];
  let errors: string[];
  let logger: BufferLogger;

  function context(argv: string[], overrides: Partial<CommandContext> = {}): CommandContext {
    const parsed = parseArgs(['node', 'promptloop', ...argv]);
    if (!parsed.success || !parsed.args) {
      throw new Error(`Bad test arguments: ${parsed.error ?? ''}`);
    }
    return {
      args: parsed.args,
      output: {
        out: (text) => out.push(text),
        err: (text) => errors.push(text),
      },
      workingDirectory: tempDir.path,
      homeDirectory: tempDir.path,
      env: {},
      logger,
      spinner: createSpinnerService({ quiet: true }),
      ...overrides,
    };
  }

  beforeEach(() => {
    tempDir = createTempDirContext('promptloop-commands-');
    workflowPath = tempDir.writeFile('notes.prompt.md', NOTES_WORKFLOW);
    tempDir.writeFile('notes.txt', 'milk\nbread\n');
    storeDir = join(tempDir.path, '.state');
    out = [];
    errors = [];
    logger = new BufferLogger();
  });

  afterEach(() => {
    tempDir.cleanup();
  });

  describe('run', () => {
    it('should run a workflow to its final answer and store a completed snapshot', async () => {
      const client = new ScriptedChatClient([READ_NOTES_TURN, { content: 'Two notes found.' }]);

      const code = await runWorkflowCommand(
        context(['run', 'notes.prompt.md', '--storage-dir', '.state', '--workflow-id', 'wf-notes'], {
          chatClient: client,
        })
      );

      expect(code).toBe(ExitCode.SUCCESS);
      expect(out).toEqual(['Two notes found.']);
      expect(errors).toEqual([]);
      expect(client.requests[0].messages[0].content).toContain('Summarize the notes in notes.txt.');
      expect(client.requests[0].toolNames).toEqual(['file-read']);

      const toolMessage = client.requests[1].messages[2];
      expect(toolMessage.role).toBe('tool');
      expect(toolMessage.content).toBe('milk\nbread\n');

      expect(tempDir.list('.state')).toEqual(['wf-notes.json']);
      expect(JSON.parse(tempDir.readFile('.state/wf-notes.json'))).toMatchObject({
        workflow_metadata: { id: 'wf-notes', status: 'completed' },
      });
    });

    it('should pass --var values into the template', async () => {
      const client = new ScriptedChatClient([{ content: 'ok' }]);

      await runWorkflowCommand(
        context(['run', 'notes.prompt.md', '--storage-dir', '.state', '--var', 'path=todo.md'], {
          chatClient: client,
        })
      );

      expect(client.requests[0].messages[0].content).toContain('Summarize the notes in todo.md.');
    });

    it('should print a JSON summary under --json', async () => {
      const client = new ScriptedChatClient([{ content: 'Hi.' }]);

      const code = await runWorkflowCommand(
        context(['run', 'notes.prompt.md', '--storage-dir', '.state', '--workflow-id', 'wf-json', '--json'], {
          chatClient: client,
        })
      );

      expect(code).toBe(ExitCode.SUCCESS);
      expect(out).toHaveLength(1);
      expect(JSON.parse(out[0])).toMatchObject({
        success: true,
        workflow: 'notes',
        workflowFile: workflowPath,
        workflowId: 'wf-json',
        status: 'COMPLETED',
        iterations: 1,
        finalOutput: 'Hi.',
        error: null,
        compatibility: null,
        exitCode: 0,
      });
    });

    it('should replay a --mock script from disk', async () => {
      tempDir.writeFile('script.json', JSON.stringify({ turns: [{ content: 'Scripted answer.' }] }));

      const code = await runWorkflowCommand(
        context(['run', 'notes.prompt.md', '--storage-dir', '.state', '--mock', 'script.json'])
      );

      expect(code).toBe(ExitCode.SUCCESS);
      expect(out).toEqual(['Scripted answer.']);
    });

    it('should fail with a usage error when no API key is configured', async () => {
      const code = await runWorkflowCommand(context(['run', 'notes.prompt.md', '--storage-dir', '.state']));

      expect(code).toBe(ExitCode.USAGE_ERROR);
      expect(errors).toEqual(['Error: OPENAI_API_KEY is not set; export it or pass --mock <script.json>']);
    });

    it('should reject an invalid --workflow-id before loading anything', async () => {
      const code = await runWorkflowCommand(context(['run', 'notes.prompt.md', '--workflow-id', '../escape']));

      expect(code).toBe(ExitCode.USAGE_ERROR);
      expect(errors).toEqual(['Error: Invalid workflow id: ../escape']);
    });

    it('should report a missing workflow file', async () => {
      const code = await runWorkflowCommand(context(['run', 'missing.prompt.md']));

      expect(code).toBe(ExitCode.USAGE_ERROR);
      expect(errors).toEqual([`Error: Workflow file not found: ${join(tempDir.path, 'missing.prompt.md')}`]);
    });
  });

  describe('interrupted run and resume', () => {
    it('should stop at the iteration limit with a resume hint, then finish on resume', async () => {
      const client = new ScriptedChatClient([READ_NOTES_TURN, READ_NOTES_TURN, { content: 'Done after resume.' }]);

      const first = await runWorkflowCommand(
        context(
          ['run', 'notes.prompt.md', '--storage-dir', '.state', '--workflow-id', 'wf-limit', '--max-iterations', '1'],
          { chatClient: client }
        )
      );

      expect(first).toBe(ExitCode.LIMIT_EXCEEDED);
      expect(out).toEqual([]);
      expect(errors).toHaveLength(1);
      expect(errors[0]).toContain('Resume with: promptloop resume notes.prompt.md --workflow-id wf-limit');
      expect(JSON.parse(tempDir.readFile('.state/wf-limit.json'))).toMatchObject({
        workflow_metadata: { id: 'wf-limit', status: 'failed' },
      });

      errors.length = 0;
      const second = await resumeWorkflowCommand(
        context(['resume', 'notes.prompt.md', '--storage-dir', '.state', '--no-interactive'], { chatClient: client })
      );

      expect(second).toBe(ExitCode.SUCCESS);
      expect(out).toEqual(['Done after resume.']);
      expect(client.callCount).toBe(3);

      const resumedMessages = client.requests[1].messages;
      expect(resumedMessages[resumedMessages.length - 1].content).toContain(RESUME_MESSAGE_HEADER);
      expect(JSON.parse(tempDir.readFile('.state/wf-limit.json'))).toMatchObject({
        workflow_metadata: { id: 'wf-limit', status: 'completed' },
      });
    });

    it('should fail with a snapshot error when nothing can be resumed', async () => {
      const code = await resumeWorkflowCommand(
        context(['resume', 'notes.prompt.md', '--storage-dir', '.state', '--no-interactive'], {
          chatClient: new ScriptedChatClient([{ content: 'unused' }]),
        })
      );

      expect(code).toBe(ExitCode.SNAPSHOT_ERROR);
      expect(errors).toEqual([
        `Error: No resumable snapshot found for ${workflowPath}; start one with: promptloop run notes.prompt.md`,
      ]);
    });

    it('should refuse a completed snapshot without --force', async () => {
      const client = new ScriptedChatClient([{ content: 'First answer.' }, { content: 'Second answer.' }]);
      await runWorkflowCommand(
        context(['run', 'notes.prompt.md', '--storage-dir', '.state', '--workflow-id', 'wf-done'], {
          chatClient: client,
        })
      );
      out.length = 0;

      const refused = await resumeWorkflowCommand(
        context(
          ['resume', 'notes.prompt.md', '--storage-dir', '.state', '--workflow-id', 'wf-done', '--no-interactive'],
          { chatClient: client }
        )
      );
      expect(refused).toBe(ExitCode.SNAPSHOT_ERROR);
      expect(errors[0]).toBe(
        'Workflow wf-done already completed; use --force to run it again\nNo resumable checkpoint exists.'
      );

      const forced = await resumeWorkflowCommand(
        context(
          ['resume', 'notes.prompt.md', '--storage-dir', '.state', '--workflow-id', 'wf-done', '--force'],
          { chatClient: client }
        )
      );
      expect(forced).toBe(ExitCode.SUCCESS);
      expect(out).toEqual(['Second answer.']);
    });
  });

  describe('incompatible resume', () => {
    async function interruptThenRewrite(client: ScriptedChatClient): Promise<void> {
      const code = await runWorkflowCommand(
        context(
          ['run', 'notes.prompt.md', '--storage-dir', '.state', '--workflow-id', 'wf-drift', '--max-iterations', '1'],
          { chatClient: client }
        )
      );
      expect(code).toBe(ExitCode.LIMIT_EXCEEDED);
      tempDir.writeFile('notes.prompt.md', REWRITTEN_WORKFLOW);
      errors.length = 0;
    }

    it('should refuse a changed workflow without --force and continue with it', async () => {
      const client = new ScriptedChatClient([READ_NOTES_TURN, { content: 'Poem written.' }]);
      await interruptThenRewrite(client);

      const refused = await resumeWorkflowCommand(
        context(['resume', 'notes.prompt.md', '--storage-dir', '.state', '--no-interactive'], { chatClient: client })
      );
      expect(refused).toBe(ExitCode.RESUME_INCOMPATIBLE);
      expect(errors[0]).toContain('Workflow wf-drift cannot be resumed: compatibility score');
      expect(errors[0].split('\n')[1]).toBe(
        'The checkpoint is kept. Resume anyway with: promptloop resume notes.prompt.md --workflow-id wf-drift --force'
      );
      expect(client.callCount).toBe(1);

      const forced = await resumeWorkflowCommand(
        context(['resume', 'notes.prompt.md', '--storage-dir', '.state', '--no-interactive', '--force'], {
          chatClient: client,
        })
      );
      expect(forced).toBe(ExitCode.SUCCESS);
      expect(out).toEqual(['Poem written.']);
    });

    it('should report the compatibility score under --json', async () => {
      const client = new ScriptedChatClient([READ_NOTES_TURN]);
      await interruptThenRewrite(client);

      await resumeWorkflowCommand(
        context(['resume', 'notes.prompt.md', '--storage-dir', '.state', '--no-interactive', '--json'], {
          chatClient: client,
        })
      );

      const summary = JSON.parse(out[0]);
      expect(summary).toMatchObject({
        success: false,
        workflowId: 'wf-drift',
        status: 'FAILED',
        error: { code: 'RESUME_INCOMPATIBLE', resumable: false },
        compatibility: { warnings: ['Workflow content has changed significantly since last execution'] },
        exitCode: ExitCode.RESUME_INCOMPATIBLE,
      });
      expect(summary.compatibility.score).toBeLessThan(0.6);
    });

    it('should ask before resuming when a user is present', async () => {
      const client = new ScriptedChatClient([READ_NOTES_TURN, { content: 'Poem written.' }]);
      await interruptThenRewrite(client);
      const prompter = new AnsweringPrompter(true);

      const code = await resumeWorkflowCommand(
        context(['resume', 'notes.prompt.md', '--storage-dir', '.state'], { chatClient: client, prompter })
      );

      expect(code).toBe(ExitCode.SUCCESS);
      expect(prompter.asked).toEqual(['Resume anyway?']);
      expect(errors[0]).toMatch(/^Snapshot wf-drift scores 0\.\d\d against the current workflow \(needs 0\.6\)\.$/);
      expect(errors[1]).toBe('  - Workflow content has changed significantly since last execution');
    });

    it('should not resume when the user declines', async () => {
      const client = new ScriptedChatClient([READ_NOTES_TURN, { content: 'unused' }]);
      await interruptThenRewrite(client);

      const code = await resumeWorkflowCommand(
        context(['resume', 'notes.prompt.md', '--storage-dir', '.state'], {
          chatClient: client,
          prompter: new AnsweringPrompter(false),
        })
      );

      expect(code).toBe(ExitCode.RESUME_INCOMPATIBLE);
      expect(client.callCount).toBe(1);
    });
  });

  describe('snapshot management', () => {
    beforeEach(async () => {
      await runWorkflowCommand(
        context(['run', 'notes.prompt.md', '--storage-dir', '.state', '--workflow-id', 'wf-notes'], {
          chatClient: new ScriptedChatClient([READ_NOTES_TURN, { content: 'Two notes found.' }]),
        })
      );
      out.length = 0;
    });

    it('should list stored snapshots', async () => {
      const code = await resumeWorkflowCommand(context(['resume', '--list', '--storage-dir', '.state']));

      expect(code).toBe(ExitCode.SUCCESS);
      expect(out).toHaveLength(1);
      const lines = out[0].split('\n');
      expect(lines[0].startsWith('wf-notes  completed    ')).toBe(true);
      expect(lines[1]).toBe(`    ${workflowPath}`);
      expect(lines[2]).toMatch(/^ {4}last activity \S+, 1 tool call\(s\), \d+ message\(s\), \d+B$/);
    });

    it('should list snapshots as JSON', async () => {
      await resumeWorkflowCommand(context(['resume', '--list', '--json', '--storage-dir', '.state']));

      expect(JSON.parse(out[0])).toMatchObject({
        success: true,
        directory: storeDir,
        snapshots: [{ workflowId: 'wf-notes', status: 'completed', workflowFilePath: workflowPath }],
      });
    });

    it('should say so when a workflow has no snapshots', async () => {
      tempDir.writeFile('other.prompt.md', 'Say hello.\n');

      await resumeWorkflowCommand(context(['resume', 'other.prompt.md', '--list', '--storage-dir', '.state']));

      expect(out).toEqual([`No snapshots in ${storeDir}`]);
    });

    it('should keep snapshots inside the retention window', async () => {
      await resumeWorkflowCommand(context(['resume', '--clean', '--storage-dir', '.state']));

      expect(out).toEqual([`Removed 0 snapshot(s) older than 7 day(s) from ${storeDir}`]);
      expect(tempDir.list('.state')).toEqual(['wf-notes.json']);
    });

    it('should remove snapshots older than the retention window', async () => {
      const clock = new MockClock(new Date(Date.now() + 2 * DAY_MS));

      await resumeWorkflowCommand(
        context(['resume', '--clean', '--retention-days', '1', '--storage-dir', '.state'], { clock })
      );

      expect(out).toEqual([`Removed 1 snapshot(s) older than 1 day(s) from ${storeDir}`]);
      expect(tempDir.list('.state')).toEqual([]);
    });
  });

  describe('validate', () => {
    it('should accept a valid workflow', async () => {
      const code = await validateWorkflowCommand(context(['validate', 'notes.prompt.md']));

      expect(code).toBe(ExitCode.SUCCESS);
      expect(out).toEqual([`✅ ${workflowPath} is valid (0 warning(s))`]);
      expect(errors).toEqual([]);
    });

    it('should report warnings without failing', async () => {
      const path = tempDir.writeFile('bare.prompt.md', 'Describe {{subject}}.\n');

      const code = await validateWorkflowCommand(context(['validate', 'bare.prompt.md']));

      expect(code).toBe(ExitCode.SUCCESS);
      expect(errors).toEqual([
        '⚠️  Template variable "subject" has no default; pass it with --var subject=...',
        '⚠️  Workflow declares no tools; the model can only answer directly',
      ]);
      expect(out).toEqual([`✅ ${path} is valid (2 warning(s))`]);
    });

    it('should fail on an unregistered tool', async () => {
      const path = tempDir.writeFile('search.prompt.md', '---\ntools: [web-search]\n---\nSearch for news.\n');

      const code = await validateWorkflowCommand(context(['validate', 'search.prompt.md']));

      expect(code).toBe(ExitCode.VALIDATION_ERROR);
      expect(errors).toEqual(['❌ Declared tool is not registered: web-search', `${path} has 1 error(s)`]);
    });

    it('should fail on invalid frontmatter', async () => {
      tempDir.writeFile('broken.prompt.md', '---\ntools: [file-read\nSummarize.\n');

      const code = await validateWorkflowCommand(context(['validate', 'broken.prompt.md']));

      expect(code).toBe(ExitCode.VALIDATION_ERROR);
      expect(errors[0]).toContain('Invalid workflow file');
    });

    it('should print the result as JSON', async () => {
      await validateWorkflowCommand(context(['validate', 'notes.prompt.md', '--json']));

      expect(JSON.parse(out[0])).toEqual({
        success: true,
        workflow: 'notes',
        workflowFile: workflowPath,
        errors: [],
        warnings: [],
        exitCode: 0,
      });
    });
  });
});
