/**
 * The example workflow shipped in examples/ stays valid and runs
 * against its mock script
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join, resolve } from 'node:path';
import { createTempDirContext, TempDirContext } from '../utils/temp-directory';
import { parseArgs } from '../../src/cli/arg-parser';
import { CommandContext } from '../../src/commands/command-context';
import { runWorkflowCommand } from '../../src/commands/run-workflow';
import { validateWorkflowCommand } from '../../src/commands/validate-workflow';
import { BufferLogger } from '../../src/logging/buffer-logger';
import { ExitCode } from '../../src/types/exit-codes';
import { createSpinnerService } from '../../src/ui/spinner-service';

const REPO_ROOT = resolve(__dirname, '..', '..');

describe('examples/hello.prompt.md', () => {
  let tempDir: TempDirContext;
  let out: string[];
  let errors: string[];
  let logger: BufferLogger;

  function context(argv: string[]): CommandContext {
    const parsed = parseArgs(['node', 'promptloop', ...argv]);
    if (!parsed.success || !parsed.args) {
      throw new Error(`Bad test arguments: ${parsed.error ?? ''}`);
    }
    return {
      args: parsed.args,
      output: { out: (text) => out.push(text), err: (text) => errors.push(text) },
      workingDirectory: REPO_ROOT,
      homeDirectory: tempDir.path,
      env: {},
      logger,
      spinner: createSpinnerService({ quiet: true }),
    };
  }

  beforeEach(() => {
    tempDir = createTempDirContext('promptloop-examples-');
    out = [];
    errors = [];
    logger = new BufferLogger();
  });

  afterEach(() => {
    tempDir.cleanup();
  });

  it('should validate without warnings', async () => {
    const code = await validateWorkflowCommand(context(['validate', 'examples/hello.prompt.md']));

    expect(code).toBe(ExitCode.SUCCESS);
    expect(out).toEqual([`✅ ${join(REPO_ROOT, 'examples', 'hello.prompt.md')} is valid (0 warning(s))`]);
  });

  it('should run to completion against its mock script', async () => {
    const storeDir = join(tempDir.path, 'resume');

    const code = await runWorkflowCommand(
      context([
        'run',
        'examples/hello.prompt.md',
        '--mock',
        'examples/hello.mock.json',
        '--storage-dir',
        storeDir,
        '--workflow-id',
        'hello-example',
      ])
    );

    expect(code).toBe(ExitCode.SUCCESS);
    expect(out).toEqual([
      'hello.prompt.md asks the model to list a directory, read the workflow files in it and describe each one in a sentence.',
    ]);
    expect(tempDir.list('resume')).toEqual(['hello-example.json']);
    expect(logger.getEventsByType('tool_invocation_completed')).toHaveLength(2);
  });
});
