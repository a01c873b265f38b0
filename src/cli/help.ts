/**
 * CLI Help Text
 *
 * Help and usage text for the CLI
 */

import { readFileSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';

const packageJsonSchema = z.object({ version: z.string() });

/** Get the usage text */
export function getUsageText(): string {
  return `Usage: promptloop <command> <workflow-file> [options]

Commands:
  run <workflow-file>                 Run a workflow from the start
  resume <workflow-file>              Continue an interrupted run from its last checkpoint
  validate <workflow-file>            Check a workflow without calling the model

Run options:
  --var <key=value>                   Set a template variable (repeatable; JSON values allowed)
  --max-iterations <number>           Maximum model turns per run (default: 25)
  --timeout <ms>                      Overall timeout in milliseconds, 0 for none (default: 0)
  --model <name>                      Model to use (default: gpt-4o-mini)
  --mock <script.json>                Replay a scripted conversation instead of calling a model
  --workflow-id <id>                  Id for the new run's snapshot (default: generated)

Resume options:
  --workflow-id <id>                  Snapshot to resume (default: ask, or the most recent)
  --force                             Resume even if the workflow changed or the run completed
  --list                              List stored snapshots
  --clean                             Delete snapshots older than the retention window
  --retention-days <number>           Retention window for --clean (default: 7)

Common options:
  --storage-dir <dir>                 Snapshot directory (default: .promptloop/resume)
  --no-interactive                    Disable interactive prompts; use defaults or fail
  --verbose                           Enable verbose output with more progress details
  --debug                             Enable debug mode with full diagnostics
  --json                              Output machine-readable JSON summary
  -h, --help                          Show this help message
  -v, --version                       Show version number

Examples:
  promptloop run summarize.prompt.md --var topic=releases
  promptloop run summarize.prompt.md --mock examples/hello.mock.json
  promptloop resume summarize.prompt.md
  promptloop resume summarize.prompt.md --workflow-id workflow_summarize_20250101_120000_1a2b3c4d
  promptloop resume --list
  promptloop validate summarize.prompt.md

Notes:
  Snapshots are not locked; never run the same workflow id from two processes at once.`;
}

/** Print usage to stderr */
export function printUsage(): void {
  console.error(getUsageText());
}

/**
 * Version from the package manifest two levels above this file
 * (src/cli in development, dist/cli when built)
 */
export function getVersion(): string {
  try {
    const manifest: unknown = JSON.parse(readFileSync(join(__dirname, '..', '..', 'package.json'), 'utf-8'));
    const parsed = packageJsonSchema.safeParse(manifest);
    return parsed.success ? parsed.data.version : 'unknown';
  } catch (error) {
    console.error(`Could not read package version: ${error instanceof Error ? error.message : String(error)}`);
    return 'unknown';
  }
}
