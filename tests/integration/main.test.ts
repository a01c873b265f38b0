/**
 * Tests for the CLI entry point
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { main } from '../../src/index';
import { getUsageText } from '../../src/cli/help';
import { ExitCode } from '../../src/types/exit-codes';

describe('main', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should print the package version', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    const code = await main(['node', 'promptloop', '--version']);

    expect(code).toBe(ExitCode.SUCCESS);
    expect(log).toHaveBeenCalledWith('0.1.0');
  });

  it('should print usage to stdout on --help', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    const code = await main(['node', 'promptloop', '--help']);

    expect(code).toBe(ExitCode.SUCCESS);
    expect(log).toHaveBeenCalledWith(getUsageText());
  });

  it('should reject an unknown command with a usage error', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    const code = await main(['node', 'promptloop', 'frobnicate', 'x.prompt.md']);

    expect(code).toBe(ExitCode.USAGE_ERROR);
    expect(error.mock.calls[0]).toEqual(['Error: Unknown command: frobnicate']);
    expect(error).toHaveBeenLastCalledWith(getUsageText());
  });

  it('should not leave a SIGINT listener behind', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const before = process.listenerCount('SIGINT');

    await main(['node', 'promptloop', 'validate', 'does-not-exist.prompt.md']);

    expect(process.listenerCount('SIGINT')).toBe(before);
  });
});
