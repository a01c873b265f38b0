/**
 * Tests for configuration resolution
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'path';
import { resolveConfig, getRepoConfigPath, getUserConfigPath } from './resolve-config';
import { formatEffectiveConfigForDisplay } from './format-effective-config';
import { MockClock } from '../types/clock';
import { createTempDirContext, TempDirContext } from '../../tests/utils/temp-directory';

describe('resolveConfig', () => {
  let repo: TempDirContext;
  let home: TempDirContext;
  const clock = new MockClock(new Date('2025-01-01T00:00:00.000Z'));

  beforeEach(() => {
    repo = createTempDirContext();
    home = createTempDirContext();
  });

  afterEach(() => {
    repo.cleanup();
    home.cleanup();
  });

  function writeRepoConfig(value: unknown): void {
    repo.writeFile('.promptloop/config.json', JSON.stringify(value));
  }

  function writeUserConfig(value: unknown): void {
    home.writeFile('.config/promptloop/config.json', JSON.stringify(value));
  }

  function resolveWith(options: Parameters<typeof resolveConfig>[0] = {}): ReturnType<typeof resolveConfig> {
    return resolveConfig({ workingDirectory: repo.path, homeDirectory: home.path, clock, ...options });
  }

  it('should fall back to defaults', () => {
    const { config, warnings } = resolveWith();

    expect(warnings).toEqual([]);
    expect(config.limits).toEqual({ maxIterations: 25, timeoutMs: 0 });
    expect(config.model).toEqual({ provider: 'openai', name: 'gpt-4o-mini', maxTokens: 4000, temperature: 0.7 });
    expect(config.resume.storageDirectory).toBe(join(repo.path, '.promptloop', 'resume'));
    expect(config.resume.checkpointFrequency).toBe(1);
    expect(config.pruning.maxChatHistory).toBe(20);
    expect(config.compatibility.resumeThreshold).toBe(0.6);
    expect(config.interactivity.interactive).toBe(true);
    expect(config.paths.workingDirectory).toBe(repo.path);
    expect(config.runId).toBe('2025-01-01_00-00-00-000Z');
    expect(config.resolvedAt).toBe('2025-01-01T00:00:00.000Z');
    expect(config.sources['limits.maxIterations']).toBe('default');
  });

  it('should apply cli > workflow > repo > user > default', () => {
    writeUserConfig({ limits: { maxIterations: 5 }, model: { name: 'user-model', temperature: 0.1 } });
    writeRepoConfig({ limits: { maxIterations: 7 }, model: { name: 'repo-model' } });

    const { config } = resolveWith({
      cliFlags: { maxIterations: 11 },
      workflow: { maxIterations: 9, model: 'workflow-model' },
    });

    expect(config.limits.maxIterations).toBe(11);
    expect(config.model.name).toBe('workflow-model');
    expect(config.model.temperature).toBe(0.1);
    expect(config.sources).toMatchObject({
      'limits.maxIterations': 'cli',
      'model.name': 'workflow',
      'model.temperature': 'user',
      'limits.timeoutMs': 'default',
    });
  });

  it('should let the workflow beat the config files', () => {
    writeRepoConfig({ limits: { maxIterations: 7 } });

    expect(resolveWith({ workflow: { maxIterations: 9 } }).config.limits.maxIterations).toBe(9);
    expect(resolveWith().config.limits.maxIterations).toBe(7);
  });

  it('should map workflow output tokens to the model settings', () => {
    const { config } = resolveWith({ workflow: { maxOutputTokens: 256, temperature: 0 } });

    expect(config.model.maxTokens).toBe(256);
    expect(config.model.temperature).toBe(0);
  });

  it('should ignore an invalid config file with a warning', () => {
    writeRepoConfig({ limits: { maxIterations: -1 } });

    const { config, warnings } = resolveWith();

    expect(warnings).toEqual([
      `Ignoring invalid config file ${getRepoConfigPath(repo.path)}: limits.maxIterations: Number must be greater than 0`,
    ]);
    expect(config.limits.maxIterations).toBe(25);
  });

  it('should ignore malformed JSON with a warning', () => {
    home.writeFile('.config/promptloop/config.json', '{ not json');

    const { warnings } = resolveWith();

    expect(warnings).toHaveLength(1);
    expect(warnings[0].startsWith(`Ignoring invalid config file ${getUserConfigPath(home.path)}: Invalid JSON:`)).toBe(
      true
    );
  });

  it('should select the mock provider for a mock script', () => {
    const { config } = resolveWith({ cliFlags: { mockScriptPath: 'script.json' } });

    expect(config.model.provider).toBe('mock');
    expect(config.model.mockScriptPath).toBe(join(repo.path, 'script.json'));
    expect(config.sources['model.provider']).toBe('cli');
  });

  it('should resolve storage and interactivity flags', () => {
    const { config } = resolveWith({ cliFlags: { storageDirectory: 'state', noInteractive: true, retentionDays: 3 } });

    expect(config.resume.storageDirectory).toBe(join(repo.path, 'state'));
    expect(config.resume.retentionDays).toBe(3);
    expect(config.interactivity.interactive).toBe(false);
  });
});

describe('formatEffectiveConfigForDisplay', () => {
  it('should mark values that did not come from defaults', () => {
    const { config } = resolveConfig({
      workingDirectory: '/work',
      homeDirectory: '/nonexistent-home',
      cliFlags: { maxIterations: 3 },
    });

    const lines = formatEffectiveConfigForDisplay(config).split('\n');

    expect(lines).toContain(`│ ${'Max Iterations:'.padEnd(22)}3 (cli)`);
    expect(lines).toContain(`│ ${'Provider:'.padEnd(22)}openai`);
  });
});
