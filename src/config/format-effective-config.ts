/**
 * Human-readable rendering of the effective configuration (shown with --debug)
 */

import { EffectiveConfig } from '../types/effective-config';

function sourceOf(config: EffectiveConfig, key: string): string {
  const source = config.sources[key];
  return source && source !== 'default' ? ` (${source})` : '';
}

export function formatEffectiveConfigForDisplay(config: EffectiveConfig): string {
  const lines: string[] = [];
  const row = (label: string, value: string | number | boolean, key?: string): void => {
    const shown = typeof value === 'boolean' ? (value ? 'yes' : 'no') : String(value);
    lines.push(`│ ${label.padEnd(22)}${shown}${key ? sourceOf(config, key) : ''}`);
  };

  lines.push('═══════════════════════════════════════════════════════════════');
  lines.push('                    EFFECTIVE CONFIGURATION');
  lines.push('═══════════════════════════════════════════════════════════════');
  lines.push('');

  // Run info
  lines.push(`Run ID:              ${config.runId}`);
  lines.push(`Working Directory:   ${config.paths.workingDirectory}`);
  lines.push(`Resolved At:         ${config.resolvedAt}`);
  lines.push('');

  lines.push('┌─ Model ─────────────────────────────────────────────────────┐');
  row('Provider:', config.model.provider, 'model.provider');
  row('Model:', config.model.name, 'model.name');
  row('Max Tokens:', config.model.maxTokens, 'model.maxTokens');
  row('Temperature:', config.model.temperature, 'model.temperature');
  if (config.model.mockScriptPath) {
    row('Mock Script:', config.model.mockScriptPath);
  }
  lines.push('└──────────────────────────────────────────────────────────────┘');
  lines.push('');

  lines.push('┌─ Limits ────────────────────────────────────────────────────┐');
  row('Max Iterations:', config.limits.maxIterations, 'limits.maxIterations');
  row('Timeout:', config.limits.timeoutMs > 0 ? `${config.limits.timeoutMs}ms` : 'none', 'limits.timeoutMs');
  lines.push('└──────────────────────────────────────────────────────────────┘');
  lines.push('');

  lines.push('┌─ Resume ────────────────────────────────────────────────────┐');
  row('Storage:', config.resume.storageDirectory, 'resume.storageDirectory');
  row('Retention Days:', config.resume.retentionDays, 'resume.retentionDays');
  row('Checkpoint Every:', `${config.resume.checkpointFrequency} tool iteration(s)`, 'resume.checkpointFrequency');
  row('Compression:', config.resume.enableCompression, 'resume.enableCompression');
  row('Resume Threshold:', config.compatibility.resumeThreshold, 'compatibility.resumeThreshold');
  lines.push('└──────────────────────────────────────────────────────────────┘');
  lines.push('');

  // Verbosity
  if (config.verbosity.verbose || config.verbosity.debug) {
    lines.push('┌─ Verbosity ─────────────────────────────────────────────────┐');
    row('Interactive:', config.interactivity.interactive);
    row('Verbose:', config.verbosity.verbose);
    row('Debug:', config.verbosity.debug);
    row('JSON:', config.verbosity.jsonOutput);
    lines.push('└──────────────────────────────────────────────────────────────┘');
    lines.push('');
  }

  lines.push('═══════════════════════════════════════════════════════════════');

  return lines.join('\n');
}
