/**
 * Importance scoring for context pruning
 */

import { JsonValue, stringifyJsonValue } from '../types/json';
import { ContextChange } from '../types/resume-snapshot';

/**
 * Keys that always survive pruning ahead of ordinary variables
 */
export const CRITICAL_CONTEXT_KEYS: ReadonlySet<string> = new Set([
  'project_path',
  'main_goal',
  'current_phase',
  'last_strategy',
  'key_findings',
  'target_framework',
  'critical_issue',
  'file_path',
  'current_analysis',
  'next_steps',
  'workflow_intent',
  'user_request',
  'analysis_result',
  'error_state',
  'completion_criteria',
  'workflow_file',
  'workflow_hash',
  'original_content',
  'available_tools',
  'execution_context',
]);

const RECENT_WINDOW_MS = 60 * 60 * 1000;

export interface ScoringInput {
  key: string;
  value: JsonValue;
  /** ISO 8601 of the latest recorded change to this key, if any */
  lastChangedAt?: string;
  /** Time the snapshot is taken */
  now: Date;
}

/**
 * Strategy for ranking context variables; higher is kept first
 */
export interface ImportanceScorer {
  score(input: ScoringInput): number;
}

export const defaultImportanceScorer: ImportanceScorer = {
  score({ key, value, lastChangedAt, now }) {
    let score = 1;
    const lowerKey = key.toLowerCase();
    const text = stringifyJsonValue(value).toLowerCase();

    if (CRITICAL_CONTEXT_KEYS.has(lowerKey)) {
      score *= 3;
    }
    if (text.includes('discovered') || text.includes('found') || text.includes('analysis')) {
      score *= 2;
    }
    if (text.includes('error') || text.includes('critical') || text.includes('requirement')) {
      score *= 2.5;
    }
    if (lowerKey.endsWith('_path') || lowerKey.endsWith('_file') || lowerKey.endsWith('_config')) {
      score *= 2;
    }
    if (lastChangedAt && now.getTime() - Date.parse(lastChangedAt) < RECENT_WINDOW_MS) {
      score *= 1.5;
    }

    return score;
  },
};

/**
 * A change worth keeping ahead of plain recency
 */
export function isImportantChange(change: ContextChange, now: Date): boolean {
  if (now.getTime() - Date.parse(change.timestamp) < RECENT_WINDOW_MS) {
    return true;
  }
  const source = change.source.toLowerCase();
  if (['user_input', 'critical_error', 'workflow_start', 'phase_change'].some((s) => source.includes(s))) {
    return true;
  }
  if (CRITICAL_CONTEXT_KEYS.has(change.key.toLowerCase())) {
    return true;
  }
  const reasoning = change.reasoning.toLowerCase();
  return ['critical', 'error', 'discovered'].some((word) => reasoning.includes(word));
}
