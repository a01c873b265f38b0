/**
 * Advisory heuristics over a transcript
 *
 * Phase, strategy and insights are stored in snapshots and shown in the
 * resume message. They never decide whether a resume is allowed.
 */

import { ChatHistory } from '../types/chat';
import { JsonValue } from '../types/json';

export type WorkflowPhase =
  | 'understanding'
  | 'investigating'
  | 'analyzing'
  | 'implementing'
  | 'finalizing';

export const DEFAULT_STRATEGY = 'Comprehensive analysis and problem-solving approach';

const PHASE_KEYWORDS: ReadonlyArray<[WorkflowPhase, readonly string[]]> = [
  ['understanding', ['understand', 'clarify', 'what']],
  ['investigating', ['investigate', 'explore', 'examine']],
  ['analyzing', ['analyze', 'process', 'review']],
  ['implementing', ['implement', 'create', 'build']],
  ['finalizing', ['finalize', 'complete', 'conclude']],
];

const STRATEGY_INDICATORS = [
  'approach',
  'strategy',
  'plan',
  'method',
  'technique',
  'focus on',
  'concentrate on',
  'prioritize',
  'emphasize',
];

const INSIGHT_KEYWORDS = [
  'discovered',
  'found',
  'identified',
  'detected',
  'noticed',
  'important',
  'significant',
  'critical',
  'key',
  'main',
];

/**
 * Phase from an explicit `current_phase` variable, else keywords in the
 * last five messages, else the number of successful tool calls
 */
export function determinePhase(
  variables: ReadonlyMap<string, JsonValue>,
  history: ChatHistory,
  successfulToolCount: number
): string {
  const explicit = variables.get('current_phase');
  if (typeof explicit === 'string' && explicit.length > 0) {
    return explicit;
  }

  const recent = history
    .slice(-5)
    .map((message) => message.content ?? '')
    .join(' ')
    .toLowerCase();
  for (const [phase, keywords] of PHASE_KEYWORDS) {
    if (keywords.some((keyword) => recent.includes(keyword))) {
      return phase;
    }
  }

  if (successfulToolCount === 0) return 'understanding';
  if (successfulToolCount < 3) return 'investigating';
  if (successfulToolCount < 7) return 'analyzing';
  return 'finalizing';
}

/**
 * Text around the first strategy indicator in the last three assistant
 * messages
 */
export function extractStrategy(history: ChatHistory): string {
  const recentAssistant = history
    .filter((message) => message.role === 'assistant' && message.content)
    .slice(-3);

  for (const message of recentAssistant) {
    const content = message.content ?? '';
    const lower = content.toLowerCase();
    for (const indicator of STRATEGY_INDICATORS) {
      const index = lower.indexOf(indicator);
      if (index >= 0) {
        const start = Math.max(0, index - 50);
        return content.slice(start, start + 100).trim();
      }
    }
  }

  return DEFAULT_STRATEGY;
}

/**
 * Sentences of 20-200 characters from assistant messages that mention a
 * discovery; distinct, at most `limit`
 */
export function extractKeyInsights(history: ChatHistory, limit = 10): string[] {
  const insights: string[] = [];

  for (const message of history) {
    if (message.role !== 'assistant' || !message.content) {
      continue;
    }
    for (const sentence of message.content.split('.')) {
      const trimmed = sentence.trim();
      if (trimmed.length < 20 || trimmed.length > 200) {
        continue;
      }
      const lower = trimmed.toLowerCase();
      if (INSIGHT_KEYWORDS.some((keyword) => lower.includes(keyword))) {
        insights.push(trimmed);
      }
    }
  }

  return Array.from(new Set(insights)).slice(0, limit);
}
