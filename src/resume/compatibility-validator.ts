/**
 * Compatibility Validator
 *
 * Scores whether a stored snapshot can safely continue against the
 * workflow as it exists now. Pure: no I/O, no clock.
 */

import { ResumeSnapshot } from '../types/resume-snapshot';
import { CompatibilityConfig, DEFAULT_COMPATIBILITY } from '../types/effective-config';
import { hashWorkflowContent } from './content-hash';

export interface MigrationStrategies {
  reset_workflow: string;
  partial_context: string;
}

export interface CompatibilityResult {
  canResume: boolean;
  /** Product of the similarity and the missing-tool penalties, in [0, 1] */
  score: number;
  /** Content similarity alone, in [0, 1] */
  similarity: number;
  warnings: string[];
  requiresAdaptation: boolean;
  adaptations: string[];
  missingTools: string[];
  /** Set when the snapshot cannot be resumed */
  migrationStrategies?: MigrationStrategies;
}

export const CONTENT_CHANGED_WARNING = 'Workflow content has changed significantly since last execution';
export const RESET_ADAPTATION = 'Consider resetting workflow state due to major changes';

/** Above this length, distance is computed over lines instead of characters */
const CHARACTER_DIFF_LIMIT = 20_000;

/**
 * Edit distance over two sequences using two rolling rows
 */
export function levenshteinDistance(a: ArrayLike<string>, b: ArrayLike<string>): number {
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let previous = new Array<number>(b.length + 1);
  let current = new Array<number>(b.length + 1);
  for (let j = 0; j <= b.length; j++) {
    previous[j] = j;
  }

  for (let i = 1; i <= a.length; i++) {
    current[0] = i;
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current[j] = Math.min(previous[j] + 1, current[j - 1] + 1, previous[j - 1] + cost);
    }
    [previous, current] = [current, previous];
  }

  return previous[b.length];
}

/**
 * Normalized similarity: 1 - distance / max length
 */
export function calculateSimilarity(a: string, b: string): number {
  if (a === b) {
    return 1;
  }
  const maxLength = Math.max(a.length, b.length);
  if (maxLength === 0) {
    return 1;
  }
  if (maxLength > CHARACTER_DIFF_LIMIT) {
    const linesA = a.split('\n');
    const linesB = b.split('\n');
    const maxLines = Math.max(linesA.length, linesB.length);
    return 1 - levenshteinDistance(linesA, linesB) / maxLines;
  }
  return 1 - levenshteinDistance(a, b) / maxLength;
}

export function validateCompatibility(
  snapshot: ResumeSnapshot,
  currentContent: string,
  registeredTools: readonly string[],
  config: CompatibilityConfig = DEFAULT_COMPATIBILITY
): CompatibilityResult {
  const warnings: string[] = [];
  const adaptations: string[] = [];
  let requiresAdaptation = false;

  const similarity =
    hashWorkflowContent(currentContent) === snapshot.originalWorkflowHash
      ? 1
      : calculateSimilarity(snapshot.originalWorkflowContent, currentContent);
  let score = similarity;

  if (similarity < config.warningSimilarity) {
    warnings.push(CONTENT_CHANGED_WARNING);
  }
  if (similarity < config.adaptationSimilarity) {
    requiresAdaptation = true;
    adaptations.push(RESET_ADAPTATION);
  }

  const registered = new Set(registeredTools);
  const available = new Set(snapshot.availableTools.filter((name) => registered.has(name)));
  const usedTools = Array.from(
    new Set(snapshot.completedTools.filter((tool) => tool.success).map((tool) => tool.functionName))
  );
  const missingTools = usedTools.filter((name) => !available.has(name));
  for (const name of missingTools) {
    score *= config.missingToolPenalty;
    warnings.push(`Previously used tool is no longer available: ${name}`);
  }

  const canResume = score >= config.resumeThreshold;

  return {
    canResume,
    score,
    similarity,
    warnings,
    requiresAdaptation,
    adaptations,
    missingTools,
    ...(canResume
      ? {}
      : {
          migrationStrategies: {
            reset_workflow: 'Start workflow from the beginning',
            partial_context: 'Preserve context but restart execution',
          },
        }),
  };
}
