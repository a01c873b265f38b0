/**
 * Resume message synthesis
 * The system message appended to a rehydrated transcript so the model
 * continues instead of starting over
 */

import { ChatMessage } from '../types/chat';
import { stringifyJsonValue } from '../types/json';
import { ResumeSnapshot } from '../types/resume-snapshot';

export const RESUME_MESSAGE_HEADER = 'WORKFLOW RESUME CONTEXT - CONTINUE FROM WHERE YOU LEFT OFF';

const MAX_CONTEXT_ITEMS = 5;
const MAX_INSIGHTS = 3;
const MAX_VALUE_LENGTH = 200;

function formatDuration(ms: number): string {
  const totalSeconds = Math.max(0, Math.floor(ms / 1000));
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return `${String(minutes).padStart(2, '0')}:${String(seconds).padStart(2, '0')}`;
}

function truncate(text: string): string {
  return text.length > MAX_VALUE_LENGTH ? `${text.slice(0, MAX_VALUE_LENGTH)}...` : text;
}

export function buildResumeMessageContent(snapshot: ResumeSnapshot): string {
  const tools = Array.from(
    new Set(snapshot.completedTools.filter((t) => t.success).map((t) => t.functionName))
  );
  const insights = snapshot.contextEvolution.keyInsights.slice(-MAX_INSIGHTS);
  const contextEntries = Object.entries(snapshot.contextEvolution.currentContext);
  const contextLines = contextEntries
    .slice(0, MAX_CONTEXT_ITEMS)
    .map(([key, value]) => `• ${key}: ${truncate(stringifyJsonValue(value))}`);
  const duration = Date.parse(snapshot.lastActivity) - Date.parse(snapshot.startTime);

  return [
    RESUME_MESSAGE_HEADER,
    '',
    'PREVIOUS SESSION SUMMARY:',
    `• Workflow: ${snapshot.workflowId}`,
    `• Phase when interrupted: ${snapshot.currentPhase}`,
    `• Last strategy: ${snapshot.currentStrategy}`,
    `• Session duration: ${formatDuration(duration)}`,
    '',
    'COMPLETED WORK (DO NOT REPEAT):',
    `• Tools successfully executed: ${tools.length > 0 ? tools.join(', ') : 'none'}`,
    `• Key discoveries made: ${insights.length > 0 ? insights.join('; ') : 'none'}`,
    `• Context variables collected: ${contextEntries.length} items`,
    '',
    'CURRENT STATE:',
    ...(contextLines.length > 0 ? contextLines : ['• (no context variables)']),
    '',
    'RESUME INSTRUCTION:',
    'You are resuming this workflow exactly where you left off. Review the context above to understand:',
    "1. What work you've already completed successfully (DO NOT REPEAT)",
    "2. What insights and context you've gathered so far",
    '3. Where you were in the workflow when it was interrupted',
    '',
    'Continue from the next step. Do not repeat tool calls that already succeeded.',
  ].join('\n');
}

export function createResumeMessage(snapshot: ResumeSnapshot, timestamp: string): ChatMessage {
  return {
    role: 'system',
    content: buildResumeMessageContent(snapshot),
    timestamp,
  };
}
