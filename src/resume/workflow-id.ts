/**
 * Workflow id generation and validation
 */

import { randomBytes } from 'crypto';

export const WORKFLOW_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/;

export function isValidWorkflowId(workflowId: string): boolean {
  return WORKFLOW_ID_PATTERN.test(workflowId) && !workflowId.includes('..');
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

function formatStamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}_` +
    `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

/**
 * `workflow_<name>_<yyyyMMdd_HHmmss>_<suffix>` in UTC
 */
export function generateWorkflowId(
  workflowName: string,
  now: Date,
  suffix: string = randomBytes(4).toString('hex')
): string {
  const name =
    workflowName
      .toLowerCase()
      .replace(/[^a-z0-9]+/g, '-')
      .replace(/^-+|-+$/g, '') || 'workflow';
  return `workflow_${name}_${formatStamp(now)}_${suffix}`;
}
