/**
 * Workflow content hashing
 */

import { createHash } from 'crypto';

/**
 * SHA-256 hex digest of the raw workflow text
 */
export function hashWorkflowContent(content: string): string {
  return createHash('sha256').update(content, 'utf8').digest('hex');
}
