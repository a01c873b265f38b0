/**
 * Workflow source types
 */

import { JsonValue } from './json';

export interface WorkflowSettings {
  temperature?: number;
  maxOutputTokens?: number;
  maxIterations?: number;
  timeoutMs?: number;
}

/**
 * A loaded workflow definition
 */
export interface WorkflowSource {
  name: string;
  /** Absolute path of the workflow file */
  filePath: string;
  /** Raw file text; this is what compatibility hashing sees */
  content: string;
  /** Prompt template (the file body) */
  template: string;
  /** Tool allow-list declared in the frontmatter */
  declaredTools: string[];
  /** input.default */
  defaults: Record<string, JsonValue>;
  /** input.schema.<name>.default */
  schemaDefaults: Record<string, JsonValue>;
  /** Inputs marked required in input.schema */
  requiredVariables: string[];
  model?: string;
  settings: WorkflowSettings;
}
