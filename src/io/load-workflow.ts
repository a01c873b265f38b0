/**
 * Workflow file loader
 *
 * A workflow is a `*.prompt.md` file: optional YAML frontmatter between
 * `---` lines, then the markdown body used as the prompt template.
 */

import { parse as parseYaml } from 'yaml';
import { FileSystem } from '../types/file-system';
import { JsonValue } from '../types/json';
import { Result, ok, err } from '../types/result';
import { WorkflowSource } from '../types/workflow';
import { validateWorkflowFrontmatter } from '../schemas/validators';

export type WorkflowLoadErrorCode = 'NOT_FOUND' | 'READ_ERROR' | 'INVALID_FRONTMATTER';

export interface WorkflowLoadError {
  code: WorkflowLoadErrorCode;
  message: string;
  path: string;
  /** One line per problem */
  details: string[];
}

interface SplitDocument {
  frontmatter: string | null;
  body: string;
}

function splitFrontmatter(content: string): Result<SplitDocument, string> {
  const lines = content.split(/\r?\n/);
  if (lines[0]?.trim() !== '---') {
    return ok({ frontmatter: null, body: content });
  }

  const end = lines.findIndex((line, index) => index > 0 && line.trim() === '---');
  if (end === -1) {
    return err('Missing closing frontmatter delimiter (---)');
  }

  let body = lines.slice(end + 1).join('\n');
  if (body.startsWith('\n')) {
    body = body.slice(1);
  }
  return ok({ frontmatter: lines.slice(1, end).join('\n'), body });
}

/**
 * Workflow name from the file name: `summarize.prompt.md` -> `summarize`
 */
export function workflowNameFromPath(filePath: string): string {
  const base = filePath.split(/[\\/]/).pop() ?? filePath;
  return base.replace(/\.prompt\.md$/i, '').replace(/\.md$/i, '');
}

/**
 * Build a WorkflowSource from file text
 */
export function parseWorkflowSource(content: string, filePath: string): Result<WorkflowSource, WorkflowLoadError> {
  const invalid = (details: string[]): Result<never, WorkflowLoadError> =>
    err({
      code: 'INVALID_FRONTMATTER',
      message: `Invalid workflow file ${filePath}: ${details[0] ?? 'unknown error'}`,
      path: filePath,
      details,
    });

  const split = splitFrontmatter(content);
  if (!split.ok) {
    return invalid([split.error]);
  }

  let data: unknown = {};
  if (split.value.frontmatter !== null) {
    try {
      data = parseYaml(split.value.frontmatter);
    } catch (error) {
      return invalid([`Invalid YAML in frontmatter: ${error instanceof Error ? error.message : String(error)}`]);
    }
  }

  const validated = validateWorkflowFrontmatter(data);
  if (!validated.success || !validated.data) {
    return invalid(validated.errors ?? []);
  }
  const frontmatter = validated.data;

  const schemaDefaults: Record<string, JsonValue> = {};
  const requiredVariables: string[] = [];
  for (const [name, entry] of Object.entries(frontmatter.input.schema)) {
    if (entry.default !== undefined) {
      schemaDefaults[name] = entry.default;
    }
    if (entry.required) {
      requiredVariables.push(name);
    }
  }

  const { temperature, maxOutputTokens, maxIterations, timeoutMs } = frontmatter.config;

  return ok({
    name: frontmatter.name ?? workflowNameFromPath(filePath),
    filePath,
    content,
    template: split.value.body,
    declaredTools: Array.from(new Set(frontmatter.tools)),
    defaults: frontmatter.input.default,
    schemaDefaults,
    requiredVariables,
    ...(frontmatter.model ? { model: frontmatter.model } : {}),
    settings: {
      ...(temperature !== undefined ? { temperature } : {}),
      ...(maxOutputTokens !== undefined ? { maxOutputTokens } : {}),
      ...(maxIterations !== undefined ? { maxIterations } : {}),
      ...(timeoutMs !== undefined ? { timeoutMs } : {}),
    },
  });
}

/**
 * Read and parse a workflow file; the returned filePath is absolute
 */
export async function loadWorkflow(
  fs: FileSystem,
  filePath: string
): Promise<Result<WorkflowSource, WorkflowLoadError>> {
  const absolutePath = fs.resolve(filePath);
  const content = await fs.readFile(absolutePath);
  if (!content.ok) {
    const notFound = content.error.code === 'NOT_FOUND';
    return err({
      code: notFound ? 'NOT_FOUND' : 'READ_ERROR',
      message: notFound ? `Workflow file not found: ${filePath}` : content.error.message,
      path: absolutePath,
      details: [content.error.message],
    });
  }
  return parseWorkflowSource(content.value, absolutePath);
}
