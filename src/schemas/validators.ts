/**
 * Schema validation with zod
 * Runtime validation for snapshot files, workflow frontmatter, config
 * files and mock scripts
 */

import { z } from 'zod';
import { resumeFileSchema, resumeFileHeaderSchema, ResumeFile, ResumeFileHeader } from './resume-file.schema';
import { workflowFrontmatterSchema, WorkflowFrontmatter } from './workflow-file.schema';
import { configFileSchema, ConfigFile } from './config-file.schema';
import { mockScriptSchema, MockScript } from './mock-script.schema';

export interface ValidationResult<T> {
  success: boolean;
  data?: T;
  errors?: string[];
}

/**
 * Format zod issues as `path: message` lines
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

function validateWith<S extends z.ZodTypeAny>(schema: S, data: unknown): ValidationResult<z.output<S>> {
  const result = schema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, errors: formatIssues(result.error) };
}

function parseJsonWith<S extends z.ZodTypeAny>(schema: S, json: string): ValidationResult<z.output<S>> {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (e) {
    return {
      success: false,
      errors: [`Invalid JSON: ${e instanceof Error ? e.message : String(e)}`],
    };
  }
  return validateWith(schema, data);
}

// =============================================================================
// Snapshot files
// =============================================================================

export function validateResumeFile(data: unknown): ValidationResult<ResumeFile> {
  return validateWith(resumeFileSchema, data);
}

export function parseResumeFile(json: string): ValidationResult<ResumeFile> {
  return parseJsonWith(resumeFileSchema, json);
}

export function parseResumeFileHeader(json: string): ValidationResult<ResumeFileHeader> {
  return parseJsonWith(resumeFileHeaderSchema, json);
}

// =============================================================================
// Workflow frontmatter
// =============================================================================

export function validateWorkflowFrontmatter(data: unknown): ValidationResult<WorkflowFrontmatter> {
  // An empty frontmatter block parses to null
  return validateWith(workflowFrontmatterSchema, data ?? {});
}

// =============================================================================
// Config files
// =============================================================================

export function validateConfigFile(data: unknown): ValidationResult<ConfigFile> {
  return validateWith(configFileSchema, data);
}

export function parseConfigFile(json: string): ValidationResult<ConfigFile> {
  return parseJsonWith(configFileSchema, json);
}

// =============================================================================
// Mock scripts
// =============================================================================

export function parseMockScript(json: string): ValidationResult<MockScript> {
  return parseJsonWith(mockScriptSchema, json);
}
