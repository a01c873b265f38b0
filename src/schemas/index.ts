/**
 * Schemas module - zod schemas and validators
 */

export { jsonValueSchema, jsonObjectSchema } from './json-value.schema';
export {
  RESUME_FILE_SCHEMA_VERSION,
  snapshotStatusSchema,
  workflowMetadataSchema,
  resumeFileSchema,
  resumeFileHeaderSchema,
} from './resume-file.schema';
export type {
  ResumeFile,
  ResumeFileHeader,
  ResumeFileMessage,
  ResumeFileCompletedTool,
  ResumeFileContextChange,
} from './resume-file.schema';
export { workflowFrontmatterSchema } from './workflow-file.schema';
export type { WorkflowFrontmatter } from './workflow-file.schema';
export { configFileSchema } from './config-file.schema';
export type { ConfigFile } from './config-file.schema';
export { mockScriptSchema, scriptedTurnSchema } from './mock-script.schema';
export type { MockScript, ScriptedTurn, ScriptedTurnInput } from './mock-script.schema';
export {
  formatIssues,
  validateResumeFile,
  parseResumeFile,
  parseResumeFileHeader,
  validateWorkflowFrontmatter,
  validateConfigFile,
  parseConfigFile,
  parseMockScript,
} from './validators';
export type { ValidationResult } from './validators';
