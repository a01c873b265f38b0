/**
 * Templates module
 */
export { renderTemplate, getTemplateVariables } from './prompt-template';
export type { PromptTemplate, TemplateError } from './prompt-template';
