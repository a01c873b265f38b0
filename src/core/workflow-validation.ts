/**
 * Workflow validation
 * Static checks of a workflow against the tool registry; never calls the model
 */

import { JsonValue } from '../types/json';
import { ToolCatalog } from '../types/tool';
import { WorkflowSource } from '../types/workflow';
import { getTemplateVariables, renderTemplate } from '../templates/prompt-template';

export interface WorkflowValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

const PLACEHOLDER_VALUE = 'placeholder';

/**
 * Render the template with defaults (and placeholders for anything
 * missing), and check every declared tool is registered
 */
export function validateWorkflow(workflow: WorkflowSource, tools: ToolCatalog): WorkflowValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  const placeholders = getTemplateVariables(workflow.template);
  if (!placeholders.ok) {
    errors.push(...placeholders.error.syntaxErrors);
  } else {
    const variables: Record<string, JsonValue> = { ...workflow.schemaDefaults, ...workflow.defaults };
    for (const name of [...workflow.requiredVariables, ...placeholders.value]) {
      if (!Object.prototype.hasOwnProperty.call(variables, name)) {
        variables[name] = PLACEHOLDER_VALUE;
        if (!workflow.requiredVariables.includes(name)) {
          warnings.push(`Template variable "${name}" has no default; pass it with --var ${name}=...`);
        }
      }
    }
    const rendered = renderTemplate(
      { template: workflow.template, requiredVariables: workflow.requiredVariables },
      variables
    );
    if (!rendered.ok) {
      errors.push(rendered.error.message);
    }
  }

  for (const name of workflow.declaredTools) {
    if (!tools.has(name)) {
      errors.push(`Declared tool is not registered: ${name}`);
    }
  }

  // Tool names quoted in backticks hint at an undeclared dependency
  const declared = new Set(workflow.declaredTools);
  const mentioned = new Set(Array.from(workflow.template.matchAll(/`([^`\s]+)`/g), (match) => match[1]));
  for (const name of mentioned) {
    if (tools.has(name) && !declared.has(name)) {
      warnings.push(`Template mentions tool "${name}" but the workflow does not declare it`);
    }
  }

  if (workflow.declaredTools.length === 0) {
    warnings.push('Workflow declares no tools; the model can only answer directly');
  }

  return { valid: errors.length === 0, errors, warnings };
}
