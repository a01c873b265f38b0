/**
 * Prompt templates with `{{name}}` placeholders
 */

import { JsonValue, stringifyJsonValue } from '../types/json';
import { Result, ok, err } from '../types/result';

export interface PromptTemplate {
  /**
   * The template string with placeholders (e.g., "{{variable}}")
   */
  template: string;

  description?: string;

  /**
   * Variables that must be supplied even if the text never mentions them
   */
  requiredVariables?: string[];
}

export interface TemplateError {
  message: string;
  /** Placeholders or required variables with no value */
  missing: string[];
  /** Syntax problems, one line each */
  syntaxErrors: string[];
}

const PLACEHOLDER_NAME = /^[A-Za-z_][A-Za-z0-9_.-]*$/;

interface Placeholder {
  name: string;
  start: number;
  end: number;
}

function lineOf(text: string, index: number): number {
  return text.slice(0, index).split('\n').length;
}

function scan(template: string): { placeholders: Placeholder[]; syntaxErrors: string[] } {
  const placeholders: Placeholder[] = [];
  const syntaxErrors: string[] = [];
  let cursor = 0;

  while (cursor < template.length) {
    const open = template.indexOf('{{', cursor);
    if (open === -1) {
      break;
    }
    const close = template.indexOf('}}', open + 2);
    if (close === -1) {
      syntaxErrors.push(`Unterminated placeholder at line ${lineOf(template, open)}`);
      break;
    }
    const name = template.slice(open + 2, close).trim();
    if (!PLACEHOLDER_NAME.test(name)) {
      syntaxErrors.push(`Invalid placeholder "{{${name}}}" at line ${lineOf(template, open)}`);
    } else {
      placeholders.push({ name, start: open, end: close + 2 });
    }
    cursor = close + 2;
  }

  return { placeholders, syntaxErrors };
}

/**
 * Distinct placeholder names in order of first appearance
 */
export function getTemplateVariables(template: string): Result<string[], TemplateError> {
  const { placeholders, syntaxErrors } = scan(template);
  if (syntaxErrors.length > 0) {
    return err({ message: `Template syntax error: ${syntaxErrors[0]}`, missing: [], syntaxErrors });
  }
  return ok(Array.from(new Set(placeholders.map((p) => p.name))));
}

/**
 * Interpolate variables into a template. Every placeholder and every
 * required variable must have a value.
 */
export function renderTemplate(
  template: PromptTemplate,
  variables: Record<string, JsonValue>
): Result<string, TemplateError> {
  const { placeholders, syntaxErrors } = scan(template.template);
  if (syntaxErrors.length > 0) {
    return err({ message: `Template syntax error: ${syntaxErrors[0]}`, missing: [], syntaxErrors });
  }

  const names = [...placeholders.map((p) => p.name), ...(template.requiredVariables ?? [])];
  const supplied = (name: string): boolean => Object.prototype.hasOwnProperty.call(variables, name);
  const missing = Array.from(new Set(names.filter((name) => !supplied(name))));
  if (missing.length > 0) {
    return err({
      message: `Missing required variables: ${missing.join(', ')}`,
      missing,
      syntaxErrors: [],
    });
  }

  let output = '';
  let cursor = 0;
  for (const placeholder of placeholders) {
    output += template.template.slice(cursor, placeholder.start);
    output += stringifyJsonValue(variables[placeholder.name]);
    cursor = placeholder.end;
  }
  output += template.template.slice(cursor);

  return ok(output);
}
