/**
 * Tool contracts
 */

import { JsonObject, JsonValue } from './json';

/**
 * JSON schema describing a tool's parameters
 */
export interface ToolParameters {
  type: 'object';
  properties: Record<string, { type: string; description?: string; enum?: string[] }>;
  required?: string[];
}

/**
 * What the model is told about a tool
 */
export interface ToolDefinition {
  name: string;
  description: string;
  parameters: ToolParameters;
}

export interface ToolResult {
  success: boolean;
  /** Text handed back to the model */
  output?: string;
  error?: string;
  /** Context variables to set after a successful call */
  context?: Record<string, JsonValue>;
}

export interface Tool extends ToolDefinition {
  execute(params: JsonObject, signal?: AbortSignal): Promise<ToolResult>;
}

/**
 * Registry of invocable tools
 */
export interface ToolCatalog {
  has(name: string): boolean;
  names(): string[];
  definitions(names?: readonly string[]): ToolDefinition[];
  invoke(name: string, params: JsonObject, signal?: AbortSignal): Promise<ToolResult>;
}
