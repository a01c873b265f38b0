/**
 * JSON value types shared by variables, tool parameters and snapshots
 */

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/**
 * Render a JSON value as plain text; strings pass through unquoted
 */
export function stringifyJsonValue(value: JsonValue): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}
