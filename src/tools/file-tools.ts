/**
 * Built-in file tools
 *
 * All paths go through the injected FileSystem; the CLI roots it at the
 * working directory so tools cannot reach outside it.
 */

import { z } from 'zod';
import { FileSystem, FileSystemError } from '../types/file-system';
import { JsonObject } from '../types/json';
import { Tool, ToolResult } from '../types/tool';
import { formatIssues } from '../schemas/validators';

const readArgsSchema = z.object({
  path: z.string().min(1),
});

const writeArgsSchema = z.object({
  path: z.string().min(1),
  content: z.string(),
});

const listArgsSchema = z.object({
  path: z.string().min(1).default('.'),
  pattern: z.string().optional(),
});

const existsArgsSchema = z.object({
  path: z.string().min(1),
});

function invalidArguments(error: z.ZodError): ToolResult {
  return { success: false, error: `Invalid arguments: ${formatIssues(error).join('; ')}` };
}

function fileError(error: FileSystemError): ToolResult {
  return { success: false, error: error.message };
}

function abortedResult(signal?: AbortSignal): ToolResult | null {
  return signal?.aborted ? { success: false, error: 'Tool call aborted' } : null;
}

export function createFileReadTool(fs: FileSystem): Tool {
  return {
    name: 'file-read',
    description: 'Read the contents of a text file in the working directory.',
    parameters: {
      type: 'object',
      properties: {
        path: { type: 'string', description: 'Path of the file, relative to the working directory' },
      },
      required: ['path'],
    },
    async execute(params: JsonObject, signal?: AbortSignal): Promise<ToolResult> {
      const parsed = readArgsSchema.safeParse(params);
      if (!parsed.success) {
        return invalidArguments(parsed.error);
      }
      const aborted = abortedResult(signal);
      if (aborted) return aborted;

      const content = await fs.readFile(parsed.data.path);
      if (!content.ok) {
        return fileError(content.error);
      }
      return {
        success: true,
        output: content.value,
        context: { file_path: parsed.data.path },
      };
    },
  };
}

export function createFileWriteTool(fs: FileSystem): Tool {
  return {
    name: 'file-write',
    description:
      'Write text to a file in the working directory. Creates parent directories and overwrites existing content.',
    parameters: {
      type: 'object',
      properties: {
        path: { type: 'string', description: 'Path of the file, relative to the working directory' },
        content: { type: 'string', description: 'Text to write' },
      },
      required: ['path', 'content'],
    },
    async execute(params: JsonObject, signal?: AbortSignal): Promise<ToolResult> {
      const parsed = writeArgsSchema.safeParse(params);
      if (!parsed.success) {
        return invalidArguments(parsed.error);
      }
      const aborted = abortedResult(signal);
      if (aborted) return aborted;

      const { path, content } = parsed.data;
      const written = await fs.writeFile(path, content, { createParents: true });
      if (!written.ok) {
        return fileError(written.error);
      }
      return {
        success: true,
        output: `Wrote ${Buffer.byteLength(content, 'utf-8')} bytes to ${path}`,
        context: { last_written_file: path },
      };
    },
  };
}

export function createFileListTool(fs: FileSystem): Tool {
  return {
    name: 'file-list',
    description: 'List the entries of a directory in the working directory, optionally filtered by a glob.',
    parameters: {
      type: 'object',
      properties: {
        path: { type: 'string', description: 'Directory to list (default: working directory)' },
        pattern: { type: 'string', description: 'Glob such as *.md, matched against entry names' },
      },
    },
    async execute(params: JsonObject, signal?: AbortSignal): Promise<ToolResult> {
      const parsed = listArgsSchema.safeParse(params);
      if (!parsed.success) {
        return invalidArguments(parsed.error);
      }
      const aborted = abortedResult(signal);
      if (aborted) return aborted;

      const { path, pattern } = parsed.data;
      const names = await fs.list(path, pattern === undefined ? {} : { pattern });
      if (!names.ok) {
        return fileError(names.error);
      }
      return {
        success: true,
        output: names.value.length > 0 ? names.value.join('\n') : '(empty)',
      };
    },
  };
}

export function createFileExistsTool(fs: FileSystem): Tool {
  return {
    name: 'file-exists',
    description: 'Check whether a file or directory exists in the working directory.',
    parameters: {
      type: 'object',
      properties: {
        path: { type: 'string', description: 'Path to check' },
      },
      required: ['path'],
    },
    async execute(params: JsonObject): Promise<ToolResult> {
      const parsed = existsArgsSchema.safeParse(params);
      if (!parsed.success) {
        return invalidArguments(parsed.error);
      }
      const exists = await fs.exists(parsed.data.path);
      return { success: true, output: exists ? 'true' : 'false' };
    },
  };
}

export function createFileTools(fs: FileSystem): Tool[] {
  return [createFileReadTool(fs), createFileWriteTool(fs), createFileListTool(fs), createFileExistsTool(fs)];
}
