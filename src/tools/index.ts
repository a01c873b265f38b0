/**
 * Tools module
 */

export { ToolRegistry, createToolRegistry } from './tool-registry';
export {
  createFileReadTool,
  createFileWriteTool,
  createFileListTool,
  createFileExistsTool,
  createFileTools,
} from './file-tools';
