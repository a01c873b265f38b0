/**
 * Config module - configuration resolution and display
 */

export {
  CONFIG_FILE_NAME,
  resolveConfig,
  getRepoConfigPath,
  getUserConfigPath,
} from './resolve-config';
export type { CliFlags, WorkflowConfigLayer, ResolveConfigOptions, ResolvedConfig } from './resolve-config';

export { formatEffectiveConfigForDisplay } from './format-effective-config';
