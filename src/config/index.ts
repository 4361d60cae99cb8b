export { Config, type ConfigLoadOptions } from './Config.js';
export {
  getDefaultConfig,
  DEFAULT_TOOL_TIMEOUT_MS,
  DEFAULT_PROVIDER_TIMEOUT_MS,
  DEFAULT_CONTEXT_LIMIT,
} from './defaults.js';
export type {
  SwitchboardConfig,
  ResolvedConfig,
  ToolsConfig,
  MemoryConfig,
  MemoryMode,
  OrchestrationConfig,
  TracingConfig,
  TrainingDataConfig,
  CliConfig,
  LoggingConfig,
  LogLevel,
  DeepPartial,
} from './types.js';
