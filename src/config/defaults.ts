import path from 'node:path';
import type { SwitchboardConfig } from './types.js';
import { getDataDirectory, getDatabasePath } from '../utils/fs.js';

export const DEFAULT_TOOL_TIMEOUT_MS = 10000;
export const DEFAULT_PROVIDER_TIMEOUT_MS = 30000;
export const DEFAULT_CONTEXT_LIMIT = 3;

export function getDefaultConfig(): SwitchboardConfig {
  return {
    llm: {
      provider: 'anthropic',
      model: 'claude-sonnet-4-20250514',
      maxTokens: 1024,
      temperature: 0.3,
      timeout: 60000,
    },
    tools: {
      timeoutMs: DEFAULT_TOOL_TIMEOUT_MS,
      search: {
        provider: 'serper',
        maxResults: 5,
      },
    },
    memory: {
      mode: 'recency',
      contextLimit: DEFAULT_CONTEXT_LIMIT,
      store: 'memory',
      databasePath: getDatabasePath('conversations'),
    },
    orchestration: {
      defaultSpecialist: 'general',
      reasoningTimeoutMs: DEFAULT_PROVIDER_TIMEOUT_MS,
      synthesisTimeoutMs: DEFAULT_PROVIDER_TIMEOUT_MS,
    },
    tracing: {
      enabled: true,
      sink: 'logger',
    },
    trainingData: {
      enabled: false,
      filePath: path.join(getDataDirectory(), 'training.jsonl'),
    },
    cli: {
      colors: true,
      spinners: true,
      outputFormat: 'text',
    },
    logging: {
      level: 'info',
      includeTimestamp: false,
    },
  };
}

export function getConfigSearchPlaces(): string[] {
  return [
    'switchboard.config.json',
    'switchboard.config.js',
    '.switchboardrc',
    '.switchboardrc.json',
    '.switchboardrc.js',
  ];
}

export interface EnvBinding {
  path: string;
  type: 'string' | 'number' | 'boolean';
}

export function getEnvVariables(): Record<string, EnvBinding> {
  return {
    ANTHROPIC_API_KEY: { path: 'llm.apiKey', type: 'string' },
    SERPER_API_KEY: { path: 'tools.search.apiKey', type: 'string' },
    SWITCHBOARD_MODEL: { path: 'llm.model', type: 'string' },
    SWITCHBOARD_LOG_LEVEL: { path: 'logging.level', type: 'string' },
    SWITCHBOARD_MEMORY_MODE: { path: 'memory.mode', type: 'string' },
    SWITCHBOARD_TOOL_TIMEOUT_MS: { path: 'tools.timeoutMs', type: 'number' },
    SWITCHBOARD_TRAINING_DATA: { path: 'trainingData.enabled', type: 'boolean' },
  };
}
