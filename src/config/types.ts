import { z } from 'zod';
import type { LLMConfig } from '../llm/types.js';
import type { SpecialistRole } from '../agents/base/types.js';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

export const MemoryModeSchema = z.enum(['recency', 'semantic']);
export type MemoryMode = z.infer<typeof MemoryModeSchema>;

export interface SwitchboardConfig {
  llm: LLMConfig;
  tools: ToolsConfig;
  memory: MemoryConfig;
  orchestration: OrchestrationConfig;
  tracing: TracingConfig;
  trainingData: TrainingDataConfig;
  cli: CliConfig;
  logging: LoggingConfig;
}

export interface ToolsConfig {
  timeoutMs: number;
  search: {
    provider: 'serper' | 'simulated';
    apiKey?: string;
    maxResults: number;
  };
}

export interface MemoryConfig {
  mode: MemoryMode;
  contextLimit: number;
  store: 'memory' | 'sqlite';
  databasePath: string;
}

export interface OrchestrationConfig {
  defaultSpecialist: SpecialistRole;
  reasoningTimeoutMs: number;
  synthesisTimeoutMs: number;
}

export interface TracingConfig {
  enabled: boolean;
  sink: 'logger' | 'memory';
}

export interface TrainingDataConfig {
  enabled: boolean;
  filePath: string;
}

export interface CliConfig {
  colors: boolean;
  spinners: boolean;
  outputFormat: 'text' | 'json';
}

export interface LoggingConfig {
  level: LogLevel;
  includeTimestamp: boolean;
}

export interface ConfigSource {
  path: string;
  type: 'file' | 'env' | 'default' | 'override';
}

export interface ResolvedConfig extends SwitchboardConfig {
  sources: ConfigSource[];
}

export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends object ? DeepPartial<T[K]> : T[K];
};
