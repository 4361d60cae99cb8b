import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import { getDefaultConfig, getConfigSearchPlaces, getEnvVariables, type EnvBinding } from './defaults.js';
import {
  LogLevelSchema,
  MemoryModeSchema,
  type DeepPartial,
  type SwitchboardConfig,
  type ResolvedConfig,
  type ConfigSource,
} from './types.js';
import { SpecialistRoleSchema } from '../agents/base/types.js';
import { ConfigurationError } from '../utils/errors.js';

const ConfigSchema = z.object({
  llm: z.object({
    provider: z.enum(['anthropic', 'none']),
    apiKey: z.string().min(1).optional(),
    model: z.string(),
    maxTokens: z.number().int().positive(),
    temperature: z.number().min(0).max(1),
    timeout: z.number().positive(),
  }),
  tools: z.object({
    timeoutMs: z.number().positive(),
    search: z.object({
      provider: z.enum(['serper', 'simulated']),
      apiKey: z.string().min(1).optional(),
      maxResults: z.number().int().min(1).max(10),
    }),
  }),
  memory: z.object({
    mode: MemoryModeSchema,
    contextLimit: z.number().int().min(0),
    store: z.enum(['memory', 'sqlite']),
    databasePath: z.string().min(1),
  }),
  orchestration: z.object({
    defaultSpecialist: SpecialistRoleSchema,
    reasoningTimeoutMs: z.number().positive(),
    synthesisTimeoutMs: z.number().positive(),
  }),
  tracing: z.object({
    enabled: z.boolean(),
    sink: z.enum(['logger', 'memory']),
  }),
  trainingData: z.object({
    enabled: z.boolean(),
    filePath: z.string().min(1),
  }),
  cli: z.object({
    colors: z.boolean(),
    spinners: z.boolean(),
    outputFormat: z.enum(['text', 'json']),
  }),
  logging: z.object({
    level: LogLevelSchema,
    includeTimestamp: z.boolean(),
  }),
});

export interface ConfigLoadOptions {
  searchFrom?: string;
  env?: NodeJS.ProcessEnv;
}

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class Config {
  private config: ResolvedConfig;

  private constructor(config: ResolvedConfig) {
    this.config = config;
  }

  static async load(
    overrides?: DeepPartial<SwitchboardConfig>,
    options: ConfigLoadOptions = {}
  ): Promise<Config> {
    const defaults = getDefaultConfig();
    const sources: ConfigSource[] = [{ path: 'defaults', type: 'default' }];

    const explorer = cosmiconfig('switchboard', {
      searchPlaces: getConfigSearchPlaces(),
    });

    let fileConfig: PlainObject = {};
    try {
      const result = await explorer.search(options.searchFrom);
      if (result && !result.isEmpty) {
        if (!isPlainObject(result.config)) {
          throw new Error(`${result.filepath} must contain an object`);
        }
        fileConfig = result.config;
        sources.push({ path: result.filepath, type: 'file' });
      }
    } catch (error) {
      throw new ConfigurationError(
        `Failed to load config file: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    const envConfig = Config.loadFromEnv(options.env ?? process.env);
    if (Object.keys(envConfig).length > 0) {
      sources.push({ path: 'environment', type: 'env' });
    }

    if (overrides && Object.keys(overrides).length > 0) {
      sources.push({ path: 'overrides', type: 'override' });
    }

    // defaults < file < env < overrides
    const merged = Config.deepMerge(defaults, fileConfig, envConfig, overrides ?? {});

    const validated = ConfigSchema.safeParse(merged);
    if (!validated.success) {
      const errors = validated.error.errors
        .map((e) => `${e.path.join('.')}: ${e.message}`)
        .join(', ');
      throw new ConfigurationError(`Invalid configuration: ${errors}`);
    }

    return new Config({ ...validated.data, sources });
  }

  static fromObject(config: SwitchboardConfig): Config {
    const validated = ConfigSchema.safeParse(config);
    if (!validated.success) {
      throw new ConfigurationError(`Invalid configuration: ${validated.error.message}`);
    }
    return new Config({ ...validated.data, sources: [{ path: 'object', type: 'override' }] });
  }

  private static loadFromEnv(env: NodeJS.ProcessEnv): PlainObject {
    const config: PlainObject = {};

    for (const [envKey, binding] of Object.entries(getEnvVariables())) {
      const value = env[envKey];
      if (value !== undefined && value !== '') {
        Config.setNestedValue(config, binding.path, Config.parseEnvValue(envKey, value, binding));
      }
    }

    return config;
  }

  private static parseEnvValue(envKey: string, value: string, binding: EnvBinding): unknown {
    switch (binding.type) {
      case 'boolean':
        if (value === 'true') return true;
        if (value === 'false') return false;
        throw new ConfigurationError(`${envKey} must be "true" or "false"`, { value });
      case 'number': {
        const num = Number(value);
        if (Number.isNaN(num)) {
          throw new ConfigurationError(`${envKey} must be a number`, { value });
        }
        return num;
      }
      default:
        return value;
    }
  }

  private static setNestedValue(obj: PlainObject, path: string, value: unknown): void {
    const parts = path.split('.');
    const lastPart = parts.pop();
    if (!lastPart) return;

    let current = obj;
    for (const part of parts) {
      const next = current[part];
      if (isPlainObject(next)) {
        current = next;
      } else {
        const created: PlainObject = {};
        current[part] = created;
        current = created;
      }
    }

    current[lastPart] = value;
  }

  private static deepMerge(...objects: object[]): PlainObject {
    const result: PlainObject = {};

    for (const obj of objects) {
      for (const [key, value] of Object.entries(obj)) {
        if (value === undefined) continue;
        const existing = result[key];
        if (isPlainObject(value) && isPlainObject(existing)) {
          result[key] = Config.deepMerge(existing, value);
        } else {
          result[key] = value;
        }
      }
    }

    return result;
  }

  get llm() {
    return this.config.llm;
  }

  get tools() {
    return this.config.tools;
  }

  get memory() {
    return this.config.memory;
  }

  get orchestration() {
    return this.config.orchestration;
  }

  get tracing() {
    return this.config.tracing;
  }

  get trainingData() {
    return this.config.trainingData;
  }

  get cli() {
    return this.config.cli;
  }

  get logging() {
    return this.config.logging;
  }

  get sources() {
    return this.config.sources;
  }
}
