import { z } from 'zod';
import type {
  ToolArgs,
  ToolDescriptor,
  ToolExecuteOptions,
  ToolInfo,
  ToolInvocationResult,
  ToolStats,
} from './types.js';
import {
  ConfigurationError,
  DuplicateToolError,
  ToolExecutionError,
  UnknownToolError,
} from '../utils/errors.js';
import { withTimeout } from '../utils/timeout.js';
import { validate } from '../utils/validation.js';
import { DEFAULT_TOOL_TIMEOUT_MS } from '../config/defaults.js';
import { logger } from '../cli/ui/logger.js';

const TOOL_NAME_PATTERN = /^[a-z][a-z0-9_]*$/;

interface InvocationOutcome {
  output: unknown;
  summary: string;
}

// The typed descriptor is closed over here so the registry can hold tools
// with different argument shapes in one map.
interface RegisteredTool {
  info: ToolInfo;
  invoke(raw: ToolArgs, signal: AbortSignal): Promise<InvocationOutcome>;
  fromQuery(query: string): ToolArgs;
  stats: Omit<ToolStats, 'successRate'>;
}

export interface ToolRegistryOptions {
  timeoutMs?: number;
}

export class ToolRegistry {
  private tools: Map<string, RegisteredTool> = new Map();
  private timeoutMs: number;

  constructor(options: ToolRegistryOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TOOL_TIMEOUT_MS;
  }

  register<TArgs extends ToolArgs, TOutput>(descriptor: ToolDescriptor<TArgs, TOutput>): void {
    if (this.tools.has(descriptor.name)) {
      throw new DuplicateToolError(descriptor.name);
    }
    if (!TOOL_NAME_PATTERN.test(descriptor.name)) {
      throw new ConfigurationError(`Invalid tool name "${descriptor.name}"`, {
        pattern: TOOL_NAME_PATTERN.source,
      });
    }
    if (descriptor.description.trim().length === 0) {
      throw new ConfigurationError(`Tool "${descriptor.name}" needs a description`);
    }
    const schema = descriptor.parameters;
    if (!(schema instanceof z.ZodObject)) {
      throw new ConfigurationError(`Tool "${descriptor.name}" parameters must be a zod object schema`);
    }

    const format = descriptor.formatOutput ?? ((output: Awaited<TOutput>) => JSON.stringify(output));

    this.tools.set(descriptor.name, {
      info: {
        name: descriptor.name,
        description: descriptor.description,
        parameters: Object.keys(schema.shape),
      },
      invoke: async (raw, signal) => {
        const args = validate(descriptor.parameters, raw, descriptor.name);
        const output = await descriptor.handler(args, { signal });
        return { output, summary: format(output) };
      },
      fromQuery: (query) => (descriptor.fromQuery ? descriptor.fromQuery(query) : { query }),
      stats: { usageCount: 0, successCount: 0, errorCount: 0 },
    });
  }

  listTools(): ToolInfo[] {
    return Array.from(this.tools.values()).map((tool) => ({
      ...tool.info,
      parameters: [...tool.info.parameters],
    }));
  }

  extractArguments(name: string, query: string): ToolArgs {
    return this.require(name).fromQuery(query);
  }

  /**
   * Run a tool under the registry timeout. Every failure, including schema
   * rejection and timeout, comes back as a ToolExecutionError.
   */
  async execute(name: string, args: ToolArgs, options: ToolExecuteOptions = {}): Promise<ToolInvocationResult> {
    const tool = this.require(name);
    tool.stats.usageCount++;
    const startedAt = Date.now();

    try {
      const { output, summary } = await withTimeout(
        `tool:${name}`,
        this.timeoutMs,
        (signal) => tool.invoke(args, signal),
        options.signal
      );
      tool.stats.successCount++;
      logger.tool(name, `completed in ${Date.now() - startedAt}ms`);
      return { toolName: name, input: args, output, summary, durationMs: Date.now() - startedAt };
    } catch (error) {
      tool.stats.errorCount++;
      const wrapped = error instanceof ToolExecutionError ? error : new ToolExecutionError(name, error);
      tool.stats.lastError = wrapped.message;
      logger.tool(name, `failed: ${wrapped.message}`);
      throw wrapped;
    }
  }

  getStats(): Record<string, ToolStats> {
    const stats: Record<string, ToolStats> = {};
    for (const [name, tool] of this.tools) {
      const { usageCount, successCount } = tool.stats;
      stats[name] = {
        ...tool.stats,
        successRate: usageCount > 0 ? successCount / usageCount : 0,
      };
    }
    return stats;
  }

  private require(name: string): RegisteredTool {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new UnknownToolError(name);
    }
    return tool;
  }
}
