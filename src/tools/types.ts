import type { z } from 'zod';

export interface ToolHandlerContext {
  signal: AbortSignal;
}

export type ToolArgs = Record<string, unknown>;

/**
 * A capability a specialist can invoke. `parameters` must be a zod object
 * schema; the registry rejects anything else at registration.
 */
export interface ToolDescriptor<TArgs extends ToolArgs = ToolArgs, TOutput = unknown> {
  name: string;
  description: string;
  parameters: z.ZodType<TArgs, z.ZodTypeDef, unknown>;
  handler: (args: TArgs, context: ToolHandlerContext) => Promise<TOutput> | TOutput;
  /** Derive raw handler arguments from a free-text query. */
  fromQuery?: (query: string) => ToolArgs;
  /** One-line rendering of an output for the deterministic synthesis. */
  formatOutput?: (output: Awaited<TOutput>) => string;
}

export interface ToolInfo {
  name: string;
  description: string;
  parameters: string[];
}

export interface ToolInvocationResult {
  toolName: string;
  input: ToolArgs;
  output: unknown;
  summary: string;
  error?: string;
  errorCode?: string;
  durationMs: number;
}

export interface ToolStats {
  usageCount: number;
  successCount: number;
  errorCount: number;
  successRate: number;
  lastError?: string;
}

export interface ToolExecuteOptions {
  signal?: AbortSignal;
}
