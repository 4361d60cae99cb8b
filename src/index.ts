// Workflow
export { Workflow, createWorkflow } from './workflow/index.js';
export type { DryRunPlan, ProcessOptions, SessionStats, WorkflowOutcome, WorkflowOverrides } from './workflow/index.js';

// Agents
export * from './agents/index.js';

// Tools
export * from './tools/index.js';

// Providers
export * from './providers/index.js';

// LLM
export { createLLMProvider, completeText, AnthropicProvider } from './llm/index.js';
export type { LLMProvider, LLMConfig, LLMRequest, LLMResponse, Message } from './llm/index.js';

// Memory
export * from './memory/index.js';

// Reasoning
export * from './reasoning/index.js';

// Evaluation
export * from './evaluation/index.js';

// Tracing and training data
export * from './tracing/index.js';
export * from './training/index.js';

// Config
export { Config } from './config/index.js';
export type { SwitchboardConfig, ResolvedConfig, DeepPartial } from './config/index.js';

// Utils
export * from './utils/errors.js';
export { logger, Logger } from './cli/ui/logger.js';
