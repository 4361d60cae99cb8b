export { ToolRegistry } from './ToolRegistry.js';
export type { ToolRegistryOptions } from './ToolRegistry.js';
export { ToolSelector, DEFAULT_TOOL_RULES, parseToolList } from './ToolSelector.js';
export type { ToolRule, RefineOptions } from './ToolSelector.js';
export * from './builtin/index.js';
export type {
  ToolArgs,
  ToolDescriptor,
  ToolExecuteOptions,
  ToolHandlerContext,
  ToolInfo,
  ToolInvocationResult,
  ToolStats,
} from './types.js';
