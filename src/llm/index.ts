export { createLLMProvider, completeText, AnthropicProvider } from './LLMProvider.js';
export type {
  LLMProvider,
  LLMConfig,
  LLMRequest,
  LLMResponse,
  LLMProviderType,
  CompletionOptions,
  Message,
  MessageRole,
  TokenUsage,
  StopReason,
} from './types.js';
