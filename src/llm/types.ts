import { z } from 'zod';

export const LLMProviderTypeSchema = z.enum(['anthropic', 'none']);
export type LLMProviderType = z.infer<typeof LLMProviderTypeSchema>;

export const MessageRoleSchema = z.enum(['user', 'assistant']);
export type MessageRole = z.infer<typeof MessageRoleSchema>;

export interface Message {
  role: MessageRole;
  content: string;
}

export interface LLMConfig {
  provider: LLMProviderType;
  apiKey?: string;
  model: string;
  maxTokens: number;
  temperature: number;
  timeout: number;
}

export interface LLMRequest {
  messages: Message[];
  system?: string;
  maxTokens?: number;
  temperature?: number;
  stopSequences?: string[];
}

export interface LLMResponse {
  content: string;
  model: string;
  usage: TokenUsage;
  stopReason: StopReason;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export type StopReason = 'end_turn' | 'max_tokens' | 'stop_sequence' | 'tool_use';

export interface CompletionOptions {
  signal?: AbortSignal;
}

/**
 * A language model backend. The orchestration core only ever needs text
 * completion; when no provider is configured every caller drops to its
 * deterministic path instead.
 */
export interface LLMProvider {
  readonly type: string;
  readonly model: string;
  complete(request: LLMRequest, options?: CompletionOptions): Promise<LLMResponse>;
}
