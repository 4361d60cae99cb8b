import Anthropic from '@anthropic-ai/sdk';
import type {
  CompletionOptions,
  LLMConfig,
  LLMProvider,
  LLMRequest,
  LLMResponse,
  StopReason,
} from '../types.js';
import {
  LLMAuthenticationError,
  LLMRateLimitError,
  ProviderError,
  ProviderTimeoutError,
  ProviderUnavailableError,
} from '../../utils/errors.js';

export class AnthropicProvider implements LLMProvider {
  readonly type = 'anthropic' as const;
  readonly model: string;

  private client: Anthropic;
  private config: LLMConfig;

  constructor(config: LLMConfig) {
    this.config = config;
    this.model = config.model;

    const apiKey = config.apiKey || process.env.ANTHROPIC_API_KEY;
    if (!apiKey) {
      throw new LLMAuthenticationError('anthropic');
    }

    this.client = new Anthropic({
      apiKey,
      timeout: config.timeout,
      maxRetries: 1,
    });
  }

  async complete(request: LLMRequest, options: CompletionOptions = {}): Promise<LLMResponse> {
    try {
      const apiRequest: Anthropic.MessageCreateParamsNonStreaming = {
        model: this.model,
        max_tokens: request.maxTokens ?? this.config.maxTokens,
        temperature: request.temperature ?? this.config.temperature,
        system: request.system,
        messages: request.messages.map((msg) => ({ role: msg.role, content: msg.content })),
        stop_sequences: request.stopSequences,
      };

      const response = await this.client.messages.create(apiRequest, { signal: options.signal });

      const content = response.content
        .filter((block): block is Anthropic.TextBlock => block.type === 'text')
        .map((block) => block.text)
        .join('\n');

      return {
        content,
        model: response.model,
        usage: {
          inputTokens: response.usage.input_tokens,
          outputTokens: response.usage.output_tokens,
          totalTokens: response.usage.input_tokens + response.usage.output_tokens,
        },
        stopReason: this.mapStopReason(response.stop_reason),
      };
    } catch (error) {
      throw this.mapError(error);
    }
  }

  private mapStopReason(reason: string | null): StopReason {
    switch (reason) {
      case 'max_tokens':
        return 'max_tokens';
      case 'stop_sequence':
        return 'stop_sequence';
      case 'tool_use':
        return 'tool_use';
      default:
        return 'end_turn';
    }
  }
}
