import type { LLMConfig, LLMProvider, LLMRequest } from './types.js';
import { AnthropicProvider } from './providers/AnthropicProvider.js';
import { ProviderError } from '../utils/errors.js';
import { withTimeout } from '../utils/timeout.js';
import { logger } from '../cli/ui/logger.js';

/**
 * Returns null when no model is configured, which puts the whole core into
 * its deterministic fallback mode.
 */
export function createLLMProvider(config: LLMConfig): LLMProvider | null {
  switch (config.provider) {
    case 'none':
      return null;
    case 'anthropic':
      if (!config.apiKey && !process.env.ANTHROPIC_API_KEY) {
        logger.warn('No ANTHROPIC_API_KEY set - running in deterministic fallback mode');
        return null;
      }
      return new AnthropicProvider(config);
  }
}

/**
 * Complete a request under a timeout and return the trimmed text.
 * Every failure comes back as a ProviderError subclass.
 */
export async function completeText(
  provider: LLMProvider,
  request: LLMRequest,
  timeoutMs: number,
  signal?: AbortSignal
): Promise<string> {
  try {
    const response = await withTimeout(
      provider.type,
      timeoutMs,
      (timeoutSignal) => provider.complete(request, { signal: timeoutSignal }),
      signal
    );
    return response.content.trim();
  } catch (error) {
    if (error instanceof ProviderError) throw error;
    throw new ProviderError(
      `${provider.type} request failed: ${error instanceof Error ? error.message : String(error)}`,
      provider.type
    );
  }
}

export { AnthropicProvider } from './providers/AnthropicProvider.js';
export type { LLMProvider, LLMConfig, LLMRequest, LLMResponse } from './types.js';
