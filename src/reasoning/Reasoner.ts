import type { LLMProvider } from '../llm/types.js';
import type { ToolSelector } from '../tools/ToolSelector.js';
import type { ToolInfo } from '../tools/types.js';
import type { ConversationTurn } from '../memory/types.js';
import type { ReasoningAnalysis } from './types.js';
import { REASONER_SYSTEM_PROMPT, REASONING_PROMPT_TEMPLATE } from './prompts.js';
import { completeText } from '../llm/LLMProvider.js';
import { formatTurns } from '../memory/relevance.js';
import { ProviderError, formatError } from '../utils/errors.js';
import { truncateString } from '../utils/validation.js';
import { DEFAULT_PROVIDER_TIMEOUT_MS } from '../config/defaults.js';
import { logger } from '../cli/ui/logger.js';

export interface ReasonerDependencies {
  provider: LLMProvider | null;
  selector: ToolSelector;
  tools: () => ToolInfo[];
  timeoutMs?: number;
}

export interface AnalyzeOptions {
  directive?: string;
  signal?: AbortSignal;
}

const TOOLS_LINE = /^\s*TOOLS:\s*(.*)$/im;

export function parseToolHints(text: string): string[] {
  const match = text.match(TOOLS_LINE);
  if (!match) return [];
  const hints = (match[1] ?? '')
    .split(',')
    .map((hint) => hint.trim().toLowerCase())
    .filter((hint) => hint.length > 0 && hint !== 'none');
  return [...new Set(hints)];
}

export class Reasoner {
  private provider: LLMProvider | null;
  private selector: ToolSelector;
  private tools: () => ToolInfo[];
  private timeoutMs: number;

  constructor(dependencies: ReasonerDependencies) {
    this.provider = dependencies.provider;
    this.selector = dependencies.selector;
    this.tools = dependencies.tools;
    this.timeoutMs = dependencies.timeoutMs ?? DEFAULT_PROVIDER_TIMEOUT_MS;
  }

  async analyze(
    query: string,
    context: string | null,
    history: ConversationTurn[],
    options: AnalyzeOptions = {}
  ): Promise<ReasoningAnalysis> {
    if (!this.provider) {
      return this.fallback(query, context, history);
    }

    const prompt = REASONING_PROMPT_TEMPLATE.replace('{{query}}', () => query)
      .replace('{{directive}}', () => options.directive ?? 'general assistance')
      .replace('{{tools}}', () => this.tools().map((tool) => `- ${tool.name}: ${tool.description}`).join('\n'))
      .replace('{{context}}', () => context ?? 'None')
      .replace('{{history}}', () => (history.length > 0 ? formatTurns(history) : 'None'));

    try {
      const text = await completeText(
        this.provider,
        {
          system: REASONER_SYSTEM_PROMPT,
          messages: [{ role: 'user', content: prompt }],
          maxTokens: 400,
          temperature: 0.2,
        },
        this.timeoutMs,
        options.signal
      );

      return {
        text: text.replace(TOOLS_LINE, '').trim(),
        toolHints: parseToolHints(text),
        source: 'model',
      };
    } catch (error) {
      if (!(error instanceof ProviderError)) throw error;
      logger.warn(`Reasoning fell back to keyword analysis: ${formatError(error)}`);
      return this.fallback(query, context, history);
    }
  }

  /**
   * Deterministic analysis built from the selector's own keyword scan.
   */
  fallback(query: string, context: string | null, history: ConversationTurn[]): ReasoningAnalysis {
    const hints = this.selector.scan(query);
    const parts = [`Query analysis: ${truncateString(query, 100)}.`];

    parts.push(
      hints.length > 0 ? `Keyword scan suggests: ${hints.join(', ')}.` : 'No tool keywords detected.'
    );
    if (context) {
      parts.push('Builds on the previous specialist output.');
    }
    if (history.length > 0) {
      parts.push(`${history.length} related earlier turn(s).`);
    }

    return { text: parts.join(' '), toolHints: hints, source: 'fallback' };
  }
}
