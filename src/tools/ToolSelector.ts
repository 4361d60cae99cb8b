import type { ToolRegistry } from './ToolRegistry.js';
import type { LLMProvider } from '../llm/types.js';
import type { ReasoningAnalysis } from '../reasoning/types.js';
import { completeText } from '../llm/LLMProvider.js';
import { tokenize } from '../utils/validation.js';
import { formatError } from '../utils/errors.js';
import { DEFAULT_PROVIDER_TIMEOUT_MS } from '../config/defaults.js';
import { logger } from '../cli/ui/logger.js';

export { extractArithmeticExpression } from './builtin/calculator.js';

export interface ToolRule {
  tool: string;
  describe: string;
  matches: (query: string) => boolean;
}

// An operator counts unless it sits between two letters ("e-mail", "and/or").
const FREE_OPERATOR = /(?<![A-Za-z])[+\-*/]|[+\-*/](?![A-Za-z])/;

export const DEFAULT_TOOL_RULES: ToolRule[] = [
  {
    tool: 'calculator',
    describe: 'arithmetic operator, or the word "calculate" or "math"',
    matches: (query) => {
      if (FREE_OPERATOR.test(query)) return true;
      const tokens = tokenize(query);
      return tokens.includes('calculate') || tokens.includes('math');
    },
  },
  {
    tool: 'weather',
    describe: 'mentions "weather"',
    matches: (query) => query.toLowerCase().includes('weather'),
  },
  {
    // Substring match: "sometimes" and "timestamp" select it as well.
    tool: 'time',
    describe: 'contains "time"',
    matches: (query) => query.toLowerCase().includes('time'),
  },
  {
    tool: 'web_search',
    describe: '"search", "find information", "look up" or the word "find"',
    matches: (query) => {
      const lower = query.toLowerCase();
      if (lower.includes('search') || lower.includes('find information') || lower.includes('look up')) {
        return true;
      }
      return tokenize(query).includes('find');
    },
  },
];

export interface RefineOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

export class ToolSelector {
  constructor(
    private registry: ToolRegistry,
    private rules: ToolRule[] = DEFAULT_TOOL_RULES
  ) {}

  /**
   * Registered tools whose rule matches the query or that a hint names,
   * in registration order.
   */
  select(query: string, hints: Iterable<string> = []): string[] {
    const wanted = new Set([...this.scan(query), ...hints]);
    return this.registry.listTools().map((tool) => tool.name).filter((name) => wanted.has(name));
  }

  /** Tools selected by the keyword rules alone. */
  scan(query: string): string[] {
    const matched = new Set(this.rules.filter((rule) => rule.matches(query)).map((rule) => rule.tool));
    return this.registry.listTools().map((tool) => tool.name).filter((name) => matched.has(name));
  }

  describeRules(): Array<Pick<ToolRule, 'tool' | 'describe'>> {
    return this.rules.map(({ tool, describe }) => ({ tool, describe }));
  }

  /**
   * Ask the model to pick tools when the rules matched nothing. Unknown
   * names are dropped; a provider failure yields an empty selection.
   */
  async refine(
    query: string,
    analysis: ReasoningAnalysis,
    provider: LLMProvider | null,
    options: RefineOptions = {}
  ): Promise<string[]> {
    if (!provider) return [];

    const available = this.registry
      .listTools()
      .map((tool) => `- ${tool.name}: ${tool.description}`)
      .join('\n');

    try {
      const text = await completeText(
        provider,
        {
          system: `Available tools:\n${available}\n\nReturn ONLY a JSON array of tool names, e.g. ["calculator", "weather"]. Return [] if no tool helps.`,
          messages: [{ role: 'user', content: `Query: ${query}\nAnalysis: ${analysis.text}` }],
          maxTokens: 50,
          temperature: 0,
        },
        options.timeoutMs ?? DEFAULT_PROVIDER_TIMEOUT_MS,
        options.signal
      );
      return this.select('', parseToolList(text));
    } catch (error) {
      logger.warn(`Tool refinement failed: ${formatError(error)}`);
      return [];
    }
  }
}

export function parseToolList(text: string): string[] {
  const start = text.indexOf('[');
  const end = text.lastIndexOf(']');
  if (start === -1 || end < start) return [];

  let parsed: unknown;
  try {
    parsed = JSON.parse(text.slice(start, end + 1));
  } catch {
    return [];
  }
  if (!Array.isArray(parsed)) return [];
  return parsed.filter((item): item is string => typeof item === 'string');
}
