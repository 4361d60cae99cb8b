import type {
  SpecialistCapability,
  SpecialistConfig,
  SpecialistResult,
  SpecialistRole,
  SpecialistRunOptions,
  SpecialistState,
} from './types.js';
import type { LLMProvider } from '../../llm/types.js';
import type { ToolRegistry } from '../../tools/ToolRegistry.js';
import type { ToolSelector } from '../../tools/ToolSelector.js';
import type { ToolInvocationResult } from '../../tools/types.js';
import type { ConversationMemory } from '../../memory/ConversationMemory.js';
import type { ConversationTurn } from '../../memory/types.js';
import type { Reasoner } from '../../reasoning/Reasoner.js';
import type { ReasoningAnalysis } from '../../reasoning/types.js';
import { SYNTHESIS_GROUNDING, SYNTHESIS_PROMPT_TEMPLATE } from './prompts.js';
import { Tracer } from '../../tracing/Tracer.js';
import { completeText } from '../../llm/LLMProvider.js';
import { ProviderUnavailableError, SpecialistError, errorCode, formatError } from '../../utils/errors.js';
import { truncateString } from '../../utils/validation.js';
import { DEFAULT_PROVIDER_TIMEOUT_MS } from '../../config/defaults.js';
import { logger } from '../../cli/ui/logger.js';

export interface SpecialistDependencies {
  registry: ToolRegistry;
  selector: ToolSelector;
  reasoner: Reasoner;
  memory: ConversationMemory;
  provider: LLMProvider | null;
  synthesisTimeoutMs?: number;
}

const CONTEXT_PREVIEW_LENGTH = 200;

/**
 * One role-scoped pass over a query: retrieve history, reason, pick and run
 * tools, synthesize. Roles differ only by configuration.
 */
export class Specialist {
  readonly role: SpecialistRole;
  readonly name: string;
  readonly directive: string;
  readonly capabilities: SpecialistCapability[];

  protected config: SpecialistConfig;
  protected dependencies: SpecialistDependencies;

  constructor(config: SpecialistConfig, dependencies: SpecialistDependencies) {
    this.role = config.role;
    this.name = config.name;
    this.directive = config.directive;
    this.capabilities = config.capabilities;
    this.config = config;
    this.dependencies = dependencies;
  }

  canUseTool(toolName: string): boolean {
    return this.config.allowedTools === 'all' || this.config.allowedTools.includes(toolName);
  }

  async run(query: string, options: SpecialistRunOptions, tracer: Tracer = Tracer.disabled()): Promise<SpecialistResult> {
    return tracer.trace(
      `specialist.${this.role}`,
      { query, context: options.context },
      (scope) => this.process(query, options, scope),
      (result) => ({ response: result.response, toolsUsed: result.toolsUsed })
    );
  }

  private async process(query: string, options: SpecialistRunOptions, tracer: Tracer): Promise<SpecialistResult> {
    const startedAt = Date.now();
    let state: SpecialistState = 'RECEIVE_QUERY';

    const advance = (to: SpecialistState) => {
      options.onTransition?.({ specialist: this.role, from: state, to, at: new Date() });
      state = to;
    };

    logger.agent(this.role, `Received: ${truncateString(query, 80)}`);

    try {
      advance('RETRIEVE_CONTEXT');
      const history = await this.dependencies.memory.getRelevantContext(query, {
        sessionId: options.sessionId,
      });

      advance('REASON');
      const reasoning = await tracer.trace('reasoner.analyze', { query }, () =>
        this.dependencies.reasoner.analyze(query, options.context, history, {
          directive: this.directive,
          signal: options.signal,
        })
      );

      advance('SELECT_TOOLS');
      const selected = await this.selectTools(query, reasoning, options.signal);

      advance('EXECUTE_TOOLS');
      const invocations = await Promise.all(
        selected.map((toolName) => this.invokeTool(toolName, query, tracer, options.signal))
      );
      const toolResults: Record<string, ToolInvocationResult> = {};
      for (const invocation of invocations) {
        toolResults[invocation.toolName] = invocation;
      }

      advance('SYNTHESIZE_RESPONSE');
      const response = await tracer.trace('specialist.synthesize', { specialist: this.role }, () =>
        this.synthesize(query, options.context, reasoning, toolResults, history, options.signal)
      );

      advance('DONE');
      logger.agent(this.role, `Done with ${selected.length} tool(s)`);

      return {
        specialist: this.role,
        response,
        toolResults,
        toolsUsed: selected,
        processingTimeMs: Date.now() - startedAt,
        context: options.context,
        reasoning,
      };
    } catch (error) {
      const failedIn = state;
      advance('FAILED');
      throw new SpecialistError(
        `${this.name} failed during ${failedIn}: ${formatError(error)}`,
        this.role,
        failedIn,
        error
      );
    }
  }

  private async selectTools(query: string, reasoning: ReasoningAnalysis, signal?: AbortSignal): Promise<string[]> {
    const { selector, provider, synthesisTimeoutMs } = this.dependencies;
    const selected = selector.select(query, reasoning.toolHints).filter((name) => this.canUseTool(name));
    if (selected.length > 0 || !provider) {
      return selected;
    }

    const refined = await selector.refine(query, reasoning, provider, {
      timeoutMs: synthesisTimeoutMs,
      signal,
    });
    return refined.filter((name) => this.canUseTool(name));
  }

  /**
   * Never rejects: a failed tool comes back with `error` set.
   */
  private async invokeTool(
    toolName: string,
    query: string,
    tracer: Tracer,
    signal?: AbortSignal
  ): Promise<ToolInvocationResult> {
    const { registry } = this.dependencies;
    const startedAt = Date.now();
    let input: Record<string, unknown> = {};

    try {
      input = registry.extractArguments(toolName, query);
      const args = input;
      return await tracer.trace(
        `tool.${toolName}`,
        args,
        () => registry.execute(toolName, args, { signal }),
        (result) => result.output
      );
    } catch (error) {
      return {
        toolName,
        input,
        output: null,
        summary: '',
        error: error instanceof Error ? error.message : String(error),
        errorCode: errorCode(error),
        durationMs: Date.now() - startedAt,
      };
    }
  }

  private async synthesize(
    query: string,
    context: string | null,
    reasoning: ReasoningAnalysis,
    toolResults: Record<string, ToolInvocationResult>,
    history: ConversationTurn[],
    signal?: AbortSignal
  ): Promise<string> {
    const { provider, synthesisTimeoutMs } = this.dependencies;
    const deterministic = () => this.synthesizeDeterministic(context, reasoning, toolResults);

    if (!provider) {
      return deterministic();
    }

    const prompt = SYNTHESIS_PROMPT_TEMPLATE.replace('{{query}}', () => query)
      .replace('{{analysis}}', () => reasoning.text)
      .replace('{{context}}', () => context ?? 'None')
      .replace('{{toolResults}}', () => this.renderToolResults(toolResults));

    try {
      const text = await completeText(
        provider,
        {
          system: `${this.directive}\n\n${SYNTHESIS_GROUNDING}`,
          messages: [
            ...history
              .slice()
              .reverse()
              .flatMap((turn) => [
                { role: 'user' as const, content: turn.query },
                { role: 'assistant' as const, content: turn.response },
              ]),
            { role: 'user', content: prompt },
          ],
        },
        synthesisTimeoutMs ?? DEFAULT_PROVIDER_TIMEOUT_MS,
        signal
      );
      return text.length > 0 ? text : deterministic();
    } catch (error) {
      if (error instanceof ProviderUnavailableError) {
        logger.warn(`${this.name} synthesis fell back to template: ${formatError(error)}`);
        return deterministic();
      }
      throw error;
    }
  }

  protected synthesizeDeterministic(
    context: string | null,
    reasoning: ReasoningAnalysis,
    toolResults: Record<string, ToolInvocationResult>
  ): string {
    const lines = [`[${this.name}] ${reasoning.text}`];
    if (context) {
      lines.push(`Building on: ${truncateString(context, CONTEXT_PREVIEW_LENGTH)}`);
    }
    for (const result of Object.values(toolResults)) {
      lines.push(
        result.error ? `- ${result.toolName}: failed (${result.error})` : `- ${result.toolName}: ${result.summary}`
      );
    }
    return lines.join('\n');
  }

  private renderToolResults(toolResults: Record<string, ToolInvocationResult>): string {
    const entries = Object.values(toolResults);
    if (entries.length === 0) return 'None';
    return entries
      .map((result) =>
        result.error
          ? `${result.toolName}: ERROR ${result.error}`
          : `${result.toolName}: ${JSON.stringify(result.output)}`
      )
      .join('\n');
  }
}
