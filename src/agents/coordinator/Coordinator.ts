import { EventEmitter } from 'eventemitter3';
import { nanoid } from 'nanoid';
import type { SpecialistRegistry } from '../base/SpecialistRegistry.js';
import type { SpecialistResult, SpecialistRole, StateTransition } from '../base/types.js';
import type { ToolInvocationResult } from '../../tools/types.js';
import type { LLMProvider } from '../../llm/types.js';
import { DEFAULT_SPECIALIST_RULES, type SpecialistRule } from './rules.js';
import { APOLOGY_RESPONSE, COORDINATOR_SYSTEM_PROMPT, FINAL_SYNTHESIS_TEMPLATE } from './prompts.js';
import { Tracer } from '../../tracing/Tracer.js';
import { completeText } from '../../llm/LLMProvider.js';
import { classifyComplexity, type QueryComplexity } from '../../evaluation/complexity.js';
import { DEFAULT_SESSION_ID } from '../../memory/types.js';
import {
  NoSpecialistError,
  RunCancelledError,
  toRecordedError,
  formatError,
  type RecordedError,
} from '../../utils/errors.js';
import { DEFAULT_PROVIDER_TIMEOUT_MS } from '../../config/defaults.js';
import { logger } from '../../cli/ui/logger.js';

export interface TaskAnalysis {
  specialistsNeeded: SpecialistRole[];
  reasoning: string;
  complexity: QueryComplexity;
}

export interface OrchestrationResult {
  runId: string;
  query: string;
  sessionId: string;
  finalResponse: string;
  agentsUsed: readonly SpecialistRole[];
  specialistResults: readonly Readonly<SpecialistResult>[];
  toolResults: Readonly<Record<string, ToolInvocationResult>>;
  toolsUsed: readonly string[];
  analysis: TaskAnalysis;
  processingTimeMs: number;
  errors: readonly Readonly<RecordedError>[];
  cancelled: boolean;
}

/** Freezes a run result together with every collection it holds. */
function freezeResult(result: OrchestrationResult): Readonly<OrchestrationResult> {
  for (const specialist of result.specialistResults) {
    Object.freeze(specialist.toolsUsed);
    Object.freeze(specialist.toolResults);
    Object.freeze(specialist);
  }
  result.errors.forEach((error) => Object.freeze(error));
  Object.freeze(result.analysis.specialistsNeeded);
  Object.freeze(result.analysis);
  Object.freeze(result.agentsUsed);
  Object.freeze(result.specialistResults);
  Object.freeze(result.toolResults);
  Object.freeze(result.toolsUsed);
  Object.freeze(result.errors);
  return Object.freeze(result);
}

export interface CoordinatorEvents {
  runStarted: (runId: string, query: string) => void;
  specialistStarted: (runId: string, role: SpecialistRole, context: string | null) => void;
  specialistTransition: (runId: string, transition: StateTransition) => void;
  specialistCompleted: (runId: string, result: SpecialistResult) => void;
  specialistFailed: (runId: string, role: SpecialistRole, error: RecordedError) => void;
  runCompleted: (result: OrchestrationResult) => void;
}

export interface CoordinatorDependencies {
  registry: SpecialistRegistry;
  provider: LLMProvider | null;
  defaultSpecialist?: SpecialistRole;
  synthesisTimeoutMs?: number;
  rules?: SpecialistRule[];
}

export interface CoordinateOptions {
  sessionId?: string;
  signal?: AbortSignal;
  tracer?: Tracer;
}

interface PipelineState {
  context: string | null;
  results: SpecialistResult[];
  agentsUsed: SpecialistRole[];
  errors: RecordedError[];
  cancelled: boolean;
}

export class Coordinator extends EventEmitter<CoordinatorEvents> {
  private registry: SpecialistRegistry;
  private provider: LLMProvider | null;
  private defaultSpecialist: SpecialistRole;
  private synthesisTimeoutMs: number;
  private rules: SpecialistRule[];

  constructor(dependencies: CoordinatorDependencies) {
    super();
    this.registry = dependencies.registry;
    this.provider = dependencies.provider;
    this.defaultSpecialist = dependencies.defaultSpecialist ?? 'general';
    this.synthesisTimeoutMs = dependencies.synthesisTimeoutMs ?? DEFAULT_PROVIDER_TIMEOUT_MS;
    this.rules = dependencies.rules ?? DEFAULT_SPECIALIST_RULES;
  }

  /**
   * Ordered specialists for a query. Matched roles that are not registered
   * are dropped; no match falls back to the default specialist.
   */
  analyze(query: string): TaskAnalysis {
    const complexity = classifyComplexity(query);
    const matched = this.rules.filter((rule) => rule.matches(query));
    const specialistsNeeded = [...new Set(matched.map((rule) => rule.role))].filter((role) =>
      this.registry.has(role)
    );

    if (specialistsNeeded.length > 0) {
      const reasons = matched
        .filter((rule) => specialistsNeeded.includes(rule.role))
        .map((rule) => `${rule.role} (${rule.describe})`);
      return { specialistsNeeded, reasoning: `Matched ${reasons.join('; ')}`, complexity };
    }

    if (this.registry.has(this.defaultSpecialist)) {
      return {
        specialistsNeeded: [this.defaultSpecialist],
        reasoning: `No specialist rule matched; using ${this.defaultSpecialist}`,
        complexity,
      };
    }

    return { specialistsNeeded: [], reasoning: 'No specialist available for this query', complexity };
  }

  /**
   * Run the specialists in order, threading each completed response into
   * the next as context. Operational failures are recorded in `errors`;
   * this never rejects for them.
   */
  async coordinate(query: string, options: CoordinateOptions = {}): Promise<OrchestrationResult> {
    const tracer = options.tracer ?? Tracer.disabled();
    const runId = nanoid();
    const sessionId = options.sessionId ?? DEFAULT_SESSION_ID;
    const startedAt = Date.now();

    this.emit('runStarted', runId, query);

    return tracer.trace(
      'coordinator.coordinate',
      { runId, query, sessionId },
      async (scope) => {
        const analysis = this.analyze(query);
        logger.debug(`[coordinator] ${analysis.reasoning}`);

        const initial: PipelineState = {
          context: null,
          results: [],
          agentsUsed: [],
          errors:
            analysis.specialistsNeeded.length === 0
              ? [toRecordedError('coordinator', new NoSpecialistError(this.matchedRoles(query)))]
              : [],
          cancelled: false,
        };

        const state = await analysis.specialistsNeeded.reduce<Promise<PipelineState>>(
          async (pending, role, index) =>
            this.runStep(await pending, role, analysis.specialistsNeeded.slice(index), {
              runId,
              query,
              sessionId,
              signal: options.signal,
              tracer: scope,
            }),
          Promise.resolve(initial)
        );

        const synthesis = await this.synthesizeFinal(query, state.results, options.signal);

        const toolResults: Record<string, ToolInvocationResult> = {};
        const toolsUsed: string[] = [];
        for (const result of state.results) {
          Object.assign(toolResults, result.toolResults);
          for (const tool of result.toolsUsed) {
            if (!toolsUsed.includes(tool)) toolsUsed.push(tool);
          }
        }

        const result = freezeResult({
          runId,
          query,
          sessionId,
          finalResponse: synthesis.response,
          agentsUsed: [...state.agentsUsed],
          specialistResults: [...state.results],
          toolResults,
          toolsUsed,
          analysis,
          processingTimeMs: Date.now() - startedAt,
          errors: synthesis.error ? [...state.errors, synthesis.error] : [...state.errors],
          cancelled: state.cancelled,
        });

        this.emit('runCompleted', result);
        return result;
      },
      (result) => ({ agentsUsed: result.agentsUsed, errors: result.errors.length })
    );
  }

  private async runStep(
    state: PipelineState,
    role: SpecialistRole,
    remaining: SpecialistRole[],
    run: { runId: string; query: string; sessionId: string; signal?: AbortSignal; tracer: Tracer }
  ): Promise<PipelineState> {
    if (state.cancelled) return state;

    if (run.signal?.aborted) {
      logger.warn(`Run ${run.runId} cancelled before ${role}`);
      return {
        ...state,
        cancelled: true,
        errors: [...state.errors, toRecordedError('cancelled', new RunCancelledError(run.runId, remaining))],
      };
    }

    const specialist = this.registry.get(role);
    if (!specialist) {
      return {
        ...state,
        errors: [...state.errors, toRecordedError('coordinator', new NoSpecialistError([role]))],
      };
    }

    this.emit('specialistStarted', run.runId, role, state.context);

    try {
      const result = await specialist.run(
        run.query,
        {
          sessionId: run.sessionId,
          context: state.context,
          signal: run.signal,
          onTransition: (transition) => this.emit('specialistTransition', run.runId, transition),
        },
        run.tracer
      );

      const toolErrors = Object.values(result.toolResults)
        .filter((invocation) => invocation.error !== undefined)
        .map((invocation) => ({
          stage: 'tool' as const,
          code: invocation.errorCode ?? 'TOOL_EXECUTION_ERROR',
          message: invocation.error ?? '',
          specialist: role,
          tool: invocation.toolName,
        }));

      this.emit('specialistCompleted', run.runId, result);

      return {
        ...state,
        context: result.response,
        results: [...state.results, result],
        agentsUsed: [...state.agentsUsed, role],
        errors: [...state.errors, ...toolErrors],
      };
    } catch (error) {
      const recorded = toRecordedError('specialist', error, { specialist: role });
      logger.warn(`${role} specialist failed: ${formatError(error)}`);
      this.emit('specialistFailed', run.runId, role, recorded);

      return {
        ...state,
        agentsUsed: [...state.agentsUsed, role],
        errors: [...state.errors, recorded],
      };
    }
  }

  private async synthesizeFinal(
    query: string,
    results: SpecialistResult[],
    signal?: AbortSignal
  ): Promise<{ response: string; error?: RecordedError }> {
    if (results.length === 0) {
      return { response: APOLOGY_RESPONSE };
    }

    const deterministic = synthesizeDeterministic(results);
    if (!this.provider) {
      return { response: deterministic };
    }

    const prompt = FINAL_SYNTHESIS_TEMPLATE.replace('{{query}}', () => query).replace('{{responses}}', () =>
      results.map((result) => `**${result.specialist.toUpperCase()}**: ${result.response}`).join('\n\n')
    );

    try {
      const text = await completeText(
        this.provider,
        {
          system: COORDINATOR_SYSTEM_PROMPT,
          messages: [{ role: 'user', content: prompt }],
        },
        this.synthesisTimeoutMs,
        signal
      );
      return { response: text.length > 0 ? text : deterministic };
    } catch (error) {
      logger.warn(`Final synthesis fell back to concatenation: ${formatError(error)}`);
      return { response: deterministic, error: toRecordedError('synthesis', error) };
    }
  }

  private matchedRoles(query: string): string[] {
    return this.rules.filter((rule) => rule.matches(query)).map((rule) => rule.role);
  }
}

/**
 * A single response is returned as is; several are labelled by role and
 * joined in run order.
 */
export function synthesizeDeterministic(results: SpecialistResult[]): string {
  if (results.length === 1) {
    return results[0]!.response;
  }
  return results.map((result) => `**${result.specialist.toUpperCase()}**: ${result.response}`).join('\n\n');
}
