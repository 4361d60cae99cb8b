import { z } from 'zod';
import type { Config } from '../config/Config.js';
import type { LLMProvider } from '../llm/types.js';
import type { SearchProvider } from '../providers/search/types.js';
import type { WeatherProvider } from '../providers/weather/types.js';
import type { TracingSink } from '../tracing/types.js';
import type { TrainingDataSink } from '../training/types.js';
import type { SpecialistRole } from '../agents/base/types.js';
import type { OrchestrationResult, TaskAnalysis } from '../agents/coordinator/Coordinator.js';
import type { ToolInfo, ToolStats } from '../tools/types.js';
import type { Evaluation } from '../evaluation/Evaluator.js';
import { createLLMProvider } from '../llm/LLMProvider.js';
import { createSearchProvider } from '../providers/search/index.js';
import { SimulatedWeatherProvider } from '../providers/weather/SimulatedWeatherProvider.js';
import { ToolRegistry } from '../tools/ToolRegistry.js';
import { ToolSelector } from '../tools/ToolSelector.js';
import { registerBuiltinTools } from '../tools/builtin/index.js';
import type { ConversationMemory } from '../memory/ConversationMemory.js';
import { createConversationMemory } from '../memory/index.js';
import { DEFAULT_SESSION_ID } from '../memory/types.js';
import { Reasoner } from '../reasoning/Reasoner.js';
import { SpecialistRegistry } from '../agents/base/SpecialistRegistry.js';
import { registerDefaultSpecialists } from '../agents/registerDefaults.js';
import { Coordinator } from '../agents/coordinator/Coordinator.js';
import { Evaluator } from '../evaluation/Evaluator.js';
import { Tracer } from '../tracing/Tracer.js';
import { createTracer } from '../tracing/index.js';
import { JsonlTrainingDataSink } from '../training/JsonlTrainingDataSink.js';
import { validate } from '../utils/validation.js';
import { formatError } from '../utils/errors.js';
import { logger } from '../cli/ui/logger.js';

const QuerySchema = z.string().trim().min(1, 'Query must not be empty');

/**
 * Replacements for the services `createWorkflow` would build from config.
 * `provider: null` forces the deterministic fallback mode.
 */
export interface WorkflowOverrides {
  provider?: LLMProvider | null;
  searchProvider?: SearchProvider;
  weatherProvider?: WeatherProvider;
  memory?: ConversationMemory;
  tracingSink?: TracingSink | null;
  trainingSink?: TrainingDataSink | null;
  now?: () => Date;
}

export interface ProcessOptions {
  sessionId?: string;
  signal?: AbortSignal;
  evaluate?: boolean;
}

export interface WorkflowOutcome {
  result: OrchestrationResult;
  evaluation?: Evaluation;
}

export interface DryRunPlan {
  analysis: TaskAnalysis;
  tools: string[];
}

export interface SessionStats {
  totalQueries: number;
  errorCount: number;
  totalProcessingTimeMs: number;
  averageProcessingTimeMs: number;
  specialistUsage: Partial<Record<SpecialistRole, number>>;
  toolUsage: Record<string, number>;
}

interface WorkflowServices {
  provider: LLMProvider | null;
  tools: ToolRegistry;
  selector: ToolSelector;
  memory: ConversationMemory;
  specialists: SpecialistRegistry;
  coordinator: Coordinator;
  evaluator: Evaluator;
  tracer: Tracer;
  trainingSink: TrainingDataSink | null;
}

/**
 * Owns every service for the lifetime of the process. Independent queries
 * may be processed concurrently.
 */
export class Workflow {
  readonly provider: LLMProvider | null;
  readonly tools: ToolRegistry;
  readonly selector: ToolSelector;
  readonly memory: ConversationMemory;
  readonly specialists: SpecialistRegistry;
  readonly coordinator: Coordinator;
  readonly evaluator: Evaluator;
  readonly tracer: Tracer;

  private trainingSink: TrainingDataSink | null;
  private stats: SessionStats = {
    totalQueries: 0,
    errorCount: 0,
    totalProcessingTimeMs: 0,
    averageProcessingTimeMs: 0,
    specialistUsage: {},
    toolUsage: {},
  };

  constructor(services: WorkflowServices) {
    this.provider = services.provider;
    this.tools = services.tools;
    this.selector = services.selector;
    this.memory = services.memory;
    this.specialists = services.specialists;
    this.coordinator = services.coordinator;
    this.evaluator = services.evaluator;
    this.tracer = services.tracer;
    this.trainingSink = services.trainingSink;
  }

  get offline(): boolean {
    return this.provider === null;
  }

  async process(query: string, options: ProcessOptions = {}): Promise<WorkflowOutcome> {
    const text = validate(QuerySchema, query, 'query');
    const sessionId = options.sessionId ?? DEFAULT_SESSION_ID;

    const result = await this.coordinator.coordinate(text, {
      sessionId,
      signal: options.signal,
      tracer: this.tracer,
    });

    if (!result.cancelled) {
      await this.remember(result);
      if (result.specialistResults.length > 0) {
        await this.recordExample(result);
      }
    }

    this.updateStats(result);

    const evaluation = options.evaluate ? this.evaluator.evaluate(result, result.query) : undefined;
    return { result, evaluation };
  }

  /** What a query would trigger, without running anything. */
  plan(query: string): DryRunPlan {
    const text = validate(QuerySchema, query, 'query');
    return {
      analysis: this.coordinator.analyze(text),
      tools: this.selector.select(text),
    };
  }

  listTools(): ToolInfo[] {
    return this.tools.listTools();
  }

  getToolStats(): Record<string, ToolStats> {
    return this.tools.getStats();
  }

  getSessionStats(): SessionStats {
    return {
      ...this.stats,
      specialistUsage: { ...this.stats.specialistUsage },
      toolUsage: { ...this.stats.toolUsage },
    };
  }

  close(): void {
    this.memory.close();
  }

  private async remember(result: OrchestrationResult): Promise<void> {
    try {
      await this.memory.append(
        {
          query: result.query,
          response: result.finalResponse,
          timestamp: new Date(),
          toolsUsed: [...result.toolsUsed],
        },
        result.sessionId
      );
    } catch (error) {
      logger.warn(`Could not store conversation turn: ${formatError(error)}`);
    }
  }

  private async recordExample(result: OrchestrationResult): Promise<void> {
    if (!this.trainingSink) return;
    try {
      await this.trainingSink.record({
        query: result.query,
        response: result.finalResponse,
        toolsUsed: [...result.toolsUsed],
        processingTimeMs: result.processingTimeMs,
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      logger.warn(`Could not record training example: ${formatError(error)}`);
    }
  }

  private updateStats(result: OrchestrationResult): void {
    const stats = this.stats;
    stats.totalQueries++;
    stats.errorCount += result.errors.length;
    stats.totalProcessingTimeMs += result.processingTimeMs;
    stats.averageProcessingTimeMs = stats.totalProcessingTimeMs / stats.totalQueries;
    for (const role of result.agentsUsed) {
      stats.specialistUsage[role] = (stats.specialistUsage[role] ?? 0) + 1;
    }
    for (const tool of result.toolsUsed) {
      stats.toolUsage[tool] = (stats.toolUsage[tool] ?? 0) + 1;
    }
  }
}

export function createWorkflow(config: Config, overrides: WorkflowOverrides = {}): Workflow {
  const provider = overrides.provider !== undefined ? overrides.provider : createLLMProvider(config.llm);

  const tools = new ToolRegistry({ timeoutMs: config.tools.timeoutMs });
  registerBuiltinTools(tools, {
    search: overrides.searchProvider ?? createSearchProvider(config.tools.search),
    weather: overrides.weatherProvider ?? new SimulatedWeatherProvider(),
    maxSearchResults: config.tools.search.maxResults,
    now: overrides.now,
  });

  const selector = new ToolSelector(tools);
  const memory = overrides.memory ?? createConversationMemory(config.memory);
  const reasoner = new Reasoner({
    provider,
    selector,
    tools: () => tools.listTools(),
    timeoutMs: config.orchestration.reasoningTimeoutMs,
  });

  const specialists = new SpecialistRegistry();
  registerDefaultSpecialists(specialists, {
    registry: tools,
    selector,
    reasoner,
    memory,
    provider,
    synthesisTimeoutMs: config.orchestration.synthesisTimeoutMs,
  });

  const coordinator = new Coordinator({
    registry: specialists,
    provider,
    defaultSpecialist: config.orchestration.defaultSpecialist,
    synthesisTimeoutMs: config.orchestration.synthesisTimeoutMs,
  });

  let tracer: Tracer;
  if (overrides.tracingSink !== undefined) {
    tracer = Tracer.create(overrides.tracingSink);
  } else {
    tracer = createTracer(config.tracing);
  }

  let trainingSink: TrainingDataSink | null = null;
  if (overrides.trainingSink !== undefined) {
    trainingSink = overrides.trainingSink;
  } else if (config.trainingData.enabled) {
    trainingSink = new JsonlTrainingDataSink(config.trainingData.filePath);
  }

  return new Workflow({
    provider,
    tools,
    selector,
    memory,
    specialists,
    coordinator,
    evaluator: new Evaluator(),
    tracer,
    trainingSink,
  });
}
