import { describe, it, expect, vi } from 'vitest';
import { createHarness, createMockLLMProvider } from '../../helpers/harness.js';
import { Coordinator, synthesizeDeterministic } from '../../../src/agents/coordinator/Coordinator.js';
import { APOLOGY_RESPONSE } from '../../../src/agents/coordinator/prompts.js';
import { SpecialistRegistry } from '../../../src/agents/base/SpecialistRegistry.js';
import { registerDefaultSpecialists } from '../../../src/agents/registerDefaults.js';
import { Researcher } from '../../../src/agents/research/Researcher.js';
import { Writer } from '../../../src/agents/writing/Writer.js';
import { InMemoryConversationStore } from '../../../src/memory/stores/InMemoryConversationStore.js';
import { SIMULATED_SEARCH_NOTE } from '../../../src/tools/builtin/webSearch.js';
import { Tracer } from '../../../src/tracing/Tracer.js';
import { MemoryTracingSink } from '../../../src/tracing/sinks.js';
import { truncateString } from '../../../src/utils/validation.js';
import type { SpecialistResult } from '../../../src/agents/base/types.js';
import type { ConversationTurn } from '../../../src/memory/types.js';
import type { LLMProvider } from '../../../src/llm/types.js';

class OfflineStore extends InMemoryConversationStore {
  async getRelevantContext(): Promise<ConversationTurn[]> {
    throw new Error('store offline');
  }
}

function createCoordinator(provider: LLMProvider | null = null) {
  const { dependencies } = createHarness({ provider });
  const registry = new SpecialistRegistry();
  registerDefaultSpecialists(registry, dependencies);
  return new Coordinator({ registry, provider });
}

function result(specialist: SpecialistResult['specialist'], response: string): SpecialistResult {
  return {
    specialist,
    response,
    toolResults: {},
    toolsUsed: [],
    processingTimeMs: 1,
    context: null,
    reasoning: { text: '', toolHints: [], source: 'fallback' },
  };
}

describe('Coordinator', () => {
  describe('analyze', () => {
    it('should fall back to the general specialist', () => {
      const analysis = createCoordinator().analyze('55+55');

      expect(analysis).toEqual({
        specialistsNeeded: ['general'],
        reasoning: 'No specialist rule matched; using general',
        complexity: 'simple',
      });
    });

    it('should order matched specialists by rule order', () => {
      const analysis = createCoordinator().analyze('write a report on the data trends');

      expect(analysis.specialistsNeeded).toEqual(['research', 'analysis', 'writing']);
    });

    it('should pick the technical specialist', () => {
      expect(createCoordinator().analyze('implement a parser').specialistsNeeded).toEqual(['technical']);
    });

    it('should drop unregistered roles', () => {
      const { dependencies } = createHarness();
      const registry = new SpecialistRegistry();
      registry.register(new Writer(dependencies));

      const analysis = new Coordinator({ registry, provider: null }).analyze('research and write');

      expect(analysis.specialistsNeeded).toEqual(['writing']);
      expect(analysis.reasoning).toBe('Matched writing (write, summary, summarize, document or report)');
    });

    it('should report when nothing can run', () => {
      const analysis = new Coordinator({ registry: new SpecialistRegistry(), provider: null }).analyze('hello');

      expect(analysis.specialistsNeeded).toEqual([]);
      expect(analysis.reasoning).toBe('No specialist available for this query');
    });
  });

  describe('coordinate', () => {
    it('should answer arithmetic through the general specialist', async () => {
      const outcome = await createCoordinator().coordinate('55+55');

      expect(outcome.agentsUsed).toEqual(['general']);
      expect(outcome.toolsUsed).toEqual(['calculator']);
      expect(outcome.finalResponse).toBe(
        '[General Assistant] Query analysis: 55+55. Keyword scan suggests: calculator.\n- calculator: 55+55 = 110'
      );
      expect(outcome.errors).toEqual([]);
      expect(outcome.cancelled).toBe(false);
      expect(outcome.sessionId).toBe('default');
      expect(Object.isFrozen(outcome)).toBe(true);
    });

    it('should freeze every collection in the result', async () => {
      const outcome = await createCoordinator().coordinate('55+55');

      expect(() => Reflect.apply(Array.prototype.push, outcome.agentsUsed, ['technical'])).toThrow(TypeError);
      expect(() => Reflect.apply(Array.prototype.push, outcome.errors, [{}])).toThrow(TypeError);
      expect(() => Reflect.apply(Array.prototype.push, outcome.toolsUsed, ['time'])).toThrow(TypeError);
      expect(Reflect.set(outcome.toolResults, 'fake', {})).toBe(false);
      expect(Reflect.set(outcome, 'finalResponse', 'changed')).toBe(false);
      expect(Object.isFrozen(outcome.specialistResults)).toBe(true);
      expect(Object.isFrozen(outcome.specialistResults[0])).toBe(true);
      expect(Object.isFrozen(outcome.specialistResults[0]?.toolResults)).toBe(true);
      expect(outcome.agentsUsed).toEqual(['general']);
      expect(Object.keys(outcome.toolResults)).toEqual(['calculator']);
    });

    it('should route search queries to research with simulated results', async () => {
      const outcome = await createCoordinator().coordinate('search for AI news');

      expect(outcome.agentsUsed).toEqual(['research']);
      expect(outcome.toolsUsed).toEqual(['web_search']);
      expect(outcome.toolResults.web_search?.output).toMatchObject({ note: SIMULATED_SEARCH_NOTE, totalResults: 2 });
      expect(outcome.errors).toEqual([]);
    });

    it('should pass each response on as the next context', async () => {
      const outcome = await createCoordinator().coordinate('research AI and write a summary');
      const [research, writing] = outcome.specialistResults;

      expect(outcome.agentsUsed).toEqual(['research', 'writing']);
      expect(research?.context).toBeNull();
      expect(writing?.context).toBe(research?.response);
      expect(writing?.response).toContain(`Building on: ${truncateString(research?.response ?? '', 200)}`);
      expect(outcome.finalResponse).toBe(
        `**RESEARCH**: ${research?.response}\n\n**WRITING**: ${writing?.response}`
      );
      expect(outcome.toolsUsed).toEqual(['web_search']);
    });

    it('should record a failed specialist and carry on', async () => {
      const healthy = createHarness();
      const broken = createHarness({ memory: new OfflineStore({ mode: 'recency', contextLimit: 3 }) });
      const registry = new SpecialistRegistry();
      registry.register(new Researcher(broken.dependencies));
      registry.register(new Writer(healthy.dependencies));
      const coordinator = new Coordinator({ registry, provider: null });

      const outcome = await coordinator.coordinate('research AI and write a summary');

      expect(outcome.agentsUsed).toEqual(['research', 'writing']);
      expect(outcome.specialistResults.map((r) => r.specialist)).toEqual(['writing']);
      expect(outcome.specialistResults[0]?.context).toBeNull();
      expect(outcome.errors).toEqual([
        {
          stage: 'specialist',
          code: 'SPECIALIST_FAILED',
          message: 'Research Specialist failed during RETRIEVE_CONTEXT: store offline',
          specialist: 'research',
        },
      ]);
      expect(outcome.finalResponse).toBe(outcome.specialistResults[0]?.response);
    });

    it('should record tool failures', async () => {
      const outcome = await createCoordinator().coordinate('1/0 please');

      expect(outcome.errors).toEqual([
        {
          stage: 'tool',
          code: 'TOOL_EXECUTION_ERROR',
          message: 'Tool "calculator" failed: Invalid arithmetic expression "1/0": result is not a finite number',
          specialist: 'general',
          tool: 'calculator',
        },
      ]);
      expect(outcome.toolsUsed).toEqual(['calculator']);
    });

    it('should apologize when no specialist can run', async () => {
      const coordinator = new Coordinator({ registry: new SpecialistRegistry(), provider: null });

      const outcome = await coordinator.coordinate('55+55');

      expect(outcome.finalResponse).toBe(APOLOGY_RESPONSE);
      expect(outcome.agentsUsed).toEqual([]);
      expect(outcome.errors).toEqual([
        {
          stage: 'coordinator',
          code: 'NO_SPECIALIST',
          message: 'No specialist matched the query and no default specialist is registered',
        },
      ]);
    });

    it('should stop before the first specialist when already cancelled', async () => {
      const controller = new AbortController();
      controller.abort();

      const outcome = await createCoordinator().coordinate('research AI and write a summary', {
        signal: controller.signal,
      });

      expect(outcome.cancelled).toBe(true);
      expect(outcome.agentsUsed).toEqual([]);
      expect(outcome.finalResponse).toBe(APOLOGY_RESPONSE);
      expect(outcome.errors).toEqual([
        {
          stage: 'cancelled',
          code: 'RUN_CANCELLED',
          message: `Run ${outcome.runId} was cancelled before research, writing`,
        },
      ]);
    });

    it('should skip the remaining specialists when cancelled mid-run', async () => {
      const coordinator = createCoordinator();
      const controller = new AbortController();
      coordinator.on('specialistCompleted', () => controller.abort());

      const outcome = await coordinator.coordinate('research AI and write a summary', { signal: controller.signal });

      expect(outcome.cancelled).toBe(true);
      expect(outcome.agentsUsed).toEqual(['research']);
      expect(outcome.errors.map((e) => e.message)).toEqual([`Run ${outcome.runId} was cancelled before writing`]);
      expect(outcome.finalResponse).toBe(outcome.specialistResults[0]?.response);
    });

    it('should use the session id', async () => {
      const outcome = await createCoordinator().coordinate('55+55', { sessionId: 'alice' });
      expect(outcome.sessionId).toBe('alice');
    });

    it('should emit lifecycle events in order', async () => {
      const coordinator = createCoordinator();
      const events: string[] = [];
      coordinator.on('runStarted', () => events.push('runStarted'));
      coordinator.on('specialistStarted', (_runId, role) => events.push(`started:${role}`));
      coordinator.on('specialistCompleted', (_runId, completed) => events.push(`completed:${completed.specialist}`));
      coordinator.on('runCompleted', () => events.push('runCompleted'));
      const transitions = vi.fn();
      coordinator.on('specialistTransition', transitions);

      await coordinator.coordinate('research AI and write a summary');

      expect(events).toEqual([
        'runStarted',
        'started:research',
        'completed:research',
        'started:writing',
        'completed:writing',
        'runCompleted',
      ]);
      expect(transitions).toHaveBeenCalledTimes(12);
    });

    it('should emit specialistFailed', async () => {
      const broken = createHarness({ memory: new OfflineStore({ mode: 'recency', contextLimit: 3 }) });
      const registry = new SpecialistRegistry();
      registry.register(new Researcher(broken.dependencies));
      const coordinator = new Coordinator({ registry, provider: null });
      const failed = vi.fn();
      coordinator.on('specialistFailed', failed);

      await coordinator.coordinate('find it');

      expect(failed).toHaveBeenCalledTimes(1);
      expect(failed.mock.calls[0]?.[1]).toBe('research');
    });

    it('should trace the run', async () => {
      const sink = new MemoryTracingSink();

      await createCoordinator().coordinate('55+55', { tracer: Tracer.create(sink) });

      const [root] = sink.find('coordinator.coordinate');
      expect(root?.parentId).toBeNull();
      expect(sink.find('specialist.general')[0]?.parentId).toBe(root?.id);
    });
  });

  describe('final synthesis with a provider', () => {
    it('should use the model answer', async () => {
      const provider = createMockLLMProvider('Sum.\nTOOLS: none', 'Specialist answer', 'Final answer');

      const outcome = await createCoordinator(provider).coordinate('55+55');

      expect(outcome.finalResponse).toBe('Final answer');
      expect(outcome.errors).toEqual([]);
    });

    it('should fall back to the specialist responses when the model fails', async () => {
      const provider = createMockLLMProvider('Sum.\nTOOLS: none', 'Specialist answer');
      vi.mocked(provider.complete)
        .mockResolvedValueOnce({
          content: 'Sum.\nTOOLS: none',
          model: 'test-model',
          usage: { inputTokens: 1, outputTokens: 1, totalTokens: 2 },
          stopReason: 'end_turn',
        })
        .mockResolvedValueOnce({
          content: 'Specialist answer',
          model: 'test-model',
          usage: { inputTokens: 1, outputTokens: 1, totalTokens: 2 },
          stopReason: 'end_turn',
        })
        .mockRejectedValueOnce(new Error('boom'));

      const outcome = await createCoordinator(provider).coordinate('55+55');

      expect(outcome.finalResponse).toBe('Specialist answer');
      expect(outcome.errors).toEqual([
        { stage: 'synthesis', code: 'PROVIDER_ERROR', message: 'anthropic request failed: boom' },
      ]);
    });
  });
});

describe('synthesizeDeterministic', () => {
  it('should return a single response unchanged', () => {
    expect(synthesizeDeterministic([result('general', 'just this')])).toBe('just this');
  });

  it('should label several responses by role', () => {
    expect(synthesizeDeterministic([result('research', 'found'), result('writing', 'wrote')])).toBe(
      '**RESEARCH**: found\n\n**WRITING**: wrote'
    );
  });
});
